/**
 * Cross-process mutual exclusion for sync cycles, backed by the lock record
 * in the state store.
 */
import crypto from 'node:crypto';
import { logger } from '../logger.js';
import type { StateStore } from './state.js';
import type { LockRecord } from './types.js';

/** A held lock older than this is assumed abandoned (crashed holder). */
export const LOCK_TTL_MS = 600_000;

const MAX_CAS_ATTEMPTS = 5;

export interface SyncLockOptions {
  ttlMs?: number;
  now?: () => number;
  /** Owner id for each acquisition; a random UUID by default */
  newOwner?: () => string;
}

/** Proof of one successful acquisition, required to release it */
export interface LockLease {
  owner: string;
  acquiredAt: number;
}

export class SyncLock {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly newOwner: () => string;

  constructor(private readonly store: StateStore, options: SyncLockOptions = {}) {
    this.ttlMs = options.ttlMs ?? LOCK_TTL_MS;
    this.now = options.now ?? Date.now;
    this.newOwner = options.newOwner ?? (() => crypto.randomUUID());
  }

  /**
   * Try to take the lock under a fresh owner id. Returns null only when
   * another holder has it and its record is younger than the TTL.
   */
  async acquire(): Promise<LockLease | null> {
    const owner = this.newOwner();
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.store.getLock();
      const now = this.now();

      if (current?.locked) {
        const age = current.acquiredAt === null ? Infinity : now - current.acquiredAt;
        if (age <= this.ttlMs) {
          return null;
        }
        logger.warn(`Breaking stale sync lock held by ${current.owner ?? 'unknown'} (${Math.round(age / 1000)}s old)`);
      }

      const next: LockRecord = { locked: true, owner, acquiredAt: now };
      if (await this.store.compareAndSwapLock(current, next)) {
        logger.debug(`Sync lock acquired by ${owner}`);
        return { owner, acquiredAt: now };
      }
    }

    logger.debug('Lost every race for the sync lock');
    return null;
  }

  /**
   * Release the lock if the lease still holds it. A lock that was broken and
   * re-taken by another acquisition is left alone.
   */
  async release(lease: LockLease): Promise<void> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.store.getLock();
      if (!current?.locked || current.owner !== lease.owner) {
        return;
      }
      const released: LockRecord = { locked: false, owner: null, acquiredAt: null };
      if (await this.store.compareAndSwapLock(current, released)) {
        logger.debug(`Sync lock released by ${lease.owner}`);
        return;
      }
    }
  }
}
