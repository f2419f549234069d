/**
 * Persisted sync state.
 *
 * The engine, lock and subscription code only see the StateStore interface.
 * FileStateStore keeps one JSON document per key under the state directory:
 *
 *   <stateDir>/cursor.json
 *   <stateDir>/subscription.json
 *   <stateDir>/lock.json
 *   <stateDir>/resync.json
 *   <stateDir>/files/<fileId>.json
 */
import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { LockRecord, Subscription, TrackedFile } from './types.js';

export interface StateStore {
  getCursor(): Promise<string | null>;
  setCursor(cursor: string): Promise<void>;

  getSubscription(): Promise<Subscription | null>;
  setSubscription(subscription: Subscription): Promise<void>;
  clearSubscription(): Promise<void>;

  getLock(): Promise<LockRecord | null>;
  /**
   * Replace the lock record only if it still equals `expected` (null meaning
   * no record). Returns false when another writer got there first.
   */
  compareAndSwapLock(expected: LockRecord | null, next: LockRecord): Promise<boolean>;

  requestResync(): Promise<void>;
  clearResync(): Promise<void>;
  isResyncRequested(): Promise<boolean>;

  getFile(fileId: string): Promise<TrackedFile | null>;
  setFile(record: TrackedFile): Promise<void>;
  deleteFile(fileId: string): Promise<void>;
  /** Tracked files, sorted by path, optionally limited to a path prefix */
  listFiles(prefix?: string): Promise<TrackedFile[]>;
}

export function sameLock(a: LockRecord | null, b: LockRecord | null): boolean {
  if (a === null || b === null) return a === b;
  return a.locked === b.locked && a.owner === b.owner && a.acquiredAt === b.acquiredAt;
}

export function sortByPath(files: TrackedFile[]): TrackedFile[] {
  return [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function parseTrackedFile(value: unknown): TrackedFile | null {
  if (!isRecord(value)) return null;
  const { fileId, name, path: filePath, mimeType } = value;
  if (typeof fileId !== 'string' || typeof name !== 'string' || typeof filePath !== 'string' || typeof mimeType !== 'string') {
    return null;
  }
  return {
    fileId,
    name,
    path: filePath,
    md5: stringOrNull(value.md5),
    mimeType,
    modifiedTime: stringOrNull(value.modifiedTime),
    extractedPath: stringOrNull(value.extractedPath),
    lastModifiedByName: stringOrNull(value.lastModifiedByName),
    lastModifiedByEmail: stringOrNull(value.lastModifiedByEmail),
  };
}

export function parseSubscription(value: unknown): Subscription | null {
  if (!isRecord(value)) return null;
  const { id, resourceId, expiration } = value;
  if (typeof id !== 'string' || typeof resourceId !== 'string' || typeof expiration !== 'number') {
    return null;
  }
  return { id, resourceId, expiration };
}

export function parseLockRecord(value: unknown): LockRecord | null {
  if (!isRecord(value) || typeof value.locked !== 'boolean') return null;
  return {
    locked: value.locked,
    owner: stringOrNull(value.owner),
    acquiredAt: numberOrNull(value.acquiredAt),
  };
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export interface FileStateStoreOptions {
  /** Age after which a leftover mutex file is considered abandoned */
  staleMutexMs?: number;
  mutexRetryMs?: number;
  mutexAttempts?: number;
}

/**
 * JSON-file state store. Writes are atomic (temp file + rename); the lock
 * compare-and-swap is serialised across processes by an exclusive-create
 * mutex file.
 */
export class FileStateStore implements StateStore {
  private readonly dir: string;
  private readonly filesDir: string;
  private readonly staleMutexMs: number;
  private readonly mutexRetryMs: number;
  private readonly mutexAttempts: number;

  constructor(dir: string, options: FileStateStoreOptions = {}) {
    this.dir = dir;
    this.filesDir = path.join(dir, 'files');
    this.staleMutexMs = options.staleMutexMs ?? 30_000;
    this.mutexRetryMs = options.mutexRetryMs ?? 50;
    this.mutexAttempts = options.mutexAttempts ?? 100;
  }

  async getCursor(): Promise<string | null> {
    const data = this.readJson('cursor.json');
    return isRecord(data) ? stringOrNull(data.cursor) : null;
  }

  async setCursor(cursor: string): Promise<void> {
    this.writeJson('cursor.json', { cursor, updatedAt: new Date().toISOString() });
  }

  async getSubscription(): Promise<Subscription | null> {
    return parseSubscription(this.readJson('subscription.json'));
  }

  async setSubscription(subscription: Subscription): Promise<void> {
    this.writeJson('subscription.json', subscription);
  }

  async clearSubscription(): Promise<void> {
    this.removeFile(path.join(this.dir, 'subscription.json'));
  }

  async getLock(): Promise<LockRecord | null> {
    return parseLockRecord(this.readJson('lock.json'));
  }

  async compareAndSwapLock(expected: LockRecord | null, next: LockRecord): Promise<boolean> {
    return this.withMutex(async () => {
      const current = parseLockRecord(this.readJson('lock.json'));
      if (!sameLock(current, expected)) return false;
      this.writeJson('lock.json', next);
      return true;
    });
  }

  async requestResync(): Promise<void> {
    this.writeJson('resync.json', { requested: true, requestedAt: new Date().toISOString() });
  }

  async clearResync(): Promise<void> {
    this.writeJson('resync.json', { requested: false });
  }

  async isResyncRequested(): Promise<boolean> {
    const data = this.readJson('resync.json');
    return isRecord(data) && data.requested === true;
  }

  async getFile(fileId: string): Promise<TrackedFile | null> {
    return parseTrackedFile(this.readJson(path.join('files', this.fileKey(fileId))));
  }

  async setFile(record: TrackedFile): Promise<void> {
    this.writeJson(path.join('files', this.fileKey(record.fileId)), record);
  }

  async deleteFile(fileId: string): Promise<void> {
    this.removeFile(path.join(this.filesDir, this.fileKey(fileId)));
  }

  async listFiles(prefix?: string): Promise<TrackedFile[]> {
    if (!fs.existsSync(this.filesDir)) return [];
    const records: TrackedFile[] = [];
    for (const entry of fs.readdirSync(this.filesDir)) {
      if (!entry.endsWith('.json')) continue;
      const record = parseTrackedFile(this.readJson(path.join('files', entry)));
      if (record && (!prefix || record.path.startsWith(prefix))) {
        records.push(record);
      }
    }
    return sortByPath(records);
  }

  private fileKey(fileId: string): string {
    return `${encodeURIComponent(fileId)}.json`;
  }

  private readJson(relPath: string): unknown {
    const filePath = path.join(this.dir, relPath);
    if (!fs.existsSync(filePath)) return null;
    const raw = fs.readFileSync(filePath, 'utf-8');
    try {
      const data: unknown = JSON.parse(raw);
      return data;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Corrupt state file ${filePath}: ${message}`);
    }
  }

  private writeJson(relPath: string, data: unknown): void {
    const filePath = path.join(this.dir, relPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${crypto.randomUUID()}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + '\n');
    fs.renameSync(tmpPath, filePath);
  }

  private removeFile(filePath: string): void {
    fs.rmSync(filePath, { force: true });
  }

  private async withMutex<T>(fn: () => Promise<T>): Promise<T> {
    fs.mkdirSync(this.dir, { recursive: true });
    const mutexPath = path.join(this.dir, 'lock.json.mutex');

    for (let attempt = 0; attempt < this.mutexAttempts; attempt++) {
      let fd: number;
      try {
        fd = fs.openSync(mutexPath, 'wx');
      } catch (err) {
        if (!isErrnoCode(err, 'EEXIST')) throw err;
        this.breakStaleMutex(mutexPath);
        await sleep(this.mutexRetryMs);
        continue;
      }

      try {
        fs.closeSync(fd);
        return await fn();
      } finally {
        this.removeFile(mutexPath);
      }
    }

    throw new Error(`Timed out waiting for state mutex ${mutexPath}`);
  }

  private breakStaleMutex(mutexPath: string): void {
    try {
      const age = Date.now() - fs.statSync(mutexPath).mtimeMs;
      if (age > this.staleMutexMs) {
        this.removeFile(mutexPath);
      }
    } catch (err) {
      // Released between our open and stat
      if (!isErrnoCode(err, 'ENOENT')) throw err;
    }
  }
}
