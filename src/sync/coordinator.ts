/**
 * Serialises sync cycles across instances and re-runs a cycle when
 * notifications arrived while one was in progress.
 */
import { logger } from '../logger.js';
import type { SyncLock } from './lock.js';
import type { StateStore } from './state.js';
import type { SyncResult } from './engine.js';

export const DEFAULT_MAX_ITERATIONS = 3;

/** Runs one sync cycle with a fresh working copy */
export type CycleRunner = () => Promise<SyncResult>;

export interface LoopSummary {
  cycles: number;
  processed: number;
  errors: SyncResult['errors'];
}

export type TriggerResult =
  | { status: 'busy' }
  | ({ status: 'completed' } & LoopSummary);

export class SyncCoordinator {
  constructor(
    private readonly store: StateStore,
    private readonly lock: SyncLock,
    private readonly runCycle: CycleRunner,
    private readonly maxIterations = DEFAULT_MAX_ITERATIONS,
  ) {}

  /**
   * Run the sync loop if no other cycle holds the lock; otherwise flag a
   * resync for the holder and return immediately.
   */
  async trigger(): Promise<TriggerResult> {
    const lease = await this.lock.acquire();
    if (!lease) {
      await this.store.requestResync();
      logger.info('Another sync is in progress, flagged for resync');
      return { status: 'busy' };
    }

    try {
      const summary = await this.runSyncLoop(this.maxIterations);
      return { status: 'completed', ...summary };
    } finally {
      await this.lock.release(lease);
    }
  }

  /**
   * Run up to `maxIterations` cycles back to back, continuing only while the
   * resync flag was raised during the previous cycle. Must be called with
   * the lock held.
   */
  async runSyncLoop(maxIterations = this.maxIterations): Promise<LoopSummary> {
    const summary: LoopSummary = { cycles: 0, processed: 0, errors: [] };

    while (summary.cycles < maxIterations) {
      await this.store.clearResync();
      const result = await this.runCycle();
      summary.cycles++;
      summary.processed += result.processed;
      summary.errors.push(...result.errors);
      logger.info(`Sync iteration ${summary.cycles}: ${result.processed} changes`);

      if (!(await this.store.isResyncRequested())) {
        return summary;
      }
      logger.info('Resync flag set, running again');
    }

    logger.info(`Stopped after ${maxIterations} iterations; remaining changes wait for the next trigger`);
    return summary;
  }
}
