/**
 * Push-notification subscription lifecycle: initial setup and periodic
 * renewal, each followed by a sync run under the lock.
 */
import { ConfigError } from '../config.js';
import { logger } from '../logger.js';
import type { SyncLock } from './lock.js';
import type { StateStore } from './state.js';
import type { SyncResult } from './engine.js';
import type { ChangeFeed, SubscriptionService } from './types.js';

export interface SubscriptionDeps {
  store: StateStore;
  drive: ChangeFeed & SubscriptionService;
  lock: SyncLock;
  /** Public address notifications are delivered to */
  webhookUrl: string | undefined;
  /** Full-folder sync, run by setup when asked */
  runInitialSync: () => Promise<SyncResult>;
  /** Incremental catch-up cycle run after renewal */
  runCycle: () => Promise<SyncResult>;
}

export interface SetupResult {
  status: 'initialized';
  subscriptionId: string;
  expiration: number;
  initialSyncCount?: number;
}

export interface RenewResult {
  status: 'renewed';
  subscriptionId: string;
  expiration: number;
  catchUpCount?: number;
}

function requireWebhookUrl(url: string | undefined): string {
  if (!url) {
    throw new ConfigError('SYNC_HANDLER_URL is not configured');
  }
  return url;
}

/**
 * Run `fn` if the lock is free. Returns undefined when another cycle holds it.
 */
async function underLock<T>(lock: SyncLock, fn: () => Promise<T>): Promise<T | undefined> {
  const lease = await lock.acquire();
  if (!lease) {
    logger.info('Sync lock busy, skipping');
    return undefined;
  }
  try {
    return await fn();
  } finally {
    await lock.release(lease);
  }
}

/**
 * Initialise from the current change position and subscribe to changes.
 * With `initialSync`, also mirror every file already in the folder.
 */
export async function setupWatch(deps: SubscriptionDeps, options: { initialSync?: boolean } = {}): Promise<SetupResult> {
  const { store, drive } = deps;
  const webhookUrl = requireWebhookUrl(deps.webhookUrl);

  const cursor = await drive.getStartCursor();
  await store.setCursor(cursor);
  logger.info(`Stored initial change cursor: ${cursor}`);

  const subscription = await drive.watch(webhookUrl, cursor);
  await store.setSubscription(subscription);
  logger.info(`Subscription created: ${subscription.id}`);

  const result: SetupResult = {
    status: 'initialized',
    subscriptionId: subscription.id,
    expiration: subscription.expiration,
  };

  if (options.initialSync) {
    logger.info('Running initial sync');
    const sync = await underLock(deps.lock, deps.runInitialSync);
    if (sync) result.initialSyncCount = sync.processed;
  }

  return result;
}

/**
 * Replace the current subscription with a new one on the stored cursor, then
 * run a catch-up cycle for anything missed in between.
 */
export async function renewWatch(deps: SubscriptionDeps): Promise<RenewResult> {
  const { store, drive } = deps;
  const webhookUrl = requireWebhookUrl(deps.webhookUrl);

  const previous = await store.getSubscription();
  if (previous) {
    try {
      await drive.stop(previous);
      logger.info(`Stopped subscription ${previous.id}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Failed to stop subscription ${previous.id}: ${message}`);
    }
    await store.clearSubscription();
  }

  let cursor = await store.getCursor();
  if (cursor === null) {
    cursor = await drive.getStartCursor();
    await store.setCursor(cursor);
  }

  const subscription = await drive.watch(webhookUrl, cursor);
  await store.setSubscription(subscription);
  logger.info(`Created subscription ${subscription.id}, expires ${new Date(subscription.expiration).toISOString()}`);

  const result: RenewResult = {
    status: 'renewed',
    subscriptionId: subscription.id,
    expiration: subscription.expiration,
  };

  const catchUp = await underLock(deps.lock, deps.runCycle);
  if (catchUp) {
    logger.info(`Catch-up sync: ${catchUp.processed} changes`);
    result.catchUpCount = catchUp.processed;
  }

  return result;
}
