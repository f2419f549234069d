/**
 * HTTP endpoints: Drive push notifications, subscription setup and renewal.
 */
import crypto from 'node:crypto';
import { Hono } from 'hono';
import { logger } from '../logger.js';
import type { Services } from '../app.js';
import { renewWatch, setupWatch } from '../sync/subscription.js';

export type NotificationOutcome = 'validation' | 'unknown-channel' | 'unauthorized' | 'accepted';

function secretsEqual(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Decide what to do with a notification from its headers.
 */
export async function checkNotification(
  headers: { channelId: string; resourceState: string; triggerSecret: string },
  services: Pick<Services, 'store' | 'config'>,
): Promise<NotificationOutcome> {
  if (headers.resourceState === 'sync') {
    return 'validation';
  }

  if (!headers.channelId) {
    // Manual trigger: must carry the shared secret
    const expected = services.config.triggerSecret;
    if (!expected || !headers.triggerSecret || !secretsEqual(headers.triggerSecret, expected)) {
      return 'unauthorized';
    }
    return 'accepted';
  }

  const subscription = await services.store.getSubscription();
  if (subscription && subscription.id !== headers.channelId) {
    return 'unknown-channel';
  }
  return 'accepted';
}

export function createApp(services: Services): Hono {
  const app = new Hono();

  app.get('/notify', (c) => {
    const token = services.config.verificationToken;
    if (token) {
      return c.html(`google-site-verification: ${token}`);
    }
    return c.text('OK');
  });

  // Always 200: an error response makes Drive retry the delivery
  app.post('/notify', async (c) => {
    const channelId = c.req.header('X-Goog-Channel-ID') ?? '';
    const resourceState = c.req.header('X-Goog-Resource-State') ?? '';
    const triggerSecret = c.req.header('X-Sync-Trigger-Secret') ?? '';

    logger.info(`Notification received: state=${resourceState || 'none'}, channel=${channelId.slice(0, 8) || 'none'}`);

    try {
      const outcome = await checkNotification({ channelId, resourceState, triggerSecret }, services);
      switch (outcome) {
        case 'validation':
          logger.info('Received subscription validation ping');
          break;
        case 'unknown-channel':
          logger.warn(`Unknown channel id: ${channelId}`);
          break;
        case 'unauthorized':
          logger.warn('Manual trigger rejected: missing or wrong trigger secret');
          break;
        case 'accepted': {
          const result = await services.coordinator.trigger();
          if (result.status === 'completed') {
            logger.info(`Notification handled: ${result.processed} changes in ${result.cycles} cycle(s)`);
          }
          break;
        }
      }
    } catch (err) {
      const message = err instanceof Error ? err.stack ?? err.message : String(err);
      logger.error(`Sync handler failed: ${message}`);
    }

    return c.text('OK');
  });

  app.post('/renew', async (c) => {
    if (!services.config.webhookUrl) {
      return c.text('SYNC_HANDLER_URL not configured', 500);
    }
    try {
      const result = await renewWatch(services.subscriptions);
      return c.json({ status: result.status, subscriptionId: result.subscriptionId });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Renew failed: ${message}`);
      return c.text('Internal error', 500);
    }
  });

  app.post('/setup', async (c) => {
    if (!services.config.webhookUrl) {
      return c.text('SYNC_HANDLER_URL not configured', 500);
    }
    const initialSync = (c.req.query('initial_sync') ?? 'false').toLowerCase() === 'true';
    try {
      const result = await setupWatch(services.subscriptions, { initialSync });
      return c.json({ ...result });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Setup failed: ${message}`);
      return c.text('Internal error', 500);
    }
  });

  return app;
}
