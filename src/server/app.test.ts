import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createTestServices, syncResult, type TestServices } from '../__tests__/mocks/services.js';
import { checkNotification, createApp } from './app.js';

describe('checkNotification', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
  });

  it('should acknowledge validation pings', async () => {
    expect(await checkNotification({ channelId: 'channel-1', resourceState: 'sync', triggerSecret: '' }, services)).toBe('validation');
  });

  it('should accept the current channel', async () => {
    services.store.subscription = { id: 'channel-1', resourceId: 'r', expiration: 0 };
    expect(await checkNotification({ channelId: 'channel-1', resourceState: 'change', triggerSecret: '' }, services)).toBe('accepted');
  });

  it('should ignore a channel that is not the stored one', async () => {
    services.store.subscription = { id: 'channel-1', resourceId: 'r', expiration: 0 };
    expect(await checkNotification({ channelId: 'channel-0', resourceState: 'change', triggerSecret: '' }, services)).toBe('unknown-channel');
  });

  it('should accept any channel before a subscription is stored', async () => {
    expect(await checkNotification({ channelId: 'channel-9', resourceState: 'change', triggerSecret: '' }, services)).toBe('accepted');
  });

  it('should require the secret for manual triggers', async () => {
    const check = (triggerSecret: string) => checkNotification({ channelId: '', resourceState: '', triggerSecret }, services);
    expect(await check('test-secret')).toBe('accepted');
    expect(await check('wrong')).toBe('unauthorized');
    expect(await check('')).toBe('unauthorized');
  });

  it('should refuse manual triggers when no secret is configured', async () => {
    services = createTestServices({ triggerSecret: undefined });
    expect(await checkNotification({ channelId: '', resourceState: '', triggerSecret: 'test-secret' }, services)).toBe('unauthorized');
  });
});

describe('HTTP app', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
  });

  describe('GET /notify', () => {
    it('should answer OK without a verification token', async () => {
      const res = await createApp(services).request('/notify');
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('OK');
    });

    it('should serve the site verification token as html', async () => {
      services = createTestServices({ verificationToken: 'verify-me' });
      const res = await createApp(services).request('/notify');
      expect(res.headers.get('content-type')).toContain('text/html');
      expect(await res.text()).toBe('google-site-verification: verify-me');
    });
  });

  describe('POST /notify', () => {
    function notify(headers: Record<string, string>) {
      return createApp(services).request('/notify', { method: 'POST', headers });
    }

    it('should run a sync for a change notification', async () => {
      services.store.subscription = { id: 'channel-1', resourceId: 'r', expiration: 0 };

      const res = await notify({ 'X-Goog-Channel-ID': 'channel-1', 'X-Goog-Resource-State': 'change' });

      expect(await res.text()).toBe('OK');
      expect(services.runCycle).toHaveBeenCalledTimes(1);
    });

    it('should not sync on a validation ping', async () => {
      await notify({ 'X-Goog-Channel-ID': 'channel-1', 'X-Goog-Resource-State': 'sync' });
      expect(services.runCycle).not.toHaveBeenCalled();
    });

    it('should drop notifications for other channels', async () => {
      services.store.subscription = { id: 'channel-1', resourceId: 'r', expiration: 0 };
      const res = await notify({ 'X-Goog-Channel-ID': 'channel-old', 'X-Goog-Resource-State': 'change' });
      expect(res.status).toBe(200);
      expect(services.runCycle).not.toHaveBeenCalled();
    });

    it('should run a manual trigger with the right secret only', async () => {
      await notify({ 'X-Sync-Trigger-Secret': 'wrong' });
      expect(services.runCycle).not.toHaveBeenCalled();

      await notify({ 'X-Sync-Trigger-Secret': 'test-secret' });
      expect(services.runCycle).toHaveBeenCalledTimes(1);
    });

    it('should flag a resync instead of syncing while the lock is held', async () => {
      services.store.lock = { locked: true, owner: 'other', acquiredAt: Date.now() };
      await notify({ 'X-Goog-Channel-ID': 'channel-1', 'X-Goog-Resource-State': 'change' });
      expect(services.store.resync).toBe(true);
      expect(services.runCycle).not.toHaveBeenCalled();
    });

    it('should answer OK and release the lock when the sync fails', async () => {
      services.runCycle.mockRejectedValueOnce(new Error('push rejected'));

      const res = await notify({ 'X-Goog-Channel-ID': 'channel-1', 'X-Goog-Resource-State': 'change' });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('OK');
      expect(services.store.lock).toEqual({ locked: false, owner: null, acquiredAt: null });
    });
  });

  describe('POST /renew', () => {
    it('should renew and report the new subscription', async () => {
      services.store.cursor = 'c1';
      const res = await createApp(services).request('/renew', { method: 'POST' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'renewed', subscriptionId: 'channel-1' });
      expect(services.runCycle).toHaveBeenCalledTimes(1);
    });

    it('should fail without a webhook address', async () => {
      services = createTestServices({ webhookUrl: undefined });
      const res = await createApp(services).request('/renew', { method: 'POST' });
      expect(res.status).toBe(500);
      expect(await res.text()).toBe('SYNC_HANDLER_URL not configured');
    });

    it('should hide internal errors', async () => {
      vi.spyOn(services.drive, 'watch').mockRejectedValueOnce(new Error('quota exceeded'));
      const res = await createApp(services).request('/renew', { method: 'POST' });
      expect(res.status).toBe(500);
      expect(await res.text()).toBe('Internal error');
    });
  });

  describe('POST /setup', () => {
    it('should subscribe without an initial sync by default', async () => {
      const res = await createApp(services).request('/setup', { method: 'POST' });

      expect(await res.json()).toEqual({ status: 'initialized', subscriptionId: 'channel-1', expiration: 1_700_000_000_000 });
      expect(services.runInitialSync).not.toHaveBeenCalled();
    });

    it('should run the initial sync when asked', async () => {
      services.runInitialSync.mockResolvedValueOnce(syncResult(5));

      const res = await createApp(services).request('/setup?initial_sync=TRUE', { method: 'POST' });

      expect(await res.json()).toEqual({
        status: 'initialized',
        subscriptionId: 'channel-1',
        expiration: 1_700_000_000_000,
        initialSyncCount: 5,
      });
    });
  });
});
