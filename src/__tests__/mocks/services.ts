import { vi, type Mock } from 'vitest';
import type { Services } from '../../app.js';
import type { AppConfig } from '../../config.js';
import { SyncCoordinator } from '../../sync/coordinator.js';
import type { SyncResult } from '../../sync/engine.js';
import { SyncLock } from '../../sync/lock.js';
import { FakeDrive } from './drive.js';
import { MemoryStateStore } from './state-store.js';

export const TEST_CONFIG: AppConfig = {
  driveFolderId: 'root-folder',
  gitRepoUrl: 'https://git.example.com/team/docs.git',
  gitBranch: 'main',
  excludePaths: [],
  skipExtensions: ['.zip'],
  maxFileSizeMb: 100,
  commitAuthor: { name: 'Drive Sync', email: 'sync@example.com' },
  docsSubdir: 'docs',
  stateDir: '/nonexistent/state',
  webhookUrl: 'https://sync.example.com/notify',
  triggerSecret: 'test-secret',
  port: 8080,
  logLevel: 'info',
};

export interface TestServices extends Services {
  store: MemoryStateStore;
  drive: FakeDrive;
  runCycle: Mock<() => Promise<SyncResult>>;
  runInitialSync: Mock<() => Promise<SyncResult>>;
}

export function syncResult(processed: number, errors: SyncResult['errors'] = []): SyncResult {
  return { processed, skipped: 0, commits: processed > 0 ? 1 : 0, errors, cursorAdvanced: true };
}

/**
 * Services over in-memory state and Drive, with mocked cycle runners.
 */
export function createTestServices(config: Partial<AppConfig> = {}): TestServices {
  const merged: AppConfig = { ...TEST_CONFIG, ...config };
  const store = new MemoryStateStore();
  const drive = new FakeDrive();
  const lock = new SyncLock(store, { newOwner: () => 'test-owner' });
  const runCycle = vi.fn(async () => syncResult(0));
  const runInitialSync = vi.fn(async () => syncResult(0));

  return {
    config: merged,
    store,
    drive,
    lock,
    coordinator: new SyncCoordinator(store, lock, runCycle),
    runCycle,
    runInitialSync,
    subscriptions: {
      store,
      drive,
      lock,
      webhookUrl: merged.webhookUrl,
      runInitialSync,
      runCycle,
    },
  };
}
