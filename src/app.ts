/**
 * Wires the configured components together. Every entry point (CLI command,
 * HTTP route) works against the services built here.
 */
import type { AppConfig } from './config.js';
import { DriveClient } from './drive/client.js';
import { createGoogleTransport, type DriveTransport } from './drive/transport.js';
import { createTextExtractor, type TextExtractor } from './extract/extractor.js';
import { GitRepo, type WorkingCopy } from './git/repo.js';
import { createTokenProvider } from './lib/credentials.js';
import { enableFileLogging, setLogLevel } from './logger.js';
import { SyncCoordinator } from './sync/coordinator.js';
import { runInitialSync, runSyncCycle, type PhaseCallback, type SyncDeps, type SyncResult } from './sync/engine.js';
import { SyncLock } from './sync/lock.js';
import { FileStateStore, type StateStore } from './sync/state.js';
import type { SubscriptionDeps } from './sync/subscription.js';
import type { DriveService } from './sync/types.js';
import type { CommandRunner } from './utils/exec.js';

export interface Services {
  config: AppConfig;
  store: StateStore;
  drive: DriveService;
  lock: SyncLock;
  coordinator: SyncCoordinator;
  runCycle: () => Promise<SyncResult>;
  runInitialSync: () => Promise<SyncResult>;
  subscriptions: SubscriptionDeps;
}

export interface ServiceOverrides {
  transport?: DriveTransport;
  store?: StateStore;
  /** Creates the working copy for each cycle */
  createRepo?: () => WorkingCopy;
  runner?: CommandRunner;
  extract?: TextExtractor;
  env?: NodeJS.ProcessEnv;
  onPhase?: PhaseCallback;
}

export function configureLogging(config: Pick<AppConfig, 'logLevel' | 'logFile'>): void {
  setLogLevel(config.logLevel);
  if (config.logFile) {
    enableFileLogging(config.logFile);
  }
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const store = overrides.store ?? new FileStateStore(config.stateDir);
  const drive = new DriveClient(overrides.transport ?? createGoogleTransport(), config.driveFolderId);
  const extract = overrides.extract ?? createTextExtractor({ runner: overrides.runner });
  const getToken = createTokenProvider(overrides.env ?? process.env);

  const createRepo = overrides.createRepo ?? (() => new GitRepo({
    repoUrl: config.gitRepoUrl,
    branch: config.gitBranch,
    committer: config.commitAuthor,
    getToken,
    runner: overrides.runner,
  }));

  const deps = (): SyncDeps => ({
    settings: config,
    drive,
    store,
    repo: createRepo(),
    extract,
    onPhase: overrides.onPhase,
  });

  const runCycle = () => runSyncCycle(deps());
  const runInitial = () => runInitialSync(deps());
  const lock = new SyncLock(store);
  const coordinator = new SyncCoordinator(store, lock, runCycle);

  return {
    config,
    store,
    drive,
    lock,
    coordinator,
    runCycle,
    runInitialSync: runInitial,
    subscriptions: {
      store,
      drive,
      lock,
      webhookUrl: config.webhookUrl,
      runInitialSync: runInitial,
      runCycle,
    },
  };
}
