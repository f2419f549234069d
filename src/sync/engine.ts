/**
 * Sync cycle: cursor → fetch → classify → materialize → commit → push →
 * persist. Per-file records and the cursor are only written after the push
 * succeeded.
 */
import { logger } from '../logger.js';
import type { AppConfig } from '../config.js';
import type { WorkingCopy } from '../git/repo.js';
import type { TextExtractor } from '../extract/extractor.js';
import { classifyAll, editorOf, type ClassifyContext } from './classifier.js';
import { materializeAll, repoPath, type MaterializeContext } from './materializer.js';
import { groupByAuthor, stagePathsFor } from './grouper.js';
import type { StateStore } from './state.js';
import type { ActionableChange, Change, DriveService, ProcessedChange, RawChange, TrackedFile } from './types.js';

export type SyncPhase =
  | 'uninitialized'
  | 'fetching'
  | 'classifying'
  | 'materializing'
  | 'committing'
  | 'pushing'
  | 'persisting'
  | 'done';

export type PhaseCallback = (phase: SyncPhase) => void;

export type SyncSettings = Pick<AppConfig, 'excludePaths' | 'skipExtensions' | 'maxFileSizeMb' | 'commitAuthor' | 'docsSubdir'>;

export interface SyncDeps {
  settings: SyncSettings;
  drive: DriveService;
  store: StateStore;
  /** Fresh, not yet cloned working copy; discarded when the cycle ends */
  repo: WorkingCopy;
  extract: TextExtractor;
  onPhase?: PhaseCallback;
}

export interface SyncResult {
  /** Changes committed and pushed */
  processed: number;
  /** Classified changes that needed no work */
  skipped: number;
  /** Number of commits created */
  commits: number;
  errors: Array<{ fileId: string; error: string }>;
  /** Whether the stored cursor moved (or was initialised) */
  cursorAdvanced: boolean;
}

function emptyResult(cursorAdvanced: boolean, skipped = 0): SyncResult {
  return { processed: 0, skipped, commits: 0, errors: [], cursorAdvanced };
}

function enter(deps: SyncDeps, phase: SyncPhase): void {
  logger.debug(`Sync phase: ${phase}`);
  deps.onPhase?.(phase);
}

function classifyContext(deps: SyncDeps): ClassifyContext {
  const { settings } = deps;
  return {
    store: deps.store,
    folder: deps.drive,
    excludePaths: settings.excludePaths,
    skipRules: { skipExtensions: settings.skipExtensions, maxFileSizeMb: settings.maxFileSizeMb },
  };
}

function isActionable(change: Change): change is ActionableChange {
  return change.kind !== 'skip';
}

/**
 * The record persisted for a change once it has been pushed.
 */
export function trackedRecord(item: ProcessedChange): TrackedFile | null {
  const { change } = item;
  if (change.kind === 'delete') return null;
  const { file } = change;
  const editor = editorOf(file);
  return {
    fileId: change.fileId,
    name: file.name,
    path: change.newPath,
    md5: file.md5Checksum ?? null,
    mimeType: file.mimeType,
    modifiedTime: file.modifiedTime ?? null,
    extractedPath: item.extractedPath,
    lastModifiedByName: editor.name ?? null,
    lastModifiedByEmail: editor.email ?? null,
  };
}

async function commitBatches(processed: ProcessedChange[], deps: SyncDeps): Promise<number> {
  const { repo, settings } = deps;
  const batches = groupByAuthor(processed, settings.commitAuthor);
  let commits = 0;

  if (batches.length === 1) {
    // Everything is already staged by the materializer
    const [batch] = batches;
    if (await repo.hasStagedChanges()) {
      await repo.commit(batch.message, { name: batch.authorName, email: batch.authorEmail });
      commits++;
    }
    return commits;
  }

  await repo.unstageAll();
  for (const batch of batches) {
    const paths = batch.changes.flatMap(stagePathsFor).map(p => repoPath(settings.docsSubdir, p));
    if (paths.length > 0) {
      await repo.stage(paths);
    }
    if (await repo.hasStagedChanges()) {
      await repo.commit(batch.message, { name: batch.authorName, email: batch.authorEmail });
      commits++;
    }
  }
  return commits;
}

async function persistRecords(processed: ProcessedChange[], store: StateStore): Promise<void> {
  for (const item of processed) {
    const record = trackedRecord(item);
    if (record) {
      await store.setFile(record);
    } else {
      await store.deleteFile(item.change.fileId);
    }
  }
}

interface Applied {
  processed: ProcessedChange[];
  commits: number;
  errors: Array<{ fileId: string; error: string }>;
}

/**
 * Clone, materialize, commit and push a set of actionable changes, then
 * persist their records. The working copy is cleaned up on every path.
 */
async function applyChanges(changes: ActionableChange[], deps: SyncDeps): Promise<Applied> {
  const { repo, store } = deps;
  try {
    enter(deps, 'materializing');
    await repo.clone();
    const ctx: MaterializeContext = {
      repo,
      content: deps.drive,
      extract: deps.extract,
      docsSubdir: deps.settings.docsSubdir,
    };

    const processed: ProcessedChange[] = [];
    const errors: Applied['errors'] = [];
    for (const result of await materializeAll(changes, ctx)) {
      if (result.ok) {
        processed.push(result.processed);
      } else {
        errors.push({ fileId: result.change.fileId, error: result.error });
      }
    }

    if (processed.length === 0) {
      return { processed, commits: 0, errors };
    }

    enter(deps, 'committing');
    const commits = await commitBatches(processed, deps);

    enter(deps, 'pushing');
    await repo.push();

    enter(deps, 'persisting');
    await persistRecords(processed, store);

    return { processed, commits, errors };
  } finally {
    await repo.cleanup();
  }
}

/**
 * Run one incremental sync cycle against the change feed.
 * A push failure propagates and leaves the stored state untouched.
 */
export async function runSyncCycle(deps: SyncDeps): Promise<SyncResult> {
  const { drive, store } = deps;

  const cursor = await store.getCursor();
  if (cursor === null) {
    enter(deps, 'uninitialized');
    const start = await drive.getStartCursor();
    await store.setCursor(start);
    logger.info('No change cursor stored; initialised from the current position');
    enter(deps, 'done');
    return emptyResult(true);
  }

  enter(deps, 'fetching');
  const page = await drive.listChanges(cursor);
  if (page.changes.length === 0) {
    await store.setCursor(page.nextCursor);
    logger.info('No changes found');
    enter(deps, 'done');
    return emptyResult(true);
  }
  logger.info(`Found ${page.changes.length} raw changes`);

  enter(deps, 'classifying');
  const classified = await classifyAll(page.changes, classifyContext(deps));
  const actionable = classified.filter(isActionable);
  const skipped = classified.length - actionable.length;

  if (actionable.length === 0) {
    await store.setCursor(page.nextCursor);
    logger.info('No actionable changes');
    enter(deps, 'done');
    return emptyResult(true, skipped);
  }

  logger.info(`Processing ${actionable.length} changes`);
  const applied = await applyChanges(actionable, deps);

  if (applied.processed.length === 0) {
    logger.error(`All ${actionable.length} changes failed; cursor left in place`);
    enter(deps, 'done');
    return { processed: 0, skipped, commits: 0, errors: applied.errors, cursorAdvanced: false };
  }

  if (applied.errors.length > 0) {
    const ids = applied.errors.map(e => e.fileId).join(', ');
    logger.warn(`Cursor advanced past ${applied.errors.length} failed change(s): ${ids}`);
  }

  await store.setCursor(page.nextCursor);
  logger.info(`Sync complete: ${applied.processed.length} changes committed`);
  enter(deps, 'done');

  return {
    processed: applied.processed.length,
    skipped,
    commits: applied.commits,
    errors: applied.errors,
    cursorAdvanced: true,
  };
}

/**
 * Mirror every file currently under the root folder, whether or not the
 * change feed has reported it. The cursor is not touched.
 */
export async function runInitialSync(deps: SyncDeps): Promise<SyncResult> {
  enter(deps, 'fetching');
  const files = await deps.drive.listTree();
  logger.info(`Initial sync: ${files.length} files in folder`);

  enter(deps, 'classifying');
  const raw: RawChange[] = files.map(file => ({ fileId: file.id, removed: false, file }));
  const classified = await classifyAll(raw, classifyContext(deps));
  const actionable = classified.filter(isActionable);
  const skipped = classified.length - actionable.length;

  if (actionable.length === 0) {
    enter(deps, 'done');
    return emptyResult(false, skipped);
  }

  const applied = await applyChanges(actionable, deps);
  logger.info(`Initial sync complete: ${applied.processed.length} changes committed`);
  enter(deps, 'done');

  return {
    processed: applied.processed.length,
    skipped,
    commits: applied.commits,
    errors: applied.errors,
    cursorAdvanced: false,
  };
}
