/**
 * Turns raw change-feed entries into the action the working copy needs.
 */
import { logger } from '../logger.js';
import { isExcluded, skipReason, type SkipRules } from './exclusions.js';
import type { StateStore } from './state.js';
import type { Change, DriveFile, Editor, FolderResolver, RawChange } from './types.js';

export interface ClassifyContext {
  store: Pick<StateStore, 'getFile'>;
  folder: FolderResolver;
  excludePaths: string[];
  skipRules: SkipRules;
}

/**
 * Keep only the last entry observed for each file id. Keys keep the order in
 * which they were first seen.
 */
export function dedupeChanges(raw: RawChange[]): RawChange[] {
  const latest = new Map<string, RawChange>();
  for (const change of raw) {
    if (!change.fileId) continue;
    latest.set(change.fileId, change);
  }
  return [...latest.values()];
}

export function editorOf(file: DriveFile): Editor {
  const editor: Editor = {};
  const user = file.lastModifyingUser;
  if (user?.displayName) editor.name = user.displayName;
  if (user?.emailAddress) editor.email = user.emailAddress;
  return editor;
}

/**
 * Classify one change. Returns null when there is nothing to do for it
 * (unknown file removed, outside the folder, excluded or skipped).
 */
export async function classifyChange(raw: RawChange, ctx: ClassifyContext): Promise<Change | null> {
  const { fileId } = raw;
  const previous = await ctx.store.getFile(fileId);
  const file = raw.file;

  if (raw.removed || !file || file.trashed) {
    return previous ? { kind: 'delete', fileId, oldPath: previous.path, previous } : null;
  }

  if (!(await ctx.folder.isInFolder(file))) {
    // Moved out of the monitored folder
    return previous ? { kind: 'delete', fileId, oldPath: previous.path, previous } : null;
  }

  const relPath = await ctx.folder.resolvePath(file);

  if (isExcluded(relPath, ctx.excludePaths)) {
    logger.debug(`Excluding ${relPath}`);
    return null;
  }

  const reason = skipReason(file, ctx.skipRules);
  if (reason) {
    logger.info(`Skipping ${relPath}: ${reason}`);
    return null;
  }

  const editor = editorOf(file);

  if (!previous) {
    return { kind: 'add', fileId, file, newPath: relPath, editor };
  }

  if (previous.path !== relPath) {
    return {
      kind: previous.name !== file.name ? 'rename' : 'move',
      fileId,
      file,
      oldPath: previous.path,
      newPath: relPath,
      previous,
      editor,
    };
  }

  const changed = file.md5Checksum && previous.md5
    ? file.md5Checksum !== previous.md5
    : (file.modifiedTime ?? null) !== previous.modifiedTime;

  if (changed) {
    return { kind: 'modify', fileId, file, newPath: relPath, previous, editor };
  }
  return { kind: 'skip', fileId, path: relPath };
}

/**
 * Classify a deduplicated batch in order, dropping ignored entries.
 */
export async function classifyAll(raw: RawChange[], ctx: ClassifyContext): Promise<Change[]> {
  const changes: Change[] = [];
  for (const entry of dedupeChanges(raw)) {
    const change = await classifyChange(entry, ctx);
    if (change) changes.push(change);
  }
  return changes;
}
