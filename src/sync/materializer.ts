/**
 * Applies classified changes to the working copy: fetches content, writes the
 * original and its derived text, and moves or removes both on rename/delete.
 */
import { logger } from '../logger.js';
import type { WorkingCopy } from '../git/repo.js';
import type { TextExtractor } from '../extract/extractor.js';
import { extractedPathFor, originalPathFor } from '../extract/formats.js';
import type {
  ActionableChange,
  AddChange,
  ContentSource,
  DeleteChange,
  DriveFile,
  ModifyChange,
  ProcessedChange,
  RelocateChange,
  TrackedFile,
} from './types.js';

export interface MaterializeContext {
  repo: WorkingCopy;
  content: ContentSource;
  extract: TextExtractor;
  /** Repository subdirectory holding the mirrored tree ('' for the root) */
  docsSubdir: string;
}

export type MaterializeResult =
  | { ok: true; processed: ProcessedChange }
  | { ok: false; change: ActionableChange; error: string };

/**
 * Repository path for a path relative to the Drive folder.
 */
export function repoPath(docsSubdir: string, relPath: string): string {
  const prefix = docsSubdir.replace(/\/+$/, '');
  return prefix ? `${prefix}/${relPath}` : relPath;
}

/** Where the original of a tracked file lives, relative to the Drive folder */
export function trackedOriginalPath(previous: TrackedFile): string {
  return originalPathFor(previous.path, previous.name, previous.mimeType);
}

interface Written {
  originalPath: string;
  extractedPath: string | null;
}

/**
 * Fetch the file, write the original and, when it has one, its text
 * companion. A failed extraction only omits the companion.
 */
async function writeContent(file: DriveFile, relPath: string, ctx: MaterializeContext): Promise<Written> {
  const content = await ctx.content.fetchOriginal(file.id, file.mimeType);
  const originalPath = originalPathFor(relPath, file.name, file.mimeType);
  await ctx.repo.write(repoPath(ctx.docsSubdir, originalPath), content);

  const derivedPath = extractedPathFor(relPath, file.name, file.mimeType);
  if (!derivedPath) {
    return { originalPath, extractedPath: null };
  }

  const result = await ctx.extract(content, file.name, file.mimeType);
  switch (result.status) {
    case 'ok':
      await ctx.repo.write(repoPath(ctx.docsSubdir, derivedPath), result.text);
      return { originalPath, extractedPath: derivedPath };
    case 'failed':
      logger.warn(`Text extraction failed for ${relPath}: ${result.reason}`);
      return { originalPath, extractedPath: null };
    case 'not-applicable':
      return { originalPath, extractedPath: null };
  }
}

async function applyDelete(change: DeleteChange, ctx: MaterializeContext): Promise<ProcessedChange> {
  const { previous } = change;
  const originalPath = trackedOriginalPath(previous);
  const removedOriginal = await ctx.repo.remove(repoPath(ctx.docsSubdir, originalPath));
  const removedExtracted = previous.extractedPath
    ? await ctx.repo.remove(repoPath(ctx.docsSubdir, previous.extractedPath))
    : false;
  logger.info(`Deleted ${change.oldPath}`);
  // Paths already missing from the checkout have nothing to stage
  return {
    change,
    originalPath: null,
    extractedPath: null,
    previousOriginalPath: removedOriginal ? originalPath : null,
    previousExtractedPath: removedExtracted ? previous.extractedPath : null,
  };
}

function contentChangedOnRelocate(change: RelocateChange): boolean {
  const newHash = change.file.md5Checksum;
  if (!newHash) return true;
  return change.previous.md5 !== null && newHash !== change.previous.md5;
}

async function applyRelocate(change: RelocateChange, ctx: MaterializeContext): Promise<ProcessedChange> {
  const { file, previous } = change;
  const previousOriginalPath = trackedOriginalPath(previous);
  let originalPath = originalPathFor(change.newPath, file.name, file.mimeType);
  await ctx.repo.rename(repoPath(ctx.docsSubdir, previousOriginalPath), repoPath(ctx.docsSubdir, originalPath));

  let extractedPath: string | null = null;
  let previousExtractedPath: string | null = null;
  if (previous.extractedPath) {
    const movedTo = extractedPathFor(change.newPath, file.name, file.mimeType);
    if (movedTo) {
      await ctx.repo.rename(repoPath(ctx.docsSubdir, previous.extractedPath), repoPath(ctx.docsSubdir, movedTo));
      extractedPath = movedTo;
      previousExtractedPath = previous.extractedPath;
    } else if (await ctx.repo.remove(repoPath(ctx.docsSubdir, previous.extractedPath))) {
      // New name is no longer extractable
      previousExtractedPath = previous.extractedPath;
    }
  }

  if (contentChangedOnRelocate(change)) {
    const written = await writeContent(file, change.newPath, ctx);
    originalPath = written.originalPath;
    extractedPath = written.extractedPath ?? extractedPath;
  }

  logger.info(`${change.kind === 'rename' ? 'Renamed' : 'Moved'} ${change.oldPath} → ${change.newPath}`);
  return {
    change,
    originalPath,
    extractedPath,
    previousOriginalPath,
    previousExtractedPath,
  };
}

async function applyWrite(change: AddChange | ModifyChange, ctx: MaterializeContext): Promise<ProcessedChange> {
  const written = await writeContent(change.file, change.newPath, ctx);
  let extractedPath = written.extractedPath;
  if (!extractedPath && change.kind === 'modify' && change.previous.extractedPath) {
    // Extraction failed this time; the earlier companion is still in place
    extractedPath = change.previous.extractedPath;
  }
  logger.info(`${change.kind === 'add' ? 'Added' : 'Updated'} ${change.newPath}`);
  return {
    change,
    originalPath: written.originalPath,
    extractedPath,
    previousOriginalPath: null,
    previousExtractedPath: null,
  };
}

export async function materialize(change: ActionableChange, ctx: MaterializeContext): Promise<ProcessedChange> {
  switch (change.kind) {
    case 'delete':
      return applyDelete(change, ctx);
    case 'rename':
    case 'move':
      return applyRelocate(change, ctx);
    case 'add':
    case 'modify':
      return applyWrite(change, ctx);
  }
}

/**
 * Materialize every change in order. A failing change is logged and reported
 * as a failed result; it never stops the rest of the batch.
 */
export async function materializeAll(changes: ActionableChange[], ctx: MaterializeContext): Promise<MaterializeResult[]> {
  const results: MaterializeResult[] = [];
  for (const change of changes) {
    try {
      results.push({ ok: true, processed: await materialize(change, ctx) });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to process ${change.kind} for ${change.fileId}: ${error}`);
      results.push({ ok: false, change, error });
    }
  }
  return results;
}
