import type { CommitIdentity } from '../config.js';
import type { ActionableChange, AuthorBatch, ProcessedChange } from './types.js';

export const COMMIT_HEADER = 'Sync from Google Drive';

function changeLabel(change: ActionableChange): string {
  if (change.kind === 'delete') {
    return change.oldPath || change.fileId;
  }
  return change.newPath || change.fileId;
}

export function commitMessage(changes: ProcessedChange[]): string {
  const lines = changes.map(({ change }) => `  - ${change.kind}: ${changeLabel(change)}`);
  return `${COMMIT_HEADER}\n\n${lines.join('\n')}`;
}

function authorOf(change: ActionableChange, fallback: CommitIdentity): CommitIdentity {
  const editor = change.kind === 'delete' ? {} : change.editor;
  return {
    name: editor.name ?? fallback.name,
    email: editor.email ?? fallback.email,
  };
}

/**
 * Partition processed changes into one batch per (name, email). Batches keep
 * first-seen order; changes keep their order within a batch.
 */
export function groupByAuthor(processed: ProcessedChange[], fallback: CommitIdentity): AuthorBatch[] {
  const batches = new Map<string, AuthorBatch>();

  for (const item of processed) {
    const author = authorOf(item.change, fallback);
    const key = `${author.name} <${author.email}>`;
    let batch = batches.get(key);
    if (!batch) {
      batch = { authorName: author.name, authorEmail: author.email, message: '', changes: [] };
      batches.set(key, batch);
    }
    batch.changes.push(item);
  }

  const result = [...batches.values()];
  for (const batch of result) {
    batch.message = commitMessage(batch.changes);
  }
  return result;
}

/**
 * Paths (relative to the Drive folder) a processed change touched, for
 * per-batch staging: the original and derived text on both sides of the change.
 */
export function stagePathsFor(item: ProcessedChange): string[] {
  const paths = [item.previousOriginalPath, item.previousExtractedPath, item.originalPath, item.extractedPath];
  const unique: string[] = [];
  for (const p of paths) {
    if (p && !unique.includes(p)) unique.push(p);
  }
  return unique;
}
