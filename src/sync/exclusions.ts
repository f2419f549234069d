/**
 * Exclusion and skip rules applied to Drive files before they are mirrored.
 */
import path from 'node:path';
import { minimatch } from 'minimatch';
import type { DriveFile } from './types.js';

const BYTES_PER_MB = 1024 * 1024;

export interface SkipRules {
  /** Lower-case extensions, including the dot */
  skipExtensions: string[];
  maxFileSizeMb: number;
}

/**
 * Check if a relative path matches any exclude pattern. A pattern matches the
 * path itself, or any of its leading directories once trailing `/` and `*`
 * are stripped (so `Archive/*` and `Archive/` both exclude `Archive/a/b.txt`).
 * File-level patterns also match the basename, so `*.tmp` excludes
 * `Reports/notes.tmp`.
 */
export function isExcluded(relPath: string, patterns: string[]): boolean {
  const segments = relPath.split('/');
  const basename = path.posix.basename(relPath);
  for (const pattern of patterns) {
    if (minimatch(relPath, pattern, { dot: true })) {
      return true;
    }
    if (minimatch(basename, pattern, { dot: true })) {
      return true;
    }
    const dirPattern = pattern.replace(/[/*]+$/, '');
    if (!dirPattern) continue;
    for (let i = 1; i <= segments.length; i++) {
      if (minimatch(segments.slice(0, i).join('/'), dirPattern, { dot: true })) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Returns the reason a file is not mirrored, or null when it is.
 */
export function skipReason(file: Pick<DriveFile, 'name' | 'size'>, rules: SkipRules): string | null {
  const name = file.name.toLowerCase();
  for (const ext of rules.skipExtensions) {
    if (name.endsWith(ext.toLowerCase())) {
      return `skipped extension ${ext}`;
    }
  }

  if (file.size !== undefined && file.size > rules.maxFileSizeMb * BYTES_PER_MB) {
    const sizeMb = Math.round(file.size / BYTES_PER_MB);
    return `file too large (${sizeMb}MB > ${rules.maxFileSizeMb}MB)`;
  }

  return null;
}
