import { describe, it, expect } from 'vitest';
import { isExcluded, skipReason } from './exclusions.js';

describe('exclusions', () => {
  describe('isExcluded', () => {
    it('should match glob patterns against the full path', () => {
      expect(isExcluded('notes.tmp', ['*.tmp'])).toBe(true);
      expect(isExcluded('notes.md', ['*.tmp'])).toBe(false);
      expect(isExcluded('a/b/notes.tmp', ['**/*.tmp'])).toBe(true);
    });

    it('should match file-level patterns in any directory', () => {
      expect(isExcluded('Reports/notes.tmp', ['*.tmp'])).toBe(true);
      expect(isExcluded('a/b/.DS_Store', ['.DS_Store'])).toBe(true);
      expect(isExcluded('Reports/notes.md', ['*.tmp'])).toBe(false);
    });

    it('should exclude everything below a directory pattern', () => {
      expect(isExcluded('Archive/2023/q1.pdf', ['Archive/*'])).toBe(true);
      expect(isExcluded('Archive/q1.pdf', ['Archive/'])).toBe(true);
      expect(isExcluded('Archive', ['Archive/**'])).toBe(true);
    });

    it('should not match sibling directories sharing a prefix', () => {
      expect(isExcluded('Archived/q1.pdf', ['Archive/*'])).toBe(false);
    });

    it('should match nested directory patterns', () => {
      expect(isExcluded('Team/Private/plan.docx', ['Team/Private'])).toBe(true);
      expect(isExcluded('Team/Public/plan.docx', ['Team/Private'])).toBe(false);
    });

    it('should match dot files', () => {
      expect(isExcluded('.hidden/x.txt', ['.hidden'])).toBe(true);
    });

    it('should exclude nothing without patterns', () => {
      expect(isExcluded('a/b.txt', [])).toBe(false);
    });
  });

  describe('skipReason', () => {
    const rules = { skipExtensions: ['.zip', '.exe'], maxFileSizeMb: 100 };

    it('should skip listed extensions case-insensitively', () => {
      expect(skipReason({ name: 'Setup.EXE' }, rules)).toBe('skipped extension .exe');
    });

    it('should skip files over the size limit', () => {
      expect(skipReason({ name: 'video.mov', size: 150 * 1024 * 1024 }, rules)).toBe('file too large (150MB > 100MB)');
    });

    it('should keep files at exactly the size limit', () => {
      expect(skipReason({ name: 'video.mov', size: 100 * 1024 * 1024 }, rules)).toBeNull();
    });

    it('should keep files without a size', () => {
      expect(skipReason({ name: 'Plan' }, rules)).toBeNull();
    });
  });
});
