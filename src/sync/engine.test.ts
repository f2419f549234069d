import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryStateStore } from '../__tests__/mocks/state-store.js';
import { RecordingWorkingCopy } from '../__tests__/mocks/working-copy.js';
import { FakeDrive, driveFile, fileChange } from '../__tests__/mocks/drive.js';
import type { TextExtractor } from '../extract/extractor.js';
import { runInitialSync, runSyncCycle, type SyncDeps, type SyncPhase } from './engine.js';
import type { DriveFile } from './types.js';

const ADA = { displayName: 'Ada', emailAddress: 'ada@example.com' };
const BOB = { displayName: 'Bob', emailAddress: 'bob@example.com' };

describe('sync engine', () => {
  let store: MemoryStateStore;
  let drive: FakeDrive;
  let repo: RecordingWorkingCopy;
  let phases: SyncPhase[];
  let deps: SyncDeps;

  function editedBy(id: string, name: string, user: DriveFile['lastModifyingUser'], md5 = `md5-${id}`): DriveFile {
    drive.contents.set(id, `content of ${name}`);
    return driveFile({ id, name, md5Checksum: md5, lastModifyingUser: user });
  }

  beforeEach(() => {
    store = new MemoryStateStore();
    drive = new FakeDrive();
    repo = new RecordingWorkingCopy();
    phases = [];
    deps = {
      settings: {
        excludePaths: [],
        skipExtensions: ['.exe'],
        maxFileSizeMb: 100,
        commitAuthor: { name: 'Drive Sync', email: 'sync@example.com' },
        docsSubdir: 'mirror',
      },
      drive,
      store,
      repo,
      extract: vi.fn<TextExtractor>(async () => ({ status: 'not-applicable' })),
      onPhase: phase => phases.push(phase),
    };
  });

  describe('runSyncCycle', () => {
    it('should initialise the cursor on a cold start without listing changes', async () => {
      const result = await runSyncCycle(deps);

      expect(result).toEqual({ processed: 0, skipped: 0, commits: 0, errors: [], cursorAdvanced: true });
      expect(store.cursor).toBe('cursor-start');
      expect(drive.listCalls).toEqual([]);
      expect(repo.cloned).toBe(false);
      expect(phases).toEqual(['uninitialized', 'done']);
    });

    it('should adopt the next cursor when the feed is empty', async () => {
      store.cursor = 'c1';
      drive.pages = [{ changes: [], nextCursor: 'c2' }];

      await runSyncCycle(deps);

      expect(drive.listCalls).toEqual(['c1']);
      expect(store.cursor).toBe('c2');
      expect(repo.cloned).toBe(false);
    });

    it('should advance without cloning when nothing is actionable', async () => {
      store.cursor = 'c1';
      drive.pages = [{
        changes: [
          { fileId: 'gone', removed: true },
          fileChange(driveFile({ id: 'bin', name: 'setup.exe' })),
        ],
        nextCursor: 'c2',
      }];

      const result = await runSyncCycle(deps);

      expect(result).toEqual({ processed: 0, skipped: 0, commits: 0, errors: [], cursorAdvanced: true });
      expect(store.cursor).toBe('c2');
      expect(repo.cloned).toBe(false);
    });

    it('should count re-notified files as skipped', async () => {
      store.cursor = 'c1';
      store.files.set('a', {
        fileId: 'a', name: 'a.txt', path: 'a.txt', md5: 'same', mimeType: 'text/plain',
        modifiedTime: null, extractedPath: null, lastModifiedByName: null, lastModifiedByEmail: null,
      });
      drive.pages = [{ changes: [fileChange(driveFile({ id: 'a', name: 'a.txt', md5Checksum: 'same' }))], nextCursor: 'c2' }];

      expect(await runSyncCycle(deps)).toMatchObject({ processed: 0, skipped: 1, cursorAdvanced: true });
    });

    it('should commit, push and then persist a new file', async () => {
      store.cursor = 'c1';
      drive.pages = [{ changes: [fileChange(editedBy('a', 'a.txt', ADA))], nextCursor: 'c2' }];

      const result = await runSyncCycle(deps);

      expect(result).toEqual({ processed: 1, skipped: 0, commits: 1, errors: [], cursorAdvanced: true });
      expect(repo.ops).toEqual(['clone', 'write mirror/a.txt', 'commit ada@example.com', 'push', 'cleanup']);
      expect(repo.commits[0]).toEqual({
        message: 'Sync from Google Drive\n\n  - add: a.txt',
        author: { name: 'Ada', email: 'ada@example.com' },
        paths: ['mirror/a.txt'],
      });
      expect(store.files.get('a')).toEqual({
        fileId: 'a',
        name: 'a.txt',
        path: 'a.txt',
        md5: 'md5-a',
        mimeType: 'text/plain',
        modifiedTime: null,
        extractedPath: null,
        lastModifiedByName: 'Ada',
        lastModifiedByEmail: 'ada@example.com',
      });
      expect(store.cursor).toBe('c2');
      expect(phases).toEqual(['fetching', 'classifying', 'materializing', 'committing', 'pushing', 'persisting', 'done']);
    });

    it('should make one commit per author and push once', async () => {
      store.cursor = 'c1';
      drive.pages = [{
        changes: [
          fileChange(editedBy('a', 'a.txt', ADA)),
          fileChange(editedBy('b', 'b.txt', BOB)),
          fileChange(editedBy('c', 'c.txt', ADA)),
        ],
        nextCursor: 'c2',
      }];

      const result = await runSyncCycle(deps);

      expect(result.commits).toBe(2);
      expect(repo.ops).toEqual([
        'clone',
        'write mirror/a.txt',
        'write mirror/b.txt',
        'write mirror/c.txt',
        'unstage',
        'stage mirror/a.txt mirror/c.txt',
        'commit ada@example.com',
        'stage mirror/b.txt',
        'commit bob@example.com',
        'push',
        'cleanup',
      ]);
      expect(repo.commits.map(c => c.paths)).toEqual([['mirror/a.txt', 'mirror/c.txt'], ['mirror/b.txt']]);
      expect(repo.pushes).toBe(1);
    });

    it('should not stage a deleted file that was already missing from the checkout', async () => {
      store.cursor = 'c1';
      store.files.set('gone', {
        fileId: 'gone', name: 'gone.txt', path: 'gone.txt', md5: 'x', mimeType: 'text/plain',
        modifiedTime: null, extractedPath: null, lastModifiedByName: null, lastModifiedByEmail: null,
      });
      drive.pages = [{
        changes: [
          fileChange(editedBy('a', 'a.txt', ADA)),
          fileChange(editedBy('b', 'b.txt', BOB)),
          { fileId: 'gone', removed: true },
        ],
        nextCursor: 'c2',
      }];

      const result = await runSyncCycle(deps);

      expect(result.errors).toEqual([]);
      expect(result.commits).toBe(2);
      expect(repo.ops).toEqual([
        'clone',
        'write mirror/a.txt',
        'write mirror/b.txt',
        'unstage',
        'stage mirror/a.txt',
        'commit ada@example.com',
        'stage mirror/b.txt',
        'commit bob@example.com',
        'push',
        'cleanup',
      ]);
      expect(store.cursor).toBe('c2');
      expect(store.files.has('gone')).toBe(false);
    });

    it('should commit deletes as the fallback author and forget the record', async () => {
      store.cursor = 'c1';
      store.files.set('a', {
        fileId: 'a', name: 'a.txt', path: 'a.txt', md5: 'x', mimeType: 'text/plain',
        modifiedTime: null, extractedPath: null, lastModifiedByName: 'Ada', lastModifiedByEmail: 'ada@example.com',
      });
      repo.files.set('mirror/a.txt', 'old');
      drive.pages = [{ changes: [{ fileId: 'a', removed: true }], nextCursor: 'c2' }];

      await runSyncCycle(deps);

      expect(repo.commits[0].author).toEqual({ name: 'Drive Sync', email: 'sync@example.com' });
      expect(repo.files.has('mirror/a.txt')).toBe(false);
      expect(store.files.has('a')).toBe(false);
    });

    it('should leave state untouched when the push fails', async () => {
      store.cursor = 'c1';
      repo.pushError = new Error('rejected: non-fast-forward');
      drive.pages = [{ changes: [fileChange(editedBy('a', 'a.txt', ADA))], nextCursor: 'c2' }];

      await expect(runSyncCycle(deps)).rejects.toThrow('rejected: non-fast-forward');

      expect(store.cursor).toBe('c1');
      expect(store.files.size).toBe(0);
      expect(repo.cleanedUp).toBe(true);
    });

    it('should keep the cursor when every change failed', async () => {
      store.cursor = 'c1';
      drive.pages = [{ changes: [fileChange(driveFile({ id: 'x', name: 'x.txt' }))], nextCursor: 'c2' }];

      const result = await runSyncCycle(deps);

      expect(result).toEqual({
        processed: 0,
        skipped: 0,
        commits: 0,
        errors: [{ fileId: 'x', error: 'File not found: x' }],
        cursorAdvanced: false,
      });
      expect(store.cursorWrites).toEqual([]);
      expect(repo.pushes).toBe(0);
      expect(repo.cleanedUp).toBe(true);
    });

    it('should advance past failed changes when others succeeded', async () => {
      store.cursor = 'c1';
      drive.pages = [{
        changes: [
          fileChange(driveFile({ id: 'x', name: 'x.txt' })),
          fileChange(editedBy('a', 'a.txt', ADA)),
        ],
        nextCursor: 'c2',
      }];

      const result = await runSyncCycle(deps);

      expect(result).toMatchObject({ processed: 1, commits: 1, errors: [{ fileId: 'x', error: 'File not found: x' }], cursorAdvanced: true });
      expect(store.cursor).toBe('c2');
      expect([...store.files.keys()]).toEqual(['a']);
    });
  });

  describe('runInitialSync', () => {
    it('should mirror the whole tree without touching the cursor', async () => {
      drive.tree = [editedBy('a', 'a.txt', ADA), editedBy('b', 'b.txt', ADA)];

      const result = await runInitialSync(deps);

      expect(result).toEqual({ processed: 2, skipped: 0, commits: 1, errors: [], cursorAdvanced: false });
      expect(store.cursorWrites).toEqual([]);
      expect([...store.files.keys()]).toEqual(['a', 'b']);
      expect(repo.pushes).toBe(1);
    });

    it('should not clone for an empty folder', async () => {
      const result = await runInitialSync(deps);
      expect(result).toEqual({ processed: 0, skipped: 0, commits: 0, errors: [], cursorAdvanced: false });
      expect(repo.cloned).toBe(false);
    });
  });
});
