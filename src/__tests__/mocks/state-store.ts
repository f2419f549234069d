import type { StateStore } from '../../sync/state.js';
import { sameLock, sortByPath } from '../../sync/state.js';
import type { LockRecord, Subscription, TrackedFile } from '../../sync/types.js';

/**
 * In-memory StateStore. Fields are public so tests can seed and inspect.
 */
export class MemoryStateStore implements StateStore {
  cursor: string | null = null;
  subscription: Subscription | null = null;
  lock: LockRecord | null = null;
  resync = false;
  files = new Map<string, TrackedFile>();
  /** Number of upcoming compareAndSwapLock calls that report a lost race */
  casFailures = 0;
  cursorWrites: string[] = [];

  async getCursor() { return this.cursor; }
  async setCursor(cursor: string) {
    this.cursor = cursor;
    this.cursorWrites.push(cursor);
  }

  async getSubscription() { return this.subscription; }
  async setSubscription(subscription: Subscription) { this.subscription = subscription; }
  async clearSubscription() { this.subscription = null; }

  async getLock() { return this.lock; }
  async compareAndSwapLock(expected: LockRecord | null, next: LockRecord) {
    if (this.casFailures > 0) {
      this.casFailures--;
      return false;
    }
    if (!sameLock(this.lock, expected)) return false;
    this.lock = { ...next };
    return true;
  }

  async requestResync() { this.resync = true; }
  async clearResync() { this.resync = false; }
  async isResyncRequested() { return this.resync; }

  async getFile(fileId: string) { return this.files.get(fileId) ?? null; }
  async setFile(record: TrackedFile) { this.files.set(record.fileId, { ...record }); }
  async deleteFile(fileId: string) { this.files.delete(fileId); }
  async listFiles(prefix?: string) {
    return sortByPath([...this.files.values()].filter(f => !prefix || f.path.startsWith(prefix)));
  }
}
