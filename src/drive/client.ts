/**
 * Drive service used by the sync engine: change feed, folder containment and
 * path resolution relative to the monitored folder, content fetch, and
 * push-notification subscriptions.
 */
import crypto from 'node:crypto';
import { logger } from '../logger.js';
import { nativeExportFor } from '../extract/formats.js';
import type { ChangePage, DriveFile, DriveService, RawChange, Subscription } from '../sync/types.js';
import type { DriveTransport, RawDriveChange, RawDriveFile } from './transport.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

interface FolderInfo {
  name: string;
  parents: string[];
}

/**
 * Normalise an API file resource. Returns null when it has no id.
 */
export function toDriveFile(raw: RawDriveFile): DriveFile | null {
  if (!raw.id) return null;
  const file: DriveFile = {
    id: raw.id,
    name: raw.name ?? 'unknown',
    parents: raw.parents ?? [],
    mimeType: raw.mimeType ?? '',
    trashed: raw.trashed ?? false,
  };
  if (raw.md5Checksum) file.md5Checksum = raw.md5Checksum;
  if (raw.modifiedTime) file.modifiedTime = raw.modifiedTime;
  if (raw.size) {
    const size = Number(raw.size);
    if (Number.isFinite(size)) file.size = size;
  }
  const user = raw.lastModifyingUser;
  if (user) {
    file.lastModifyingUser = {};
    if (user.displayName) file.lastModifyingUser.displayName = user.displayName;
    if (user.emailAddress) file.lastModifyingUser.emailAddress = user.emailAddress;
  }
  return file;
}

export function toRawChange(raw: RawDriveChange): RawChange | null {
  if (!raw.fileId) return null;
  const change: RawChange = { fileId: raw.fileId, removed: raw.removed ?? false };
  const file = raw.file ? toDriveFile(raw.file) : null;
  if (file) change.file = file;
  return change;
}

export class DriveClient implements DriveService {
  /** id → folder metadata, or null when the lookup failed */
  private readonly folders = new Map<string, FolderInfo | null>();

  constructor(
    private readonly transport: DriveTransport,
    private readonly rootFolderId: string,
  ) {}

  /**
   * Fetch every change since `cursor`, following page tokens. Folder lookups
   * are cached for the duration of one batch.
   */
  async listChanges(cursor: string): Promise<ChangePage> {
    this.folders.clear();
    const changes: RawChange[] = [];
    let pageToken = cursor;

    for (;;) {
      const page = await this.transport.listChanges(pageToken);
      for (const raw of page.changes ?? []) {
        const change = toRawChange(raw);
        if (change) changes.push(change);
      }
      if (page.nextPageToken) {
        pageToken = page.nextPageToken;
        continue;
      }
      return { changes, nextCursor: page.newStartPageToken ?? pageToken };
    }
  }

  async getStartCursor(): Promise<string> {
    return this.transport.getStartPageToken();
  }

  /**
   * Whether the file sits anywhere below the monitored folder. Unreachable
   * parents count as "not contained".
   */
  async isInFolder(file: DriveFile): Promise<boolean> {
    const visited = new Set<string>();
    const pending = [...file.parents];

    while (pending.length > 0) {
      const parentId = pending.pop();
      if (parentId === undefined || visited.has(parentId)) continue;
      visited.add(parentId);

      if (parentId === this.rootFolderId) return true;

      const info = await this.folder(parentId);
      if (info) pending.push(...info.parents);
    }
    return false;
  }

  /**
   * Path of the file relative to the monitored folder, following first
   * parents. When a folder cannot be looked up the leading segments are
   * dropped and a warning is logged.
   */
  async resolvePath(file: DriveFile): Promise<string> {
    const parts: string[] = [];
    const visited = new Set<string>();
    let current: string | undefined = file.parents[0];

    while (current !== undefined && current !== this.rootFolderId) {
      if (visited.has(current)) break;
      visited.add(current);

      const info = await this.folder(current);
      if (!info) {
        logger.warn(`Path of ${file.name} truncated: folder ${current} could not be resolved`);
        break;
      }
      parts.push(info.name);
      current = info.parents[0];
    }

    parts.reverse();
    parts.push(file.name);
    return parts.join('/');
  }

  /**
   * Original bytes of a file: exported for natively-edited documents,
   * downloaded otherwise.
   */
  async fetchOriginal(fileId: string, mimeType: string): Promise<Buffer> {
    const native = nativeExportFor(mimeType);
    if (native) {
      return this.transport.exportFile(fileId, native.exportMimeType);
    }
    return this.transport.download(fileId);
  }

  async watch(address: string, cursor: string): Promise<Subscription> {
    const id = crypto.randomUUID();
    const channel = await this.transport.watchChanges(cursor, { id, address });
    if (!channel.resourceId) {
      throw new Error('Drive did not return a resource id for the subscription');
    }
    return {
      id,
      resourceId: channel.resourceId,
      expiration: Number(channel.expiration ?? 0),
    };
  }

  async stop(subscription: Subscription): Promise<void> {
    await this.transport.stopChannel(subscription.id, subscription.resourceId);
  }

  /**
   * Every non-folder file below the monitored folder, breadth first.
   */
  async listTree(): Promise<DriveFile[]> {
    this.folders.clear();
    const files: DriveFile[] = [];
    const visited = new Set<string>();
    const queue = [this.rootFolderId];

    while (queue.length > 0) {
      const folderId = queue.shift();
      if (folderId === undefined || visited.has(folderId)) continue;
      visited.add(folderId);

      let pageToken: string | undefined;
      do {
        const page = await this.transport.listChildren(folderId, pageToken);
        for (const raw of page.files ?? []) {
          const file = toDriveFile(raw);
          if (!file) continue;
          if (file.mimeType === FOLDER_MIME_TYPE) {
            this.folders.set(file.id, { name: file.name, parents: file.parents });
            queue.push(file.id);
          } else {
            files.push(file);
          }
        }
        pageToken = page.nextPageToken ?? undefined;
      } while (pageToken);
    }

    return files;
  }

  private async folder(id: string): Promise<FolderInfo | null> {
    const cached = this.folders.get(id);
    if (cached !== undefined) return cached;

    let info: FolderInfo | null;
    try {
      const raw = await this.transport.getFile(id, 'name,parents');
      info = { name: raw.name ?? id, parents: raw.parents ?? [] };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug(`Could not fetch folder ${id}: ${message}`);
      info = null;
    }
    this.folders.set(id, info);
    return info;
  }
}
