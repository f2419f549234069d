/**
 * Type definitions for the sync engine.
 */

/** Editor identity as reported by Drive */
export interface DriveUser {
  displayName?: string;
  emailAddress?: string;
}

/**
 * Metadata snapshot of a Drive file, normalised from the API response.
 */
export interface DriveFile {
  id: string;
  name: string;
  /** Parent folder IDs (Drive allows several) */
  parents: string[];
  mimeType: string;
  /** MD5 of the content; absent for natively-edited documents */
  md5Checksum?: string;
  trashed: boolean;
  /** RFC 3339 modification timestamp */
  modifiedTime?: string;
  /** Size in bytes */
  size?: number;
  lastModifyingUser?: DriveUser;
}

/**
 * One entry of the change feed.
 */
export interface RawChange {
  fileId: string;
  removed: boolean;
  file?: DriveFile;
}

export interface ChangePage {
  changes: RawChange[];
  /** Cursor to adopt once the batch has been applied */
  nextCursor: string;
}

/**
 * Persisted record for a file that is currently mirrored.
 * Stored under <stateDir>/files/<fileId>.json.
 */
export interface TrackedFile {
  fileId: string;
  name: string;
  /** Path relative to the Drive folder, forward slashes */
  path: string;
  md5: string | null;
  mimeType: string;
  modifiedTime: string | null;
  /** Relative path of the derived text companion, if one was written */
  extractedPath: string | null;
  lastModifiedByName: string | null;
  lastModifiedByEmail: string | null;
}

/**
 * Push-notification subscription (a Drive watch channel).
 */
export interface Subscription {
  /** Channel ID we generated */
  id: string;
  /** Resource ID assigned by Drive */
  resourceId: string;
  /** Expiry as epoch milliseconds */
  expiration: number;
}

export interface LockRecord {
  locked: boolean;
  owner: string | null;
  /** Epoch milliseconds */
  acquiredAt: number | null;
}

export interface Editor {
  name?: string;
  email?: string;
}

export interface AddChange {
  kind: 'add';
  fileId: string;
  file: DriveFile;
  newPath: string;
  editor: Editor;
}

export interface ModifyChange {
  kind: 'modify';
  fileId: string;
  file: DriveFile;
  newPath: string;
  previous: TrackedFile;
  editor: Editor;
}

export interface RelocateChange {
  kind: 'rename' | 'move';
  fileId: string;
  file: DriveFile;
  oldPath: string;
  newPath: string;
  previous: TrackedFile;
  editor: Editor;
}

export interface DeleteChange {
  kind: 'delete';
  fileId: string;
  oldPath: string;
  previous: TrackedFile;
}

/** Re-notification with nothing to apply */
export interface SkipChange {
  kind: 'skip';
  fileId: string;
  path: string;
}

export type Change = AddChange | ModifyChange | RelocateChange | DeleteChange | SkipChange;

/** A change that touches the working copy */
export type ActionableChange = Exclude<Change, SkipChange>;

/**
 * A change that was written to the working copy, with the paths it touched
 * (relative to the Drive folder).
 */
export interface ProcessedChange {
  change: ActionableChange;
  /** Original file written or moved to; null for deletes */
  originalPath: string | null;
  /** Derived text written or moved to */
  extractedPath: string | null;
  /** Original file removed or moved away from */
  previousOriginalPath: string | null;
  previousExtractedPath: string | null;
}

export interface AuthorBatch {
  authorName: string;
  authorEmail: string;
  message: string;
  changes: ProcessedChange[];
}

/**
 * Drive-facing services the engine depends on.
 */
export interface ChangeFeed {
  listChanges(cursor: string): Promise<ChangePage>;
  getStartCursor(): Promise<string>;
}

export interface FolderResolver {
  isInFolder(file: DriveFile): Promise<boolean>;
  resolvePath(file: DriveFile): Promise<string>;
}

export interface ContentSource {
  fetchOriginal(fileId: string, mimeType: string): Promise<Buffer>;
}

export interface SubscriptionService {
  watch(address: string, cursor: string): Promise<Subscription>;
  stop(subscription: Subscription): Promise<void>;
}

export interface DriveService extends ChangeFeed, FolderResolver, ContentSource, SubscriptionService {
  /** Every file under the monitored folder, for the initial sync */
  listTree(): Promise<DriveFile[]>;
}
