/**
 * Narrow promise-based view of the Drive v3 API, and its implementation on
 * top of the `googleapis` client.
 */
import { google } from 'googleapis';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.readonly'];

export const CHANGE_FIELDS =
  'nextPageToken,newStartPageToken,' +
  'changes(fileId,removed,file(id,name,parents,mimeType,md5Checksum,' +
  'trashed,modifiedTime,size,lastModifyingUser(displayName,emailAddress)))';

export const FILE_FIELDS =
  'id,name,parents,mimeType,md5Checksum,trashed,modifiedTime,size,' +
  'lastModifyingUser(displayName,emailAddress)';

export interface RawDriveUser {
  displayName?: string | null;
  emailAddress?: string | null;
}

/** File resource as returned by the API; every field may be missing */
export interface RawDriveFile {
  id?: string | null;
  name?: string | null;
  parents?: string[] | null;
  mimeType?: string | null;
  md5Checksum?: string | null;
  trashed?: boolean | null;
  modifiedTime?: string | null;
  size?: string | null;
  lastModifyingUser?: RawDriveUser | null;
}

export interface RawDriveChange {
  fileId?: string | null;
  removed?: boolean | null;
  file?: RawDriveFile | null;
}

export interface RawChangeList {
  changes?: RawDriveChange[] | null;
  nextPageToken?: string | null;
  newStartPageToken?: string | null;
}

export interface RawFileList {
  files?: RawDriveFile[] | null;
  nextPageToken?: string | null;
}

export interface RawChannel {
  resourceId?: string | null;
  expiration?: string | null;
}

export interface DriveTransport {
  listChanges(pageToken: string): Promise<RawChangeList>;
  getStartPageToken(): Promise<string>;
  getFile(fileId: string, fields: string): Promise<RawDriveFile>;
  /** Direct, non-trashed children of a folder */
  listChildren(folderId: string, pageToken?: string): Promise<RawFileList>;
  download(fileId: string): Promise<Buffer>;
  exportFile(fileId: string, mimeType: string): Promise<Buffer>;
  watchChanges(pageToken: string, channel: { id: string; address: string }): Promise<RawChannel>;
  stopChannel(id: string, resourceId: string): Promise<void>;
}

export function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  throw new Error('Unexpected response body from Drive');
}

/**
 * Transport backed by googleapis, authenticated with application default
 * credentials (service account key, workload identity, or gcloud login).
 */
export function createGoogleTransport(): DriveTransport {
  const auth = new google.auth.GoogleAuth({ scopes: DRIVE_SCOPES });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async listChanges(pageToken) {
      const res = await drive.changes.list({
        pageToken,
        fields: CHANGE_FIELDS,
        spaces: 'drive',
        includeRemoved: true,
        pageSize: 1000,
      });
      return res.data;
    },

    async getStartPageToken() {
      const res = await drive.changes.getStartPageToken({});
      if (!res.data.startPageToken) {
        throw new Error('Drive returned no start page token');
      }
      return res.data.startPageToken;
    },

    async getFile(fileId, fields) {
      const res = await drive.files.get({ fileId, fields });
      return res.data;
    },

    async listChildren(folderId, pageToken) {
      const res = await drive.files.list({
        q: `'${folderId.replace(/'/g, "\\'")}' in parents and trashed = false`,
        fields: `nextPageToken,files(${FILE_FIELDS})`,
        pageSize: 1000,
        pageToken,
      });
      return res.data;
    },

    async download(fileId) {
      const res = await drive.files.get({ fileId, alt: 'media' }, { responseType: 'arraybuffer' });
      return toBuffer(res.data);
    },

    async exportFile(fileId, mimeType) {
      const res = await drive.files.export({ fileId, mimeType }, { responseType: 'arraybuffer' });
      return toBuffer(res.data);
    },

    async watchChanges(pageToken, channel) {
      const res = await drive.changes.watch({
        pageToken,
        fields: 'resourceId,expiration',
        requestBody: { id: channel.id, type: 'web_hook', address: channel.address },
      });
      return res.data;
    },

    async stopChannel(id, resourceId) {
      await drive.channels.stop({ requestBody: { id, resourceId } });
    },
  };
}
