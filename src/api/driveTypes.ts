/**
 * Types for the remote tree capability contract
 */

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/**
 * Prefix of Google-native documents (Docs, Sheets, Slides...), which carry no checksum
 */
export const NATIVE_DOCUMENT_PREFIX = 'application/vnd.google-apps.';

export type RemoteKind = 'file' | 'folder';

/**
 * Point-in-time view of one remote item. Never mutated locally, only re-fetched.
 */
export interface RemoteNode {
  id: string;
  name: string;
  kind: RemoteKind;
  mimeType: string;
  size?: number;                 // bytes, files only
  contentHash?: string | null;   // md5 when the service computes one
}

export interface ChildrenPage {
  items: RemoteNode[];
  nextPageToken?: string;
}

/**
 * Operations the sync core needs from the remote service.
 *
 * Implementations throw TransientServiceError or PermanentServiceError;
 * every call must be safe to retry.
 */
export interface RemoteTreeService {
  /** Returns null when the id does not resolve */
  getMetadata(id: string): Promise<RemoteNode | null>;
  listChildren(parentId: string, pageToken?: string): Promise<ChildrenPage>;
  findByName(parentId: string, name: string, kind?: RemoteKind): Promise<RemoteNode | null>;
  createFolder(name: string, parentId: string): Promise<string>;
  copyFile(sourceId: string, destParentId: string, destName: string): Promise<string>;
}

export function isNativeDocument(mimeType: string | undefined): boolean {
  return mimeType !== undefined && mimeType.startsWith(NATIVE_DOCUMENT_PREFIX) && mimeType !== FOLDER_MIME_TYPE;
}
