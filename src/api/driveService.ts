/**
 * Google Drive v3 adapter for the RemoteTreeService contract
 *
 * The only module that sees raw googleapis responses and errors:
 * - maps drive_v3 file resources to RemoteNode
 * - converts every thrown value into TransientServiceError / PermanentServiceError
 * - shared drives are always included
 */

import { google } from 'googleapis';
import type { Auth, drive_v3 } from 'googleapis';
import {
  PermanentServiceError,
  ServiceError,
  TransientServiceError
} from '../errors/syncErrors.js';
import {
  FOLDER_MIME_TYPE,
  type ChildrenPage,
  type RemoteKind,
  type RemoteNode,
  type RemoteTreeService
} from './driveTypes.js';

const FILE_FIELDS = 'id, name, mimeType, size, md5Checksum';
const LIST_PAGE_SIZE = 1000;

const RETRIABLE_STATUS = new Set([403, 429, 500, 503]);

// 403 reasons that no amount of waiting will fix
const PERMANENT_403_REASONS = new Set([
  'dailyLimitExceeded',
  'storageQuotaExceeded',
  'insufficientFilePermissions',
  'cannotCopyFile',
  'domainPolicy'
]);

const RETRIABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'EAI_AGAIN', 'EPIPE']);

/**
 * The subset of drive.files this adapter calls
 */
export interface DriveFilesApi {
  list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
  get(params: drive_v3.Params$Resource$Files$Get): Promise<{ data: drive_v3.Schema$File }>;
  create(params: drive_v3.Params$Resource$Files$Create): Promise<{ data: drive_v3.Schema$File }>;
  copy(params: drive_v3.Params$Resource$Files$Copy): Promise<{ data: drive_v3.Schema$File }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

interface FailureDetails {
  status?: number;
  reason?: string;
  networkCode?: string;
  message: string;
}

/**
 * Pull status code, API reason and message out of a googleapis (gaxios) error
 */
export function describeFailure(error: unknown): FailureDetails {
  const details: FailureDetails = { message: error instanceof Error ? error.message : String(error) };
  if (!isRecord(error)) {
    return details;
  }

  const response = error.response;
  if (isRecord(response)) {
    if (typeof response.status === 'number') {
      details.status = response.status;
    }
    const body = response.data;
    if (isRecord(body) && isRecord(body.error)) {
      if (typeof body.error.message === 'string') {
        details.message = body.error.message;
      }
      const errors = body.error.errors;
      if (Array.isArray(errors) && isRecord(errors[0]) && typeof errors[0].reason === 'string') {
        details.reason = errors[0].reason;
      }
    }
  }

  if (details.status === undefined && typeof error.status === 'number') {
    details.status = error.status;
  }
  if (typeof error.code === 'string') {
    if (/^\d+$/.test(error.code)) {
      details.status ??= Number(error.code);
    } else {
      details.networkCode = error.code;
    }
  } else if (typeof error.code === 'number') {
    details.status ??= error.code;
  }

  return details;
}

/**
 * Convert anything a Drive call throws into a classified ServiceError
 */
export function classifyDriveError(operation: string, error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  const { status, reason, networkCode, message } = describeFailure(error);

  if (status !== undefined && RETRIABLE_STATUS.has(status)) {
    if (status === 403 && reason !== undefined && PERMANENT_403_REASONS.has(reason)) {
      return new PermanentServiceError(operation, message, status, reason);
    }
    return new TransientServiceError(operation, message, status, reason);
  }
  if (status === undefined && networkCode !== undefined && RETRIABLE_NETWORK_CODES.has(networkCode)) {
    return new TransientServiceError(operation, message, undefined, networkCode);
  }
  return new PermanentServiceError(operation, message, status, reason ?? networkCode);
}

/**
 * Escape a value for a Drive query string literal
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function toRemoteNode(file: drive_v3.Schema$File): RemoteNode {
  if (!file.id || typeof file.name !== 'string') {
    throw new PermanentServiceError('decode', `Drive returned a file without id or name (${JSON.stringify(file)})`);
  }
  const mimeType = file.mimeType ?? 'application/octet-stream';
  if (mimeType === FOLDER_MIME_TYPE) {
    return { id: file.id, name: file.name, kind: 'folder', mimeType };
  }
  const size = file.size ? Number.parseInt(file.size, 10) : 0;
  return {
    id: file.id,
    name: file.name,
    kind: 'file',
    mimeType,
    size: Number.isFinite(size) && size >= 0 ? size : 0,
    contentHash: file.md5Checksum ?? null
  };
}

export class DriveService implements RemoteTreeService {
  constructor(private readonly files: DriveFilesApi) {}

  async getMetadata(id: string): Promise<RemoteNode | null> {
    try {
      const response = await this.files.get({ fileId: id, fields: FILE_FIELDS, supportsAllDrives: true });
      return toRemoteNode(response.data);
    } catch (error) {
      const classified = classifyDriveError('files.get', error);
      if (classified instanceof PermanentServiceError && classified.isNotFound) {
        return null;
      }
      throw classified;
    }
  }

  async listChildren(parentId: string, pageToken?: string): Promise<ChildrenPage> {
    try {
      const response = await this.files.list({
        q: `'${escapeQueryValue(parentId)}' in parents and trashed = false`,
        fields: `nextPageToken, files(${FILE_FIELDS})`,
        pageToken,
        pageSize: LIST_PAGE_SIZE,
        spaces: 'drive',
        supportsAllDrives: true,
        includeItemsFromAllDrives: true
      });
      return {
        items: (response.data.files ?? []).map(toRemoteNode),
        nextPageToken: response.data.nextPageToken ?? undefined
      };
    } catch (error) {
      throw classifyDriveError('files.list', error);
    }
  }

  async findByName(parentId: string, name: string, kind?: RemoteKind): Promise<RemoteNode | null> {
    const clauses = [
      `name = '${escapeQueryValue(name)}'`,
      `'${escapeQueryValue(parentId)}' in parents`,
      'trashed = false'
    ];
    if (kind === 'folder') {
      clauses.push(`mimeType = '${FOLDER_MIME_TYPE}'`);
    } else if (kind === 'file') {
      clauses.push(`mimeType != '${FOLDER_MIME_TYPE}'`);
    }

    try {
      const response = await this.files.list({
        q: clauses.join(' and '),
        fields: `files(${FILE_FIELDS})`,
        pageSize: 10,
        spaces: 'drive',
        supportsAllDrives: true,
        includeItemsFromAllDrives: true
      });
      const first = response.data.files?.[0];
      return first ? toRemoteNode(first) : null;
    } catch (error) {
      throw classifyDriveError('files.list(name)', error);
    }
  }

  async createFolder(name: string, parentId: string): Promise<string> {
    try {
      const response = await this.files.create({
        requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
        fields: 'id, name',
        supportsAllDrives: true
      });
      return toRemoteNode({ mimeType: FOLDER_MIME_TYPE, ...response.data }).id;
    } catch (error) {
      throw classifyDriveError('files.create', error);
    }
  }

  async copyFile(sourceId: string, destParentId: string, destName: string): Promise<string> {
    try {
      const response = await this.files.copy({
        fileId: sourceId,
        requestBody: { name: destName, parents: [destParentId] },
        fields: 'id, name',
        supportsAllDrives: true
      });
      return toRemoteNode(response.data).id;
    } catch (error) {
      throw classifyDriveError('files.copy', error);
    }
  }
}

/**
 * Build the adapter on top of an authorized googleapis client
 */
export function createDriveService(auth: Auth.OAuth2Client): DriveService {
  const drive = google.drive({ version: 'v3', auth });
  return new DriveService({
    list: params => drive.files.list(params),
    get: params => drive.files.get(params),
    create: params => drive.files.create(params),
    copy: params => drive.files.copy(params)
  });
}
