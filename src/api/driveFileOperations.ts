/**
 * File Operations Module
 *
 * File lookups and the idempotent copy used by the copy pass.
 */

import { log } from '../utils/logger.js';
import { cacheKeys, cachedNode, type DriveApiContext } from './driveApiContext.js';
import { isNativeDocument, type RemoteNode } from './driveTypes.js';

export type CopyOutcome = 'copied' | 'skipped';

/**
 * Two files are identical when size and md5 agree, or, for native documents
 * that carry no checksum, when both have the same native MIME type.
 */
export function filesMatch(source: RemoteNode, dest: RemoteNode): boolean {
  const sourceHash = source.contentHash ?? null;
  const destHash = dest.contentHash ?? null;
  if (sourceHash !== null && destHash !== null && sourceHash === destHash && source.size === dest.size) {
    return true;
  }
  if (isNativeDocument(source.mimeType) && isNativeDocument(dest.mimeType)) {
    return source.mimeType === dest.mimeType;
  }
  return false;
}

export class DriveFileOperations {
  constructor(private readonly context: DriveApiContext) {}

  async getFileDetails(fileId: string): Promise<RemoteNode | null> {
    const key = cacheKeys.fileDetails(fileId);
    const cached = cachedNode(this.context, key);
    if (cached) {
      return cached;
    }

    const node = await this.context.governor.executeWithRetry(
      () => this.context.service.getMetadata(fileId),
      `getFileDetails(${fileId})`
    );
    if (!node || node.kind !== 'file') {
      return null;
    }
    this.context.cache.set(key, { kind: 'node', node });
    return node;
  }

  /**
   * Same-named file in a folder; only hits are cached
   */
  async findFileInFolder(folderId: string, name: string): Promise<RemoteNode | null> {
    const key = cacheKeys.fileInFolder(folderId, name);
    const cached = cachedNode(this.context, key);
    if (cached) {
      return cached;
    }

    const node = await this.context.governor.executeWithRetry(
      () => this.context.service.findByName(folderId, name, 'file'),
      `findFileInFolder(${name})`
    );
    if (node) {
      this.context.cache.set(key, { kind: 'node', node });
    }
    return node;
  }

  /**
   * Copy `sourceId` into `destFolderId` as `name`, unless an identical file is already there
   */
  async copyFileIfChanged(sourceId: string, destFolderId: string, name: string): Promise<CopyOutcome> {
    const source = await this.getFileDetails(sourceId);
    if (!source) {
      throw new Error(`Source file ${sourceId} not found`);
    }

    const existing = await this.findFileInFolder(destFolderId, name);
    if (existing && filesMatch(source, existing)) {
      log.info(`[DRIVE] Skipping identical file '${name}'`);
      return 'skipped';
    }

    const newId = await this.context.governor.executeWithRetry(
      () => this.context.service.copyFile(sourceId, destFolderId, name),
      `copyFile(${name})`
    );
    this.context.cache.remove(cacheKeys.fileInFolder(destFolderId, name));
    this.context.cache.remove(cacheKeys.folderContents(destFolderId));
    log.debug(`[DRIVE] Copied '${name}' (${sourceId} -> ${newId})`);
    return 'copied';
  }
}
