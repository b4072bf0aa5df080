/**
 * Folder Operations Module
 *
 * Folder lookups, idempotent creation and tree-wide counts.
 * Every remote call goes through the governor; lookups check the cache first.
 */

import { errorMessage } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';
import { cacheKeys, cachedNode, type DriveApiContext } from './driveApiContext.js';
import { FOLDER_MIME_TYPE, type RemoteNode } from './driveTypes.js';

export interface FolderCreation {
  id: string;
  /** false when an existing same-named folder was reused */
  created: boolean;
}

export class DriveFolderOperations {
  constructor(private readonly context: DriveApiContext) {}

  /**
   * Folder metadata, null if the id does not resolve or is not a folder
   */
  async getFolderDetails(folderId: string): Promise<RemoteNode | null> {
    const key = cacheKeys.folderDetails(folderId);
    const cached = cachedNode(this.context, key);
    if (cached) {
      return cached;
    }

    const node = await this.context.governor.executeWithRetry(
      () => this.context.service.getMetadata(folderId),
      `getFolderDetails(${folderId})`
    );
    if (!node || node.kind !== 'folder') {
      return null;
    }
    this.context.cache.set(key, { kind: 'node', node });
    return node;
  }

  /**
   * Uncached existence check, used by preflight and after creation
   */
  async verifyFolderExists(folderId: string): Promise<boolean> {
    const node = await this.context.governor.executeWithRetry(
      () => this.context.service.getMetadata(folderId),
      `verifyFolderExists(${folderId})`
    );
    return node !== null && node.kind === 'folder';
  }

  /**
   * Id of a same-named child folder; only hits are cached
   */
  async findFolderByName(parentId: string, name: string): Promise<string | null> {
    const key = cacheKeys.folderByName(parentId, name);
    const cached = cachedNode(this.context, key);
    if (cached) {
      return cached.id;
    }

    const node = await this.context.governor.executeWithRetry(
      () => this.context.service.findByName(parentId, name, 'folder'),
      `findFolderByName(${name})`
    );
    if (!node) {
      return null;
    }
    this.context.cache.set(key, { kind: 'node', node });
    return node.id;
  }

  /**
   * Create `name` under `parentId` unless a same-named folder already exists there.
   * The new folder is verified before its id is returned.
   */
  async createFolder(name: string, parentId: string): Promise<FolderCreation> {
    const existingId = await this.findFolderByName(parentId, name);
    if (existingId) {
      log.info(`[DRIVE] Folder '${name}' already exists (ID: ${existingId})`);
      return { id: existingId, created: false };
    }

    const newId = await this.context.governor.executeWithRetry(
      () => this.context.service.createFolder(name, parentId),
      `createFolder(${name})`
    );
    if (!(await this.verifyFolderExists(newId))) {
      throw new Error(`Folder '${name}' (ID: ${newId}) not visible after creation`);
    }

    this.context.cache.remove(cacheKeys.folderContents(parentId));
    this.context.cache.set(cacheKeys.folderByName(parentId, name), {
      kind: 'node',
      node: { id: newId, name, kind: 'folder', mimeType: FOLDER_MIME_TYPE }
    });
    log.info(`[DRIVE] Created folder '${name}' (ID: ${newId})`);
    return { id: newId, created: true };
  }

  /**
   * All direct children sorted by name, pages drained, cached as one listing
   */
  async listAllChildren(folderId: string): Promise<RemoteNode[]> {
    const key = cacheKeys.folderContents(folderId);
    const cached = this.context.cache.get(key);
    if (cached?.kind === 'children') {
      return cached.items;
    }

    const items: RemoteNode[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.context.governor.executeWithRetry(
        () => this.context.service.listChildren(folderId, pageToken),
        `listChildren(${folderId})`
      );
      items.push(...page.items);
      pageToken = page.nextPageToken;
    } while (pageToken);

    items.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    this.context.cache.set(key, { kind: 'children', items });
    return items;
  }

  /**
   * Number of items (files and folders) below the root, for progress totals.
   * A folder that cannot be listed contributes what was counted so far.
   */
  async countItems(rootId: string): Promise<number> {
    const key = cacheKeys.itemCount(rootId);
    const cached = this.context.cache.get(key);
    if (cached?.kind === 'count') {
      return cached.count;
    }

    let total = 0;
    const pending = [rootId];
    while (pending.length > 0) {
      const folderId = pending.pop();
      if (folderId === undefined) {
        break;
      }
      let pageToken: string | undefined;
      try {
        do {
          const page = await this.context.governor.executeWithRetry(
            () => this.context.service.listChildren(folderId, pageToken),
            `countItems(${folderId})`
          );
          total += page.items.length;
          for (const item of page.items) {
            if (item.kind === 'folder') {
              pending.push(item.id);
            }
          }
          pageToken = page.nextPageToken;
        } while (pageToken);
      } catch (error) {
        log.warn(`[DRIVE] Error counting items in ${folderId}: ${errorMessage(error)}`);
      }
    }

    this.context.cache.set(key, { kind: 'count', count: total });
    return total;
  }
}
