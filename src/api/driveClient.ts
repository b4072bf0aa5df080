/**
 * DriveClient - Facade for Google Drive sync operations
 *
 * Delegates to specialized operation modules that share one context:
 * - driveFolderOperations.ts: folder lookups, idempotent creation, counts
 * - driveFileOperations.ts: file lookups and idempotent copies
 *
 * One DriveClient (hence one RateGovernor and one ResponseCache) is built per
 * process and handed to every component.
 */

import type { TreeSnapshot } from '../types/syncTypes.js';
import { ResponseCache } from '../utils/responseCache.js';
import { cacheKeys, type CachedResponse, type DriveApiContext } from './driveApiContext.js';
import { DriveFileOperations, type CopyOutcome } from './driveFileOperations.js';
import { DriveFolderOperations, type FolderCreation } from './driveFolderOperations.js';
import type { ChildrenPage, RemoteNode, RemoteTreeService } from './driveTypes.js';
import { RateGovernor } from './rateGovernor.js';

export interface DriveClientOptions {
  governor?: RateGovernor;
  cache?: ResponseCache<CachedResponse>;
}

export class DriveClient {
  readonly governor: RateGovernor;
  readonly cache: ResponseCache<CachedResponse>;
  private readonly context: DriveApiContext;
  private readonly folderOps: DriveFolderOperations;
  private readonly fileOps: DriveFileOperations;

  constructor(service: RemoteTreeService, options: DriveClientOptions = {}) {
    this.governor = options.governor ?? new RateGovernor();
    this.cache = options.cache ?? new ResponseCache<CachedResponse>();
    this.context = { service, governor: this.governor, cache: this.cache };
    this.folderOps = new DriveFolderOperations(this.context);
    this.fileOps = new DriveFileOperations(this.context);
  }

  // ============================================================================
  // Listing
  // ============================================================================

  /**
   * One page of children; never cached
   */
  async listChildren(folderId: string, pageToken?: string): Promise<ChildrenPage> {
    return this.governor.executeWithRetry(
      () => this.context.service.listChildren(folderId, pageToken),
      `listChildren(${folderId})`
    );
  }

  async listAllChildren(folderId: string): Promise<RemoteNode[]> {
    return this.folderOps.listAllChildren(folderId);
  }

  async countItems(rootId: string): Promise<number> {
    return this.folderOps.countItems(rootId);
  }

  // ============================================================================
  // Folder Operations
  // ============================================================================

  async getFolderDetails(folderId: string): Promise<RemoteNode | null> {
    return this.folderOps.getFolderDetails(folderId);
  }

  async verifyFolderExists(folderId: string): Promise<boolean> {
    return this.folderOps.verifyFolderExists(folderId);
  }

  async findFolderByName(parentId: string, name: string): Promise<string | null> {
    return this.folderOps.findFolderByName(parentId, name);
  }

  async createFolder(name: string, parentId: string): Promise<FolderCreation> {
    return this.folderOps.createFolder(name, parentId);
  }

  // ============================================================================
  // File Operations
  // ============================================================================

  async getFileDetails(fileId: string): Promise<RemoteNode | null> {
    return this.fileOps.getFileDetails(fileId);
  }

  async findFileInFolder(folderId: string, name: string): Promise<RemoteNode | null> {
    return this.fileOps.findFileInFolder(folderId, name);
  }

  async copyFileIfChanged(sourceId: string, destFolderId: string, name: string): Promise<CopyOutcome> {
    return this.fileOps.copyFileIfChanged(sourceId, destFolderId, name);
  }

  // ============================================================================
  // Snapshot cache
  // ============================================================================

  getCachedSnapshot(rootId: string): TreeSnapshot | undefined {
    const entry = this.cache.get(cacheKeys.snapshot(rootId));
    return entry?.kind === 'snapshot' ? entry.snapshot : undefined;
  }

  cacheSnapshot(snapshot: TreeSnapshot): void {
    this.cache.set(cacheKeys.snapshot(snapshot.rootId), { kind: 'snapshot', snapshot });
  }

  /**
   * Drop the whole-tree results of a root after it was mutated
   */
  invalidateSnapshot(rootId: string): void {
    this.cache.remove(cacheKeys.snapshot(rootId));
    this.cache.remove(cacheKeys.itemCount(rootId));
  }
}
