/**
 * TreeEnumerator - flattens a remote folder tree into a TreeSnapshot
 *
 * Walks with an explicit stack of (folderId, path) instead of recursion, in
 * pre-order: a folder's subfolders are visited before its later siblings.
 * Each folder's listing is drained page by page.
 *
 * Failure policy:
 * - the root cannot be listed -> EnumerationError (the pass aborts)
 * - any other folder fails after the governor's retries -> logged, recorded in
 *   `incompletePaths`, walk continues; its subtree stays under-populated
 */

import type { DriveClient } from '../../api/driveClient.js';
import { EnumerationError, errorMessage } from '../../errors/syncErrors.js';
import type { SnapshotFile, TreeSnapshot } from '../../types/syncTypes.js';
import { log } from '../../utils/logger.js';

export interface EnumerateOptions {
  /** name used in log lines, e.g. "source" */
  label?: string;
  /** ignore a cached snapshot of this root */
  fresh?: boolean;
  /** count items first so progress has a denominator */
  countItemsFirst?: boolean;
  onProgress?: (processed: number, total: number, percent: number) => void;
}

interface PendingFolder {
  folderId: string;
  path: string;
}

export function joinPath(parentPath: string, name: string): string {
  return parentPath ? `${parentPath}/${name}` : name;
}

export class TreeEnumerator {
  constructor(private readonly client: DriveClient) {}

  async enumerate(rootId: string, options: EnumerateOptions = {}): Promise<TreeSnapshot> {
    const label = options.label ?? rootId;

    if (options.fresh) {
      this.client.invalidateSnapshot(rootId);
    } else {
      const cached = this.client.getCachedSnapshot(rootId);
      if (cached) {
        log.info(`[ENUM] Using cached ${label} snapshot: ${cached.files.size} files, ${cached.folders.size} folders`);
        return cached;
      }
    }

    const total = options.countItemsFirst ? await this.client.countItems(rootId) : 0;
    const files = new Map<string, SnapshotFile>();
    const folders = new Map<string, string>();
    const incompletePaths: string[] = [];
    let processed = 0;
    let lastReported = -1;

    const reportProgress = () => {
      const percent = total > 0 ? Math.min(100, (processed / total) * 100) : 0;
      const rounded = Math.floor(percent);
      if (options.onProgress && rounded !== lastReported) {
        lastReported = rounded;
        options.onProgress(processed, total, percent);
      }
    };

    const stack: PendingFolder[] = [{ folderId: rootId, path: '' }];

    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) {
        break;
      }
      const subfolders: PendingFolder[] = [];
      let pageToken: string | undefined;
      let pageNumber = 0;

      try {
        do {
          const page = await this.client.listChildren(current.folderId, pageToken);
          pageNumber++;
          log.debug(`[ENUM] ${label} page ${pageNumber} of '${current.path || '/'}': ${page.items.length} items`);

          for (const item of page.items) {
            processed++;
            const itemPath = joinPath(current.path, item.name);
            if (item.kind === 'folder') {
              folders.set(itemPath, item.id);
              subfolders.push({ folderId: item.id, path: itemPath });
            } else {
              files.set(itemPath, {
                id: item.id,
                size: item.size ?? 0,
                contentHash: item.contentHash ?? null,
                mimeType: item.mimeType
              });
            }
          }
          reportProgress();
          pageToken = page.nextPageToken;
        } while (pageToken);
      } catch (error) {
        if (current.folderId === rootId && pageNumber === 0) {
          throw new EnumerationError(rootId, errorMessage(error));
        }
        log.error(`[ENUM] Error listing ${label} folder '${current.path || '/'}': ${errorMessage(error)}`);
        incompletePaths.push(current.path);
      }

      // reversed so the first-listed subfolder is popped first
      for (let i = subfolders.length - 1; i >= 0; i--) {
        stack.push(subfolders[i]);
      }
    }

    const snapshot: TreeSnapshot = {
      rootId,
      files,
      folders,
      incompletePaths,
      createdAt: Date.now()
    };
    this.client.cacheSnapshot(snapshot);

    log.info(`[ENUM] Found ${files.size} files, ${folders.size} folders in ${label}`);
    if (incompletePaths.length > 0) {
      log.warn(`[ENUM] ${incompletePaths.length} ${label} folder(s) could not be fully listed`);
    }
    return snapshot;
  }
}
