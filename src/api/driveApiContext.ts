import type { TreeSnapshot } from '../types/syncTypes.js';
import type { ResponseCache } from '../utils/responseCache.js';
import type { RemoteNode, RemoteTreeService } from './driveTypes.js';
import type { RateGovernor } from './rateGovernor.js';

/**
 * Everything the Drive operation modules share: one adapter, one governor, one cache
 */
export interface DriveApiContext {
  service: RemoteTreeService;
  governor: RateGovernor;
  cache: ResponseCache<CachedResponse>;
}

/**
 * Values the response cache holds, tagged so readers narrow without casts
 */
export type CachedResponse =
  | { kind: 'node'; node: RemoteNode }
  | { kind: 'children'; items: RemoteNode[] }
  | { kind: 'snapshot'; snapshot: TreeSnapshot }
  | { kind: 'count'; count: number };

/**
 * Deterministic cache keys, one builder per logical query
 */
export const cacheKeys = {
  folderDetails: (folderId: string) => `folder_details_${folderId}`,
  fileDetails: (fileId: string) => `file_details_${fileId}`,
  folderByName: (parentId: string, name: string) => `folder_by_name_${parentId}_${name}`,
  fileInFolder: (parentId: string, name: string) => `file_in_folder_${parentId}_${name}`,
  folderContents: (folderId: string) => `folder_contents_${folderId}`,
  snapshot: (rootId: string) => `folder_contents_full_${rootId}`,
  itemCount: (rootId: string) => `item_count_${rootId}`
};

export function cachedNode(context: DriveApiContext, key: string): RemoteNode | undefined {
  const entry = context.cache.get(key);
  return entry?.kind === 'node' ? entry.node : undefined;
}
