/**
 * FolderIdMap - destination folder path -> folder id, shared by concurrent copies
 *
 * Seeded from the destination snapshot and owned by the engine; the snapshot
 * itself is never patched. Fallback creation runs under the mutex so two
 * copies racing on the same missing folder create it once.
 */

import { InconsistentTreeError } from '../../errors/syncErrors.js';
import { AsyncMutex } from '../../utils/asyncMutex.js';

/** Creates `name` under `parentId` (or reuses an existing one) and returns its id */
export type FolderCreator = (name: string, parentId: string) => Promise<string>;

export function parentPath(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? '' : path.slice(0, slash);
}

export function baseName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

export class FolderIdMap {
  private readonly ids: Map<string, string>;
  private readonly mutex = new AsyncMutex();

  constructor(readonly rootId: string, folders: ReadonlyMap<string, string> = new Map()) {
    this.ids = new Map(folders);
  }

  /** The root is the empty path */
  get(path: string): string | undefined {
    return path === '' ? this.rootId : this.ids.get(path);
  }

  set(path: string, folderId: string): void {
    this.ids.set(path, folderId);
  }

  has(path: string): boolean {
    return path === '' || this.ids.has(path);
  }

  get size(): number {
    return this.ids.size;
  }

  /**
   * Id of the folder that holds `path`
   * @throws InconsistentTreeError when the parent has not been mapped
   */
  parentIdOf(path: string): string {
    const parent = parentPath(path);
    const id = this.get(parent);
    if (id === undefined) {
      throw new InconsistentTreeError(path, parent);
    }
    return id;
  }

  /**
   * Resolve `folderPath`, creating any unmapped segment along the way
   */
  async ensure(folderPath: string, create: FolderCreator): Promise<string> {
    const known = this.get(folderPath);
    if (known !== undefined) {
      return known;
    }

    return this.mutex.runExclusive(async () => {
      let currentId = this.rootId;
      let currentPath = '';
      for (const segment of folderPath.split('/')) {
        currentPath = currentPath ? `${currentPath}/${segment}` : segment;
        const mapped = this.ids.get(currentPath);
        if (mapped !== undefined) {
          currentId = mapped;
          continue;
        }
        currentId = await create(segment, currentId);
        this.ids.set(currentPath, currentId);
      }
      return currentId;
    });
  }
}
