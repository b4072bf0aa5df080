/**
 * TreePrinter - indented listing of a folder tree, folders first
 */

import type { DriveClient } from '../../api/driveClient.js';
import { errorMessage } from '../../errors/syncErrors.js';

const INDENT = '  ';

type Entry =
  | { kind: 'folder'; id: string; name: string; depth: number }
  | { kind: 'file'; name: string; depth: number };

export class TreePrinter {
  constructor(private readonly client: DriveClient) {}

  /**
   * Lines of the listing, root first; unreadable folders are marked inline
   */
  async render(rootId: string): Promise<string[]> {
    const root = await this.client.getFolderDetails(rootId);
    const lines: string[] = [];
    const stack: Entry[] = [{ kind: 'folder', id: rootId, name: root ? root.name : rootId, depth: 0 }];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }
      const prefix = INDENT.repeat(entry.depth);
      if (entry.kind === 'file') {
        lines.push(`${prefix}📄 ${entry.name}`);
        continue;
      }

      lines.push(`${prefix}📁 ${entry.name}`);
      let children;
      try {
        children = await this.client.listAllChildren(entry.id);
      } catch (error) {
        lines.push(`${prefix}${INDENT}⚠️ unreadable: ${errorMessage(error)}`);
        continue;
      }

      // popped in reverse: folders (by name) then files (by name)
      const depth = entry.depth + 1;
      const files = children.filter(child => child.kind === 'file');
      const folders = children.filter(child => child.kind === 'folder');
      for (let i = files.length - 1; i >= 0; i--) {
        stack.push({ kind: 'file', name: files[i].name, depth });
      }
      for (let i = folders.length - 1; i >= 0; i--) {
        stack.push({ kind: 'folder', id: folders[i].id, name: folders[i].name, depth });
      }
    }
    return lines;
  }
}
