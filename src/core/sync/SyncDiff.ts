/**
 * SyncDiff - Computes the copy plan between two tree snapshots
 *
 * Key responsibilities:
 * - Files present in source only, or whose size or content hash differ
 * - Folders present in source only, shallowest first
 *
 * Nothing is ever planned for deletion; destination-only items are left alone.
 */

import { log } from '../../utils/logger.js';
import type { CopyReason, DiffPlan, PlannedCopy, SnapshotFile, TreeSnapshot } from '../../types/syncTypes.js';

export function pathDepth(path: string): number {
  return path.split('/').length;
}

export class SyncDiff {
  /**
   * Build the plan that brings `dest` up to `source`
   */
  static compute(source: TreeSnapshot, dest: TreeSnapshot): DiffPlan {
    const copies: PlannedCopy[] = [];
    let identical = 0;

    for (const [relativePath, sourceFile] of source.files) {
      const reason = SyncDiff.copyReason(sourceFile, dest.files.get(relativePath));
      if (reason) {
        copies.push({ sourceFileId: sourceFile.id, relativePath, reason });
      } else {
        identical++;
      }
    }

    const missingFolders = SyncDiff.missingFolders(source, dest);
    log.info(`[DIFF] ${copies.length} files to copy, ${identical} identical, ${missingFolders.length} folders missing`);
    return { copies, missingFolders };
  }

  /**
   * Why a source file needs copying, or null when the destination already matches
   */
  static copyReason(source: SnapshotFile, dest: SnapshotFile | undefined): CopyReason | null {
    if (!dest) {
      return 'missing';
    }
    if (source.size !== dest.size) {
      return 'size-changed';
    }
    if (source.contentHash !== null && dest.contentHash !== null && source.contentHash !== dest.contentHash) {
      return 'hash-changed';
    }
    return null;
  }

  /**
   * Source folder paths absent from dest, ascending depth, walk order within a depth
   */
  static missingFolders(source: TreeSnapshot, dest: TreeSnapshot): string[] {
    const missing: string[] = [];
    for (const path of source.folders.keys()) {
      if (!dest.folders.has(path)) {
        missing.push(path);
      }
    }
    // Array.prototype.sort is stable
    return missing.sort((a, b) => pathDepth(a) - pathDepth(b));
  }

  static formatSummary(plan: DiffPlan): string {
    if (plan.copies.length === 0 && plan.missingFolders.length === 0) {
      return 'No changes detected';
    }

    const byReason: Record<CopyReason, number> = { 'missing': 0, 'size-changed': 0, 'hash-changed': 0 };
    for (const copy of plan.copies) {
      byReason[copy.reason]++;
    }

    const parts: string[] = [];
    if (plan.missingFolders.length > 0) {
      parts.push(`+${plan.missingFolders.length} folders`);
    }
    if (byReason.missing > 0) {
      parts.push(`+${byReason.missing} missing`);
    }
    if (byReason['size-changed'] > 0) {
      parts.push(`~${byReason['size-changed']} size changed`);
    }
    if (byReason['hash-changed'] > 0) {
      parts.push(`~${byReason['hash-changed']} content changed`);
    }

    return parts.join(', ') + ` (${plan.copies.length} copies)`;
  }
}
