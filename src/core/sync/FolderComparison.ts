/**
 * FolderComparison - read-only audit of a source/destination pair
 *
 * Enumerates both trees fresh and reports totals, file types, folder depth
 * and every discrepancy. Makes no remote mutation.
 */

import type { DriveClient } from '../../api/driveClient.js';
import type { TreeSnapshot } from '../../types/syncTypes.js';
import { log } from '../../utils/logger.js';
import { baseName } from './FolderIdMap.js';
import { TreeEnumerator } from './TreeEnumerator.js';

export type DetailLevel = 'basic' | 'detailed';

export interface FileTypeStats {
  count: number;
  totalSize: number;
}

export interface DepthStats {
  maxDepth: number;
  averageDepth: number;
  /** depth -> number of folders */
  distribution: Record<number, number>;
}

export interface SideStats {
  totalFiles: number;
  totalFolders: number;
  totalSize: number;
}

export interface SizeMismatch {
  path: string;
  sourceSize: number;
  destSize: number;
}

export interface ComparisonReport {
  sourceStats: SideStats & { fileTypes: Record<string, FileTypeStats>; depthStats: DepthStats };
  destStats: SideStats;
  discrepancies: {
    missingFiles: Array<{ path: string; size: number }>;
    sizeMismatches: SizeMismatch[];
    hashMismatches: string[];
    missingFolders: string[];
    extraFolders: string[];
  };
  completionPercentage: number;
  performance: { elapsedSeconds: number; filesPerSecond: number };
  fileDetails?: { matchingFiles: string[]; differentFiles: SizeMismatch[]; missingFiles: string[] };
  folderDetails?: { matchingFolders: string[]; missingFolders: string[]; extraFolders: string[] };
}

const MAX_LISTED = 10;

export function fileExtension(path: string): string {
  const name = baseName(path);
  const dot = name.lastIndexOf('.');
  return dot === -1 || dot === name.length - 1 ? 'no_extension' : name.slice(dot + 1).toLowerCase();
}

export function depthStats(folderPaths: Iterable<string>): DepthStats {
  const depths = [...folderPaths].map(path => path.split('/').length - 1);
  const distribution: Record<number, number> = {};
  for (const depth of depths) {
    distribution[depth] = (distribution[depth] ?? 0) + 1;
  }
  return {
    maxDepth: depths.length > 0 ? Math.max(...depths) : 0,
    averageDepth: depths.length > 0 ? depths.reduce((sum, d) => sum + d, 0) / depths.length : 0,
    distribution
  };
}

function totalSize(snapshot: TreeSnapshot): number {
  let total = 0;
  for (const file of snapshot.files.values()) {
    total += file.size;
  }
  return total;
}

/**
 * Build the report from two snapshots; performance is filled by the caller
 */
export function buildComparisonReport(
  source: TreeSnapshot,
  dest: TreeSnapshot,
  detailLevel: DetailLevel = 'basic'
): ComparisonReport {
  const fileTypes: Record<string, FileTypeStats> = {};
  const missingFiles: Array<{ path: string; size: number }> = [];
  const sizeMismatches: SizeMismatch[] = [];
  const hashMismatches: string[] = [];
  const matchingFiles: string[] = [];

  for (const [path, file] of source.files) {
    const ext = fileExtension(path);
    const stats = fileTypes[ext] ?? { count: 0, totalSize: 0 };
    stats.count++;
    stats.totalSize += file.size;
    fileTypes[ext] = stats;

    const destFile = dest.files.get(path);
    if (!destFile) {
      missingFiles.push({ path, size: file.size });
    } else if (destFile.size !== file.size) {
      sizeMismatches.push({ path, sourceSize: file.size, destSize: destFile.size });
    } else if (file.contentHash !== null && destFile.contentHash !== null && file.contentHash !== destFile.contentHash) {
      hashMismatches.push(path);
    } else {
      matchingFiles.push(path);
    }
  }

  const missingFolders = [...source.folders.keys()].filter(path => !dest.folders.has(path));
  const extraFolders = [...dest.folders.keys()].filter(path => !source.folders.has(path));

  const report: ComparisonReport = {
    sourceStats: {
      totalFiles: source.files.size,
      totalFolders: source.folders.size,
      totalSize: totalSize(source),
      fileTypes,
      depthStats: depthStats(source.folders.keys())
    },
    destStats: {
      totalFiles: dest.files.size,
      totalFolders: dest.folders.size,
      totalSize: totalSize(dest)
    },
    discrepancies: { missingFiles, sizeMismatches, hashMismatches, missingFolders, extraFolders },
    completionPercentage: source.files.size === 0 ? 100 : (dest.files.size * 100) / source.files.size,
    performance: { elapsedSeconds: 0, filesPerSecond: 0 }
  };

  if (detailLevel === 'detailed') {
    report.fileDetails = {
      matchingFiles,
      differentFiles: sizeMismatches,
      missingFiles: missingFiles.map(file => file.path)
    };
    report.folderDetails = {
      matchingFolders: [...source.folders.keys()].filter(path => dest.folders.has(path)),
      missingFolders,
      extraFolders
    };
  }
  return report;
}

export class FolderComparison {
  private readonly enumerator: TreeEnumerator;

  constructor(client: DriveClient) {
    this.enumerator = new TreeEnumerator(client);
  }

  async compare(sourceRootId: string, destRootId: string, detailLevel: DetailLevel = 'basic'): Promise<ComparisonReport> {
    const started = Date.now();
    log.info(`[COMPARE] Comparing ${sourceRootId} with ${destRootId} (${detailLevel})`);

    const source = await this.enumerator.enumerate(sourceRootId, { label: 'source', fresh: true });
    const dest = await this.enumerator.enumerate(destRootId, { label: 'destination', fresh: true });
    const report = buildComparisonReport(source, dest, detailLevel);

    const elapsedSeconds = (Date.now() - started) / 1000;
    const fileOps = source.files.size + dest.files.size;
    report.performance = {
      elapsedSeconds,
      filesPerSecond: elapsedSeconds > 0 ? fileOps / elapsedSeconds : 0
    };
    log.info(`[COMPARE] Completion ${report.completionPercentage.toFixed(1)}% in ${elapsedSeconds.toFixed(2)}s`);
    return report;
  }
}

const MB = 1024 * 1024;
const GB = MB * 1024;

function listWithOverflow(lines: string[], items: string[], noun: string): void {
  for (const item of items.slice(0, MAX_LISTED)) {
    lines.push(`  ${item}`);
  }
  if (items.length > MAX_LISTED) {
    lines.push(`  ...and ${items.length - MAX_LISTED} more ${noun}`);
  }
}

/**
 * Plain-text rendering of a comparison report
 */
export function formatComparisonReport(report: ComparisonReport): string {
  const { sourceStats, destStats, discrepancies } = report;
  const lines: string[] = [
    'Folder Comparison Report',
    '========================',
    '',
    'Overall Statistics:',
    `Source: ${sourceStats.totalFiles} files, ${sourceStats.totalFolders} folders, ${(sourceStats.totalSize / GB).toFixed(2)} GB`,
    `Destination: ${destStats.totalFiles} files, ${destStats.totalFolders} folders, ${(destStats.totalSize / GB).toFixed(2)} GB`,
    '',
    'Performance:',
    `Elapsed Time: ${report.performance.elapsedSeconds.toFixed(2)} seconds`,
    `Processing Speed: ${report.performance.filesPerSecond.toFixed(2)} files/second`,
    '',
    `Completion: ${report.completionPercentage.toFixed(1)}%`,
    '',
    'Directory Structure:',
    `Maximum Depth: ${sourceStats.depthStats.maxDepth} levels`,
    `Average Depth: ${sourceStats.depthStats.averageDepth.toFixed(1)} levels`,
    '',
    'Top File Types:'
  ];

  const topTypes = Object.entries(sourceStats.fileTypes)
    .sort(([, a], [, b]) => b.count - a.count)
    .slice(0, 5);
  for (const [ext, stats] of topTypes) {
    lines.push(`  .${ext}: ${stats.count} files, ${(stats.totalSize / MB).toFixed(2)} MB`);
  }

  const hasDiscrepancies =
    discrepancies.missingFiles.length > 0 ||
    discrepancies.sizeMismatches.length > 0 ||
    discrepancies.hashMismatches.length > 0 ||
    discrepancies.missingFolders.length > 0 ||
    discrepancies.extraFolders.length > 0;

  lines.push('');
  if (!hasDiscrepancies) {
    lines.push('No discrepancies found - folders are identical!');
    return lines.join('\n');
  }

  lines.push('Discrepancies Found:');
  if (discrepancies.missingFiles.length > 0) {
    const missingSize = discrepancies.missingFiles.reduce((sum, file) => sum + file.size, 0);
    lines.push('', `Missing Files (${discrepancies.missingFiles.length}):`);
    lines.push(`Total size of missing files: ${(missingSize / MB).toFixed(2)} MB`);
    listWithOverflow(
      lines,
      discrepancies.missingFiles.map(file => `${file.path} (${(file.size / MB).toFixed(2)} MB)`),
      'files'
    );
  }
  if (discrepancies.sizeMismatches.length > 0) {
    lines.push('', `Size Mismatches (${discrepancies.sizeMismatches.length}):`);
    listWithOverflow(
      lines,
      discrepancies.sizeMismatches.map(m => `${m.path} (source ${m.sourceSize} bytes, destination ${m.destSize} bytes)`),
      'mismatches'
    );
  }
  if (discrepancies.hashMismatches.length > 0) {
    lines.push('', `Checksum Mismatches (${discrepancies.hashMismatches.length}):`);
    listWithOverflow(lines, discrepancies.hashMismatches, 'mismatches');
  }
  if (discrepancies.missingFolders.length > 0) {
    lines.push('', `Missing Folders (${discrepancies.missingFolders.length}):`);
    listWithOverflow(lines, [...discrepancies.missingFolders].sort(), 'folders');
  }
  if (discrepancies.extraFolders.length > 0) {
    lines.push('', `Extra Folders (${discrepancies.extraFolders.length}):`);
    listWithOverflow(lines, [...discrepancies.extraFolders].sort(), 'folders');
  }
  return lines.join('\n');
}
