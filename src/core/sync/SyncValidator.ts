/**
 * SyncValidator - re-enumerates both trees and checks the destination matches
 *
 * Never repairs anything; the engine decides what to do with a failed report.
 */

import type { DriveClient } from '../../api/driveClient.js';
import type { TreeSnapshot, ValidationMismatch, ValidationReport } from '../../types/syncTypes.js';
import { log } from '../../utils/logger.js';
import { TreeEnumerator } from './TreeEnumerator.js';

export interface ValidationRun {
  report: ValidationReport;
  source: TreeSnapshot;
  dest: TreeSnapshot;
}

/**
 * Compare two snapshots; pure
 */
export function compareSnapshots(source: TreeSnapshot, dest: TreeSnapshot): ValidationReport {
  const mismatches: ValidationMismatch[] = [];

  for (const path of source.folders.keys()) {
    if (!dest.folders.has(path)) {
      mismatches.push({ kind: 'missing-folder', path, message: `Folder missing in destination: ${path}` });
    }
  }

  for (const [path, sourceFile] of source.files) {
    const destFile = dest.files.get(path);
    if (!destFile) {
      mismatches.push({
        kind: 'missing-file',
        path,
        sourceSize: sourceFile.size,
        message: `File missing in destination: ${path}`
      });
    } else if (sourceFile.size !== destFile.size) {
      mismatches.push({
        kind: 'size-mismatch',
        path,
        sourceSize: sourceFile.size,
        destSize: destFile.size,
        message: `Size mismatch for ${path}: ${sourceFile.size} vs ${destFile.size}`
      });
    } else if (
      sourceFile.contentHash !== null &&
      destFile.contentHash !== null &&
      sourceFile.contentHash !== destFile.contentHash
    ) {
      mismatches.push({
        kind: 'hash-mismatch',
        path,
        sourceSize: sourceFile.size,
        destSize: destFile.size,
        message: `Content hash mismatch for ${path}`
      });
    }
  }

  const extraFiles: string[] = [];
  for (const path of dest.files.keys()) {
    if (!source.files.has(path)) {
      extraFiles.push(path);
    }
  }

  const incompletePaths = [
    ...source.incompletePaths.map(path => `source:${path || '/'}`),
    ...dest.incompletePaths.map(path => `destination:${path || '/'}`)
  ];

  // an unlisted source subtree may hide files that were never copied
  return {
    passed: mismatches.length === 0 && source.incompletePaths.length === 0,
    sourceFileCount: source.files.size,
    destFileCount: dest.files.size,
    mismatches,
    extraFiles,
    incompletePaths
  };
}

/**
 * Paths of files absent from the destination
 */
export function missingFiles(report: ValidationReport): string[] {
  return report.mismatches.filter(m => m.kind === 'missing-file').map(m => m.path);
}

export class SyncValidator {
  private readonly enumerator: TreeEnumerator;

  constructor(client: DriveClient) {
    this.enumerator = new TreeEnumerator(client);
  }

  async validate(sourceRootId: string, destRootId: string): Promise<ValidationReport> {
    const run = await this.validateWithSnapshots(sourceRootId, destRootId);
    return run.report;
  }

  /**
   * Validation that also hands back the fresh snapshots it compared
   */
  async validateWithSnapshots(sourceRootId: string, destRootId: string): Promise<ValidationRun> {
    log.info('[VALIDATE] Re-enumerating source and destination');
    const source = await this.enumerator.enumerate(sourceRootId, { label: 'source', fresh: true });
    const dest = await this.enumerator.enumerate(destRootId, { label: 'destination', fresh: true });
    const report = compareSnapshots(source, dest);

    if (report.passed) {
      log.info(`[VALIDATE] Passed: ${report.destFileCount}/${report.sourceFileCount} files present`);
    } else {
      log.warn(
        `[VALIDATE] Failed with ${report.mismatches.length} mismatch(es), ${source.incompletePaths.length} unlisted source folder(s)`
      );
      for (const mismatch of report.mismatches.slice(0, 20)) {
        log.warn(`[VALIDATE]   ${mismatch.message}`);
      }
    }
    if (report.extraFiles.length > 0) {
      log.info(`[VALIDATE] ${report.extraFiles.length} destination-only file(s) left in place`);
    }
    if (report.incompletePaths.length > 0) {
      log.warn(`[VALIDATE] Incomplete listings: ${report.incompletePaths.join(', ')}`);
    }
    return { report, source, dest };
  }
}
