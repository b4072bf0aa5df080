/**
 * @fileoverview Shared data model of a sync pass
 *
 * Snapshots are immutable once produced; a new pass builds a new one.
 * Paths are relative to the enumerated root, `/`-joined and case-sensitive.
 */

/**
 * File metadata recorded by enumeration
 */
export interface SnapshotFile {
  id: string;
  size: number;
  /** md5 reported by Drive; null for native documents and some uploads */
  contentHash: string | null;
  mimeType: string;
}

/**
 * Enumeration result for one root
 */
export interface TreeSnapshot {
  readonly rootId: string;
  /** relative path -> file metadata, in walk order */
  readonly files: ReadonlyMap<string, SnapshotFile>;
  /** relative path -> folder id; the root itself is implicit */
  readonly folders: ReadonlyMap<string, string>;
  /** folders whose listing failed; their subtrees are under-populated */
  readonly incompletePaths: readonly string[];
  readonly createdAt: number;
}

export type CopyReason = 'missing' | 'size-changed' | 'hash-changed';

export interface PlannedCopy {
  sourceFileId: string;
  relativePath: string;
  reason: CopyReason;
}

/**
 * Work derived from comparing two snapshots; consumed once by a copy pass
 */
export interface DiffPlan {
  copies: PlannedCopy[];
  /** folder paths present in source only, shallowest first */
  missingFolders: string[];
}

export type ValidationMismatchKind = 'missing-file' | 'size-mismatch' | 'hash-mismatch' | 'missing-folder';

/**
 * A reported discrepancy; never thrown
 */
export interface ValidationMismatch {
  kind: ValidationMismatchKind;
  path: string;
  sourceSize?: number;
  destSize?: number;
  message: string;
}

export interface ValidationReport {
  /** no mismatch and the source was listed completely */
  passed: boolean;
  sourceFileCount: number;
  destFileCount: number;
  mismatches: ValidationMismatch[];
  /** destination-only files, informational */
  extraFiles: string[];
  /** subtrees that could not be fully listed on either side */
  incompletePaths: string[];
}

export type SyncState =
  | 'init'
  | 'preflight'
  | 'enumerate-source'
  | 'enumerate-destination'
  | 'diff'
  | 'create-folders'
  | 'copy-files'
  | 'validate'
  | 'done'
  | 'failed';

export interface ProgressCounters {
  state: SyncState;
  /** epoch ms when the tracker was created */
  startedAt: number;
  totalFiles: number;
  totalFolders: number;
  processedFiles: number;
  successfulCopies: number;
  failedCopies: number;
  skippedCopies: number;
  createdFolders: number;
  skippedFolders: number;
  failedFolders: number;
}

export interface SyncResult {
  success: boolean;
  state: SyncState;
  counters: ProgressCounters;
  plannedCopies: number;
  missingFolders: number;
  /** relative paths of items that failed */
  failures: string[];
  /** source folders whose listing failed in the last enumeration; their subtrees were not synced */
  incompletePaths: string[];
  validation?: ValidationReport;
  error?: string;
}
