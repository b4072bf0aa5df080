/**
 * SyncEngine - orchestrates one sync pass from a source folder to a destination folder
 *
 * States: init -> preflight -> enumerate-source -> enumerate-destination -> diff
 *         -> create-folders -> copy-files -> validate -> done
 * `failed` is reachable from any step. Every transition goes through the tracker.
 *
 * The pass only ever adds: folders are created and files copied, nothing in the
 * destination is deleted or overwritten in place.
 */

import type { DriveClient } from '../../api/driveClient.js';
import { InconsistentTreeError, PreflightError, errorMessage } from '../../errors/syncErrors.js';
import type {
  DiffPlan,
  PlannedCopy,
  SyncResult,
  SyncState,
  TreeSnapshot,
  ValidationReport
} from '../../types/syncTypes.js';
import { log } from '../../utils/logger.js';
import { FolderIdMap, baseName, parentPath } from './FolderIdMap.js';
import { ProgressTracker, formatProgress } from './ProgressTracker.js';
import { SyncDiff } from './SyncDiff.js';
import { SyncValidator } from './SyncValidator.js';
import { TreeEnumerator } from './TreeEnumerator.js';

export interface SyncEngineOptions {
  sourceRootId: string;
  destRootId: string;
  /** copies run concurrently in batches of this size */
  batchSize?: number;
  /** re-validate after the pass */
  finalValidation?: boolean;
  /** run one repair pass when validation fails */
  autoFixMissing?: boolean;
  /** count the source tree before enumerating it, for progress */
  countItemsFirst?: boolean;
}

const DEFAULT_BATCH_SIZE = 100;

export class SyncEngine {
  readonly tracker: ProgressTracker;
  private readonly enumerator: TreeEnumerator;
  private readonly validator: SyncValidator;
  private readonly batchSize: number;

  constructor(
    private readonly client: DriveClient,
    private readonly options: SyncEngineOptions,
    tracker?: ProgressTracker
  ) {
    this.tracker = tracker ?? new ProgressTracker();
    this.enumerator = new TreeEnumerator(client);
    this.validator = new SyncValidator(client);
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  async run(): Promise<SyncResult> {
    const { sourceRootId, destRootId } = this.options;
    const failures: string[] = [];
    let sourceGaps: readonly string[] = [];
    let plan: DiffPlan = { copies: [], missingFolders: [] };
    let validation: ValidationReport | undefined;

    log.info(`[ENGINE] Sync ${sourceRootId} -> ${destRootId}`);

    try {
      this.transition('preflight');
      await this.preflight(sourceRootId, 'source');
      await this.preflight(destRootId, 'destination');

      this.transition('enumerate-source');
      const source = await this.enumerator.enumerate(sourceRootId, {
        label: 'source',
        countItemsFirst: this.options.countItemsFirst ?? true,
        onProgress: (processed, total, percent) =>
          log.debug(`[ENGINE] Source enumeration ${processed}/${total} (${percent.toFixed(1)}%)`)
      });

      sourceGaps = source.incompletePaths;

      this.transition('enumerate-destination');
      const dest = await this.enumerator.enumerate(destRootId, { label: 'destination' });

      plan = await this.applyPass(source, dest, failures);

      if (this.options.finalValidation ?? true) {
        this.transition('validate');
        let run = await this.validator.validateWithSnapshots(sourceRootId, destRootId);
        sourceGaps = run.source.incompletePaths;

        if (!run.report.passed && (this.options.autoFixMissing ?? true)) {
          log.info(`[ENGINE] Repairing ${run.report.mismatches.length} mismatch(es)`);
          await this.applyPass(run.source, run.dest, failures);
          this.transition('validate');
          run = await this.validator.validateWithSnapshots(sourceRootId, destRootId);
          sourceGaps = run.source.incompletePaths;
        }
        validation = run.report;
      }

      this.transition('done');
    } catch (error) {
      this.transition('failed');
      log.error(`[ENGINE] Sync failed: ${errorMessage(error)}`);
      return this.result(false, plan, failures, sourceGaps, validation, errorMessage(error));
    }

    const counters = this.tracker.snapshot();
    if (sourceGaps.length > 0) {
      log.warn(`[ENGINE] Not synced, source listing failed: ${sourceGaps.join(', ')}`);
    }
    const success = counters.failedCopies === 0 && sourceGaps.length === 0 && (validation?.passed ?? true);
    log.info(`[ENGINE] ${success ? 'Completed' : 'Completed with errors'}: ${formatProgress(counters)}`);
    return this.result(success, plan, failures, sourceGaps, validation);
  }

  // ============================================================================
  // Phases
  // ============================================================================

  private async preflight(folderId: string, label: string): Promise<void> {
    let exists: boolean;
    try {
      exists = await this.client.verifyFolderExists(folderId);
    } catch (error) {
      throw new PreflightError(`${label} folder check`, folderId, errorMessage(error));
    }
    if (!exists) {
      throw new PreflightError(`${label} folder check`, folderId, 'not found or not a folder');
    }
    log.info(`[ENGINE] ${label} folder ${folderId} is accessible`);
  }

  /**
   * diff -> create-folders -> copy-files, then drop the stale destination snapshot
   */
  private async applyPass(source: TreeSnapshot, dest: TreeSnapshot, failures: string[]): Promise<DiffPlan> {
    this.transition('diff');
    const plan = SyncDiff.compute(source, dest);
    log.info(`[ENGINE] Plan: ${SyncDiff.formatSummary(plan)}`);
    this.tracker.update({ type: 'totals', files: plan.copies.length, folders: plan.missingFolders.length });

    const folderMap = new FolderIdMap(dest.rootId, dest.folders);
    try {
      this.transition('create-folders');
      await this.createFolders(plan.missingFolders, folderMap, failures);

      this.transition('copy-files');
      await this.copyFiles(plan.copies, folderMap, failures);
    } finally {
      this.client.invalidateSnapshot(dest.rootId);
    }
    return plan;
  }

  private async createFolders(paths: string[], folderMap: FolderIdMap, failures: string[]): Promise<void> {
    for (const path of paths) {
      try {
        const parentId = folderMap.parentIdOf(path);
        const { id, created } = await this.client.createFolder(baseName(path), parentId);
        folderMap.set(path, id);
        this.tracker.update({ type: 'folder', outcome: created ? 'createdFolders' : 'skippedFolders', path });
      } catch (error) {
        if (error instanceof InconsistentTreeError) {
          log.warn(`[ENGINE] Skipping folder ${path}: ${error.message}`);
        } else {
          log.error(`[ENGINE] Failed to create folder ${path}: ${errorMessage(error)}`);
        }
        failures.push(path);
        this.tracker.update({ type: 'folder', outcome: 'failedFolders', path });
      }
    }
  }

  private async copyFiles(copies: PlannedCopy[], folderMap: FolderIdMap, failures: string[]): Promise<void> {
    const batchCount = Math.ceil(copies.length / this.batchSize);
    for (let start = 0; start < copies.length; start += this.batchSize) {
      const batch = copies.slice(start, start + this.batchSize);
      await Promise.all(batch.map(copy => this.copyOne(copy, folderMap, failures)));
      log.info(`[ENGINE] Batch ${start / this.batchSize + 1}/${batchCount}: ${formatProgress(this.tracker.snapshot())}`);
    }
  }

  /**
   * Never rejects; a failure is counted against the item
   */
  private async copyOne(copy: PlannedCopy, folderMap: FolderIdMap, failures: string[]): Promise<void> {
    const path = copy.relativePath;
    try {
      const parentId = await folderMap.ensure(parentPath(path), async (name, parent) => {
        const folder = await this.client.createFolder(name, parent);
        log.info(`[ENGINE] Created missing intermediate folder '${name}' for ${path}`);
        return folder.id;
      });
      const outcome = await this.client.copyFileIfChanged(copy.sourceFileId, parentId, baseName(path));
      if (outcome === 'copied') {
        log.info(`[ENGINE] Copied ${path} (${copy.reason})`);
        this.tracker.update({ type: 'copy', outcome: 'successfulCopies', path });
      } else {
        this.tracker.update({ type: 'copy', outcome: 'skippedCopies', path });
      }
    } catch (error) {
      log.error(`[ENGINE] Failed to copy ${path}: ${errorMessage(error)}`);
      failures.push(path);
      this.tracker.update({ type: 'copy', outcome: 'failedCopies', path });
    }
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private transition(state: SyncState): void {
    log.debug(`[ENGINE] State: ${state}`);
    this.tracker.update({ type: 'state', state });
  }

  private result(
    success: boolean,
    plan: DiffPlan,
    failures: string[],
    sourceGaps: readonly string[],
    validation?: ValidationReport,
    error?: string
  ): SyncResult {
    const counters = this.tracker.snapshot();
    return {
      success,
      state: counters.state,
      counters,
      plannedCopies: plan.copies.length,
      missingFolders: plan.missingFolders.length,
      failures,
      incompletePaths: [...sourceGaps],
      ...(validation ? { validation } : {}),
      ...(error ? { error } : {})
    };
  }
}
