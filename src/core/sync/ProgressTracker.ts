/**
 * ProgressTracker - counters of a sync pass
 *
 * All mutation goes through `update(event)`; listeners are notified once per
 * event. Rendering is left to listeners (the CLI logs a throttled summary).
 */

import type { ProgressCounters, SyncState } from '../../types/syncTypes.js';

export type CopyOutcomeCounter = 'successfulCopies' | 'failedCopies' | 'skippedCopies';
export type FolderOutcomeCounter = 'createdFolders' | 'skippedFolders' | 'failedFolders';

export type ProgressEvent =
  | { type: 'state'; state: SyncState }
  | { type: 'totals'; files: number; folders: number }
  | { type: 'copy'; outcome: CopyOutcomeCounter; path: string }
  | { type: 'folder'; outcome: FolderOutcomeCounter; path: string };

export type ProgressListener = (counters: Readonly<ProgressCounters>, event: ProgressEvent) => void;

export interface ProgressEstimate {
  elapsedMs: number;
  /** null until at least one file has been processed */
  remainingMs: number | null;
  finishAt: number | null;
}

export function emptyCounters(startedAt = 0): ProgressCounters {
  return {
    state: 'init',
    startedAt,
    totalFiles: 0,
    totalFolders: 0,
    processedFiles: 0,
    successfulCopies: 0,
    failedCopies: 0,
    skippedCopies: 0,
    createdFolders: 0,
    skippedFolders: 0,
    failedFolders: 0
  };
}

export class ProgressTracker {
  private readonly counters: ProgressCounters;
  private listeners = new Set<ProgressListener>();

  constructor(private readonly now: () => number = Date.now) {
    this.counters = emptyCounters(now());
  }

  update(event: ProgressEvent): void {
    switch (event.type) {
      case 'state':
        this.counters.state = event.state;
        break;
      case 'totals':
        this.counters.totalFiles = event.files;
        this.counters.totalFolders = event.folders;
        break;
      case 'copy':
        this.counters[event.outcome]++;
        this.counters.processedFiles++;
        break;
      case 'folder':
        this.counters[event.outcome]++;
        break;
    }

    const view = this.snapshot();
    for (const listener of this.listeners) {
      listener(view, event);
    }
  }

  /**
   * Returns an unsubscribe function
   */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): ProgressCounters {
    return { ...this.counters };
  }

  /**
   * Overall percentage, file work weighted 80% and folder work 20%
   */
  percentComplete(): number {
    return computePercent(this.counters);
  }

  estimateRemaining(): ProgressEstimate {
    return estimateRemaining(this.counters, this.now());
  }
}

/**
 * Elapsed time and ETA, extrapolated from the file processing rate so far
 */
export function estimateRemaining(counters: ProgressCounters, now: number): ProgressEstimate {
  const elapsedMs = Math.max(0, now - counters.startedAt);
  if (counters.processedFiles === 0 || elapsedMs === 0) {
    return { elapsedMs, remainingMs: null, finishAt: null };
  }
  const left = Math.max(0, counters.totalFiles - counters.processedFiles);
  const remainingMs = Math.round((left * elapsedMs) / counters.processedFiles);
  return { elapsedMs, remainingMs, finishAt: now + remainingMs };
}

function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  return h > 0 ? `${h}h${m}m${s}s` : m > 0 ? `${m}m${s}s` : `${s}s`;
}

export function formatEstimate(estimate: ProgressEstimate): string {
  const elapsed = `elapsed=${formatDuration(estimate.elapsedMs)}`;
  if (estimate.remainingMs === null || estimate.finishAt === null) {
    return `${elapsed} eta=unknown`;
  }
  return `${elapsed} eta=${formatDuration(estimate.remainingMs)} finish=${new Date(estimate.finishAt).toISOString()}`;
}

export function computePercent(counters: ProgressCounters): number {
  if (counters.totalFiles === 0) {
    return 0;
  }
  const processed = counters.successfulCopies + counters.failedCopies + counters.skippedCopies;
  const fileProgress = (processed / counters.totalFiles) * 100;
  const folderProgress = counters.totalFolders > 0
    ? ((counters.createdFolders + counters.skippedFolders) / counters.totalFolders) * 100
    : 0;
  return fileProgress * 0.8 + folderProgress * 0.2;
}

/**
 * One-line rendering of the counters
 */
export function formatProgress(counters: ProgressCounters): string {
  return [
    `${computePercent(counters).toFixed(1)}%`,
    `state=${counters.state}`,
    `files=${counters.totalFiles}`,
    `folders=${counters.totalFolders}`,
    `copied=${counters.successfulCopies}`,
    `failed=${counters.failedCopies}`,
    `skipped=${counters.skippedCopies}`,
    `createdFolders=${counters.createdFolders}`,
    `skippedFolders=${counters.skippedFolders}`
  ].join(' ');
}
