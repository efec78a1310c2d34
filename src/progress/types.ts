/**
 * Types for run progress and the post-run summary.
 */

/** Running tallies for one run */
export interface RunStats {
  downloaded: number;
  skipped: number;
  failed: number;

  /** Bytes under the destination root after the run (set from the summary) */
  totalBytesOnDisk: number;
}

/** Point-in-time view of progress */
export interface ProgressSnapshot {
  /** Tasks expected in this run (fetched plus skipped) */
  total: number;

  /** Tasks that reached a terminal status */
  completed: number;
  downloaded: number;
  skipped: number;
  failed: number;

  /** Bytes transferred by downloaded tasks */
  bytesTransferred: number;

  /** completed / total as a percentage; 100 when there is nothing to do */
  percent: number;
}

/** A task that ended failed, kept for operator follow-up */
export interface FailureRecord {
  key: string;
  localPath: string;
  attempts: number;
  error: string;
}

/** Files and bytes under one top-level entry of the destination root */
export interface CategorySummary {
  /** Top-level entry name, or "." for files directly under the root */
  name: string;
  fileCount: number;
  totalBytes: number;
}

export interface TreeSummary {
  fileCount: number;
  totalBytes: number;

  /** Sorted by name */
  categories: CategorySummary[];
}
