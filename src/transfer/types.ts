/**
 * Types for the transfer module: fetch tasks, per-task results and the
 * pieces a TransferPool is assembled from.
 */

import type { ObjectDescriptor } from '../listing/types.js';

/**
 * How remote units map onto the destination tree.
 *
 * - file: one object becomes one file at its relative key
 * - archive: one zip archive becomes one directory of extracted files
 */
export type LocalLayout = 'file' | 'archive';

/** Rules for deriving a local path from a remote key */
export interface PathMapping {
  /** Absolute destination root */
  destinationRoot: string;

  /** Prefix removed from keys before joining onto the root */
  stripPrefix: string;

  layout: LocalLayout;

  /** Archive extension removed to name the extraction directory (archive layout) */
  archiveExtension?: string;
}

/** One remote unit judged absent locally */
export interface FetchTask {
  readonly descriptor: ObjectDescriptor;

  /** Canonical local path: a file, or a directory for archives */
  readonly localPath: string;
}

export type TaskStatus = 'downloaded' | 'skipped' | 'failed';

/** Task fetched and materialized at its local path */
export interface DownloadedResult {
  readonly status: 'downloaded';
  readonly task: FetchTask;
  readonly attempts: number;
  readonly bytesTransferred: number;

  /** Files written at the local path (1 for plain files) */
  readonly filesWritten: number;
  readonly durationMs: number;
}

/** Task that exhausted its attempts, or was cancelled mid-flight */
export interface FailedResult {
  readonly status: 'failed';
  readonly task: FetchTask;
  readonly attempts: number;
  readonly error: string;
  readonly durationMs: number;
}

/** Task excluded before submission because its local path was already present */
export interface SkippedResult {
  readonly status: 'skipped';
  readonly task: FetchTask;
}

export type TaskResult = DownloadedResult | FailedResult | SkippedResult;

/** Outcome of a single attempt */
export type AttemptResult =
  | { ok: true; bytesTransferred: number; filesWritten: number }
  | { ok: false; error: Error };

/**
 * Streams a remote unit into a temporary file.
 * Resolves to the number of bytes written; rejects on any transport error.
 */
export interface ObjectFetcher {
  fetch(task: FetchTask, tempPath: string, signal: AbortSignal): Promise<number>;
}

/**
 * Moves a fully fetched temporary file into its canonical location.
 */
export interface Materializer {
  /** Temporary path the fetcher writes to; never equal to the canonical path */
  tempPathFor(task: FetchTask): string;

  /**
   * Publish the temporary file at `task.localPath`.
   * Resolves to the number of files written.
   */
  materialize(task: FetchTask, tempPath: string): Promise<number>;

  /** Remove every artifact a failed attempt may have left. */
  discard(task: FetchTask, tempPath: string): Promise<void>;
}

/** Configuration for the transfer pool */
export interface TransferPoolOptions {
  /** Transfers in flight at once */
  parallel: number;

  /** Attempts per task before it is reported failed */
  maxAttempts: number;

  /** Fixed delay between attempts */
  retryDelayMs: number;

  /** Ceiling for a single fetch */
  requestTimeoutMs: number;
}

/** Events emitted by the TransferPool */
export interface TransferPoolEvents {
  /** An attempt started (attempt numbers start at 1) */
  taskStart: (task: FetchTask, attempt: number) => void;

  /** An attempt failed and another will follow */
  taskRetry: (task: FetchTask, attempt: number, error: Error) => void;

  /** A task reached its terminal status */
  taskComplete: (result: DownloadedResult | FailedResult) => void;
}

/** Result of draining one task list */
export interface PoolRunResult {
  /** One result per task that started, in completion order */
  results: Array<DownloadedResult | FailedResult>;

  /** Tasks never started because the run was cancelled first */
  notStarted: FetchTask[];
}
