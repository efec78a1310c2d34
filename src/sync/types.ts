/**
 * Types for planning and running one synchronization.
 */

import type { DatasetDefinition, TierDefinition } from '../catalog/types.js';
import type { ListingRequest, ObjectLister } from '../listing/types.js';
import type { ListingFailedError } from '../errors.js';
import type { PartitionResult } from '../transfer/existence-filter.js';
import type {
  DownloadedResult,
  FailedResult,
  Materializer,
  ObjectFetcher,
  PathMapping,
} from '../transfer/types.js';
import type { FailureRecord, ProgressSnapshot, RunStats, TreeSummary } from '../progress/types.js';

/** How many remote units a run should cover */
export type Selection =
  | { kind: 'tier'; tier: string }
  | { kind: 'limit'; limit: number }
  | { kind: 'range'; threads: number; start: number }
  | { kind: 'all' };

/** A fully resolved run: what to list, where it lands, how it is fetched */
export interface SyncJob {
  dataset: DatasetDefinition;

  /** Set when the selection named a tier */
  tier?: TierDefinition;

  lister: ObjectLister;
  request: ListingRequest;
  mapping: PathMapping;
  fetcher: ObjectFetcher;
  materializer: Materializer;

  /** Upper bound on remote units (undefined: the whole collection) */
  bound: number | undefined;

  /** True when a requested archive range ran past the last archive */
  clamped: boolean;
}

export interface RunReport {
  stats: RunStats;

  /** Failed tasks, in the order they failed */
  failures: FailureRecord[];

  /** Message of the listing failure when the run used a partial listing */
  listingFailure: string | null;

  /** Keys that could not be mapped inside the destination root */
  rejected: string[];

  /** Tasks never started because the run was cancelled */
  notStarted: number;

  /** Descriptors produced by the listing */
  listedCount: number;

  summary: TreeSummary;
  durationMs: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** Events emitted by the SyncRunner */
export interface SyncRunnerEvents {
  /** The listing finished, possibly partially */
  listingComplete: (listed: number, failure: ListingFailedError | null) => void;

  /** Listed objects were split into fetch and skip sets */
  partitioned: (result: PartitionResult) => void;

  /** A transfer reached its terminal status */
  taskComplete: (result: DownloadedResult | FailedResult) => void;

  /** Counters changed */
  progress: (snapshot: ProgressSnapshot) => void;

  /** The run finished and the destination tree was summarized */
  runComplete: (report: RunReport) => void;
}
