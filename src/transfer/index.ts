export { TransferPool, DEFAULT_TRANSFER_OPTIONS } from './transfer-pool.js';
export type { TypedTransferPoolEmitter } from './transfer-pool.js';
export { partition, localPathFor, isPresent } from './existence-filter.js';
export type { PartitionResult } from './existence-filter.js';
export { FileMaterializer } from './file-materializer.js';
export { ArchiveMaterializer } from './archive-materializer.js';
export { S3ObjectFetcher } from './s3-object-fetcher.js';
export { HttpFetcher } from './http-fetcher.js';
export type { FetchFn } from './http-fetcher.js';
export { temporarySibling, isTemporaryArtifact } from './temp-paths.js';
export type {
  LocalLayout,
  PathMapping,
  FetchTask,
  TaskStatus,
  DownloadedResult,
  FailedResult,
  SkippedResult,
  TaskResult,
  AttemptResult,
  ObjectFetcher,
  Materializer,
  TransferPoolOptions,
  TransferPoolEvents,
  PoolRunResult,
} from './types.js';
