/**
 * Turns a dataset definition and a selection into a runnable SyncJob.
 */

import type { S3Client } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { TierCatalog } from '../catalog/tier-catalog.js';
import type {
  ArchiveRangeSource,
  BucketSource,
  DatasetDefinition,
  HttpFilesSource,
  TierDefinition,
} from '../catalog/types.js';
import { InvalidRangeError } from '../errors.js';
import { ArchiveRangeLister, resolveArchiveRange } from '../listing/archive-range-lister.js';
import type { ResolvedRange } from '../listing/archive-range-lister.js';
import { FileListLister } from '../listing/file-list-lister.js';
import { S3ObjectLister } from '../listing/s3-object-lister.js';
import { ArchiveMaterializer } from '../transfer/archive-materializer.js';
import { FileMaterializer } from '../transfer/file-materializer.js';
import { HttpFetcher } from '../transfer/http-fetcher.js';
import type { FetchFn } from '../transfer/http-fetcher.js';
import { S3ObjectFetcher } from '../transfer/s3-object-fetcher.js';
import type { Selection, SyncJob } from './types.js';

export interface PlanContext {
  /** Absolute directory the dataset is written into */
  destinationRoot: string;

  s3Client: S3Client;
  listPageSize: number;
  logger: Logger;

  /** HTTP client for archive and file datasets; defaults to the global fetch */
  fetchFn?: FetchFn;

  /** Tier lookup for the dataset; built from `dataset.tiers` when omitted */
  tiers?: TierCatalog;
}

export function planSync(
  dataset: DatasetDefinition,
  selection: Selection,
  context: PlanContext
): SyncJob {
  const tiers = context.tiers ?? new TierCatalog(dataset.tiers);
  const tier = selection.kind === 'tier' ? tiers.resolve(selection.tier) : undefined;

  switch (dataset.source.type) {
    case 'bucket':
      return planBucket(dataset, dataset.source, selection, tier, context);
    case 'archive-range':
      return planArchiveRange(dataset, dataset.source, selection, tier, context);
    case 'http-files':
      return planHttpFiles(dataset, dataset.source, selection, tier, context);
  }
}

/**
 * Item bound for datasets addressed by count rather than by thread.
 */
function countBound(
  dataset: DatasetDefinition,
  selection: Selection,
  tier: TierDefinition | undefined
): number | undefined {
  switch (selection.kind) {
    case 'tier':
      return tier?.itemLimit;
    case 'limit':
      if (!Number.isInteger(selection.limit) || selection.limit < 1) {
        throw new InvalidRangeError(`Limit must be a positive integer (got ${selection.limit})`);
      }
      return selection.limit;
    case 'range':
      throw new InvalidRangeError(
        `Dataset "${dataset.id}" is not split into threads; use --tier or --limit`
      );
    case 'all':
      return undefined;
  }
}

function planBucket(
  dataset: DatasetDefinition,
  source: BucketSource,
  selection: Selection,
  tier: TierDefinition | undefined,
  context: PlanContext
): SyncJob {
  const bound = countBound(dataset, selection, tier);

  return {
    dataset,
    tier,
    lister: new S3ObjectLister(context.s3Client, context.logger, { pageSize: context.listPageSize }),
    request: {
      namespace: source.bucket,
      prefix: source.prefix,
      maxItems: bound,
      includeSuffixes: source.includeSuffixes,
    },
    mapping: {
      destinationRoot: context.destinationRoot,
      stripPrefix: source.prefix,
      layout: 'file',
    },
    fetcher: new S3ObjectFetcher(context.s3Client, source.bucket),
    materializer: new FileMaterializer(),
    bound,
    clamped: false,
  };
}

function planArchiveRange(
  dataset: DatasetDefinition,
  source: ArchiveRangeSource,
  selection: Selection,
  tier: TierDefinition | undefined,
  context: PlanContext
): SyncJob {
  const bounds = { first: source.first, last: source.last };

  let range: ResolvedRange;
  switch (selection.kind) {
    case 'tier': {
      const count = tier?.itemLimit ?? 0;
      // A zero tier is a valid run that lists nothing
      range =
        count === 0
          ? { first: source.first, last: source.first, count: 0, clamped: false }
          : resolveArchiveRange(source.first, count, bounds);
      break;
    }
    case 'range':
      range = resolveArchiveRange(selection.start, selection.threads, bounds);
      break;
    case 'limit':
      throw new InvalidRangeError(
        `Dataset "${dataset.id}" is fetched by thread; use --tier or --threads`
      );
    case 'all':
      range = resolveArchiveRange(source.first, source.last - source.first + 1, bounds);
      break;
  }

  return {
    dataset,
    tier,
    lister: new ArchiveRangeLister({
      width: source.width,
      first: range.first,
      last: range.last,
      extension: source.extension,
    }),
    request: {
      namespace: source.baseUrl,
      prefix: '',
      maxItems: range.count,
    },
    mapping: {
      destinationRoot: context.destinationRoot,
      stripPrefix: '',
      layout: 'archive',
      archiveExtension: source.extension,
    },
    fetcher: new HttpFetcher(source.baseUrl, context.fetchFn),
    materializer: new ArchiveMaterializer(),
    bound: range.count,
    clamped: range.clamped,
  };
}

function planHttpFiles(
  dataset: DatasetDefinition,
  source: HttpFilesSource,
  selection: Selection,
  tier: TierDefinition | undefined,
  context: PlanContext
): SyncJob {
  const bound = countBound(dataset, selection, tier);

  return {
    dataset,
    tier,
    lister: new FileListLister(source.files),
    request: {
      namespace: source.baseUrl,
      prefix: '',
      maxItems: bound,
    },
    mapping: {
      destinationRoot: context.destinationRoot,
      stripPrefix: '',
      layout: 'file',
    },
    fetcher: new HttpFetcher(source.baseUrl, context.fetchFn),
    materializer: new FileMaterializer(),
    bound,
    clamped: false,
  };
}
