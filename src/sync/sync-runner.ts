/**
 * SyncRunner - one synchronization from listing to summary.
 *
 * Flow: list -> partition against the destination tree -> drain the
 * fetch set through a TransferPool -> summarize the tree.
 *
 * Setup failures (nothing listed) throw before any transfer starts.
 * Everything after that is reported in the returned RunReport.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { EmptyListingError } from '../errors.js';
import { collectListing } from '../listing/collect-listing.js';
import { ProgressAggregator } from '../progress/progress-aggregator.js';
import { summarize } from '../progress/summary-reporter.js';
import { partition } from '../transfer/existence-filter.js';
import { TransferPool } from '../transfer/transfer-pool.js';
import type { SkippedResult } from '../transfer/types.js';
import type { SyncConfig } from './config.js';
import { validateSyncConfig } from './config.js';
import type { RunOptions, RunReport, SyncJob, SyncRunnerEvents } from './types.js';

/**
 * Typed event emitter interface for the sync runner.
 */
export interface TypedSyncRunnerEmitter {
  on<K extends keyof SyncRunnerEvents>(event: K, listener: SyncRunnerEvents[K]): this;
  off<K extends keyof SyncRunnerEvents>(event: K, listener: SyncRunnerEvents[K]): this;
  emit<K extends keyof SyncRunnerEvents>(
    event: K,
    ...args: Parameters<SyncRunnerEvents[K]>
  ): boolean;
}

export class SyncRunner extends EventEmitter implements TypedSyncRunnerEmitter {
  private readonly config: SyncConfig;
  private readonly logger: Logger;

  constructor(config: SyncConfig, logger: Logger) {
    super();

    const errors = validateSyncConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid sync config: ${errors.join('; ')}`);
    }

    this.config = config;
    this.logger = logger.child({ component: 'sync-runner' });
  }

  async run(job: SyncJob, options: RunOptions = {}): Promise<RunReport> {
    const startTime = Date.now();
    const { request, mapping } = job;

    this.logger.info(
      {
        dataset: job.dataset.id,
        tier: job.tier?.name,
        bound: job.bound,
        destination: mapping.destinationRoot,
      },
      'Starting sync'
    );

    // Listing
    const listing = await collectListing(job.lister, request, this.logger);
    if (listing.objects.length === 0) {
      if (listing.failure) {
        throw listing.failure;
      }
      if (request.maxItems !== 0) {
        throw new EmptyListingError(request.namespace, request.prefix);
      }
    }
    this.emit('listingComplete', listing.objects.length, listing.failure);

    // Partition
    const partitioned = await partition(listing.objects, mapping);
    if (partitioned.rejected.length > 0) {
      this.logger.warn(
        { rejected: partitioned.rejected.map((d) => d.key) },
        'Skipping keys that map outside the destination'
      );
    }
    this.logger.info(
      { toFetch: partitioned.toFetch.length, toSkip: partitioned.toSkip.length },
      'Partitioned listing'
    );
    this.emit('partitioned', partitioned);

    const aggregator = new ProgressAggregator(
      partitioned.toFetch.length + partitioned.toSkip.length
    );
    for (const task of partitioned.toSkip) {
      const skipped: SkippedResult = { status: 'skipped', task };
      aggregator.observe(skipped);
    }
    this.emit('progress', aggregator.snapshot());

    // Transfers
    const pool = new TransferPool(job.fetcher, job.materializer, this.logger, {
      parallel: this.config.parallel,
      maxAttempts: this.config.maxAttempts,
      retryDelayMs: this.config.retryDelayMs,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });
    pool.on('taskComplete', (result) => {
      aggregator.observe(result);
      this.emit('taskComplete', result);
      this.emit('progress', aggregator.snapshot());
    });

    const poolResult = await pool.run(partitioned.toFetch, options.signal);

    // Summary
    const summary = await summarize(mapping.destinationRoot);
    aggregator.recordBytesOnDisk(summary.totalBytes);

    const report: RunReport = {
      stats: aggregator.runStats(),
      failures: aggregator.failures(),
      listingFailure: listing.failure ? listing.failure.message : null,
      rejected: partitioned.rejected.map((d) => d.key),
      notStarted: poolResult.notStarted.length,
      listedCount: listing.objects.length,
      summary,
      durationMs: Date.now() - startTime,
    };

    this.logger.info(
      {
        downloaded: report.stats.downloaded,
        skipped: report.stats.skipped,
        failed: report.stats.failed,
        notStarted: report.notStarted,
        durationMs: report.durationMs,
      },
      'Sync complete'
    );
    this.emit('runComplete', report);

    return report;
  }
}
