/**
 * TransferPool - drains fetch tasks with bounded parallelism.
 *
 * Each task runs: create the parent directory -> fetch into a temporary
 * sibling -> materialize at the canonical path. Failed attempts discard
 * their temporary artifacts and are retried after a fixed delay until the
 * attempt ceiling is reached.
 *
 * Emits events so progress can be observed without touching pool state.
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import { TransferFailedError } from '../errors.js';
import type {
  AttemptResult,
  DownloadedResult,
  FailedResult,
  FetchTask,
  Materializer,
  ObjectFetcher,
  PoolRunResult,
  TransferPoolEvents,
  TransferPoolOptions,
} from './types.js';

export const DEFAULT_TRANSFER_OPTIONS: TransferPoolOptions = {
  parallel: 4,
  maxAttempts: 3,
  retryDelayMs: 2_000,
  requestTimeoutMs: 120_000,
};

/**
 * Typed event emitter interface for the transfer pool.
 */
export interface TypedTransferPoolEmitter {
  on<K extends keyof TransferPoolEvents>(event: K, listener: TransferPoolEvents[K]): this;
  off<K extends keyof TransferPoolEvents>(event: K, listener: TransferPoolEvents[K]): this;
  emit<K extends keyof TransferPoolEvents>(
    event: K,
    ...args: Parameters<TransferPoolEvents[K]>
  ): boolean;
}

export class TransferPool extends EventEmitter implements TypedTransferPoolEmitter {
  private readonly fetcher: ObjectFetcher;
  private readonly materializer: Materializer;
  private readonly options: TransferPoolOptions;
  private readonly logger: Logger;

  private _activeTransfers = 0;

  constructor(
    fetcher: ObjectFetcher,
    materializer: Materializer,
    logger: Logger,
    options?: Partial<TransferPoolOptions>
  ) {
    super();
    this.fetcher = fetcher;
    this.materializer = materializer;
    this.options = { ...DEFAULT_TRANSFER_OPTIONS, ...options };
    this.logger = logger.child({ component: 'transfer-pool' });

    if (!Number.isInteger(this.options.parallel) || this.options.parallel < 1) {
      throw new Error(`parallel must be a positive integer (got ${this.options.parallel})`);
    }
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer (got ${this.options.maxAttempts})`);
    }
  }

  /** Attempts currently in flight */
  get activeTransfers(): number {
    return this._activeTransfers;
  }

  /**
   * Run every task to a terminal result.
   *
   * Once `signal` aborts, tasks that have not started are returned in
   * `notStarted`; tasks in flight are aborted and reported failed.
   */
  async run(tasks: readonly FetchTask[], signal?: AbortSignal): Promise<PoolRunResult> {
    const limit = pLimit(this.options.parallel);
    const results: Array<DownloadedResult | FailedResult> = [];
    const notStarted: FetchTask[] = [];

    this.logger.info(
      { tasks: tasks.length, parallel: this.options.parallel },
      'Starting transfers'
    );

    await Promise.all(
      tasks.map((task) =>
        limit(async () => {
          if (signal?.aborted) {
            notStarted.push(task);
            return;
          }
          const result = await this.execute(task, signal);
          results.push(result);
          this.emit('taskComplete', result);
        })
      )
    );

    if (notStarted.length > 0) {
      this.logger.warn({ notStarted: notStarted.length }, 'Transfers cancelled before starting');
    }

    return { results, notStarted };
  }

  /**
   * Run one task through its attempts.
   */
  async execute(task: FetchTask, signal?: AbortSignal): Promise<DownloadedResult | FailedResult> {
    const startTime = Date.now();
    const { key } = task.descriptor;
    let lastError = 'No attempt made';

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      this.emit('taskStart', task, attempt);
      const outcome = await this.attempt(task, signal);

      if (outcome.ok) {
        this.logger.debug(
          { key, attempt, bytes: outcome.bytesTransferred, files: outcome.filesWritten },
          'Transfer complete'
        );
        return {
          status: 'downloaded',
          task,
          attempts: attempt,
          bytesTransferred: outcome.bytesTransferred,
          filesWritten: outcome.filesWritten,
          durationMs: Date.now() - startTime,
        };
      }

      lastError = outcome.error.message;

      if (signal?.aborted) {
        return this.failed(task, attempt, 'Transfer cancelled', startTime);
      }

      if (attempt < this.options.maxAttempts) {
        this.logger.warn({ key, attempt, error: lastError }, 'Attempt failed; retrying');
        this.emit('taskRetry', task, attempt, outcome.error);

        const resumed = await this.pause(signal);
        if (!resumed) {
          return this.failed(task, attempt, 'Transfer cancelled', startTime);
        }
      }
    }

    this.logger.error(
      { key, attempts: this.options.maxAttempts, error: lastError },
      'Transfer failed'
    );
    return this.failed(task, this.options.maxAttempts, lastError, startTime);
  }

  /**
   * A single attempt. Never throws: failures come back as a value after
   * the attempt's temporary artifacts have been removed.
   */
  private async attempt(task: FetchTask, signal?: AbortSignal): Promise<AttemptResult> {
    const tempPath = this.materializer.tempPathFor(task);
    const timeoutSignal = AbortSignal.timeout(this.options.requestTimeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    this._activeTransfers++;
    try {
      await fs.mkdir(path.dirname(task.localPath), { recursive: true });
      const bytesTransferred = await this.fetchWithTimeout(task, tempPath, requestSignal, timeoutSignal);
      const filesWritten = await this.materializer.materialize(task, tempPath);
      return { ok: true, bytesTransferred, filesWritten };
    } catch (err) {
      await this.discard(task, tempPath);
      return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    } finally {
      this._activeTransfers--;
    }
  }

  /**
   * The timeout covers the request only; materialization errors keep their own message.
   */
  private async fetchWithTimeout(
    task: FetchTask,
    tempPath: string,
    requestSignal: AbortSignal,
    timeoutSignal: AbortSignal
  ): Promise<number> {
    try {
      return await this.fetcher.fetch(task, tempPath, requestSignal);
    } catch (err) {
      if (timeoutSignal.aborted) {
        throw new TransferFailedError(
          task.descriptor.key,
          `Request timed out after ${this.options.requestTimeoutMs}ms`,
          { cause: err }
        );
      }
      throw err;
    }
  }

  private async discard(task: FetchTask, tempPath: string): Promise<void> {
    try {
      await this.materializer.discard(task, tempPath);
    } catch (err) {
      this.logger.error(
        { key: task.descriptor.key, tempPath, error: err instanceof Error ? err.message : String(err) },
        'Failed to remove temporary artifact'
      );
    }
  }

  /**
   * Wait out the retry delay. Resolves false when the wait was cancelled.
   */
  private async pause(signal?: AbortSignal): Promise<boolean> {
    if (this.options.retryDelayMs <= 0) {
      return !signal?.aborted;
    }
    try {
      await sleep(this.options.retryDelayMs, undefined, { signal });
      return true;
    } catch (err) {
      if (signal?.aborted) {
        return false;
      }
      throw err;
    }
  }

  private failed(task: FetchTask, attempts: number, error: string, startTime: number): FailedResult {
    return {
      status: 'failed',
      task,
      attempts,
      error,
      durationMs: Date.now() - startTime,
    };
  }
}
