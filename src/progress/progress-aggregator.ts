/**
 * ProgressAggregator - the single owner of a run's counters.
 *
 * Pool workers never touch the counters directly; results flow in through
 * observe(), usually wired to the pool's taskComplete event.
 */

import type { TaskResult } from '../transfer/types.js';
import type { FailureRecord, ProgressSnapshot, RunStats } from './types.js';

export class ProgressAggregator {
  private readonly total: number;
  private readonly stats: RunStats = { downloaded: 0, skipped: 0, failed: 0, totalBytesOnDisk: 0 };
  private readonly failureRecords: FailureRecord[] = [];
  private bytesTransferred = 0;

  constructor(total: number) {
    if (!Number.isInteger(total) || total < 0) {
      throw new Error(`total must be a non-negative integer (got ${total})`);
    }
    this.total = total;
  }

  observe(result: TaskResult): void {
    switch (result.status) {
      case 'downloaded':
        this.stats.downloaded++;
        this.bytesTransferred += result.bytesTransferred;
        break;
      case 'skipped':
        this.stats.skipped++;
        break;
      case 'failed':
        this.stats.failed++;
        this.failureRecords.push({
          key: result.task.descriptor.key,
          localPath: result.task.localPath,
          attempts: result.attempts,
          error: result.error,
        });
        break;
    }
  }

  /** Record the on-disk total once the destination tree has been summarized. */
  recordBytesOnDisk(totalBytes: number): void {
    this.stats.totalBytesOnDisk = totalBytes;
  }

  snapshot(): ProgressSnapshot {
    const completed = this.stats.downloaded + this.stats.skipped + this.stats.failed;
    return {
      total: this.total,
      completed,
      downloaded: this.stats.downloaded,
      skipped: this.stats.skipped,
      failed: this.stats.failed,
      bytesTransferred: this.bytesTransferred,
      percent: this.total === 0 ? 100 : Math.floor((completed / this.total) * 100),
    };
  }

  runStats(): RunStats {
    return { ...this.stats };
  }

  /** Failed tasks in the order they failed */
  failures(): FailureRecord[] {
    return [...this.failureRecords];
  }
}
