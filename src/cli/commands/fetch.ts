/**
 * corpus-sync <dataset> - fetch one dataset family.
 *
 * One command is registered per catalog entry. Options pick the bound
 * (tier, limit or thread range) and the destination; the run itself is
 * delegated to SyncRunner.
 */

import * as readline from 'node:readline';
import type { S3Client } from '@aws-sdk/client-s3';
import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import type { TierCatalog } from '../../catalog/tier-catalog.js';
import type { DatasetDefinition } from '../../catalog/types.js';
import { errorMessage } from '../../errors.js';
import { createAnonymousS3Client } from '../../s3/client.js';
import { buildSyncConfig } from '../../sync/config.js';
import { planSync } from '../../sync/plan.js';
import { SyncRunner } from '../../sync/sync-runner.js';
import type { RunReport, Selection, SyncJob } from '../../sync/types.js';
import type { FetchFn } from '../../transfer/http-fetcher.js';
import { resolveDestination } from '../utils/default-path.js';
import { formatBytes, formatDuration } from '../utils/format.js';
import { createCliLogger, isLogLevel, LOG_LEVELS } from '../utils/logger.js';

/** Failed keys printed in the summary before the rest are counted */
const MAX_FAILED_KEYS_SHOWN = 10;

/** Raised for option combinations commander cannot express */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface FetchCommandOptions {
  list?: boolean;
  tier?: string;
  limit?: number;
  threads?: number;
  start?: number;
  path?: string;
  subfolder: boolean;
  parallel?: number;
  yes?: boolean;
  logLevel: string;
}

/** Collaborators a fetch command runs against */
export interface FetchCommandDeps {
  /** Tier lookup of the loaded catalog */
  tiers?: TierCatalog;

  /** Client for bucket datasets; an anonymous client is created when omitted */
  s3Client?: S3Client;

  /** HTTP client for archive and file datasets; defaults to the global fetch */
  fetchFn?: FetchFn;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Translate command options into a Selection.
 * Datasets without tiers fetch the whole collection when no bound is given.
 */
export function selectionFrom(dataset: DatasetDefinition, options: FetchCommandOptions): Selection {
  if (options.tier !== undefined) {
    return { kind: 'tier', tier: options.tier };
  }
  if (options.limit !== undefined) {
    return { kind: 'limit', limit: options.limit };
  }
  if (options.threads !== undefined) {
    return { kind: 'range', threads: options.threads, start: options.start ?? 0 };
  }
  if (options.start !== undefined) {
    throw new UsageError('--start needs --threads');
  }
  if (dataset.tiers.length > 0) {
    throw new UsageError(
      `Choose a size with --tier (${dataset.tiers.map((t) => t.name).join(', ')}) or run with --list`
    );
  }
  return { kind: 'all' };
}

/** Whether a run should be confirmed before it starts */
export function needsConfirmation(job: SyncJob): boolean {
  const threshold = job.dataset.confirmAbove;
  if (threshold === undefined) return false;
  return job.bound === undefined || job.bound > threshold;
}

/** Tier table for --list */
export function renderTiers(dataset: DatasetDefinition): string[] {
  const lines = [`${dataset.title} - ${dataset.description}`, ''];

  if (dataset.tiers.length === 0) {
    lines.push('  No tiers: the whole collection is fetched unless --limit is given.');
    return lines;
  }

  const filesPerArchive =
    dataset.source.type === 'archive-range' ? dataset.source.filesPerArchive : undefined;
  const width = Math.max(...dataset.tiers.map((t) => t.name.length));

  for (const tier of dataset.tiers) {
    const count =
      filesPerArchive !== undefined
        ? `${tier.itemLimit} archives (~${(tier.itemLimit * filesPerArchive).toLocaleString('en-US')} files)`
        : `${tier.itemLimit.toLocaleString('en-US')} files`;
    lines.push(`  ${tier.name.padEnd(width)}  ${count}, ${tier.approxSizeLabel}  ${tier.description}`);
  }
  return lines;
}

/** Final summary lines, uncoloured */
export function renderSummary(report: RunReport, destination: string): string[] {
  const { stats, summary } = report;
  const lines = [
    'Summary',
    `  Destination:   ${destination}`,
    `  Downloaded:    ${stats.downloaded}`,
    `  Skipped:       ${stats.skipped}`,
    `  Failed:        ${stats.failed}`,
    `  Not started:   ${report.notStarted}`,
    `  On disk:       ${summary.fileCount} files, ${formatBytes(stats.totalBytesOnDisk)}`,
  ];

  if (summary.categories.length > 0) {
    lines.push('  Categories:');
    const width = Math.max(...summary.categories.map((c) => c.name.length));
    for (const category of summary.categories) {
      lines.push(
        `    ${category.name.padEnd(width)}  ${category.fileCount} files, ${formatBytes(category.totalBytes)}`
      );
    }
  }

  if (report.listingFailure) {
    lines.push(`  Listing stopped early: ${report.listingFailure}`);
  }

  if (report.rejected.length > 0) {
    lines.push(`  Rejected keys:  ${report.rejected.length}`);
  }

  if (report.failures.length > 0) {
    lines.push('  Failed keys:');
    for (const failure of report.failures.slice(0, MAX_FAILED_KEYS_SHOWN)) {
      lines.push(`    ${failure.key} (${failure.attempts} attempts): ${failure.error}`);
    }
    const rest = report.failures.length - MAX_FAILED_KEYS_SHOWN;
    if (rest > 0) {
      lines.push(`    ... and ${rest} more`);
    }
  }

  lines.push(`  Elapsed:       ${formatDuration(report.durationMs)}`);
  return lines;
}

function promptConfirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      const trimmed = answer.trim().toLowerCase();
      resolve(trimmed === 'y' || trimmed === 'yes');
    });
  });
}

function describeBound(job: SyncJob): string {
  const unit = job.mapping.layout === 'archive' ? 'archives' : 'files';
  if (job.bound === undefined) {
    return `entire collection${job.dataset.approxSizeLabel ? ` (${job.dataset.approxSizeLabel})` : ''}`;
  }
  const tier = job.tier ? `tier ${job.tier.name}: ` : '';
  const size = job.tier ? `, ${job.tier.approxSizeLabel}` : '';
  return `${tier}${job.bound.toLocaleString('en-US')} ${unit}${size}`;
}

async function runFetch(
  dataset: DatasetDefinition,
  options: FetchCommandOptions,
  deps: FetchCommandDeps
): Promise<void> {
  if (options.list) {
    for (const line of renderTiers(dataset)) {
      console.log(line);
    }
    return;
  }

  if (!isLogLevel(options.logLevel)) {
    throw new UsageError(`--log-level must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  const logger = createCliLogger(options.logLevel);

  const config = buildSyncConfig(options.parallel !== undefined ? { parallel: options.parallel } : {});
  const destination = resolveDestination({
    parent: options.path,
    directoryName: dataset.directoryName,
    appendSubfolder: options.subfolder,
    dataHome: config.dataHome,
  });

  const selection = selectionFrom(dataset, options);
  const runner = new SyncRunner(config, logger);
  const job = planSync(dataset, selection, {
    destinationRoot: destination,
    s3Client: deps.s3Client ?? createAnonymousS3Client(config),
    listPageSize: config.listPageSize,
    logger,
    fetchFn: deps.fetchFn,
    tiers: deps.tiers,
  });

  console.log(chalk.bold(`${dataset.title}: ${describeBound(job)}`));
  console.log(`Destination: ${destination}`);
  if (job.clamped) {
    console.log(chalk.yellow(`Range runs past the last archive; fetching ${job.bound} instead.`));
  }

  if (needsConfirmation(job) && !options.yes) {
    if (!process.stdin.isTTY) {
      throw new UsageError('This is a large download; pass --yes to confirm it.');
    }
    const confirmed = await promptConfirm('This is a large download. Continue?');
    if (!confirmed) {
      console.log('Cancelled.');
      return;
    }
  }

  const progressBar = new cliProgress.SingleBar(
    {
      format: ' {bar} | {percentage}% | {value}/{total} | {failed} failed',
      clearOnComplete: false,
      hideCursor: true,
    },
    cliProgress.Presets.shades_grey
  );
  let barActive = false;
  let failed = 0;

  runner.on('listingComplete', (listed, failure) => {
    console.log(`Listed ${listed} objects.`);
    if (failure) {
      console.log(chalk.yellow(`Warning: ${failure.message}`));
    }
  });
  runner.on('partitioned', (result) => {
    console.log(`${result.toSkip.length} already present, ${result.toFetch.length} to fetch.`);
    if (result.toFetch.length > 0) {
      progressBar.start(result.toFetch.length, 0, { failed });
      barActive = true;
    }
  });
  runner.on('taskComplete', (result) => {
    if (result.status === 'failed') failed++;
    progressBar.increment(1, { failed });
  });

  const controller = new AbortController();
  const onSigint = (): void => {
    console.error(chalk.yellow('\nCancelling; waiting for in-flight transfers to stop...'));
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let report: RunReport;
  try {
    report = await runner.run(job, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
    if (barActive) progressBar.stop();
  }

  console.log();
  const lines = renderSummary(report, destination);
  const [title, ...rest] = lines;
  console.log(chalk.bold(title ?? 'Summary'));
  for (const line of rest) {
    console.log(report.stats.failed > 0 && line.startsWith('  Failed') ? chalk.red(line) : line);
  }
}

export function registerFetchCommand(
  program: Command,
  dataset: DatasetDefinition,
  deps: FetchCommandDeps = {}
): void {
  program
    .command(dataset.id)
    .description(`${dataset.title}: ${dataset.description}`)
    .addOption(new Option('--list', 'List size tiers and exit').conflicts(['limit', 'threads', 'start']))
    .addOption(
      new Option('-t, --tier <name>', 'Size tier to fetch').conflicts(['limit', 'threads', 'start'])
    )
    .addOption(
      new Option('--limit <n>', 'Fetch at most n files').argParser(parsePositiveInt).conflicts(['threads', 'start'])
    )
    .addOption(new Option('--threads <n>', 'Number of archives to fetch').argParser(parsePositiveInt))
    .addOption(new Option('--start <n>', 'First archive number (default: 0)').argParser(parseNonNegativeInt))
    .option('-p, --path <dir>', 'Parent directory for the download')
    .option('--no-subfolder', 'Write directly into --path instead of a dataset subfolder')
    .addOption(new Option('-j, --parallel <n>', 'Concurrent transfers (default: 4)').argParser(parsePositiveInt))
    .option('-y, --yes', 'Skip the confirmation for large downloads')
    .option('--log-level <level>', `Log level (${LOG_LEVELS.join(', ')})`, 'warn')
    .action(async (options: FetchCommandOptions) => {
      try {
        await runFetch(dataset, options, deps);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
