import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Readable } from 'node:stream';
import AdmZip from 'adm-zip';
import { SyncRunner } from '../sync/sync-runner.js';
import { planSync } from '../sync/plan.js';
import { buildSyncConfig } from '../sync/config.js';
import { EmptyListingError, ListingFailedError } from '../errors.js';
import type { DatasetDefinition } from '../catalog/types.js';
import type { ProgressSnapshot } from '../progress/types.js';
import type { Selection } from '../sync/types.js';
import type { Logger } from 'pino';

function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

interface S3Command {
  constructor: { name: string };
  input: { Prefix?: string; MaxKeys?: number; ContinuationToken?: string; Key?: string };
}

interface FakeS3Options {
  /** Keys whose GetObject always fails */
  failingKeys?: string[];

  /** Fail the ListObjectsV2 request with this 1-based number */
  failListOnPage?: number;
}

/**
 * In-process S3 stand-in serving ListObjectsV2 and GetObject from a map.
 */
function createFakeS3(objects: Record<string, string>, options: FakeS3Options = {}) {
  const keys = Object.keys(objects).sort();
  let listCalls = 0;
  const gets: string[] = [];

  const send = vi.fn().mockImplementation((command: S3Command) => {
    const commandName = command.constructor?.name ?? '';

    if (commandName === 'ListObjectsV2Command') {
      listCalls++;
      if (options.failListOnPage === listCalls) {
        return Promise.reject(new Error('service unavailable'));
      }
      const matching = keys.filter((k) => k.startsWith(command.input.Prefix ?? ''));
      const start = Number(command.input.ContinuationToken ?? '0');
      const page = matching.slice(start, start + (command.input.MaxKeys ?? 1000));
      const next = start + page.length;
      const truncated = next < matching.length;
      return Promise.resolve({
        Contents: page.map((Key) => ({ Key, Size: objects[Key]?.length ?? 0 })),
        IsTruncated: truncated,
        NextContinuationToken: truncated ? String(next) : undefined,
      });
    }

    if (commandName === 'GetObjectCommand') {
      const key = command.input.Key ?? '';
      gets.push(key);
      const content = objects[key];
      if (content === undefined || options.failingKeys?.includes(key)) {
        return Promise.reject(new Error(`NoSuchKey: ${key}`));
      }
      return Promise.resolve({ Body: Readable.from([Buffer.from(content)]) });
    }

    return Promise.reject(new Error(`Unexpected command ${commandName}`));
  });

  return { client: { send }, gets };
}

function pdfObjects(count: number): Record<string, string> {
  const objects: Record<string, string> = {};
  for (let i = 0; i < count; i++) {
    const id = String(i).padStart(4, '0');
    objects[`corpora/pdfs/${id.slice(0, 2)}/${id}.pdf`] = `%PDF-${id}`;
  }
  return objects;
}

const PDF_DATASET: DatasetDefinition = {
  id: 'pdfs',
  title: 'PDFs',
  description: 'Test PDFs',
  group: 'bucket',
  directoryName: 'PDFS',
  source: { type: 'bucket', bucket: 'test-bucket', prefix: 'corpora/pdfs/', includeSuffixes: [] },
  tiers: [{ name: 'sample', itemLimit: 10, approxSizeLabel: '~1 KB', description: 'Sample' }],
};

const THREAD_DATASET: DatasetDefinition = {
  id: 'threads',
  title: 'Threads',
  description: 'Numbered archives',
  group: 'archive',
  directoryName: 'Threads',
  source: {
    type: 'archive-range',
    baseUrl: 'https://example.test/zips/',
    width: 3,
    first: 0,
    last: 9,
    extension: '.zip',
  },
  tiers: [],
};

function makeConfig() {
  return buildSyncConfig({
    parallel: 4,
    maxAttempts: 3,
    retryDelayMs: 0,
    requestTimeoutMs: 5_000,
    listPageSize: 4,
    region: 'us-east-1',
  });
}

describe('SyncRunner', () => {
  let tmpDir: string;
  let destination: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-sync-runner-test-'));
    destination = path.join(tmpDir, 'PDFS');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function plan(client: unknown, selection: Selection, dataset: DatasetDefinition = PDF_DATASET) {
    return planSync(dataset, selection, {
      destinationRoot: destination,
      s3Client: client as never,
      listPageSize: 4,
      logger: createMockLogger(),
    });
  }

  it('should download the tier bound into a fresh directory', async () => {
    const { client } = createFakeS3(pdfObjects(25));
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    const report = await runner.run(plan(client, { kind: 'tier', tier: 'sample' }));

    expect(report.stats).toEqual({ downloaded: 10, skipped: 0, failed: 0, totalBytesOnDisk: 90 });
    expect(report.listedCount).toBe(10);
    expect(report.failures).toEqual([]);
    expect(report.notStarted).toBe(0);
    expect(report.listingFailure).toBeNull();
    expect(report.summary.fileCount).toBe(10);
    expect(report.summary.categories).toEqual([{ name: '00', fileCount: 10, totalBytes: 90 }]);
    expect(fs.readFileSync(path.join(destination, '00', '0007.pdf'), 'utf-8')).toBe('%PDF-0007');
  });

  it('should skip everything on an immediate rerun', async () => {
    const { client, gets } = createFakeS3(pdfObjects(25));
    const runner = new SyncRunner(makeConfig(), createMockLogger());
    const job = plan(client, { kind: 'tier', tier: 'sample' });

    await runner.run(job);
    const before = gets.length;
    const second = await runner.run(job);

    expect(second.stats).toMatchObject({ downloaded: 0, skipped: 10, failed: 0 });
    expect(gets.length).toBe(before);
  });

  it('should fetch only what is missing when resuming', async () => {
    const { client, gets } = createFakeS3(pdfObjects(25));
    const runner = new SyncRunner(makeConfig(), createMockLogger());
    const job = plan(client, { kind: 'tier', tier: 'sample' });

    await runner.run(job);
    for (const id of ['0001', '0004', '0008']) {
      fs.rmSync(path.join(destination, '00', `${id}.pdf`));
    }
    gets.length = 0;
    const resumed = await runner.run(job);

    expect(resumed.stats).toMatchObject({ downloaded: 3, skipped: 7, failed: 0 });
    expect(gets.sort()).toEqual([
      'corpora/pdfs/00/0001.pdf',
      'corpora/pdfs/00/0004.pdf',
      'corpora/pdfs/00/0008.pdf',
    ]);
  });

  it('should report failed keys and keep the rest of the run', async () => {
    const { client, gets } = createFakeS3(pdfObjects(3), { failingKeys: ['corpora/pdfs/00/0001.pdf'] });
    const runner = new SyncRunner({ ...makeConfig(), parallel: 1 }, createMockLogger());

    const report = await runner.run(plan(client, { kind: 'all' }));

    expect(report.stats).toMatchObject({ downloaded: 2, skipped: 0, failed: 1 });
    expect(report.failures).toEqual([
      {
        key: 'corpora/pdfs/00/0001.pdf',
        localPath: path.join(destination, '00', '0001.pdf'),
        attempts: 3,
        error: 'NoSuchKey: corpora/pdfs/00/0001.pdf',
      },
    ]);
    expect(gets.filter((k) => k === 'corpora/pdfs/00/0001.pdf')).toHaveLength(3);
    expect(fs.readdirSync(path.join(destination, '00')).sort()).toEqual(['0000.pdf', '0002.pdf']);
  });

  it('should emit progress up to completion', async () => {
    const { client } = createFakeS3(pdfObjects(5));
    const runner = new SyncRunner(makeConfig(), createMockLogger());
    const snapshots: ProgressSnapshot[] = [];
    runner.on('progress', (snapshot: ProgressSnapshot) => snapshots.push(snapshot));

    await runner.run(plan(client, { kind: 'all' }));

    expect(snapshots[0]).toMatchObject({ total: 5, completed: 0, percent: 0 });
    expect(snapshots.at(-1)).toMatchObject({ total: 5, completed: 5, downloaded: 5, percent: 100 });
    expect(snapshots).toHaveLength(6);
  });

  it('should throw EmptyListingError when nothing is listed', async () => {
    const { client } = createFakeS3({ 'other/file.pdf': 'x' });
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    await expect(runner.run(plan(client, { kind: 'all' }))).rejects.toThrow(EmptyListingError);
    expect(fs.existsSync(destination)).toBe(false);
  });

  it('should throw when the listing fails before producing anything', async () => {
    const { client } = createFakeS3(pdfObjects(5), { failListOnPage: 1 });
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    await expect(runner.run(plan(client, { kind: 'all' }))).rejects.toThrow(ListingFailedError);
  });

  it('should continue with a partial listing', async () => {
    const { client } = createFakeS3(pdfObjects(10), { failListOnPage: 2 });
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    const report = await runner.run(plan(client, { kind: 'all' }));

    expect(report.listedCount).toBe(4);
    expect(report.stats.downloaded).toBe(4);
    expect(report.listingFailure).toBe(
      'Listing test-bucket/corpora/pdfs/ failed after 4 objects: service unavailable'
    );
  });

  it('should refuse an invalid config', () => {
    expect(() => new SyncRunner({ ...makeConfig(), parallel: 0 }, createMockLogger())).toThrow(
      'Invalid sync config: parallel must be at least 1'
    );
  });

  it('should download and extract archive threads', async () => {
    const requested: string[] = [];
    const fetchFn = async (input: string | URL | Request): Promise<Response> => {
      const url = String(input);
      requested.push(url);
      const id = path.basename(url, '.zip');
      const zip = new AdmZip();
      zip.addFile(`${id}001.txt`, Buffer.from(`doc ${id}`));
      zip.addFile(`${id}002.txt`, Buffer.from(`doc ${id}`));
      return new Response(zip.toBuffer());
    };
    const job = planSync(THREAD_DATASET, { kind: 'range', threads: 2, start: 3 }, {
      destinationRoot: destination,
      s3Client: { send: vi.fn() } as never,
      listPageSize: 4,
      logger: createMockLogger(),
      fetchFn,
    });
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    const report = await runner.run(job);

    expect(requested.sort()).toEqual([
      'https://example.test/zips/003.zip',
      'https://example.test/zips/004.zip',
    ]);
    expect(report.stats).toMatchObject({ downloaded: 2, skipped: 0, failed: 0 });
    expect(report.summary.fileCount).toBe(4);
    expect(fs.readdirSync(destination).sort()).toEqual(['003', '004']);
    expect(fs.readFileSync(path.join(destination, '003', '003001.txt'), 'utf-8')).toBe('doc 003');

    const rerun = await runner.run(job);
    expect(rerun.stats).toMatchObject({ downloaded: 0, skipped: 2 });
  });

  it('should finish a zero-item archive tier without fetching anything', async () => {
    const fetchFn = vi.fn();
    const dataset: DatasetDefinition = {
      ...THREAD_DATASET,
      tiers: [{ name: 'none', itemLimit: 0, approxSizeLabel: '0 B', description: 'Nothing' }],
    };
    const job = planSync(dataset, { kind: 'tier', tier: 'none' }, {
      destinationRoot: destination,
      s3Client: { send: vi.fn() } as never,
      listPageSize: 4,
      logger: createMockLogger(),
      fetchFn,
    });
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    const report = await runner.run(job);

    expect(report.listedCount).toBe(0);
    expect(report.stats).toEqual({ downloaded: 0, skipped: 0, failed: 0, totalBytesOnDisk: 0 });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should download named files from an HTTP origin', async () => {
    const requested: string[] = [];
    const fetchFn = async (input: string | URL | Request): Promise<Response> => {
      const url = String(input);
      requested.push(url);
      return new Response(`body:${path.basename(url)}`);
    };
    const dataset: DatasetDefinition = {
      id: 'retail',
      title: 'Retail',
      description: 'Sales workbook',
      group: 'corpus',
      directoryName: 'Retail',
      source: {
        type: 'http-files',
        baseUrl: 'https://example.test/retail/',
        files: ['sales.xlsx', 'docs/readme.txt'],
      },
      tiers: [],
    };
    const job = planSync(dataset, { kind: 'all' }, {
      destinationRoot: destination,
      s3Client: { send: vi.fn() } as never,
      listPageSize: 4,
      logger: createMockLogger(),
      fetchFn,
    });
    const runner = new SyncRunner(makeConfig(), createMockLogger());

    const report = await runner.run(job);

    expect(requested.sort()).toEqual([
      'https://example.test/retail/docs/readme.txt',
      'https://example.test/retail/sales.xlsx',
    ]);
    expect(report.stats).toMatchObject({ downloaded: 2, skipped: 0, failed: 0 });
    expect(fs.readFileSync(path.join(destination, 'sales.xlsx'), 'utf-8')).toBe('body:sales.xlsx');
    expect(fs.readFileSync(path.join(destination, 'docs', 'readme.txt'), 'utf-8')).toBe('body:readme.txt');

    const rerun = await runner.run(job);
    expect(rerun.stats).toMatchObject({ downloaded: 0, skipped: 2 });
  });
});
