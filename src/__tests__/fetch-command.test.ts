import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Readable } from 'node:stream';
import { Command } from 'commander';
import { registerFetchCommand } from '../cli/commands/fetch.js';
import type { FetchCommandDeps } from '../cli/commands/fetch.js';
import type { DatasetDefinition } from '../catalog/types.js';

interface S3Command {
  constructor: { name: string };
  input: { Prefix?: string; MaxKeys?: number; Key?: string };
}

/**
 * In-process S3 stand-in answering a single listing page and GetObject.
 */
function createFakeS3(objects: Record<string, string>, failingKeys: string[] = []) {
  const send = vi.fn().mockImplementation((command: S3Command) => {
    const commandName = command.constructor?.name ?? '';

    if (commandName === 'ListObjectsV2Command') {
      const keys = Object.keys(objects)
        .filter((k) => k.startsWith(command.input.Prefix ?? ''))
        .sort()
        .slice(0, command.input.MaxKeys ?? 1000);
      return Promise.resolve({
        Contents: keys.map((Key) => ({ Key, Size: objects[Key]?.length ?? 0 })),
        IsTruncated: false,
      });
    }

    if (commandName === 'GetObjectCommand') {
      const key = command.input.Key ?? '';
      const content = objects[key];
      if (content === undefined || failingKeys.includes(key)) {
        return Promise.reject(new Error(`NoSuchKey: ${key}`));
      }
      return Promise.resolve({ Body: Readable.from([Buffer.from(content)]) });
    }

    return Promise.reject(new Error(`Unexpected command ${commandName}`));
  });

  return { send };
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

const PDF_OBJECTS: Record<string, string> = {
  'corpora/pdfs/a.pdf': '%PDF-a',
  'corpora/pdfs/b.pdf': '%PDF-b',
  'corpora/pdfs/c.pdf': '%PDF-c',
};

describe('fetch command', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-sync-fetch-cmd-test-'));
    vi.stubEnv('CORPUS_SYNC_RETRY_DELAY_MS', '0');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeProgram(dataset: DatasetDefinition, deps: FetchCommandDeps = {}): Command {
    const program = new Command();
    program.exitOverride().configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    registerFetchCommand(program, dataset, deps);
    return program;
  }

  function run(program: Command, args: string[]): Promise<Command> {
    return program.parseAsync(
      ['pdfs', ...args, '--path', tmpDir, '--log-level', 'silent'],
      { from: 'user' }
    );
  }

  function printed(stream: 'log' | 'error'): string[] {
    return vi.mocked(console[stream]).mock.calls.map((call) => String(call[0]));
  }

  describe('option conflicts', () => {
    it('should reject --tier together with --limit', async () => {
      await expect(run(makeProgram(PDF_DATASET), ['--tier', 'sample', '--limit', '3'])).rejects.toThrow(
        "option '-t, --tier <name>' cannot be used with option '--limit <n>'"
      );
    });

    it('should reject --list together with --threads', async () => {
      await expect(run(makeProgram(PDF_DATASET), ['--list', '--threads', '2'])).rejects.toThrow(
        "option '--list' cannot be used with option '--threads <n>'"
      );
    });

    it('should reject --limit together with --start', async () => {
      await expect(run(makeProgram(PDF_DATASET), ['--limit', '3', '--start', '1'])).rejects.toThrow(
        "option '--limit <n>' cannot be used with option '--start <n>'"
      );
    });
  });

  describe('exit codes', () => {
    it('should list tiers and leave the exit code unset', async () => {
      const s3 = createFakeS3(PDF_OBJECTS);

      await run(makeProgram(PDF_DATASET, { s3Client: s3 as never }), ['--list']);

      expect(process.exitCode).toBeUndefined();
      expect(printed('log')).toContain('  sample  10 files, ~1 KB  Sample');
      expect(s3.send).not.toHaveBeenCalled();
    });

    it('should exit 1 for an unknown tier', async () => {
      const s3 = createFakeS3(PDF_OBJECTS);

      await run(makeProgram(PDF_DATASET, { s3Client: s3 as never }), ['--tier', 'huge']);

      expect(process.exitCode).toBe(1);
      expect(printed('error').some((line) => line.includes('Unknown tier "huge"'))).toBe(true);
      expect(s3.send).not.toHaveBeenCalled();
    });

    it('should exit 1 for a thread range on a bucket dataset', async () => {
      const s3 = createFakeS3(PDF_OBJECTS);

      await run(makeProgram(PDF_DATASET, { s3Client: s3 as never }), ['--threads', '2']);

      expect(process.exitCode).toBe(1);
      expect(
        printed('error').some((line) =>
          line.includes('Dataset "pdfs" is not split into threads; use --tier or --limit')
        )
      ).toBe(true);
    });

    it('should exit 1 when the listing is empty', async () => {
      const s3 = createFakeS3({});

      await run(makeProgram(PDF_DATASET, { s3Client: s3 as never }), ['--limit', '5']);

      expect(process.exitCode).toBe(1);
      expect(fs.existsSync(path.join(tmpDir, 'PDFS'))).toBe(false);
    });

    it('should refuse a large run without --yes when no terminal can confirm it', async () => {
      const s3 = createFakeS3(PDF_OBJECTS);
      const dataset: DatasetDefinition = { ...PDF_DATASET, confirmAbove: 2 };
      const wasTTY = process.stdin.isTTY;
      process.stdin.isTTY = false;

      try {
        await run(makeProgram(dataset, { s3Client: s3 as never }), ['--limit', '3']);
      } finally {
        process.stdin.isTTY = wasTTY;
      }

      expect(process.exitCode).toBe(1);
      expect(
        printed('error').some((line) => line.includes('This is a large download; pass --yes to confirm it.'))
      ).toBe(true);
      expect(s3.send).not.toHaveBeenCalled();
    });

    it('should leave the exit code unset when some transfers fail', async () => {
      const s3 = createFakeS3(PDF_OBJECTS, ['corpora/pdfs/b.pdf']);

      await run(makeProgram(PDF_DATASET, { s3Client: s3 as never }), ['--limit', '3']);

      expect(process.exitCode).toBeUndefined();
      expect(fs.readdirSync(path.join(tmpDir, 'PDFS')).sort()).toEqual(['a.pdf', 'c.pdf']);
      expect(printed('log')).toContain('  Downloaded:    2');
      expect(printed('log')).toContain('    corpora/pdfs/b.pdf (3 attempts): NoSuchKey: corpora/pdfs/b.pdf');
    });
  });
});
