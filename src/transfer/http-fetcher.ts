/**
 * Fetches archives and single files over plain HTTP(S) GET into temporary files.
 */

import * as fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { Readable } from 'node:stream';
import { TransferFailedError } from '../errors.js';
import type { FetchTask, ObjectFetcher } from './types.js';

export type FetchFn = typeof fetch;

export class HttpFetcher implements ObjectFetcher {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  /**
   * @param baseUrl - Origin URL the object key is appended to.
   * @param fetchFn - Injected for tests; defaults to the global fetch.
   */
  constructor(baseUrl: string, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl;
    this.fetchFn = fetchFn;
  }

  urlFor(task: FetchTask): string {
    return new URL(task.descriptor.key, this.baseUrl).toString();
  }

  async fetch(task: FetchTask, tempPath: string, signal: AbortSignal): Promise<number> {
    const url = this.urlFor(task);
    const response = await this.fetchFn(url, { signal });

    if (!response.ok) {
      // Release the connection before giving up on the response
      await response.body?.cancel();
      throw new TransferFailedError(task.descriptor.key, `GET ${url} returned HTTP ${response.status}`);
    }
    if (!response.body) {
      throw new TransferFailedError(task.descriptor.key, `GET ${url} returned an empty body`);
    }

    const writeStream = fs.createWriteStream(tempPath);
    await pipeline(Readable.fromWeb(response.body), writeStream, { signal });
    return writeStream.bytesWritten;
  }
}
