/**
 * Fetches S3 objects into temporary files.
 */

import * as fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { Readable } from 'node:stream';
import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { TransferFailedError } from '../errors.js';
import type { FetchTask, ObjectFetcher } from './types.js';

export class S3ObjectFetcher implements ObjectFetcher {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(client: S3Client, bucket: string) {
    this.client = client;
    this.bucket = bucket;
  }

  async fetch(task: FetchTask, tempPath: string, signal: AbortSignal): Promise<number> {
    const { key } = task.descriptor;
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }),
      { abortSignal: signal }
    );

    if (!response.Body) {
      throw new TransferFailedError(key, 'S3 response body is empty');
    }

    const bodyStream =
      response.Body instanceof Readable
        ? response.Body
        : Readable.from([await response.Body.transformToByteArray()]);

    const writeStream = fs.createWriteStream(tempPath);
    await pipeline(bodyStream, writeStream, { signal });
    return writeStream.bytesWritten;
  }
}
