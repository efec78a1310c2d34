/**
 * S3 object lister.
 *
 * Pages through ListObjectsV2 under a prefix, yielding one descriptor per
 * object. Works against partially compliant S3-compatible stores that
 * report truncation without a continuation token.
 */

import { S3Client, ListObjectsV2Command } from '@aws-sdk/client-s3';
import type { ListObjectsV2CommandOutput } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { ListingFailedError } from '../errors.js';
import type { ListingRequest, ObjectDescriptor, ObjectLister } from './types.js';

export const DEFAULT_LIST_PAGE_SIZE = 1000;

export interface S3ObjectListerOptions {
  /** Keys requested per page (S3 caps this at 1000) */
  pageSize?: number;
}

export class S3ObjectLister implements ObjectLister {
  private readonly client: S3Client;
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(client: S3Client, logger: Logger, options?: S3ObjectListerOptions) {
    this.client = client;
    this.logger = logger.child({ component: 's3-object-lister' });
    this.pageSize = options?.pageSize ?? DEFAULT_LIST_PAGE_SIZE;
  }

  /**
   * List objects under `request.prefix`, stopping at `maxItems`.
   *
   * The next page starts from the listing's continuation token, or from
   * the last key seen when the response carries no token.
   */
  async *list(request: ListingRequest): AsyncGenerator<ObjectDescriptor, void, undefined> {
    const { namespace: bucket, prefix, maxItems } = request;
    const suffixes = request.includeSuffixes ?? [];

    if (maxItems !== undefined && maxItems <= 0) {
      return;
    }

    const seen = new Set<string>();
    let continuationToken: string | undefined;
    let startAfter: string | undefined;
    let pageCount = 0;

    for (;;) {
      const remaining = maxItems === undefined ? this.pageSize : maxItems - seen.size;
      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            MaxKeys: suffixes.length > 0 ? this.pageSize : Math.min(this.pageSize, remaining),
            ContinuationToken: continuationToken,
            StartAfter: continuationToken ? undefined : startAfter,
          })
        );
      } catch (err) {
        throw new ListingFailedError(bucket, prefix, seen.size, err);
      }
      pageCount++;

      let lastKeyInPage: string | undefined;
      for (const obj of response.Contents ?? []) {
        if (!obj.Key) {
          continue;
        }
        lastKeyInPage = obj.Key;

        // Skip directory markers
        if (obj.Key.endsWith('/')) {
          continue;
        }
        if (suffixes.length > 0 && !suffixes.some((s) => obj.Key?.endsWith(s))) {
          continue;
        }
        if (seen.has(obj.Key)) {
          continue;
        }

        seen.add(obj.Key);
        yield { key: obj.Key, sizeBytes: obj.Size ?? 0 };

        if (maxItems !== undefined && seen.size >= maxItems) {
          this.logger.debug({ bucket, prefix, pageCount, listed: seen.size }, 'Reached listing limit');
          return;
        }
      }

      this.logger.debug({ bucket, prefix, pageCount, listed: seen.size }, 'Listed page');

      if (!response.IsTruncated) {
        return;
      }

      if (response.NextContinuationToken) {
        continuationToken = response.NextContinuationToken;
        continue;
      }

      if (lastKeyInPage === undefined || lastKeyInPage === startAfter) {
        throw new ListingFailedError(
          bucket,
          prefix,
          seen.size,
          new Error('listing is truncated but made no forward progress')
        );
      }
      continuationToken = undefined;
      startAfter = lastKeyInPage;
    }
  }
}
