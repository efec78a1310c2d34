/**
 * Anonymous S3 client for public buckets.
 */

import { S3Client } from '@aws-sdk/client-s3';
import type { SyncConfig } from '../sync/config.js';

/**
 * Create an S3 client that sends unsigned requests.
 *
 * Public datasets need no credentials; the placeholder identity keeps the
 * SDK from searching the environment for one, and the pass-through signer
 * leaves requests unsigned.
 */
export function createAnonymousS3Client(
  config: Pick<SyncConfig, 'region' | 'endpoint' | 'forcePathStyle'>
): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: { accessKeyId: '', secretAccessKey: '' },
    signer: { sign: async (request) => request },
  });
}
