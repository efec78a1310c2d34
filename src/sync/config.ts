/**
 * Sync configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

export interface SyncConfig {
  /** Transfers in flight at once */
  parallel: number;

  /** Attempts per object before it is reported failed */
  maxAttempts: number;

  /** Fixed delay between attempts */
  retryDelayMs: number;

  /** Ceiling for one request */
  requestTimeoutMs: number;

  /** Keys requested per listing page */
  listPageSize: number;

  /** Region the anonymous S3 client signs for */
  region: string;

  /** Custom endpoint for S3-compatible stores */
  endpoint?: string;

  /** Address buckets by path instead of virtual host */
  forcePathStyle: boolean;

  /** Overrides the platform default parent directory for downloads */
  dataHome?: string;
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  parallel: 4,
  maxAttempts: 3,
  retryDelayMs: 2_000,
  requestTimeoutMs: 120_000,
  listPageSize: 1_000,
  region: 'us-east-1',
  forcePathStyle: false,
};

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

/**
 * Build sync config from environment variables and optional overrides.
 *
 * Environment variables:
 * - CORPUS_SYNC_PARALLEL: Concurrent transfers (default: 4)
 * - CORPUS_SYNC_MAX_ATTEMPTS: Attempts per object (default: 3)
 * - CORPUS_SYNC_RETRY_DELAY_MS: Delay between attempts (default: 2000)
 * - CORPUS_SYNC_REQUEST_TIMEOUT_MS: Per-request timeout (default: 120000)
 * - CORPUS_SYNC_LIST_PAGE_SIZE: Listing page size (default: 1000)
 * - S3_REGION: Region (default: us-east-1)
 * - S3_ENDPOINT: Custom S3-compatible endpoint
 * - S3_FORCE_PATH_STYLE: Path-style addressing (true|1)
 * - CORPUS_SYNC_HOME: Parent directory for downloads
 */
export function buildSyncConfig(overrides?: Partial<SyncConfig>): SyncConfig {
  return {
    parallel:
      overrides?.parallel ?? getEnvNumber('CORPUS_SYNC_PARALLEL', DEFAULT_SYNC_CONFIG.parallel),
    maxAttempts:
      overrides?.maxAttempts ??
      getEnvNumber('CORPUS_SYNC_MAX_ATTEMPTS', DEFAULT_SYNC_CONFIG.maxAttempts),
    retryDelayMs:
      overrides?.retryDelayMs ??
      getEnvNumber('CORPUS_SYNC_RETRY_DELAY_MS', DEFAULT_SYNC_CONFIG.retryDelayMs),
    requestTimeoutMs:
      overrides?.requestTimeoutMs ??
      getEnvNumber('CORPUS_SYNC_REQUEST_TIMEOUT_MS', DEFAULT_SYNC_CONFIG.requestTimeoutMs),
    listPageSize:
      overrides?.listPageSize ??
      getEnvNumber('CORPUS_SYNC_LIST_PAGE_SIZE', DEFAULT_SYNC_CONFIG.listPageSize),
    region: overrides?.region ?? getEnv('S3_REGION', DEFAULT_SYNC_CONFIG.region),
    endpoint: overrides?.endpoint ?? getOptionalEnv('S3_ENDPOINT'),
    forcePathStyle:
      overrides?.forcePathStyle ??
      getEnvBoolean('S3_FORCE_PATH_STYLE', DEFAULT_SYNC_CONFIG.forcePathStyle),
    dataHome: overrides?.dataHome ?? getOptionalEnv('CORPUS_SYNC_HOME'),
  };
}

/**
 * Validate a sync configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateSyncConfig(config: SyncConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.parallel) || config.parallel < 1) {
    errors.push('parallel must be at least 1');
  }

  if (config.parallel > 64) {
    errors.push('parallel must not exceed 64');
  }

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    errors.push('maxAttempts must be at least 1');
  }

  if (config.maxAttempts > 10) {
    errors.push('maxAttempts must not exceed 10');
  }

  if (config.retryDelayMs < 0) {
    errors.push('retryDelayMs must not be negative');
  }

  if (config.requestTimeoutMs < 1000) {
    errors.push('requestTimeoutMs must be at least 1000 (1 second)');
  }

  if (config.listPageSize < 1 || config.listPageSize > 1000) {
    errors.push('listPageSize must be between 1 and 1000');
  }

  if (!config.region) {
    errors.push('region is required');
  }

  if (config.endpoint !== undefined && !/^https?:\/\//.test(config.endpoint)) {
    errors.push('endpoint must be an http(s) URL');
  }

  return errors;
}
