/**
 * corpus-sync - bulk dataset synchronizer.
 *
 * Lists remote collections (S3 prefixes or numbered HTTP archives), skips
 * what is already on disk and fetches the rest with bounded parallelism
 * and per-object retry.
 */

export * from './errors.js';
export * from './catalog/index.js';
export * from './listing/index.js';
export * from './transfer/index.js';
export * from './progress/index.js';
export * from './sync/index.js';
export * from './s3/index.js';
