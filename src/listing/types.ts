/**
 * Types for remote object listing.
 */

/** One remote object as seen in a listing */
export interface ObjectDescriptor {
  /** Remote key or archive name, unique within one listing */
  readonly key: string;

  /** Object size in bytes (0 when the remote does not report it) */
  readonly sizeBytes: number;
}

/** What to list */
export interface ListingRequest {
  /** Bucket name, or origin URL for HTTP sources */
  namespace: string;

  /** Key prefix to list under */
  prefix: string;

  /** Stop after this many descriptors (unbounded when omitted) */
  maxItems?: number;

  /** Only yield keys ending in one of these suffixes (all keys when empty) */
  includeSuffixes?: readonly string[];
}

/**
 * Produces a bounded sequence of addressable remote units.
 *
 * Each call starts a fresh listing. The sequence throws ListingFailedError
 * when a page cannot be read; descriptors yielded before the failure remain
 * valid.
 */
export interface ObjectLister {
  list(request: ListingRequest): AsyncGenerator<ObjectDescriptor, void, undefined>;
}
