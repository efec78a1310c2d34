/**
 * Error classes shared by the catalog, listing and transfer modules.
 *
 * Setup-time errors (unknown dataset or tier, invalid range, empty or
 * failed listing, bad catalog) abort a run before any transfer starts.
 * Transfer and extraction errors stay local to one task and end up as
 * result values.
 */

export class UnknownTierError extends Error {
  public readonly tierName: string;
  public readonly available: readonly string[];

  constructor(tierName: string, available: readonly string[]) {
    super(`Unknown tier "${tierName}". Available tiers: ${available.join(', ') || '(none)'}`);
    this.name = 'UnknownTierError';
    this.tierName = tierName;
    this.available = available;
  }
}

export class UnknownDatasetError extends Error {
  public readonly datasetId: string;

  constructor(datasetId: string, available: readonly string[]) {
    super(`Unknown dataset "${datasetId}". Available datasets: ${available.join(', ') || '(none)'}`);
    this.name = 'UnknownDatasetError';
    this.datasetId = datasetId;
  }
}

export class CatalogError extends Error {
  public readonly problems: readonly string[];

  constructor(source: string, problems: readonly string[]) {
    super(`Invalid dataset catalog ${source}: ${problems.join('; ')}`);
    this.name = 'CatalogError';
    this.problems = problems;
  }
}

export class InvalidRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class ListingFailedError extends Error {
  public readonly namespace: string;
  public readonly prefix: string;
  /** Descriptors produced before the failing page */
  public readonly itemsListed: number;

  constructor(namespace: string, prefix: string, itemsListed: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Listing ${namespace}/${prefix} failed after ${itemsListed} objects: ${reason}`, { cause });
    this.name = 'ListingFailedError';
    this.namespace = namespace;
    this.prefix = prefix;
    this.itemsListed = itemsListed;
  }
}

export class EmptyListingError extends Error {
  constructor(namespace: string, prefix: string) {
    super(`No objects found under ${namespace}/${prefix}`);
    this.name = 'EmptyListingError';
  }
}

export class TransferFailedError extends Error {
  public readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferFailedError';
    this.key = key;
  }
}

export class ExtractionFailedError extends Error {
  public readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionFailedError';
    this.key = key;
  }
}

/** Normalize an unknown thrown value into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
