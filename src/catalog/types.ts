/**
 * Types for dataset and tier catalogs.
 *
 * Catalogs are loaded once at startup and never mutated afterwards.
 */

/** A named preset bounding how many remote objects a run fetches */
export interface TierDefinition {
  /** Unique tier name (e.g. "sample") */
  readonly name: string;

  /** Maximum number of remote units to fetch */
  readonly itemLimit: number;

  /** Human-readable size estimate (e.g. "~1 GB") */
  readonly approxSizeLabel: string;

  readonly description: string;
}

/** Flat key listing under a bucket prefix */
export interface BucketSource {
  readonly type: 'bucket';
  readonly bucket: string;

  /** Listing prefix; also stripped from keys to build local paths */
  readonly prefix: string;

  /** Only keys ending in one of these suffixes are fetched (all keys when empty) */
  readonly includeSuffixes: readonly string[];
}

/** Fixed-width numbered zip archives served from an HTTP origin */
export interface ArchiveRangeSource {
  readonly type: 'archive-range';

  /** Origin URL the archive names are appended to, ending in "/" */
  readonly baseUrl: string;

  /** Zero-padded width of an archive number (3 for 000-999) */
  readonly width: number;

  /** First valid archive number */
  readonly first: number;

  /** Last valid archive number (inclusive) */
  readonly last: number;

  /** Archive file extension, including the dot */
  readonly extension: string;

  /** Approximate number of files inside one archive, for display */
  readonly filesPerArchive?: number;
}

/** Individually named files served from an HTTP origin */
export interface HttpFilesSource {
  readonly type: 'http-files';

  /** Origin URL the file names are appended to, ending in "/" */
  readonly baseUrl: string;

  /** File names relative to baseUrl; each is saved under the same relative path */
  readonly files: readonly string[];
}

export type DatasetSource = BucketSource | ArchiveRangeSource | HttpFilesSource;

/** A dataset family the CLI exposes as one command */
export interface DatasetDefinition {
  /** Command name and catalog key */
  readonly id: string;

  readonly title: string;
  readonly description: string;

  /** Free-form grouping for listings (e.g. "scenario", "corpus") */
  readonly group: string;

  /** Directory created under the destination parent */
  readonly directoryName: string;

  readonly source: DatasetSource;

  /** Size tiers; empty when the dataset is fetched whole or by --limit */
  readonly tiers: readonly TierDefinition[];

  /** Ask for confirmation when a run would fetch more units than this */
  readonly confirmAbove?: number;

  /** Approximate total size of the whole dataset, for display */
  readonly approxSizeLabel?: string;
}
