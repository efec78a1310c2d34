/**
 * Dataset catalog loader.
 *
 * Loads dataset definitions from a YAML file (kebab-case keys), validates
 * them, and exposes them as an immutable lookup.
 *
 * @module dataset-catalog
 */

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { CatalogError, UnknownDatasetError } from '../errors.js';
import { TierCatalog } from './tier-catalog.js';
import type {
  DatasetDefinition,
  DatasetSource,
  TierDefinition,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Validation error from catalog loading */
export interface CatalogValidationError {
  field: string;
  message: string;
}

/** Result of parsing catalog text */
export type CatalogParseResult =
  | { success: true; datasets: DatasetDefinition[] }
  | { success: false; errors: CatalogValidationError[] };

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

const ID_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(
  obj: RawRecord,
  key: string,
  field: string,
  errors: CatalogValidationError[],
  fallback?: string,
): string {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    errors.push({ field: `${field}.${key}`, message: `Required field '${key}' is missing` });
    return '';
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    errors.push({ field: `${field}.${key}`, message: `Field '${key}' must be a string` });
    return '';
  }
  return String(value);
}

function readInteger(
  obj: RawRecord,
  key: string,
  field: string,
  errors: CatalogValidationError[],
  fallback?: number,
): number {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    errors.push({ field: `${field}.${key}`, message: `Required field '${key}' is missing` });
    return 0;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    errors.push({ field: `${field}.${key}`, message: `Field '${key}' must be a non-negative integer` });
    return 0;
  }
  return value;
}

function readOptionalInteger(
  obj: RawRecord,
  key: string,
  field: string,
  errors: CatalogValidationError[],
): number | undefined {
  if (obj[key] === undefined || obj[key] === null) return undefined;
  return readInteger(obj, key, field, errors);
}

// ---------------------------------------------------------------------------
// Transform raw YAML to typed definitions
// ---------------------------------------------------------------------------

function transformTier(raw: unknown, field: string, errors: CatalogValidationError[]): TierDefinition | null {
  if (!isRecord(raw)) {
    errors.push({ field, message: 'Tier must be a mapping' });
    return null;
  }
  return {
    name: readString(raw, 'name', field, errors),
    itemLimit: readInteger(raw, 'items', field, errors),
    approxSizeLabel: readString(raw, 'size', field, errors, 'unknown'),
    description: readString(raw, 'description', field, errors, ''),
  };
}

function transformSource(raw: unknown, field: string, errors: CatalogValidationError[]): DatasetSource | null {
  if (!isRecord(raw)) {
    errors.push({ field, message: 'Required section "source" is missing' });
    return null;
  }

  const type = raw['type'];
  if (type === 'bucket') {
    const suffixes = raw['include-suffixes'];
    let includeSuffixes: string[] = [];
    if (suffixes !== undefined && suffixes !== null) {
      if (Array.isArray(suffixes) && suffixes.every((s): s is string => typeof s === 'string')) {
        includeSuffixes = suffixes;
      } else {
        errors.push({ field: `${field}.include-suffixes`, message: 'include-suffixes must be a list of strings' });
      }
    }

    const prefix = readString(raw, 'prefix', field, errors);
    if (prefix && !prefix.endsWith('/')) {
      errors.push({ field: `${field}.prefix`, message: 'prefix must end with "/"' });
    }

    return {
      type: 'bucket',
      bucket: readString(raw, 'bucket', field, errors),
      prefix,
      includeSuffixes,
    };
  }

  if (type === 'archive-range') {
    const baseUrl = readString(raw, 'base-url', field, errors);
    if (baseUrl && !/^https?:\/\/.+\/$/.test(baseUrl)) {
      errors.push({ field: `${field}.base-url`, message: 'base-url must be an http(s) URL ending with "/"' });
    }

    const width = readInteger(raw, 'width', field, errors);
    const first = readInteger(raw, 'first', field, errors, 0);
    const last = readInteger(raw, 'last', field, errors);
    if (last < first) {
      errors.push({ field: `${field}.last`, message: 'last must not be smaller than first' });
    }
    if (width < 1 || String(last).length > width) {
      errors.push({ field: `${field}.width`, message: `width ${width} cannot hold archive number ${last}` });
    }

    return {
      type: 'archive-range',
      baseUrl,
      width,
      first,
      last,
      extension: readString(raw, 'extension', field, errors, '.zip'),
      filesPerArchive: readOptionalInteger(raw, 'files-per-archive', field, errors),
    };
  }

  if (type === 'http-files') {
    const baseUrl = readString(raw, 'base-url', field, errors);
    if (baseUrl && !/^https?:\/\/.+\/$/.test(baseUrl)) {
      errors.push({ field: `${field}.base-url`, message: 'base-url must be an http(s) URL ending with "/"' });
    }

    const files = raw['files'];
    if (
      !Array.isArray(files) ||
      files.length === 0 ||
      !files.every((f): f is string => typeof f === 'string' && f.length > 0)
    ) {
      errors.push({ field: `${field}.files`, message: 'files must be a non-empty list of file names' });
      return { type: 'http-files', baseUrl, files: [] };
    }

    return { type: 'http-files', baseUrl, files };
  }

  errors.push({
    field: `${field}.type`,
    message: `Invalid source type: "${String(type)}". Must be one of: bucket, archive-range, http-files`,
  });
  return null;
}

function transformDataset(
  id: string,
  raw: unknown,
  errors: CatalogValidationError[],
): DatasetDefinition | null {
  const field = `datasets.${id}`;
  if (!ID_PATTERN.test(id)) {
    errors.push({ field, message: 'Dataset id must match [a-z0-9][a-z0-9-]*' });
  }
  if (!isRecord(raw)) {
    errors.push({ field, message: 'Dataset must be a mapping' });
    return null;
  }

  const source = transformSource(raw['source'], `${field}.source`, errors);
  if (!source) return null;

  const rawTiers = raw['tiers'] ?? [];
  const tiers: TierDefinition[] = [];
  if (!Array.isArray(rawTiers)) {
    errors.push({ field: `${field}.tiers`, message: 'tiers must be a list' });
  } else {
    rawTiers.forEach((t: unknown, i: number) => {
      const tier = transformTier(t, `${field}.tiers[${i}]`, errors);
      if (tier) tiers.push(tier);
    });
  }

  const names = new Set<string>();
  for (const tier of tiers) {
    if (names.has(tier.name)) {
      errors.push({ field: `${field}.tiers`, message: `Duplicate tier name "${tier.name}"` });
    }
    names.add(tier.name);
  }

  return {
    id,
    title: readString(raw, 'title', field, errors, id),
    description: readString(raw, 'description', field, errors, ''),
    group: readString(raw, 'group', field, errors, 'dataset'),
    directoryName: readString(raw, 'directory', field, errors),
    source,
    tiers,
    confirmAbove: readOptionalInteger(raw, 'confirm-above', field, errors),
    approxSizeLabel: raw['size'] === undefined ? undefined : readString(raw, 'size', field, errors),
  };
}

/**
 * Parse and validate catalog YAML text.
 */
export function parseDatasetCatalog(text: string): CatalogParseResult {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: '(root)', message: `YAML parse error: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  if (!isRecord(doc) || !isRecord(doc['datasets'])) {
    return {
      success: false,
      errors: [{ field: 'datasets', message: 'Required section "datasets" is missing' }],
    };
  }

  const errors: CatalogValidationError[] = [];
  const datasets: DatasetDefinition[] = [];
  for (const [id, raw] of Object.entries(doc['datasets'])) {
    const dataset = transformDataset(id, raw, errors);
    if (dataset) datasets.push(dataset);
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, datasets };
}

// ---------------------------------------------------------------------------
// DatasetCatalog
// ---------------------------------------------------------------------------

/**
 * Immutable lookup of dataset definitions, each with its own tier catalog.
 */
export class DatasetCatalog {
  private readonly datasets: ReadonlyMap<string, DatasetDefinition>;
  private readonly tierCatalogs: ReadonlyMap<string, TierCatalog>;

  constructor(datasets: readonly DatasetDefinition[]) {
    const byId = new Map<string, DatasetDefinition>();
    const tiers = new Map<string, TierCatalog>();
    for (const dataset of datasets) {
      byId.set(dataset.id, dataset);
      tiers.set(dataset.id, new TierCatalog(dataset.tiers));
    }
    this.datasets = byId;
    this.tierCatalogs = tiers;
  }

  /**
   * Read a catalog from a YAML file.
   * Throws CatalogError listing every validation problem.
   */
  static fromFile(filePath: string): DatasetCatalog {
    const result = parseDatasetCatalog(readFileSync(filePath, 'utf-8'));
    if (!result.success) {
      throw new CatalogError(filePath, result.errors.map((e) => `${e.field}: ${e.message}`));
    }
    return new DatasetCatalog(result.datasets);
  }

  get(datasetId: string): DatasetDefinition {
    const dataset = this.datasets.get(datasetId);
    if (!dataset) {
      throw new UnknownDatasetError(datasetId, this.ids());
    }
    return dataset;
  }

  tiers(datasetId: string): TierCatalog {
    const catalog = this.tierCatalogs.get(datasetId);
    if (!catalog) {
      throw new UnknownDatasetError(datasetId, this.ids());
    }
    return catalog;
  }

  list(): DatasetDefinition[] {
    return Array.from(this.datasets.values());
  }

  ids(): string[] {
    return Array.from(this.datasets.keys());
  }
}
