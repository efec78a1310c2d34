export { TierCatalog } from './tier-catalog.js';
export { DatasetCatalog, parseDatasetCatalog } from './dataset-catalog.js';
export type { CatalogValidationError, CatalogParseResult } from './dataset-catalog.js';
export type {
  TierDefinition,
  BucketSource,
  ArchiveRangeSource,
  HttpFilesSource,
  DatasetSource,
  DatasetDefinition,
} from './types.js';
