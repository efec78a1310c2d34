/**
 * Location of the bundled dataset catalog.
 */

import { fileURLToPath } from 'node:url';
import { DatasetCatalog } from '../../catalog/dataset-catalog.js';

/** datasets.yaml at the package root, above src/ or dist/ */
export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../../../datasets.yaml', import.meta.url));

/**
 * Load the dataset catalog. CORPUS_SYNC_CATALOG points at a replacement file.
 */
export function loadCatalog(): DatasetCatalog {
  return DatasetCatalog.fromFile(process.env['CORPUS_SYNC_CATALOG'] ?? BUNDLED_CATALOG_PATH);
}
