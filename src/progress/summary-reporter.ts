/**
 * Post-run summary of the destination tree.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isTemporaryArtifact } from '../transfer/temp-paths.js';
import type { CategorySummary, TreeSummary } from './types.js';

const ROOT_CATEGORY = '.';

interface Tally {
  fileCount: number;
  totalBytes: number;
}

/**
 * Walk `root` once and total its files, grouped by top-level entry.
 * Unfinished transfer artifacts are left out. A missing root is empty.
 */
export async function summarize(root: string): Promise<TreeSummary> {
  const categories = new Map<string, Tally>();

  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { fileCount: 0, totalBytes: 0, categories: [] };
    }
    throw err;
  }

  for (const entry of entries) {
    if (isTemporaryArtifact(entry.name)) continue;
    const fullPath = path.join(root, entry.name);

    if (entry.isDirectory()) {
      const tally = categories.get(entry.name) ?? { fileCount: 0, totalBytes: 0 };
      await walk(fullPath, tally);
      categories.set(entry.name, tally);
    } else if (entry.isFile()) {
      const tally = categories.get(ROOT_CATEGORY) ?? { fileCount: 0, totalBytes: 0 };
      const stats = await fs.stat(fullPath);
      tally.fileCount++;
      tally.totalBytes += stats.size;
      categories.set(ROOT_CATEGORY, tally);
    }
  }

  const list: CategorySummary[] = [...categories.entries()]
    .map(([name, tally]) => ({ name, ...tally }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return {
    fileCount: list.reduce((sum, c) => sum + c.fileCount, 0),
    totalBytes: list.reduce((sum, c) => sum + c.totalBytes, 0),
    categories: list,
  };
}

async function walk(dir: string, tally: Tally): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (isTemporaryArtifact(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, tally);
    } else if (entry.isFile()) {
      const stats = await fs.stat(fullPath);
      tally.fileCount++;
      tally.totalBytes += stats.size;
    }
  }
}
