/**
 * Existence filter.
 *
 * Splits listed objects into those already present in the destination tree
 * and those still to fetch. Presence of the canonical local path is the only
 * signal; transfers publish that path atomically, so a crashed run never
 * leaves something that passes for a finished download.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import pLimit from 'p-limit';
import type { ObjectDescriptor } from '../listing/types.js';
import type { FetchTask, PathMapping } from './types.js';

/** Filesystem checks in flight at once while partitioning */
const PRESENCE_CHECK_CONCURRENCY = 32;

export interface PartitionResult {
  /** Objects absent locally, in listing order */
  toFetch: FetchTask[];

  /** Objects whose local path is already present */
  toSkip: FetchTask[];

  /** Objects whose key cannot be mapped inside the destination root */
  rejected: ObjectDescriptor[];
}

/**
 * Derive the canonical local path for a key.
 *
 * Returns null when the key maps to the root itself or escapes it
 * (e.g. through ".." segments).
 */
export function localPathFor(key: string, mapping: PathMapping): string | null {
  let relative = key.startsWith(mapping.stripPrefix) ? key.slice(mapping.stripPrefix.length) : key;

  if (mapping.layout === 'archive' && mapping.archiveExtension && relative.endsWith(mapping.archiveExtension)) {
    relative = relative.slice(0, -mapping.archiveExtension.length);
  }

  const segments = relative.split('/').filter((s) => s.length > 0);
  if (segments.length === 0 || segments.some((s) => s === '.' || s === '..')) {
    return null;
  }

  const root = path.resolve(mapping.destinationRoot);
  const resolved = path.resolve(root, ...segments);
  if (!resolved.startsWith(root + path.sep)) {
    return null;
  }
  return resolved;
}

/**
 * Whether a canonical local path counts as already downloaded.
 *
 * Files count when anything exists at the path. Archive directories count
 * only when they exist and hold at least one entry, so an extraction that
 * was interrupted after creating the directory is fetched again.
 */
export async function isPresent(localPath: string, layout: PathMapping['layout']): Promise<boolean> {
  if (layout === 'archive') {
    try {
      const entries = await fs.readdir(localPath);
      return entries.length > 0;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  try {
    await fs.lstat(localPath);
    return true;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/**
 * Partition descriptors into fetch and skip sets.
 *
 * Two descriptors mapping to the same local path would race each other in
 * the pool; the second one is rejected.
 */
export async function partition(
  descriptors: readonly ObjectDescriptor[],
  mapping: PathMapping
): Promise<PartitionResult> {
  const limit = pLimit(PRESENCE_CHECK_CONCURRENCY);
  const claimed = new Set<string>();
  const rejected: ObjectDescriptor[] = [];
  const candidates: FetchTask[] = [];

  for (const descriptor of descriptors) {
    const localPath = localPathFor(descriptor.key, mapping);
    if (localPath === null || claimed.has(localPath)) {
      rejected.push(descriptor);
      continue;
    }
    claimed.add(localPath);
    candidates.push({ descriptor, localPath });
  }

  const presence = await Promise.all(
    candidates.map((task) => limit(() => isPresent(task.localPath, mapping.layout)))
  );

  const toFetch: FetchTask[] = [];
  const toSkip: FetchTask[] = [];
  candidates.forEach((task, i) => {
    if (presence[i]) {
      toSkip.push(task);
    } else {
      toFetch.push(task);
    }
  });

  return { toFetch, toSkip, rejected };
}
