/**
 * Naming of in-flight transfer artifacts.
 *
 * Temporary files and staging directories sit beside their canonical path
 * (same filesystem, so the final rename is atomic) and carry a random
 * suffix so concurrent or crashed runs never collide.
 */

import { randomBytes } from 'node:crypto';

const TEMP_SUFFIX_PATTERN = /\.partial-[0-9a-f]{8}$/;

/** Build a unique temporary sibling of `canonicalPath`. */
export function temporarySibling(canonicalPath: string, label: string): string {
  return `${canonicalPath}.${label}.partial-${randomBytes(4).toString('hex')}`;
}

/** Whether a file or directory name belongs to an unfinished transfer. */
export function isTemporaryArtifact(name: string): boolean {
  return TEMP_SUFFIX_PATTERN.test(name);
}
