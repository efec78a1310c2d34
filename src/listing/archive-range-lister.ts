/**
 * Archive range lister.
 *
 * Thread-indexed corpora number their archives with fixed-width
 * identifiers (000.zip .. 999.zip), so listing them is an integer range
 * and needs no network call.
 */

import { InvalidRangeError } from '../errors.js';
import type { ListingRequest, ObjectDescriptor, ObjectLister } from './types.js';

export interface ArchiveRange {
  /** Zero-padded width of an archive number */
  width: number;

  /** First archive number to list */
  first: number;

  /** Last archive number to list (inclusive) */
  last: number;

  /** Archive extension including the dot */
  extension: string;
}

/** Bounds of the archive numbers a dataset publishes */
export interface ArchiveBounds {
  first: number;
  last: number;
}

export interface ResolvedRange {
  first: number;
  last: number;

  /** Number of archives in the range */
  count: number;

  /** True when the requested count ran past the last archive and was cut short */
  clamped: boolean;
}

/**
 * Turn a (start, count) request into a concrete inclusive range.
 *
 * Throws InvalidRangeError when start is outside the published bounds or
 * count is not positive. A count reaching past the last archive is clamped.
 */
export function resolveArchiveRange(start: number, count: number, bounds: ArchiveBounds): ResolvedRange {
  if (!Number.isInteger(start) || start < bounds.first || start > bounds.last) {
    throw new InvalidRangeError(
      `Start must be between ${bounds.first} and ${bounds.last} (got ${start})`
    );
  }
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidRangeError(`Thread count must be a positive integer (got ${count})`);
  }

  const available = bounds.last - start + 1;
  const clamped = count > available;
  const effective = clamped ? available : count;

  return {
    first: start,
    last: start + effective - 1,
    count: effective,
    clamped,
  };
}

/** Format an archive number as its fixed-width name, without extension. */
export function formatArchiveId(index: number, width: number): string {
  return String(index).padStart(width, '0');
}

export class ArchiveRangeLister implements ObjectLister {
  private readonly range: ArchiveRange;

  constructor(range: ArchiveRange) {
    if (range.last < range.first) {
      throw new InvalidRangeError(`Empty archive range ${range.first}..${range.last}`);
    }
    this.range = range;
  }

  /**
   * Yield `<prefix><id><extension>` for each archive number in the range.
   * The namespace (origin URL) is not needed to enumerate names.
   */
  async *list(request: ListingRequest): AsyncGenerator<ObjectDescriptor, void, undefined> {
    const { width, first, last, extension } = this.range;
    let listed = 0;

    for (let index = first; index <= last; index++) {
      if (request.maxItems !== undefined && listed >= request.maxItems) {
        return;
      }
      yield { key: `${request.prefix}${formatArchiveId(index, width)}${extension}`, sizeBytes: 0 };
      listed++;
    }
  }
}
