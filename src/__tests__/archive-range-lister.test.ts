import { describe, it, expect } from 'vitest';
import {
  ArchiveRangeLister,
  formatArchiveId,
  resolveArchiveRange,
} from '../listing/archive-range-lister.js';
import { InvalidRangeError } from '../errors.js';
import type { ListingRequest, ObjectDescriptor } from '../listing/types.js';

const BOUNDS = { first: 0, last: 999 };

async function drain(lister: ArchiveRangeLister, request: ListingRequest): Promise<string[]> {
  const keys: string[] = [];
  for await (const descriptor of lister.list(request)) {
    keys.push(descriptor.key);
  }
  return keys;
}

describe('resolveArchiveRange', () => {
  it('should resolve a range inside the bounds', () => {
    expect(resolveArchiveRange(5, 3, BOUNDS)).toEqual({ first: 5, last: 7, count: 3, clamped: false });
  });

  it('should clamp a count that runs past the last archive', () => {
    expect(resolveArchiveRange(995, 10, BOUNDS)).toEqual({
      first: 995,
      last: 999,
      count: 5,
      clamped: true,
    });
  });

  it('should accept the last archive as a start', () => {
    expect(resolveArchiveRange(999, 1, BOUNDS)).toEqual({
      first: 999,
      last: 999,
      count: 1,
      clamped: false,
    });
  });

  it('should reject a start outside the bounds', () => {
    expect(() => resolveArchiveRange(1000, 1, BOUNDS)).toThrow(InvalidRangeError);
    expect(() => resolveArchiveRange(1000, 1, BOUNDS)).toThrow(
      'Start must be between 0 and 999 (got 1000)'
    );
    expect(() => resolveArchiveRange(-1, 1, BOUNDS)).toThrow(InvalidRangeError);
  });

  it('should reject a count below 1', () => {
    expect(() => resolveArchiveRange(0, 0, BOUNDS)).toThrow(
      'Thread count must be a positive integer (got 0)'
    );
  });
});

describe('formatArchiveId', () => {
  it('should zero-pad to the given width', () => {
    expect(formatArchiveId(7, 3)).toBe('007');
    expect(formatArchiveId(42, 3)).toBe('042');
    expect(formatArchiveId(999, 3)).toBe('999');
  });
});

describe('ArchiveRangeLister', () => {
  it('should yield fixed-width archive names in order', async () => {
    const lister = new ArchiveRangeLister({ width: 3, first: 5, last: 8, extension: '.zip' });

    const keys = await drain(lister, { namespace: 'https://example.test/zips/', prefix: '' });

    expect(keys).toEqual(['005.zip', '006.zip', '007.zip', '008.zip']);
  });

  it('should respect maxItems', async () => {
    const lister = new ArchiveRangeLister({ width: 3, first: 0, last: 999, extension: '.zip' });

    const keys = await drain(lister, { namespace: 'n', prefix: '', maxItems: 2 });

    expect(keys).toEqual(['000.zip', '001.zip']);
  });

  it('should prepend the request prefix', async () => {
    const lister = new ArchiveRangeLister({ width: 2, first: 1, last: 1, extension: '.zip' });
    const descriptors: ObjectDescriptor[] = [];
    for await (const d of lister.list({ namespace: 'n', prefix: 'threads/' })) {
      descriptors.push(d);
    }

    expect(descriptors).toEqual([{ key: 'threads/01.zip', sizeBytes: 0 }]);
  });

  it('should reject an inverted range', () => {
    expect(() => new ArchiveRangeLister({ width: 3, first: 5, last: 4, extension: '.zip' })).toThrow(
      'Empty archive range 5..4'
    );
  });
});
