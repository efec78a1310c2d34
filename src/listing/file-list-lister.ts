/**
 * Lister over a fixed set of file names published on an HTTP origin.
 */

import type { ListingRequest, ObjectDescriptor, ObjectLister } from './types.js';

export class FileListLister implements ObjectLister {
  private readonly files: readonly string[];

  constructor(files: readonly string[]) {
    this.files = files;
  }

  async *list(request: ListingRequest): AsyncGenerator<ObjectDescriptor, void, undefined> {
    const seen = new Set<string>();

    for (const name of this.files) {
      if (request.maxItems !== undefined && seen.size >= request.maxItems) {
        return;
      }
      const key = `${request.prefix}${name}`;
      if (seen.has(key)) continue;
      seen.add(key);
      yield { key, sizeBytes: 0 };
    }
  }
}
