export { S3ObjectLister, DEFAULT_LIST_PAGE_SIZE } from './s3-object-lister.js';
export type { S3ObjectListerOptions } from './s3-object-lister.js';
export {
  ArchiveRangeLister,
  resolveArchiveRange,
  formatArchiveId,
} from './archive-range-lister.js';
export type { ArchiveRange, ArchiveBounds, ResolvedRange } from './archive-range-lister.js';
export { FileListLister } from './file-list-lister.js';
export { collectListing } from './collect-listing.js';
export type { ListingOutcome } from './collect-listing.js';
export type { ObjectDescriptor, ListingRequest, ObjectLister } from './types.js';
