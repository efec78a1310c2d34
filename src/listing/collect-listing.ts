/**
 * Drain an ObjectLister into memory, keeping a partial result when the
 * listing fails part-way.
 */

import type { Logger } from 'pino';
import { ListingFailedError } from '../errors.js';
import type { ListingRequest, ObjectDescriptor, ObjectLister } from './types.js';

export interface ListingOutcome {
  /** Descriptors listed before completion or failure, in listing order */
  objects: ObjectDescriptor[];

  /** Set when the listing stopped early because a page failed */
  failure: ListingFailedError | null;
}

/**
 * Collect every descriptor the lister yields for `request`.
 *
 * A ListingFailedError does not propagate; it is returned with whatever was
 * listed before it. Any other error is a bug and is rethrown.
 */
export async function collectListing(
  lister: ObjectLister,
  request: ListingRequest,
  logger: Logger
): Promise<ListingOutcome> {
  const objects: ObjectDescriptor[] = [];

  try {
    for await (const descriptor of lister.list(request)) {
      objects.push(descriptor);
    }
  } catch (err) {
    if (!(err instanceof ListingFailedError)) {
      throw err;
    }
    logger.warn(
      { namespace: request.namespace, prefix: request.prefix, listed: objects.length, error: err.message },
      'Listing failed; continuing with partial listing'
    );
    return { objects, failure: err };
  }

  logger.info(
    { namespace: request.namespace, prefix: request.prefix, listed: objects.length },
    'Listing complete'
  );
  return { objects, failure: null };
}
