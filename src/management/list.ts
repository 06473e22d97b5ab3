/**
 * Existence and enumeration
 *
 * Maintenance queries over a tenant's container. Neither has side effects.
 */

import type { BlockBlobStore, ListIdsOptions, StoreRequestOptions } from '../types/index.js';

/**
 * Check whether a committed blob exists
 */
export function blobExists(
  store: BlockBlobStore,
  container: string,
  blobId: string,
  options: StoreRequestOptions = {}
): Promise<boolean> {
  return store.exists(container, blobId, options);
}

/**
 * Yield every committed blob id in the container, following continuation
 * markers. Each call starts a fresh listing; pages are fetched as the
 * consumer iterates.
 */
export async function* listBlobIds(
  store: BlockBlobStore,
  container: string,
  options: ListIdsOptions = {}
): AsyncGenerator<string> {
  let marker: string | undefined;

  do {
    const page = await store.listBlobs(container, {
      prefix: options.prefix,
      marker,
      maxResults: options.pageSize,
      signal: options.signal,
    });
    yield* page.names;
    marker = page.nextMarker;
  } while (marker);
}
