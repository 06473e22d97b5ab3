/**
 * Store clients
 */

export { RestBlockBlobStore, buildBlockListXml, parseListBlobsXml, md5Base64 } from './rest-store.js';
export type { FetchLike, RestStoreOptions } from './rest-store.js';
