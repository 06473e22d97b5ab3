/**
 * Streaming
 */

export { BlobReadStream } from './read-stream.js';
export type { BlobReadStreamOptions } from './read-stream.js';
export { BlobWriteStream } from './write-stream.js';
export type { BlobWriteStreamOptions } from './write-stream.js';
