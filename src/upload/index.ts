/**
 * Upload
 */

export { BLOCK_ID_DIGITS, MAX_BLOCK_INDEX, encodeBlockId, blockIdRange } from './block-id.js';
export {
  ChunkedUploader,
  expectedBlockCount,
  blobMetadataFor,
  locateChunk,
} from './chunked.js';
export type { ChunkWrite, ChunkWriteResult } from './chunked.js';
