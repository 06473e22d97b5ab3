/**
 * Chunked Upload Protocol
 *
 * Maps a sequence of fixed-size chunks onto stage-block / commit-block-list.
 * Chunk `k` (1-based) is staged under `encodeBlockId(k)`. When the chunk that
 * completes the blob arrives, the full block list `1..blockCount` is committed
 * and the blob is tagged with its owner's ids. Until then readers see nothing.
 */

import { MAX_BLOCK_COUNT } from '../client/config.js';
import { ConfigurationMismatchError, ValidationError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger, traced } from '../observability/index.js';
import type { BlobMetadata, BlobStorageContext, BlockBlobStore } from '../types/index.js';
import { blockIdRange, encodeBlockId } from './block-id.js';

/** One chunk of a transfer */
export interface ChunkWrite {
  container: string;
  blobId: string;
  /** Chunk size recorded for the blob at allocation */
  chunkSize: number;
  /** Total blob length */
  length: number;
  offset: number;
  buffer: Uint8Array;
  /** Metadata set once the blob is committed */
  metadata: BlobMetadata;
  signal?: AbortSignal;
}

/** What a chunk write did */
export type ChunkWriteResult = 'staged' | 'committed';

/**
 * Number of blocks a blob of `length` bytes is split into.
 * Integer arithmetic only, so lengths up to 2^53 are exact.
 */
export function expectedBlockCount(length: number, chunkSize: number): number {
  const whole = Math.floor(length / chunkSize);
  return length % chunkSize > 0 ? whole + 1 : whole;
}

/**
 * The metadata a committed blob carries
 */
export function blobMetadataFor(context: Pick<BlobStorageContext, 'fileId' | 'versionId' | 'propertyTypeId'>): BlobMetadata {
  return {
    fileId: String(context.fileId),
    versionId: String(context.versionId),
    propertyTypeId: String(context.propertyTypeId),
  };
}

/**
 * Validate a chunk against the blob's layout and return its 1-based index
 * and the blob's block count.
 *
 * @throws {ConfigurationMismatchError} If the chunk does not line up with the recorded chunk size
 * @throws {ValidationError} If the offset or length is not a usable number
 */
export function locateChunk(
  write: Pick<ChunkWrite, 'blobId' | 'chunkSize' | 'length' | 'offset' | 'buffer'>
): { index: number; blockCount: number } {
  const { blobId, chunkSize, length, offset, buffer } = write;

  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new ValidationError({ message: `Offset must be a non-negative integer, got ${offset}`, field: 'offset' });
  }
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new ValidationError({ message: `Length must be a non-negative integer, got ${length}`, field: 'length' });
  }

  const mismatch = (message?: string): ConfigurationMismatchError =>
    new ConfigurationMismatchError({
      message,
      offset,
      bufferLength: buffer.length,
      chunkSize,
      blobName: blobId,
    });

  if (buffer.length > chunkSize || offset % chunkSize > 0) {
    throw mismatch();
  }

  const blockCount = expectedBlockCount(length, chunkSize);
  if (blockCount > MAX_BLOCK_COUNT) {
    throw new ValidationError({
      message: `A blob of ${length} bytes needs ${blockCount} blocks of ${chunkSize} bytes; at most ${MAX_BLOCK_COUNT} are allowed`,
      field: 'length',
      blobName: blobId,
    });
  }

  const index = offset / chunkSize + 1;
  if (index > blockCount) {
    throw mismatch(`Chunk at offset ${offset} lies past the end of blob ${blobId} (length ${length}, chunk size ${chunkSize}).`);
  }
  if (index < blockCount && buffer.length !== chunkSize) {
    throw mismatch(
      `Chunk ${index} of ${blockCount} for blob ${blobId} has ${buffer.length} bytes; every chunk but the last must have ${chunkSize}.`
    );
  }
  if (index === blockCount && offset + buffer.length !== length) {
    throw mismatch(
      `Final chunk for blob ${blobId} ends at ${offset + buffer.length} but the blob length is ${length}.`
    );
  }

  return { index, blockCount };
}

/**
 * Executes the chunk protocol against a block blob store
 */
export class ChunkedUploader {
  constructor(
    private readonly store: BlockBlobStore,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  /**
   * Stage one chunk; commit and tag the blob if it was the last one.
   *
   * Chunk calls for one blob must not overlap.
   */
  async writeChunk(write: ChunkWrite): Promise<ChunkWriteResult> {
    const { index, blockCount } = locateChunk(write);
    const { container, blobId, buffer, signal } = write;

    return traced<ChunkWriteResult>(
      this.logger,
      'writeChunk',
      {
        container,
        blobId,
        offset: write.offset,
        bufferLength: buffer.length,
        chunkSize: write.chunkSize,
        length: write.length,
        index,
        blockCount,
      },
      async () => {
        await this.store.stageBlock(container, blobId, encodeBlockId(index), buffer, { signal });
        if (index < blockCount) {
          return 'staged';
        }

        await this.commit(container, blobId, blockCount, write.metadata, signal);
        return 'committed';
      }
    );
  }

  /**
   * Commit a zero-length blob
   */
  async commitEmpty(container: string, blobId: string, metadata: BlobMetadata, signal?: AbortSignal): Promise<void> {
    await traced(this.logger, 'commitEmpty', { container, blobId }, () =>
      this.commit(container, blobId, 0, metadata, signal)
    );
  }

  private async commit(
    container: string,
    blobId: string,
    blockCount: number,
    metadata: BlobMetadata,
    signal?: AbortSignal
  ): Promise<void> {
    await this.store.commitBlockList(container, blobId, blockIdRange(blockCount), { signal });
    await this.store.setMetadata(container, blobId, metadata, { signal });
  }
}
