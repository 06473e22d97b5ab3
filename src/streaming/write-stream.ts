/**
 * Blob write stream
 *
 * A Writable that stages bytes as `chunkSize` blocks numbered from 1 and
 * commits them with the metadata fixed when the stream was opened. Nothing is
 * visible to readers until `end()` completes.
 */

import { Writable } from 'node:stream';
import { MAX_BLOCK_COUNT } from '../client/config.js';
import { ValidationError, toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { blockIdRange, encodeBlockId } from '../upload/block-id.js';
import type { BlobMetadata, BlockBlobStore } from '../types/index.js';

/** Write stream construction options */
export interface BlobWriteStreamOptions {
  container: string;
  blobName: string;
  chunkSize: number;
  metadata: BlobMetadata;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Writable that uploads into one block blob
 */
export class BlobWriteStream extends Writable {
  readonly container: string;
  readonly blobName: string;
  readonly metadata: Readonly<BlobMetadata>;

  private readonly store: BlockBlobStore;
  private readonly chunkSize: number;
  private readonly abortSignal?: AbortSignal;
  private readonly logger: Logger;
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private stagedBlocks = 0;

  constructor(store: BlockBlobStore, options: BlobWriteStreamOptions) {
    super();
    this.store = store;
    this.container = options.container;
    this.blobName = options.blobName;
    this.chunkSize = options.chunkSize;
    this.metadata = { ...options.metadata };
    this.abortSignal = options.signal;
    this.logger = options.logger ?? new NoopLogger();
  }

  /** Blocks staged so far */
  get blockCount(): number {
    return this.stagedBlocks;
  }

  override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!(chunk instanceof Uint8Array)) {
      callback(new ValidationError({ message: 'BlobWriteStream accepts only binary chunks', field: 'chunk' }));
      return;
    }

    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
    void this.flushFullBlocks().then(
      () => callback(),
      (error: unknown) => callback(toError(error))
    );
  }

  override _final(callback: (error?: Error | null) => void): void {
    void this.finish().then(
      () => callback(),
      (error: unknown) => callback(toError(error))
    );
  }

  private async flushFullBlocks(): Promise<void> {
    while (this.pendingBytes >= this.chunkSize) {
      await this.stage(this.take(this.chunkSize));
    }
  }

  private async finish(): Promise<void> {
    if (this.pendingBytes > 0) {
      await this.stage(this.take(this.pendingBytes));
    }

    this.logger.debug('Committing write stream', {
      container: this.container,
      blobName: this.blobName,
      blockCount: this.stagedBlocks,
    });
    await this.store.commitBlockList(this.container, this.blobName, blockIdRange(this.stagedBlocks), {
      metadata: { ...this.metadata },
      signal: this.abortSignal,
    });
  }

  private async stage(block: Uint8Array): Promise<void> {
    const index = this.stagedBlocks + 1;
    if (index > MAX_BLOCK_COUNT) {
      throw new ValidationError({
        message: `Write stream exceeded ${MAX_BLOCK_COUNT} blocks of ${this.chunkSize} bytes`,
        field: 'length',
        container: this.container,
        blobName: this.blobName,
      });
    }

    this.logger.debug('Staging block', {
      container: this.container,
      blobName: this.blobName,
      index,
      bufferLength: block.length,
    });
    await this.store.stageBlock(this.container, this.blobName, encodeBlockId(index), block, {
      signal: this.abortSignal,
    });
    this.stagedBlocks = index;
  }

  /** Remove `count` bytes from the front of the pending buffer */
  private take(count: number): Uint8Array {
    const block = new Uint8Array(count);
    let filled = 0;
    while (filled < count) {
      const head = this.pending[0];
      if (!head) {
        break;
      }
      const needed = count - filled;
      if (head.length <= needed) {
        block.set(head, filled);
        filled += head.length;
        this.pending.shift();
      } else {
        block.set(head.subarray(0, needed), filled);
        filled += needed;
        this.pending[0] = head.subarray(needed);
      }
    }
    this.pendingBytes -= filled;
    return block;
  }
}
