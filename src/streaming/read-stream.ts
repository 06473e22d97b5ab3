/**
 * Blob read stream
 *
 * A Readable over one committed blob. Ranges of `chunkSize` bytes are fetched
 * one at a time as the consumer pulls.
 */

import { Readable } from 'node:stream';
import { ValidationError, toError } from '../errors/index.js';
import type { BlockBlobStore } from '../types/index.js';

/** Read stream construction options */
export interface BlobReadStreamOptions {
  container: string;
  blobName: string;
  /** Blob length in bytes */
  length: number;
  /** Bytes per range request */
  chunkSize: number;
  start?: number;
  end?: number;
  signal?: AbortSignal;
}

/**
 * Readable over a committed blob
 */
export class BlobReadStream extends Readable {
  /** Blob length in bytes */
  readonly length: number;
  readonly container: string;
  readonly blobName: string;
  readonly start: number;
  readonly end: number;

  private readonly store: BlockBlobStore;
  private readonly chunkSize: number;
  private readonly abortSignal?: AbortSignal;
  private position: number;

  constructor(store: BlockBlobStore, options: BlobReadStreamOptions) {
    super();
    const start = options.start ?? 0;
    const end = options.end ?? options.length;
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 0 || end > options.length || start > end) {
      throw new ValidationError({
        message: `Invalid read range ${start}-${end} for a blob of ${options.length} bytes`,
        field: 'range',
        container: options.container,
        blobName: options.blobName,
      });
    }

    this.store = store;
    this.container = options.container;
    this.blobName = options.blobName;
    this.length = options.length;
    this.chunkSize = options.chunkSize;
    this.abortSignal = options.signal;
    this.start = start;
    this.end = end;
    this.position = start;
  }

  /** Bytes not yet fetched */
  get remaining(): number {
    return this.end - this.position;
  }

  override _read(): void {
    if (this.position >= this.end) {
      this.push(null);
      return;
    }

    const count = Math.min(this.chunkSize, this.end - this.position);
    void this.store
      .readRange(this.container, this.blobName, this.position, count, { signal: this.abortSignal })
      .then(
        (data) => {
          if (data.length === 0) {
            this.push(null);
            return;
          }
          this.position += data.length;
          this.push(data);
        },
        (error: unknown) => {
          this.destroy(toError(error));
        }
      );
  }
}
