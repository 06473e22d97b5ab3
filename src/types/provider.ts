/**
 * Provider Types
 *
 * Records shared between the content repository and the provider.
 */

import type { Readable, Writable } from 'node:stream';
import type { StoreRequestOptions } from './blob.js';

/**
 * Locates one remote blob and the chunk size it is written with.
 * Persisted by the repository as opaque text.
 */
export interface ProviderData {
  blobId: string;
  chunkSize: number;
}

/**
 * Per-transfer context owned by the content repository.
 *
 * The provider reads `length` and `providerData`, and writes `providerData`
 * back on allocation. The three ids only end up as blob metadata.
 */
export interface BlobStorageContext {
  /** Total content length in bytes */
  length: number;
  providerData?: ProviderData;
  /** Owning file id */
  fileId: number;
  versionId: number;
  propertyTypeId: number;
}

/** Options for opening a read stream */
export interface ReadStreamOptions extends StoreRequestOptions {
  /** First byte to read (default: 0) */
  start?: number;
  /** Byte after the last one to read (default: blob length) */
  end?: number;
}

/** Options for listing blob ids */
export interface ListIdsOptions extends StoreRequestOptions {
  prefix?: string;
  /** Page size requested from the store */
  pageSize?: number;
}

/**
 * Everything the content repository needs to store, read and delete binary
 * content without knowing the store's primitives.
 */
export interface BlobProvider {
  /** Chunk size every writeChunk call must use */
  readonly chunkSize: number;

  allocate(context: BlobStorageContext, options?: StoreRequestOptions): Promise<ProviderData>;
  writeChunk(
    context: BlobStorageContext,
    offset: number,
    buffer: Uint8Array,
    options?: StoreRequestOptions
  ): Promise<void>;
  delete(context: BlobStorageContext, options?: StoreRequestOptions): Promise<void>;

  openForRead(context: BlobStorageContext, options?: ReadStreamOptions): Promise<Readable>;
  openForWrite(context: BlobStorageContext, options?: StoreRequestOptions): Writable;
  cloneStream(context: BlobStorageContext, stream: Readable | Writable): Promise<Readable | Writable>;

  parseData(text: string): ProviderData;
  serializeData(data: ProviderData): string;

  exists(blobId: string, options?: StoreRequestOptions): Promise<boolean>;
  listIds(options?: ListIdsOptions): AsyncGenerator<string>;
}
