/**
 * Block Blob Store Types
 *
 * The narrow set of block-blob primitives the provider needs. The REST client
 * and the in-memory simulation both implement {@link BlockBlobStore}.
 */

/** Blob metadata (x-ms-meta-*) */
export type BlobMetadata = Record<string, string>;

/** Options accepted by every store call */
export interface StoreRequestOptions {
  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

/** Options for staging a block */
export interface StageBlockOptions extends StoreRequestOptions {
  /** Base64 MD5 of the block, verified by the service */
  contentMd5?: string;
}

/** Options for committing a block list */
export interface CommitBlockListOptions extends StoreRequestOptions {
  /** Metadata stored with the committed blob; replaces any existing metadata */
  metadata?: BlobMetadata;
  /** Content type of the committed blob */
  contentType?: string;
}

/** Subset of blob properties the provider reads */
export interface BlobProperties {
  contentLength: number;
  contentType?: string;
  etag: string;
  lastModified: Date;
  metadata: BlobMetadata;
}

/** Listing request */
export interface ListBlobsOptions extends StoreRequestOptions {
  prefix?: string;
  marker?: string;
  maxResults?: number;
}

/** One page of a listing */
export interface ListBlobsPage {
  names: string[];
  /** Continuation marker; absent on the last page */
  nextMarker?: string;
}

/**
 * Block blob primitives.
 *
 * Staged blocks are invisible to readers until a block list is committed.
 */
export interface BlockBlobStore {
  /** Create the container unless it already exists; resolves true when created */
  createContainerIfNotExists(container: string, options?: StoreRequestOptions): Promise<boolean>;

  /** Upload one uncommitted block */
  stageBlock(
    container: string,
    blobName: string,
    blockId: string,
    data: Uint8Array,
    options?: StageBlockOptions
  ): Promise<void>;

  /** Assemble the blob from the given block ids in order */
  commitBlockList(
    container: string,
    blobName: string,
    blockIds: readonly string[],
    options?: CommitBlockListOptions
  ): Promise<void>;

  /** Replace the metadata of a committed blob */
  setMetadata(
    container: string,
    blobName: string,
    metadata: BlobMetadata,
    options?: StoreRequestOptions
  ): Promise<void>;

  /** Read properties of a committed blob; rejects with BlobNotFoundError if absent */
  getProperties(container: string, blobName: string, options?: StoreRequestOptions): Promise<BlobProperties>;

  /** True if a committed blob exists */
  exists(container: string, blobName: string, options?: StoreRequestOptions): Promise<boolean>;

  /** Read `count` bytes starting at `offset` */
  readRange(
    container: string,
    blobName: string,
    offset: number,
    count: number,
    options?: StoreRequestOptions
  ): Promise<Uint8Array>;

  /** Delete a blob; rejects with BlobNotFoundError if absent */
  deleteBlob(container: string, blobName: string, options?: StoreRequestOptions): Promise<void>;

  /** List committed blob names, one page at a time */
  listBlobs(container: string, options?: ListBlobsOptions): Promise<ListBlobsPage>;
}
