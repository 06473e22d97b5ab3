/**
 * In-memory block blob store
 *
 * A BlockBlobStore that keeps everything in process, following the service's
 * block-blob rules: staged blocks stay invisible until a block list is
 * committed, a commit may only name staged or already committed blocks, and a
 * commit discards the blob's remaining uncommitted blocks. Used for tests and
 * local development.
 *
 * @example
 * ```typescript
 * const store = new InMemoryBlockBlobStore();
 * const provider = await AzureBlobProvider.create(config, { store });
 * ```
 */

import {
  BlobNotFoundError,
  ContainerNotFoundError,
  StoreRequestError,
  ValidationError,
} from '../errors/index.js';
import { md5Base64 } from '../store/rest-store.js';
import type {
  BlobMetadata,
  BlobProperties,
  BlockBlobStore,
  CommitBlockListOptions,
  ListBlobsOptions,
  ListBlobsPage,
  StageBlockOptions,
  StoreRequestOptions,
} from '../types/index.js';

/** Store operations that can be recorded or made to fail */
export type StoreOperation =
  | 'createContainer'
  | 'stageBlock'
  | 'commitBlockList'
  | 'setMetadata'
  | 'getProperties'
  | 'readRange'
  | 'deleteBlob'
  | 'listBlobs';

/** A recorded call */
export interface RecordedCall {
  operation: StoreOperation;
  container: string;
  blobName?: string;
  blockId?: string;
  blockIds?: string[];
}

interface CommittedBlob {
  blocks: Array<{ id: string; data: Uint8Array }>;
  content: Uint8Array;
  metadata: BlobMetadata;
  contentType?: string;
  etag: string;
  lastModified: Date;
}

interface ContainerState {
  blobs: Map<string, CommittedBlob>;
  uncommitted: Map<string, Map<string, Uint8Array>>;
}

const DEFAULT_PAGE_SIZE = 5000;

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * In-process block blob store
 */
export class InMemoryBlockBlobStore implements BlockBlobStore {
  private readonly containers = new Map<string, ContainerState>();
  private readonly calls: RecordedCall[] = [];
  private readonly faults: Array<{ operation: StoreOperation; error: Error }> = [];
  private etagCounter = 0;

  /**
   * Make the next call of `operation` reject with `error`.
   * Queued faults are consumed in order.
   */
  failNext(operation: StoreOperation, error: Error): this {
    this.faults.push({ operation, error });
    return this;
  }

  /** Calls made so far, oldest first */
  getCalls(operation?: StoreOperation): RecordedCall[] {
    return this.calls.filter((call) => operation === undefined || call.operation === operation);
  }

  /** Number of staged, not yet committed blocks for a blob */
  uncommittedBlockCount(container: string, blobName: string): number {
    return this.containers.get(container)?.uncommitted.get(blobName)?.size ?? 0;
  }

  /** Whether the container exists */
  hasContainer(container: string): boolean {
    return this.containers.has(container);
  }

  async createContainerIfNotExists(container: string, options?: StoreRequestOptions): Promise<boolean> {
    this.enter({ operation: 'createContainer', container }, options);
    if (this.containers.has(container)) {
      return false;
    }
    this.containers.set(container, { blobs: new Map(), uncommitted: new Map() });
    return true;
  }

  async stageBlock(
    container: string,
    blobName: string,
    blockId: string,
    data: Uint8Array,
    options?: StageBlockOptions
  ): Promise<void> {
    this.enter({ operation: 'stageBlock', container, blobName, blockId }, options);
    const state = this.requireContainer(container);
    if (options?.contentMd5 !== undefined && options.contentMd5 !== md5Base64(data)) {
      throw new StoreRequestError({
        message: 'The MD5 value specified in the request did not match with the MD5 value calculated by the server.',
        statusCode: 400,
        code: 'Md5Mismatch',
        container,
        blobName,
      });
    }

    let staged = state.uncommitted.get(blobName);
    if (!staged) {
      staged = new Map();
      state.uncommitted.set(blobName, staged);
    }
    staged.set(blockId, Uint8Array.from(data));
  }

  async commitBlockList(
    container: string,
    blobName: string,
    blockIds: readonly string[],
    options?: CommitBlockListOptions
  ): Promise<void> {
    this.enter({ operation: 'commitBlockList', container, blobName, blockIds: [...blockIds] }, options);
    const state = this.requireContainer(container);
    const staged = state.uncommitted.get(blobName) ?? new Map<string, Uint8Array>();
    const existing = state.blobs.get(blobName);

    const blocks: Array<{ id: string; data: Uint8Array }> = [];
    for (const id of blockIds) {
      const data = staged.get(id) ?? existing?.blocks.find((block) => block.id === id)?.data;
      if (!data) {
        throw new StoreRequestError({
          message: `The specified block list is invalid: block ${id} was not found`,
          statusCode: 400,
          code: 'InvalidBlockList',
          container,
          blobName,
        });
      }
      blocks.push({ id, data });
    }

    state.uncommitted.delete(blobName);
    state.blobs.set(blobName, {
      blocks,
      content: concat(blocks.map((block) => block.data)),
      metadata: { ...options?.metadata },
      contentType: options?.contentType,
      etag: this.nextEtag(),
      lastModified: new Date(),
    });
  }

  async setMetadata(
    container: string,
    blobName: string,
    metadata: BlobMetadata,
    options?: StoreRequestOptions
  ): Promise<void> {
    this.enter({ operation: 'setMetadata', container, blobName }, options);
    const blob = this.requireBlob(container, blobName);
    blob.metadata = { ...metadata };
    blob.etag = this.nextEtag();
  }

  async getProperties(container: string, blobName: string, options?: StoreRequestOptions): Promise<BlobProperties> {
    this.enter({ operation: 'getProperties', container, blobName }, options);
    const blob = this.requireBlob(container, blobName);
    return {
      contentLength: blob.content.length,
      contentType: blob.contentType,
      etag: blob.etag,
      lastModified: blob.lastModified,
      metadata: { ...blob.metadata },
    };
  }

  async exists(container: string, blobName: string, options?: StoreRequestOptions): Promise<boolean> {
    try {
      await this.getProperties(container, blobName, options);
      return true;
    } catch (error) {
      if (error instanceof BlobNotFoundError || error instanceof ContainerNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  async readRange(
    container: string,
    blobName: string,
    offset: number,
    count: number,
    options?: StoreRequestOptions
  ): Promise<Uint8Array> {
    this.enter({ operation: 'readRange', container, blobName }, options);
    const blob = this.requireBlob(container, blobName);
    if (offset < 0 || count < 0) {
      throw new ValidationError({ message: `Invalid range ${offset}+${count}`, field: 'range' });
    }
    if (count > 0 && offset >= blob.content.length) {
      throw new StoreRequestError({
        message: 'The range specified is invalid for the current size of the resource',
        statusCode: 416,
        code: 'InvalidRange',
        container,
        blobName,
      });
    }
    return blob.content.slice(offset, offset + count);
  }

  async deleteBlob(container: string, blobName: string, options?: StoreRequestOptions): Promise<void> {
    this.enter({ operation: 'deleteBlob', container, blobName }, options);
    const state = this.requireContainer(container);
    if (!state.blobs.delete(blobName)) {
      throw new BlobNotFoundError({
        message: 'The specified blob does not exist.',
        statusCode: 404,
        container,
        blobName,
      });
    }
    state.uncommitted.delete(blobName);
  }

  async listBlobs(container: string, options: ListBlobsOptions = {}): Promise<ListBlobsPage> {
    this.enter({ operation: 'listBlobs', container }, options);
    const state = this.requireContainer(container);
    const pageSize = options.maxResults ?? DEFAULT_PAGE_SIZE;

    const names = [...state.blobs.keys()]
      .filter((name) => options.prefix === undefined || name.startsWith(options.prefix))
      .sort()
      .filter((name) => options.marker === undefined || name >= options.marker);

    const page = names.slice(0, pageSize);
    return { names: page, nextMarker: names[pageSize] };
  }

  private enter(call: RecordedCall, options?: StoreRequestOptions): void {
    options?.signal?.throwIfAborted();
    this.calls.push(call);

    const index = this.faults.findIndex((fault) => fault.operation === call.operation);
    if (index !== -1) {
      const [fault] = this.faults.splice(index, 1);
      if (fault) {
        throw fault.error;
      }
    }
  }

  private requireContainer(container: string): ContainerState {
    const state = this.containers.get(container);
    if (!state) {
      throw new ContainerNotFoundError({
        message: 'The specified container does not exist.',
        statusCode: 404,
        container,
      });
    }
    return state;
  }

  private requireBlob(container: string, blobName: string): CommittedBlob {
    const blob = this.requireContainer(container).blobs.get(blobName);
    if (!blob) {
      throw new BlobNotFoundError({
        message: 'The specified blob does not exist.',
        statusCode: 404,
        container,
        blobName,
      });
    }
    return blob;
  }

  private nextEtag(): string {
    this.etagCounter++;
    return `"0x${this.etagCounter.toString(16).toUpperCase().padStart(15, '0')}"`;
  }
}
