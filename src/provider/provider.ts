/**
 * Azure Blob Provider
 *
 * The host-facing provider. One instance serves one tenant's container;
 * `forTenant` derives an instance for another tenant that shares the same
 * store client.
 */

import type { Readable, Writable } from 'node:stream';
import type { NormalizedProviderConfig, ProviderConfig } from '../client/config.js';
import { normalizeConfig } from '../client/config.js';
import { ValidationError } from '../errors/index.js';
import { blobExists, listBlobIds } from '../management/index.js';
import { containerNameFor, validateBlobName } from '../naming/container.js';
import type { Logger } from '../observability/index.js';
import { createConsoleLogger, traced } from '../observability/index.js';
import type { FetchLike } from '../store/index.js';
import { RestBlockBlobStore } from '../store/index.js';
import { BlobReadStream, BlobWriteStream } from '../streaming/index.js';
import type {
  BlobProvider,
  BlobStorageContext,
  BlockBlobStore,
  ListIdsOptions,
  ProviderData,
  ReadStreamOptions,
  StoreRequestOptions,
} from '../types/index.js';
import { ChunkedUploader, blobMetadataFor } from '../upload/index.js';
import { allocateProviderData, deserializeProviderData, serializeProviderData } from './provider-data.js';

/** Collaborators a provider can be given instead of the defaults */
export interface ProviderDependencies {
  /** Block blob store; defaults to the REST store built from the configuration */
  store?: BlockBlobStore;
  /** Logger; defaults to `config.logger`, then a console logger at `config.logLevel` */
  logger?: Logger;
  /** fetch used by the default REST store */
  fetch?: FetchLike;
  /** Signal for the container creation request */
  signal?: AbortSignal;
}

/**
 * Block blob storage provider for one tenant
 *
 * @example
 * ```typescript
 * const provider = await AzureBlobProvider.create({ connectionString, tenantId: 'acme' });
 * const context = { length: data.length, fileId: 1, versionId: 1, propertyTypeId: 1 };
 * await provider.allocate(context);
 * for (let offset = 0; offset < data.length; offset += provider.chunkSize) {
 *   await provider.writeChunk(context, offset, data.subarray(offset, offset + provider.chunkSize));
 * }
 * ```
 */
export class AzureBlobProvider implements BlobProvider {
  readonly chunkSize: number;
  readonly tenantId: string;
  readonly containerName: string;

  private readonly config: NormalizedProviderConfig;
  private readonly store: BlockBlobStore;
  private readonly logger: Logger;
  private readonly uploader: ChunkedUploader;

  private constructor(
    config: NormalizedProviderConfig,
    store: BlockBlobStore,
    logger: Logger,
    tenantId: string,
    containerName: string
  ) {
    this.config = config;
    this.store = store;
    this.logger = logger;
    this.tenantId = tenantId;
    this.containerName = containerName;
    this.chunkSize = config.chunkSize;
    this.uploader = new ChunkedUploader(store, logger);
  }

  /**
   * Validate the configuration, then create the tenant's container if it
   * does not exist yet.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   * @throws {NamingError} If the derived container name is invalid
   */
  static async create(config: ProviderConfig, dependencies: ProviderDependencies = {}): Promise<AzureBlobProvider> {
    const normalized = normalizeConfig(config);
    const logger = dependencies.logger ?? config.logger ?? createConsoleLogger(normalized.logLevel);
    const store =
      dependencies.store ?? new RestBlockBlobStore(normalized, { fetch: dependencies.fetch, logger });

    return AzureBlobProvider.open(normalized, store, logger, normalized.tenantId, dependencies.signal);
  }

  private static async open(
    config: NormalizedProviderConfig,
    store: BlockBlobStore,
    logger: Logger,
    tenantId: string,
    signal?: AbortSignal
  ): Promise<AzureBlobProvider> {
    const containerName = containerNameFor(config.containerPrefix, tenantId);
    const created = await store.createContainerIfNotExists(containerName, { signal });
    logger.debug(created ? 'Created container' : 'Using existing container', { container: containerName, tenantId });

    return new AzureBlobProvider(config, store, logger.child({ container: containerName }), tenantId, containerName);
  }

  /**
   * Provider for another tenant, sharing this provider's store client
   */
  forTenant(tenantId: string, options: StoreRequestOptions = {}): Promise<AzureBlobProvider> {
    return AzureBlobProvider.open(this.config, this.store, this.logger, tenantId, options.signal);
  }

  /**
   * Assign the blob id and chunk size for a transfer and record them in the
   * context. A zero-length transfer is committed right away.
   */
  async allocate(context: BlobStorageContext, options: StoreRequestOptions = {}): Promise<ProviderData> {
    const data = allocateProviderData(context.providerData?.blobId, this.chunkSize);
    validateBlobName(data.blobId);
    context.providerData = data;

    this.logger.debug('Allocated blob', { blobId: data.blobId, chunkSize: data.chunkSize, length: context.length });

    if (context.length === 0) {
      await this.uploader.commitEmpty(this.containerName, data.blobId, blobMetadataFor(context), options.signal);
    }
    return data;
  }

  /**
   * Stage one chunk of an allocated transfer
   *
   * @throws {ConfigurationMismatchError} If the chunk does not match the recorded chunk size
   */
  async writeChunk(
    context: BlobStorageContext,
    offset: number,
    buffer: Uint8Array,
    options: StoreRequestOptions = {}
  ): Promise<void> {
    const data = this.requireProviderData(context);
    await this.uploader.writeChunk({
      container: this.containerName,
      blobId: data.blobId,
      chunkSize: data.chunkSize,
      length: context.length,
      offset,
      buffer,
      metadata: blobMetadataFor(context),
      signal: options.signal,
    });
  }

  /**
   * Delete the blob
   *
   * @throws {BlobNotFoundError} If the blob does not exist
   */
  async delete(context: BlobStorageContext, options: StoreRequestOptions = {}): Promise<void> {
    const { blobId } = this.requireProviderData(context);
    await traced(this.logger, 'delete', { blobId }, () =>
      this.store.deleteBlob(this.containerName, blobId, { signal: options.signal })
    );
  }

  /**
   * Open a stream over the committed blob
   *
   * @throws {BlobNotFoundError} If the blob does not exist
   */
  async openForRead(context: BlobStorageContext, options: ReadStreamOptions = {}): Promise<BlobReadStream> {
    const data = this.requireProviderData(context);
    const properties = await this.store.getProperties(this.containerName, data.blobId, { signal: options.signal });

    this.logger.debug('Opened read stream', {
      blobId: data.blobId,
      length: properties.contentLength,
      start: options.start,
      end: options.end,
    });

    return new BlobReadStream(this.store, {
      container: this.containerName,
      blobName: data.blobId,
      length: properties.contentLength,
      chunkSize: data.chunkSize,
      start: options.start,
      end: options.end,
      signal: options.signal,
    });
  }

  /**
   * Open a stream that replaces the blob's content when it ends
   */
  openForWrite(context: BlobStorageContext, options: StoreRequestOptions = {}): BlobWriteStream {
    const data = this.requireProviderData(context);
    this.logger.debug('Opened write stream', { blobId: data.blobId, chunkSize: data.chunkSize });

    return new BlobWriteStream(this.store, {
      container: this.containerName,
      blobName: data.blobId,
      chunkSize: data.chunkSize,
      metadata: blobMetadataFor(context),
      signal: options.signal,
      logger: this.logger,
    });
  }

  /**
   * A fresh handle of the same direction as `stream`
   */
  async cloneStream(context: BlobStorageContext, stream: Readable | Writable): Promise<Readable | Writable> {
    if (stream instanceof BlobWriteStream) {
      return this.openForWrite(context);
    }
    return this.openForRead(context);
  }

  parseData(text: string): ProviderData {
    return deserializeProviderData(text, this.chunkSize);
  }

  serializeData(data: ProviderData): string {
    return serializeProviderData(data);
  }

  exists(blobId: string, options: StoreRequestOptions = {}): Promise<boolean> {
    return blobExists(this.store, this.containerName, blobId, options);
  }

  listIds(options: ListIdsOptions = {}): AsyncGenerator<string> {
    return listBlobIds(this.store, this.containerName, options);
  }

  private requireProviderData(context: BlobStorageContext): ProviderData {
    if (!context.providerData) {
      throw new ValidationError({
        message: 'Blob storage context has no provider data; allocate the blob first',
        field: 'providerData',
        container: this.containerName,
      });
    }
    return context.providerData;
  }
}

/**
 * Create a provider from configuration
 */
export function createBlobProvider(
  config: ProviderConfig,
  dependencies?: ProviderDependencies
): Promise<AzureBlobProvider> {
  return AzureBlobProvider.create(config, dependencies);
}
