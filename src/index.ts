/**
 * Azure Block Blob Provider
 *
 * Stores a content repository's binary content in Azure Blob Storage block
 * blobs. Content arrives as fixed-size chunks; each chunk is staged as one
 * block and the blob is committed and tagged when its last chunk arrives.
 *
 * This module provides:
 * - `AzureBlobProvider`: allocate, writeChunk, delete, read/write streams, clone
 * - Tenant-scoped containers (`<prefix><tenantId>`)
 * - Shared Key and SAS authentication over the Blob REST API
 * - Linear retry for transient store faults
 * - An in-memory store for tests and local development
 *
 * @example Chunked upload
 * ```typescript
 * import { AzureBlobProvider } from 'azure-block-blob-provider';
 *
 * const provider = await AzureBlobProvider.create({
 *   connectionString: process.env.AZURE_STORAGE_CONNECTION_STRING,
 *   tenantId: 'tenant1',
 * });
 *
 * const context = { length: data.length, fileId: 42, versionId: 7, propertyTypeId: 3 };
 * await provider.allocate(context);
 * for (let offset = 0; offset < data.length; offset += provider.chunkSize) {
 *   await provider.writeChunk(context, offset, data.subarray(offset, offset + provider.chunkSize));
 * }
 *
 * const saved = provider.serializeData(context.providerData);
 * ```
 *
 * @example Configuration from the environment
 * ```typescript
 * import { ProviderConfigBuilder, createBlobProvider } from 'azure-block-blob-provider';
 *
 * const provider = await createBlobProvider(ProviderConfigBuilder.fromEnv().build());
 * ```
 *
 * @example Testing without Azure
 * ```typescript
 * import { AzureBlobProvider, InMemoryBlockBlobStore } from 'azure-block-blob-provider';
 *
 * const provider = await AzureBlobProvider.create(
 *   { accountName: 'devaccount', accountKey: 'dGVzdC1zZWNyZXQ=' },
 *   { store: new InMemoryBlockBlobStore() }
 * );
 * ```
 *
 * @packageDocumentation
 */

// Provider
export { AzureBlobProvider, createBlobProvider } from './provider/provider.js';
export type { ProviderDependencies } from './provider/provider.js';
export {
  allocateProviderData,
  serializeProviderData,
  deserializeProviderData,
  newBlobId,
} from './provider/provider-data.js';

// Configuration
export {
  ProviderConfigBuilder,
  builder,
  normalizeConfig,
  parseConnectionString,
  API_VERSION,
  DEFAULT_CHUNK_SIZE,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  MAX_BLOCK_COUNT,
  DEFAULT_CONTAINER_PREFIX,
  DEFAULT_CONFIG,
} from './client/config.js';
export type {
  ProviderConfig,
  NormalizedProviderConfig,
  RetryConfig,
  StoreCredentials,
  ConnectionStringParts,
} from './client/config.js';

// Naming
export {
  resolveContainerName,
  validateContainerName,
  containerNameFor,
  validateBlobName,
} from './naming/container.js';

// Upload
export {
  ChunkedUploader,
  MAX_BLOCK_INDEX,
  encodeBlockId,
  blockIdRange,
  expectedBlockCount,
  blobMetadataFor,
  locateChunk,
} from './upload/index.js';
export type { ChunkWrite, ChunkWriteResult } from './upload/index.js';

// Streaming
export { BlobReadStream, BlobWriteStream } from './streaming/index.js';
export type { BlobReadStreamOptions, BlobWriteStreamOptions } from './streaming/index.js';

// Management
export { blobExists, listBlobIds } from './management/index.js';

// Store clients
export { RestBlockBlobStore } from './store/index.js';
export type { FetchLike, RestStoreOptions } from './store/index.js';
export { InMemoryBlockBlobStore } from './simulation/index.js';
export type { StoreOperation, RecordedCall } from './simulation/index.js';

// Auth
export { SharedKeyAuthProvider, SasTokenAuthProvider, createAuthProvider } from './auth/index.js';
export type { AuthProvider, AuthMethod } from './auth/index.js';

// Resilience
export { RetryExecutor, createRetryExecutor, isTransient } from './resilience/index.js';

// Observability
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createConsoleLogger,
  createNoopLogger,
  createInMemoryLogger,
} from './observability/index.js';
export type { Logger, LogLevel, LogEntry } from './observability/index.js';

// Errors
export * from './errors/index.js';

// Types
export type * from './types/index.js';
