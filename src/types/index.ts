/**
 * Type re-exports
 */

export type {
  BlobMetadata,
  StoreRequestOptions,
  StageBlockOptions,
  CommitBlockListOptions,
  BlobProperties,
  ListBlobsOptions,
  ListBlobsPage,
  BlockBlobStore,
} from './blob.js';

export type {
  ProviderData,
  BlobStorageContext,
  ReadStreamOptions,
  ListIdsOptions,
  BlobProvider,
} from './provider.js';
