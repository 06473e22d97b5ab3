/**
 * Azure Block Blob Provider Errors
 *
 * Re-exports all error types.
 */

export {
  BlobStorageError,
  BlobNotFoundError,
  ContainerNotFoundError,
  AuthenticationError,
  AuthorizationError,
  ServerBusyError,
  ServiceUnavailableError,
  TimeoutError,
  NetworkError,
  StoreRequestError,
  TransientStoreError,
  ConfigurationMismatchError,
  NamingError,
  SerializationError,
  ConfigurationError,
  ValidationError,
  createErrorFromResponse,
  isRetryableStatus,
  toError,
} from './error.js';

export type { BlobStorageErrorOptions, NameKind } from './error.js';
