/**
 * Azure Block Blob Provider Error Types
 *
 * Typed errors for the block-blob store and the chunked upload protocol.
 */

/** Base error options */
export interface BlobStorageErrorOptions {
  message: string;
  statusCode?: number;
  code?: string;
  container?: string;
  blobName?: string;
  requestId?: string;
  retryable?: boolean;
  retryAfterMs?: number;
  cause?: Error;
}

/**
 * Base class for all provider errors
 */
export abstract class BlobStorageError extends Error {
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly container?: string;
  public readonly blobName?: string;
  public readonly requestId?: string;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public override readonly cause?: Error;

  constructor(options: BlobStorageErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.container = options.container;
    this.blobName = options.blobName;
    this.requestId = options.requestId;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Check if error is retryable */
  isRetryable(): boolean {
    return this.retryable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      container: this.container,
      blobName: this.blobName,
      requestId: this.requestId,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
    };
  }
}

type FixedOptions = Omit<BlobStorageErrorOptions, 'retryable' | 'code'>;

/**
 * Blob not found error (404)
 */
export class BlobNotFoundError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: false, code: 'BlobNotFound' });
  }
}

/**
 * Container not found error (404)
 */
export class ContainerNotFoundError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: false, code: 'ContainerNotFound' });
  }
}

/**
 * Authentication error (401)
 */
export class AuthenticationError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: false, code: 'AuthenticationFailed' });
  }
}

/**
 * Authorization error (403)
 */
export class AuthorizationError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: false, code: 'AuthorizationFailed' });
  }
}

/**
 * Server busy error (503) - retryable
 */
export class ServerBusyError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: true, code: 'ServerBusy' });
  }
}

/**
 * Service unavailable error (503) - retryable
 */
export class ServiceUnavailableError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: true, code: 'ServiceUnavailable' });
  }
}

/**
 * Timeout error - retryable
 */
export class TimeoutError extends BlobStorageError {
  public readonly operation: string;

  constructor(options: FixedOptions & { operation: string }) {
    super({ ...options, retryable: true, code: 'Timeout' });
    this.operation = options.operation;
  }
}

/**
 * Network error - retryable
 */
export class NetworkError extends BlobStorageError {
  constructor(options: FixedOptions) {
    super({ ...options, retryable: true, code: 'NetworkError' });
  }
}

/**
 * Any other non-success response from the store
 */
export class StoreRequestError extends BlobStorageError {}

/**
 * Raised once the store client's retry policy is exhausted on a transient fault
 */
export class TransientStoreError extends BlobStorageError {
  public readonly attempts: number;

  constructor(options: FixedOptions & { attempts: number }) {
    super({ ...options, retryable: false, code: 'TransientStoreFailure' });
    this.attempts = options.attempts;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), attempts: this.attempts };
  }
}

/**
 * A write call disagrees with the chunk size recorded at allocation.
 * Never retried: the same sizes would produce the same wrong block boundaries.
 */
export class ConfigurationMismatchError extends BlobStorageError {
  public readonly offset: number;
  public readonly bufferLength: number;
  public readonly chunkSize: number;

  constructor(
    options: Omit<FixedOptions, 'message'> & {
      message?: string;
      offset: number;
      bufferLength: number;
      chunkSize: number;
    }
  ) {
    super({
      ...options,
      message:
        options.message ??
        `Incorrect chunk size configuration. The blob chunk size must be the same as the application chunk size. ` +
          `Offset: ${options.offset}. Buffer length: ${options.bufferLength}. Blob chunk size: ${options.chunkSize}.`,
      retryable: false,
      code: 'ConfigurationMismatch',
    });
    this.offset = options.offset;
    this.bufferLength = options.bufferLength;
    this.chunkSize = options.chunkSize;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      offset: this.offset,
      bufferLength: this.bufferLength,
      chunkSize: this.chunkSize,
    };
  }
}

/** What kind of store name failed validation */
export type NameKind = 'container' | 'blob';

/**
 * Container or blob name violates the store's naming rules
 */
export class NamingError extends BlobStorageError {
  public readonly invalidName: string;
  public readonly kind: NameKind;

  constructor(options: Omit<FixedOptions, 'message'> & { reason: string; invalidName: string; kind: NameKind }) {
    super({
      ...options,
      message: `Invalid ${options.kind} name "${options.invalidName}": ${options.reason}`,
      retryable: false,
      code: 'InvalidName',
    });
    this.invalidName = options.invalidName;
    this.kind = options.kind;
  }
}

/**
 * Malformed provider data text
 */
export class SerializationError extends BlobStorageError {
  public readonly text: string;

  constructor(options: FixedOptions & { text: string }) {
    super({ ...options, retryable: false, code: 'SerializationError' });
    this.text = options.text;
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends BlobStorageError {
  public readonly issues: string[];

  constructor(options: FixedOptions & { issues?: string[] }) {
    super({ ...options, retryable: false, code: 'ConfigurationError' });
    this.issues = options.issues ?? [];
  }
}

/**
 * Validation error for invalid requests
 */
export class ValidationError extends BlobStorageError {
  public readonly field?: string;

  constructor(options: FixedOptions & { field?: string }) {
    super({ ...options, retryable: false, code: 'ValidationError' });
    this.field = options.field;
  }
}

/**
 * Create error from HTTP response
 */
export function createErrorFromResponse(
  statusCode: number,
  body: string,
  headers?: Record<string, string>,
  container?: string,
  blobName?: string
): BlobStorageError {
  const requestId = headers?.['x-ms-request-id'];
  const retryAfter = headers?.['retry-after'];
  const retryAfterMs = retryAfter ? parseInt(retryAfter, 10) * 1000 : undefined;

  // Error code comes from the XML body, or from x-ms-error-code on HEAD responses
  const codeMatch = body.match(/<Code>([^<]+)<\/Code>/);
  const code = codeMatch?.[1] ?? headers?.['x-ms-error-code'];
  const messageMatch = body.match(/<Message>([^<]+)<\/Message>/);
  const message = messageMatch?.[1] ?? (body || `Request failed with status ${statusCode}`);

  const baseOptions = { message, statusCode, requestId, container, blobName, retryAfterMs };

  switch (statusCode) {
    case 401:
      return new AuthenticationError(baseOptions);
    case 403:
      return new AuthorizationError(baseOptions);
    case 404:
      if (code === 'ContainerNotFound') {
        return new ContainerNotFoundError(baseOptions);
      }
      return new BlobNotFoundError(baseOptions);
    case 503:
      if (code === 'ServerBusy') {
        return new ServerBusyError(baseOptions);
      }
      return new ServiceUnavailableError(baseOptions);
    default:
      return new StoreRequestError({
        ...baseOptions,
        code,
        retryable: isRetryableStatus(statusCode),
      });
  }
}

/**
 * Check if status code is retryable
 */
export function isRetryableStatus(statusCode: number): boolean {
  return (
    statusCode === 408 || // Request Timeout
    statusCode === 429 || // Too Many Requests
    statusCode === 500 || // Internal Server Error
    statusCode === 502 || // Bad Gateway
    statusCode === 503 || // Service Unavailable
    statusCode === 504    // Gateway Timeout
  );
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
