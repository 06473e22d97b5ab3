/**
 * Tests for error types and response mapping.
 */

import {
  BlobStorageError,
  BlobNotFoundError,
  ContainerNotFoundError,
  AuthenticationError,
  AuthorizationError,
  ServerBusyError,
  ServiceUnavailableError,
  StoreRequestError,
  TransientStoreError,
  ConfigurationMismatchError,
  createErrorFromResponse,
  isRetryableStatus,
  toError,
} from '../index.js';

function errorBody(code: string, message: string): string {
  return `<?xml version="1.0" encoding="utf-8"?><Error><Code>${code}</Code><Message>${message}</Message></Error>`;
}

describe('createErrorFromResponse', () => {
  it('should map 404 ContainerNotFound', () => {
    const error = createErrorFromResponse(404, errorBody('ContainerNotFound', 'The specified container does not exist.'));
    expect(error).toBeInstanceOf(ContainerNotFoundError);
    expect(error.message).toBe('The specified container does not exist.');
    expect(error.statusCode).toBe(404);
  });

  it('should map 404 without a body using the error code header', () => {
    const error = createErrorFromResponse(404, '', { 'x-ms-error-code': 'BlobNotFound' }, 'blobs', 'abc');
    expect(error).toBeInstanceOf(BlobNotFoundError);
    expect(error.message).toBe('Request failed with status 404');
    expect(error.container).toBe('blobs');
    expect(error.blobName).toBe('abc');
  });

  it('should map 401 and 403', () => {
    expect(createErrorFromResponse(401, '')).toBeInstanceOf(AuthenticationError);
    expect(createErrorFromResponse(403, errorBody('AuthorizationFailure', 'denied'))).toBeInstanceOf(AuthorizationError);
  });

  it('should map 503 ServerBusy with retry-after', () => {
    const error = createErrorFromResponse(503, errorBody('ServerBusy', 'busy'), { 'retry-after': '2' });
    expect(error).toBeInstanceOf(ServerBusyError);
    expect(error.retryAfterMs).toBe(2000);
    expect(error.isRetryable()).toBe(true);
  });

  it('should map other 503 responses to ServiceUnavailableError', () => {
    expect(createErrorFromResponse(503, '')).toBeInstanceOf(ServiceUnavailableError);
  });

  it('should map 500 to a retryable StoreRequestError', () => {
    const error = createErrorFromResponse(500, errorBody('InternalError', 'oops'), { 'x-ms-request-id': 'req-1' });
    expect(error).toBeInstanceOf(StoreRequestError);
    expect(error.code).toBe('InternalError');
    expect(error.requestId).toBe('req-1');
    expect(error.isRetryable()).toBe(true);
  });

  it('should map 409 to a non-retryable StoreRequestError', () => {
    const error = createErrorFromResponse(409, errorBody('ContainerAlreadyExists', 'exists'));
    expect(error).toBeInstanceOf(StoreRequestError);
    expect(error.code).toBe('ContainerAlreadyExists');
    expect(error.isRetryable()).toBe(false);
  });
});

describe('isRetryableStatus', () => {
  it('should retry throttling and server faults only', () => {
    expect([408, 429, 500, 502, 503, 504].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 403, 404, 409, 412].some(isRetryableStatus)).toBe(false);
  });
});

describe('ConfigurationMismatchError', () => {
  it('should describe the mismatch by default', () => {
    const error = new ConfigurationMismatchError({ offset: 0, bufferLength: 500, chunkSize: 300, blobName: 'abc' });
    expect(error.message).toBe(
      'Incorrect chunk size configuration. The blob chunk size must be the same as the application chunk size. ' +
        'Offset: 0. Buffer length: 500. Blob chunk size: 300.'
    );
    expect(error).toBeInstanceOf(BlobStorageError);
    expect(error.name).toBe('ConfigurationMismatchError');
    expect(error.isRetryable()).toBe(false);
  });

  it('should serialize its sizes', () => {
    const json = new ConfigurationMismatchError({ offset: 10, bufferLength: 5, chunkSize: 4 }).toJSON();
    expect(json['offset']).toBe(10);
    expect(json['bufferLength']).toBe(5);
    expect(json['chunkSize']).toBe(4);
    expect(json['code']).toBe('ConfigurationMismatch');
  });
});

describe('TransientStoreError', () => {
  it('should report the attempts and the last cause', () => {
    const cause = new ServerBusyError({ message: 'busy' });
    const error = new TransientStoreError({ message: 'stageBlock failed', attempts: 4, cause });
    expect(error.attempts).toBe(4);
    expect(error.cause).toBe(cause);
    expect(error.toJSON()['attempts']).toBe(4);
    expect(error.isRetryable()).toBe(false);
  });
});

describe('toError', () => {
  it('should keep errors and wrap other values', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});
