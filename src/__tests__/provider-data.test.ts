/**
 * Tests for provider data allocation and persistence.
 */

import {
  allocateProviderData,
  serializeProviderData,
  deserializeProviderData,
  newBlobId,
  SerializationError,
  ValidationError,
} from '../index.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('allocateProviderData', () => {
  it('should mint a uuid when no id is supplied', () => {
    const data = allocateProviderData(undefined, 65536);
    expect(data.blobId).toMatch(UUID_V4);
    expect(data.chunkSize).toBe(65536);
  });

  it('should keep a supplied id', () => {
    expect(allocateProviderData('existing-id', 1024)).toEqual({ blobId: 'existing-id', chunkSize: 1024 });
  });

  it('should mint a new id for an empty supplied id', () => {
    expect(allocateProviderData('', 1024).blobId).toMatch(UUID_V4);
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => allocateProviderData(undefined, 0)).toThrow(ValidationError);
    expect(() => allocateProviderData(undefined, 1.5)).toThrow(ValidationError);
  });

  it('should mint distinct ids', () => {
    expect(newBlobId()).not.toBe(newBlobId());
  });
});

describe('serializeProviderData', () => {
  it('should write the persisted field names', () => {
    expect(serializeProviderData({ blobId: 'abc', chunkSize: 262144 })).toBe('{"BlobId":"abc","ChunkSize":262144}');
  });
});

describe('deserializeProviderData', () => {
  it('should read what serialize wrote', () => {
    const data = { blobId: '9b2e6f1c-3d4a-4b5c-8d6e-7f8091a2b3c4', chunkSize: 4096 };
    expect(deserializeProviderData(serializeProviderData(data))).toEqual(data);
  });

  it('should ignore unknown fields', () => {
    expect(deserializeProviderData('{"BlobId":"abc","ChunkSize":10,"Extra":true}')).toEqual({
      blobId: 'abc',
      chunkSize: 10,
    });
  });

  it('should fall back when the chunk size is missing', () => {
    expect(deserializeProviderData('{"BlobId":"abc"}')).toEqual({ blobId: 'abc', chunkSize: 262144 });
    expect(deserializeProviderData('{"BlobId":"abc"}', 1000)).toEqual({ blobId: 'abc', chunkSize: 1000 });
  });

  it('should reject malformed json', () => {
    expect(() => deserializeProviderData('{not json')).toThrow(SerializationError);
    expect(() => deserializeProviderData('{not json')).toThrow(/^Provider data is not valid JSON: /);
  });

  it('should reject a missing or empty blob id', () => {
    expect(() => deserializeProviderData('{"ChunkSize":10}')).toThrow(SerializationError);
    expect(() => deserializeProviderData('{"BlobId":"","ChunkSize":10}')).toThrow(
      'Invalid provider data: BlobId: BlobId must not be empty'
    );
  });

  it('should reject an invalid chunk size', () => {
    expect(() => deserializeProviderData('{"BlobId":"abc","ChunkSize":-1}')).toThrow(SerializationError);
    expect(() => deserializeProviderData('{"BlobId":"abc","ChunkSize":"big"}')).toThrow(SerializationError);
  });

  it('should keep the original text on the error', () => {
    try {
      deserializeProviderData('null');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SerializationError);
      if (error instanceof SerializationError) {
        expect(error.text).toBe('null');
      }
    }
  });
});
