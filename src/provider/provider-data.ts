/**
 * Provider data
 *
 * The record a repository stores to find a blob again after a restart. The
 * text form keeps the `BlobId` / `ChunkSize` field names of records already
 * persisted by repositories.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { DEFAULT_CHUNK_SIZE } from '../client/config.js';
import { SerializationError, ValidationError } from '../errors/index.js';
import type { ProviderData } from '../types/index.js';

const ProviderDataSchema = z.object({
  BlobId: z.string().min(1, 'BlobId must not be empty'),
  ChunkSize: z.number().int().positive().optional(),
});

/**
 * Mint a new blob id
 */
export function newBlobId(): string {
  return uuidv4();
}

/**
 * Keep an existing blob id or mint one, and stamp the chunk size
 */
export function allocateProviderData(existingBlobId: string | undefined, chunkSize: number): ProviderData {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError({ message: `Chunk size must be a positive integer, got ${chunkSize}`, field: 'chunkSize' });
  }
  return {
    blobId: existingBlobId || newBlobId(),
    chunkSize,
  };
}

/**
 * Serialize provider data to its persisted text form
 */
export function serializeProviderData(data: ProviderData): string {
  return JSON.stringify({ BlobId: data.blobId, ChunkSize: data.chunkSize });
}

/**
 * Parse persisted provider data
 *
 * Unknown fields are ignored. Records written without a chunk size get
 * `fallbackChunkSize`.
 *
 * @throws {SerializationError} If the text is not valid provider data
 */
export function deserializeProviderData(text: string, fallbackChunkSize: number = DEFAULT_CHUNK_SIZE): ProviderData {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SerializationError({
      message: `Provider data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      text,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = ProviderDataSchema.safeParse(raw);
  if (!result.success) {
    throw new SerializationError({
      message: `Invalid provider data: ${result.error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ')}`,
      text,
    });
  }

  return {
    blobId: result.data.BlobId,
    chunkSize: result.data.ChunkSize ?? fallbackChunkSize,
  };
}
