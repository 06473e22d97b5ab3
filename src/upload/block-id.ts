/**
 * Block id encoding
 *
 * Block ids are the 1-based chunk index, zero-padded to six digits and
 * base64-encoded. All ids of a blob must have the same length. Commit order
 * comes from the explicit block list, not from sorting the ids.
 */

import { ValidationError } from '../errors/index.js';

/** Digits in a block id */
export const BLOCK_ID_DIGITS = 6;

/** Largest index a block id can carry */
export const MAX_BLOCK_INDEX = 10 ** BLOCK_ID_DIGITS - 1;

/**
 * Encode a 1-based chunk index as a block id
 *
 * @example encodeBlockId(1) === 'MDAwMDAx'
 */
export function encodeBlockId(index: number): string {
  if (!Number.isInteger(index) || index < 1 || index > MAX_BLOCK_INDEX) {
    throw new ValidationError({
      message: `Block index must be an integer between 1 and ${MAX_BLOCK_INDEX}, got ${index}`,
      field: 'index',
    });
  }
  return Buffer.from(String(index).padStart(BLOCK_ID_DIGITS, '0'), 'utf8').toString('base64');
}

/**
 * Block ids for indices 1..count, in commit order
 */
export function blockIdRange(count: number): string[] {
  const ids: string[] = [];
  for (let index = 1; index <= count; index++) {
    ids.push(encodeBlockId(index));
  }
  return ids;
}
