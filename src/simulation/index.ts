/**
 * Simulation
 *
 * In-process stand-in for the block blob service.
 */

export { InMemoryBlockBlobStore } from './memory-store.js';
export type { StoreOperation, RecordedCall } from './memory-store.js';
