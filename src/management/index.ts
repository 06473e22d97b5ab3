/**
 * Management
 */

export { blobExists, listBlobIds } from './list.js';
