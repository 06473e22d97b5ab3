/**
 * Blob Service Authentication
 */

export type { AuthMethod, AuthProvider, SignableRequest, SignedRequest } from './auth-provider.js';
export { SharedKeyAuthProvider, SasTokenAuthProvider, createAuthProvider } from './auth-provider.js';
