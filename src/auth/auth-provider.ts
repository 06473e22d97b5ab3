/**
 * Blob Service Authentication
 *
 * Request signing for the Blob REST API:
 * - Shared Key (HMAC-SHA256 over the canonicalized request)
 * - SAS token (appended to the request URL)
 */

import { createHmac } from 'node:crypto';
import { API_VERSION } from '../client/config.js';
import type { StoreCredentials } from '../client/config.js';

/** Authentication method types */
export type AuthMethod = 'shared-key' | 'sas-token';

/** A request about to be sent */
export interface SignableRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  contentLength: number;
}

/** The request as it goes on the wire */
export interface SignedRequest {
  url: string;
  headers: Record<string, string>;
}

/** Authentication provider interface */
export interface AuthProvider {
  /** Add date, version and credentials to a request */
  signRequest(request: SignableRequest, now?: Date): SignedRequest;
  /** Get the authentication method type */
  getMethod(): AuthMethod;
}

/**
 * Shared Key authentication provider
 */
export class SharedKeyAuthProvider implements AuthProvider {
  private readonly accountName: string;
  private readonly accountKey: Buffer;

  constructor(accountName: string, accountKey: string) {
    if (!accountName) {
      throw new Error('Account name is required');
    }
    if (!accountKey) {
      throw new Error('Account key is required');
    }
    this.accountName = accountName;
    this.accountKey = Buffer.from(accountKey, 'base64');
  }

  signRequest(request: SignableRequest, now: Date = new Date()): SignedRequest {
    const headers: Record<string, string> = {
      ...request.headers,
      'x-ms-date': now.toUTCString(),
      'x-ms-version': API_VERSION,
    };

    const stringToSign = this.buildStringToSign(request.method, headers, request.contentLength, new URL(request.url));
    headers['Authorization'] = `SharedKey ${this.accountName}:${this.sign(stringToSign)}`;

    return { url: request.url, headers };
  }

  getMethod(): AuthMethod {
    return 'shared-key';
  }

  /**
   * Build the string to sign:
   * VERB, standard headers, canonicalized x-ms-* headers, canonicalized resource.
   */
  buildStringToSign(method: string, headers: Record<string, string>, contentLength: number, url: URL): string {
    const lowered = new Map(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
    const getHeader = (name: string): string => lowered.get(name.toLowerCase()) ?? '';

    return [
      method.toUpperCase(),
      getHeader('Content-Encoding'),
      getHeader('Content-Language'),
      // Zero length is sent as an empty string
      contentLength > 0 ? String(contentLength) : '',
      getHeader('Content-MD5'),
      getHeader('Content-Type'),
      '', // Date - x-ms-date is used instead
      getHeader('If-Modified-Since'),
      getHeader('If-Match'),
      getHeader('If-None-Match'),
      getHeader('If-Unmodified-Since'),
      getHeader('Range'),
      this.buildCanonicalizedHeaders(lowered),
      this.buildCanonicalizedResource(url),
    ].join('\n');
  }

  private buildCanonicalizedHeaders(headers: Map<string, string>): string {
    return [...headers.entries()]
      .filter(([key]) => key.startsWith('x-ms-'))
      .map(([key, value]) => [key, value.replace(/\s+/g, ' ').trim()] as const)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${key}:${value}`)
      .join('\n');
  }

  private buildCanonicalizedResource(url: URL): string {
    let resource = `/${this.accountName}${decodeURIComponent(url.pathname)}`;

    const grouped = new Map<string, string[]>();
    for (const [key, value] of url.searchParams.entries()) {
      const lowerKey = key.toLowerCase();
      grouped.set(lowerKey, [...(grouped.get(lowerKey) ?? []), value]);
    }

    const keys = [...grouped.keys()].sort();
    for (const key of keys) {
      const values = (grouped.get(key) ?? []).sort();
      resource += `\n${key}:${values.join(',')}`;
    }

    return resource;
  }

  private sign(stringToSign: string): string {
    return createHmac('sha256', this.accountKey).update(stringToSign, 'utf8').digest('base64');
  }
}

/**
 * SAS token authentication provider
 */
export class SasTokenAuthProvider implements AuthProvider {
  private readonly sasToken: string;

  constructor(sasToken: string) {
    if (!sasToken) {
      throw new Error('SAS token is required');
    }
    this.sasToken = sasToken.startsWith('?') ? sasToken.slice(1) : sasToken;
  }

  signRequest(request: SignableRequest, now: Date = new Date()): SignedRequest {
    const separator = request.url.includes('?') ? '&' : '?';
    return {
      url: `${request.url}${separator}${this.sasToken}`,
      headers: {
        ...request.headers,
        'x-ms-date': now.toUTCString(),
        'x-ms-version': API_VERSION,
      },
    };
  }

  getMethod(): AuthMethod {
    return 'sas-token';
  }
}

/**
 * Create auth provider from resolved credentials
 */
export function createAuthProvider(credentials: StoreCredentials): AuthProvider {
  switch (credentials.type) {
    case 'shared-key':
      return new SharedKeyAuthProvider(credentials.accountName, credentials.accountKey);
    case 'sas-token':
      return new SasTokenAuthProvider(credentials.sasToken);
  }
}
