/**
 * Block Blob REST Store
 *
 * BlockBlobStore over the Blob service REST API. Every request is signed,
 * bounded by the configured timeout and retried by the linear retry policy
 * when the service reports a transient fault.
 */

import { createHash } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import type { AuthProvider } from '../auth/index.js';
import { createAuthProvider } from '../auth/index.js';
import type { NormalizedProviderConfig } from '../client/config.js';
import {
  BlobNotFoundError,
  ContainerNotFoundError,
  NetworkError,
  StoreRequestError,
  TimeoutError,
  createErrorFromResponse,
  toError,
} from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { Sleep } from '../resilience/index.js';
import { RetryExecutor } from '../resilience/index.js';
import type {
  BlobMetadata,
  BlobProperties,
  BlockBlobStore,
  CommitBlockListOptions,
  ListBlobsOptions,
  ListBlobsPage,
  StageBlockOptions,
  StoreRequestOptions,
} from '../types/index.js';

/** The subset of fetch the store uses */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Construction options */
export interface RestStoreOptions {
  fetch?: FetchLike;
  logger?: Logger;
  authProvider?: AuthProvider;
  /** Delay function used between retries */
  sleep?: Sleep;
}

/** One REST call */
interface StoreRequest {
  operation: string;
  method: 'GET' | 'HEAD' | 'PUT' | 'DELETE';
  container: string;
  blobName?: string;
  query?: Record<string, string | undefined>;
  headers?: Record<string, string>;
  body?: Uint8Array;
}

const METADATA_HEADER_PREFIX = 'x-ms-meta-';

/** Compute the base64 MD5 of a block */
export function md5Base64(data: Uint8Array): string {
  return createHash('md5').update(data).digest('base64');
}

/** Build the XML body for Put Block List */
export function buildBlockListXml(blockIds: readonly string[]): string {
  const blocks = blockIds.map((id) => `<Latest>${id}</Latest>`).join('');
  return `<?xml version="1.0" encoding="utf-8"?><BlockList>${blocks}</BlockList>`;
}

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/** Parse blob names and the continuation marker from a List Blobs response */
export function parseListBlobsXml(xml: string): ListBlobsPage {
  const names: string[] = [];
  const blobRegex = /<Blob>[\s\S]*?<Name>([^<]*)<\/Name>[\s\S]*?<\/Blob>/g;
  let match: RegExpExecArray | null;
  while ((match = blobRegex.exec(xml)) !== null) {
    const name = match[1];
    if (name !== undefined) {
      names.push(decodeXmlEntities(name));
    }
  }

  const nextMarker = xml.match(/<NextMarker>([^<]+)<\/NextMarker>/)?.[1];
  return { names, nextMarker: nextMarker ? decodeXmlEntities(nextMarker) : undefined };
}

/**
 * `x-ms-meta-*` headers for a metadata map. fetch sends header names in lower
 * case and the service stores metadata names as sent, so names are lowered
 * here: `fileId` is stored, and read back, as `fileid`.
 */
function metadataHeaders(metadata: BlobMetadata | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    headers[`${METADATA_HEADER_PREFIX}${key.toLowerCase()}`] = value;
  }
  return headers;
}

/**
 * Block blob store backed by the Blob REST API
 */
export class RestBlockBlobStore implements BlockBlobStore {
  private readonly fetchFn: FetchLike;
  private readonly authProvider: AuthProvider;
  private readonly retry: RetryExecutor;
  private readonly logger: Logger;

  constructor(
    private readonly config: NormalizedProviderConfig,
    options: RestStoreOptions = {}
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.authProvider = options.authProvider ?? createAuthProvider(config.credentials);
    this.logger = options.logger ?? new NoopLogger();
    this.retry = new RetryExecutor(config.retry, this.logger, options.sleep);
  }

  async createContainerIfNotExists(container: string, options: StoreRequestOptions = {}): Promise<boolean> {
    try {
      await this.send(
        { operation: 'createContainer', method: 'PUT', container, query: { restype: 'container' } },
        options
      );
      return true;
    } catch (error) {
      if (error instanceof StoreRequestError && error.code === 'ContainerAlreadyExists') {
        return false;
      }
      throw error;
    }
  }

  async stageBlock(
    container: string,
    blobName: string,
    blockId: string,
    data: Uint8Array,
    options: StageBlockOptions = {}
  ): Promise<void> {
    const headers: Record<string, string> = {};
    const contentMd5 = options.contentMd5 ?? (this.config.transactionalMd5 ? md5Base64(data) : undefined);
    if (contentMd5) {
      headers['Content-MD5'] = contentMd5;
    }

    await this.send(
      {
        operation: 'stageBlock',
        method: 'PUT',
        container,
        blobName,
        query: { comp: 'block', blockid: blockId },
        headers,
        body: data,
      },
      options
    );
  }

  async commitBlockList(
    container: string,
    blobName: string,
    blockIds: readonly string[],
    options: CommitBlockListOptions = {}
  ): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/xml',
      ...metadataHeaders(options.metadata),
    };
    if (options.contentType) {
      headers['x-ms-blob-content-type'] = options.contentType;
    }

    await this.send(
      {
        operation: 'commitBlockList',
        method: 'PUT',
        container,
        blobName,
        query: { comp: 'blocklist' },
        headers,
        body: new TextEncoder().encode(buildBlockListXml(blockIds)),
      },
      options
    );
  }

  async setMetadata(
    container: string,
    blobName: string,
    metadata: BlobMetadata,
    options: StoreRequestOptions = {}
  ): Promise<void> {
    await this.send(
      {
        operation: 'setMetadata',
        method: 'PUT',
        container,
        blobName,
        query: { comp: 'metadata' },
        headers: metadataHeaders(metadata),
      },
      options
    );
  }

  async getProperties(container: string, blobName: string, options: StoreRequestOptions = {}): Promise<BlobProperties> {
    const response = await this.send(
      { operation: 'getProperties', method: 'HEAD', container, blobName },
      options
    );

    const metadata: BlobMetadata = {};
    response.headers.forEach((value, key) => {
      if (key.startsWith(METADATA_HEADER_PREFIX)) {
        metadata[key.slice(METADATA_HEADER_PREFIX.length)] = value;
      }
    });

    const lastModified = response.headers.get('last-modified');
    return {
      contentLength: parseInt(response.headers.get('content-length') ?? '0', 10),
      contentType: response.headers.get('content-type') ?? undefined,
      etag: response.headers.get('etag') ?? '',
      lastModified: lastModified ? new Date(lastModified) : new Date(),
      metadata,
    };
  }

  async exists(container: string, blobName: string, options: StoreRequestOptions = {}): Promise<boolean> {
    try {
      await this.getProperties(container, blobName, options);
      return true;
    } catch (error) {
      if (error instanceof BlobNotFoundError || error instanceof ContainerNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  async readRange(
    container: string,
    blobName: string,
    offset: number,
    count: number,
    options: StoreRequestOptions = {}
  ): Promise<Uint8Array> {
    if (count <= 0) {
      return new Uint8Array(0);
    }

    const response = await this.send(
      {
        operation: 'readRange',
        method: 'GET',
        container,
        blobName,
        headers: { 'x-ms-range': `bytes=${offset}-${offset + count - 1}` },
      },
      options
    );

    return new Uint8Array(await response.arrayBuffer());
  }

  async deleteBlob(container: string, blobName: string, options: StoreRequestOptions = {}): Promise<void> {
    await this.send({ operation: 'deleteBlob', method: 'DELETE', container, blobName }, options);
  }

  async listBlobs(container: string, options: ListBlobsOptions = {}): Promise<ListBlobsPage> {
    const response = await this.send(
      {
        operation: 'listBlobs',
        method: 'GET',
        container,
        query: {
          restype: 'container',
          comp: 'list',
          prefix: options.prefix,
          marker: options.marker,
          maxresults: options.maxResults !== undefined ? String(options.maxResults) : undefined,
        },
      },
      options
    );

    return parseListBlobsXml(await response.text());
  }

  /**
   * Build the URL for a container or blob
   */
  buildUrl(container: string, blobName?: string, query: Record<string, string | undefined> = {}): string {
    let url = `${this.config.endpoint}/${encodeURIComponent(container)}`;
    if (blobName !== undefined) {
      url += `/${blobName.split('/').map(encodeURIComponent).join('/')}`;
    }

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.set(key, value);
      }
    }
    const search = params.toString();
    return search ? `${url}?${search}` : url;
  }

  private send(request: StoreRequest, options: StoreRequestOptions): Promise<Response> {
    return this.retry.execute(request.operation, () => this.attempt(request, options.signal), options.signal);
  }

  private async attempt(request: StoreRequest, signal?: AbortSignal): Promise<Response> {
    signal?.throwIfAborted();

    const clientRequestId = uuidv4();
    const signed = this.authProvider.signRequest({
      method: request.method,
      url: this.buildUrl(request.container, request.blobName, request.query),
      headers: { ...request.headers, 'x-ms-client-request-id': clientRequestId },
      contentLength: request.body?.length ?? 0,
    });

    this.logger.trace('Store request', {
      operation: request.operation,
      method: request.method,
      container: request.container,
      blobName: request.blobName,
      clientRequestId,
    });

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchFn(signed.url, {
        method: request.method,
        headers: signed.headers,
        body: request.body,
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw toError(signal.reason);
      }
      if (timedOut) {
        throw new TimeoutError({
          message: `${request.operation} timed out after ${this.config.timeout}ms`,
          operation: request.operation,
          container: request.container,
          blobName: request.blobName,
        });
      }
      throw new NetworkError({
        message: `${request.operation} failed: ${toError(error).message}`,
        container: request.container,
        blobName: request.blobName,
        cause: toError(error),
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (!response.ok) {
      const body = request.method === 'HEAD' ? '' : await response.text();
      throw createErrorFromResponse(
        response.status,
        body,
        Object.fromEntries(response.headers.entries()),
        request.container,
        request.blobName
      );
    }

    return response;
  }
}
