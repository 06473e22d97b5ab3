/**
 * Tests for AzureBlobProvider over the in-memory store.
 */

import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  AzureBlobProvider,
  createBlobProvider,
  InMemoryBlockBlobStore,
  InMemoryLogger,
  BlobReadStream,
  BlobWriteStream,
  BlobNotFoundError,
  ConfigurationMismatchError,
  NamingError,
  ValidationError,
} from '../index.js';
import type { BlobStorageContext, ProviderConfig } from '../index.js';

const TEST_KEY = Buffer.from('test-secret').toString('base64');
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function filled(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i * 7) % 256);
}

function contextFor(length: number, blobId?: string): BlobStorageContext {
  return {
    length,
    providerData: blobId ? { blobId, chunkSize: 1 } : undefined,
    fileId: 42,
    versionId: 7,
    propertyTypeId: 3,
  };
}

async function readAll(stream: Readable): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      chunks.push(chunk);
    }
  }
  return new Uint8Array(Buffer.concat(chunks));
}

async function upload(provider: AzureBlobProvider, context: BlobStorageContext, data: Uint8Array): Promise<void> {
  const { chunkSize } = provider;
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    await provider.writeChunk(context, offset, data.subarray(offset, offset + chunkSize));
  }
}

describe('AzureBlobProvider', () => {
  let store: InMemoryBlockBlobStore;
  let logger: InMemoryLogger;

  const create = (config: ProviderConfig = {}): Promise<AzureBlobProvider> =>
    AzureBlobProvider.create({ accountName: 'devaccount', accountKey: TEST_KEY, chunkSize: 100, ...config }, { store, logger });

  beforeEach(() => {
    store = new InMemoryBlockBlobStore();
    logger = new InMemoryLogger();
  });

  describe('create', () => {
    it('should create the default container', async () => {
      const provider = await create();

      expect(provider.containerName).toBe('snc');
      expect(provider.tenantId).toBe('');
      expect(provider.chunkSize).toBe(100);
      expect(store.hasContainer('snc')).toBe(true);
    });

    it('should reuse an existing container', async () => {
      await create();
      await create();

      expect(store.getCalls('createContainer')).toHaveLength(2);
      expect(logger.getLogsByLevel('debug').map((entry) => entry.message)).toEqual([
        'Created container',
        'Using existing container',
      ]);
    });

    it('should validate the container name before calling the store', async () => {
      await expect(create({ tenantId: 'Tenant1' })).rejects.toBeInstanceOf(NamingError);
      expect(store.getCalls('createContainer')).toHaveLength(0);
    });

    it('should default the chunk size to 256 KiB', async () => {
      const provider = await AzureBlobProvider.create({ accountName: 'devaccount', accountKey: TEST_KEY }, { store, logger });
      expect(provider.chunkSize).toBe(262144);
    });

    it('should be available as a plain factory', async () => {
      const provider = await createBlobProvider(
        { accountName: 'devaccount', accountKey: TEST_KEY, containerPrefix: 'files' },
        { store, logger }
      );
      expect(provider.containerName).toBe('files');
    });
  });

  describe('forTenant', () => {
    it('should derive a provider for another tenant', async () => {
      const provider = await create();
      const tenant = await provider.forTenant('tenant1');

      expect(tenant.containerName).toBe('snctenant1');
      expect(tenant.tenantId).toBe('tenant1');
      expect(tenant.chunkSize).toBe(100);
      expect(provider.containerName).toBe('snc');
      expect(store.hasContainer('snctenant1')).toBe(true);
    });

    it('should keep tenants apart', async () => {
      const provider = await create();
      const tenant = await provider.forTenant('tenant1');
      const context = contextFor(0, 'shared-id');

      await tenant.allocate(context);

      await expect(tenant.exists('shared-id')).resolves.toBe(true);
      await expect(provider.exists('shared-id')).resolves.toBe(false);
    });

    it('should reject invalid tenant ids', async () => {
      const provider = await create();
      await expect(provider.forTenant('-x')).rejects.toBeInstanceOf(NamingError);
    });
  });

  describe('allocate', () => {
    it('should mint an id and record the chunk size in the context', async () => {
      const provider = await create();
      const context = contextFor(250);

      const data = await provider.allocate(context);

      expect(data.blobId).toMatch(UUID_V4);
      expect(data.chunkSize).toBe(100);
      expect(context.providerData).toEqual(data);
    });

    it('should keep an existing id and overwrite its chunk size', async () => {
      const provider = await create();
      const context = contextFor(250, 'keep-me');

      await expect(provider.allocate(context)).resolves.toEqual({ blobId: 'keep-me', chunkSize: 100 });
    });

    it('should reject an invalid blob id', async () => {
      const provider = await create();
      await expect(provider.allocate(contextFor(10, 'dir/'))).rejects.toBeInstanceOf(NamingError);
    });

    it('should commit a zero-length blob right away', async () => {
      const provider = await create();
      const context = contextFor(0);

      const { blobId } = await provider.allocate(context);

      await expect(provider.exists(blobId)).resolves.toBe(true);
      expect((await store.getProperties('snc', blobId)).metadata).toEqual({
        fileId: '42',
        versionId: '7',
        propertyTypeId: '3',
      });
      expect((await readAll(await provider.openForRead(context))).length).toBe(0);
    });

    it('should not touch the store for a non-empty blob', async () => {
      const provider = await create();
      await provider.allocate(contextFor(250));

      expect(store.getCalls().map((call) => call.operation)).toEqual(['createContainer']);
    });
  });

  describe('writeChunk', () => {
    it('should store a single-chunk blob', async () => {
      const provider = await create({ chunkSize: 65536 });
      const data = filled(4096);
      const context = contextFor(4096);
      const { blobId } = await provider.allocate(context);

      await provider.writeChunk(context, 0, data);

      await expect(provider.exists(blobId)).resolves.toBe(true);
      expect(await readAll(await provider.openForRead(context))).toEqual(data);
      expect((await store.getProperties('snc', blobId)).metadata).toEqual({
        fileId: '42',
        versionId: '7',
        propertyTypeId: '3',
      });
    });

    it('should store a multi-chunk blob once the last chunk arrives', async () => {
      const provider = await create();
      const data = filled(250);
      const context = contextFor(250);
      const { blobId } = await provider.allocate(context);

      await provider.writeChunk(context, 0, data.subarray(0, 100));
      await provider.writeChunk(context, 100, data.subarray(100, 200));
      await expect(provider.exists(blobId)).resolves.toBe(false);

      await provider.writeChunk(context, 200, data.subarray(200));

      await expect(provider.exists(blobId)).resolves.toBe(true);
      expect(await readAll(await provider.openForRead(context))).toEqual(data);
    });

    it('should commit a blob that fills its last chunk exactly', async () => {
      const provider = await create({ chunkSize: 4096 });
      const data = filled(65536);
      const context = contextFor(65536);
      const { blobId } = await provider.allocate(context);

      for (let index = 0; index < 15; index++) {
        const offset = index * 4096;
        await provider.writeChunk(context, offset, data.subarray(offset, offset + 4096));
      }
      await expect(provider.exists(blobId)).resolves.toBe(false);

      await provider.writeChunk(context, 61440, data.subarray(61440));

      await expect(provider.exists(blobId)).resolves.toBe(true);
      expect(store.getCalls('stageBlock')).toHaveLength(16);
      const commits = store.getCalls('commitBlockList');
      expect(commits).toHaveLength(1);
      expect(commits[0]?.blockIds).toHaveLength(16);
      expect(commits[0]?.blockIds?.[0]).toBe('MDAwMDAx');
      expect(commits[0]?.blockIds?.[15]).toBe('MDAwMDE2');

      const stream = await provider.openForRead(context);
      expect(stream.length).toBe(65536);
      expect(await readAll(stream)).toEqual(data);
    });

    it('should reject chunks that disagree with the chunk size', async () => {
      const provider = await create({ chunkSize: 300 });
      const data = filled(700);
      const context = contextFor(700);
      const { blobId } = await provider.allocate(context);

      await expect(provider.writeChunk(context, 0, data.subarray(0, 500))).rejects.toBeInstanceOf(
        ConfigurationMismatchError
      );
      await expect(provider.writeChunk(context, 500, data.subarray(500))).rejects.toBeInstanceOf(
        ConfigurationMismatchError
      );
      await expect(provider.exists(blobId)).resolves.toBe(false);
      expect(store.getCalls('stageBlock')).toHaveLength(0);
    });

    it('should use the chunk size recorded with the blob', async () => {
      const provider = await create();
      const context = contextFor(100);
      context.providerData = provider.parseData('{"BlobId":"old-record","ChunkSize":50}');
      const data = filled(100);

      await provider.writeChunk(context, 0, data.subarray(0, 50));
      await provider.writeChunk(context, 50, data.subarray(50));

      expect(store.getCalls('commitBlockList')[0]?.blockIds).toEqual(['MDAwMDAx', 'MDAwMDAy']);
      expect(await readAll(await provider.openForRead(context))).toEqual(data);
    });

    it('should require an allocated context', async () => {
      const provider = await create();
      await expect(provider.writeChunk(contextFor(10), 0, filled(10))).rejects.toBeInstanceOf(ValidationError);
    });

    it('should stop when the caller aborts', async () => {
      const provider = await create();
      const context = contextFor(10);
      await provider.allocate(context);
      const controller = new AbortController();
      controller.abort();

      await expect(provider.writeChunk(context, 0, filled(10), { signal: controller.signal })).rejects.toThrow();
      expect(store.getCalls('stageBlock')).toHaveLength(0);
    });

    it('should log the allocation under the container', async () => {
      const provider = await create();
      const context = contextFor(250, 'logged');
      await provider.allocate(context);

      expect(logger.getLogs()).toContainEqual({
        level: 'debug',
        message: 'Allocated blob',
        context: { container: 'snc', blobId: 'logged', chunkSize: 100, length: 250 },
      });
    });
  });

  describe('delete', () => {
    it('should delete the blob', async () => {
      const provider = await create();
      const context = contextFor(0);
      const { blobId } = await provider.allocate(context);

      await provider.delete(context);

      await expect(provider.exists(blobId)).resolves.toBe(false);
    });

    it('should report a missing blob', async () => {
      const provider = await create();
      const context = contextFor(10);
      await provider.allocate(context);

      await expect(provider.delete(context)).rejects.toBeInstanceOf(BlobNotFoundError);
    });
  });

  describe('streams', () => {
    it('should report a missing blob when opening for read', async () => {
      const provider = await create();
      const context = contextFor(10);
      await provider.allocate(context);

      await expect(provider.openForRead(context)).rejects.toBeInstanceOf(BlobNotFoundError);
    });

    it('should expose the blob length and read a range', async () => {
      const provider = await create();
      const data = filled(250);
      const context = contextFor(250);
      await provider.allocate(context);
      await upload(provider, context, data);

      const stream = await provider.openForRead(context, { start: 90, end: 110 });

      expect(stream.length).toBe(250);
      expect(await readAll(stream)).toEqual(data.slice(90, 110));
    });

    it('should write through a stream with the context metadata', async () => {
      const provider = await create();
      const data = filled(230);
      const context = contextFor(230);
      const { blobId } = await provider.allocate(context);

      await pipeline(Readable.from([Buffer.from(data)]), provider.openForWrite(context));

      expect(await readAll(await provider.openForRead(context))).toEqual(data);
      expect((await store.getProperties('snc', blobId)).metadata).toEqual({
        fileId: '42',
        versionId: '7',
        propertyTypeId: '3',
      });
      expect(store.getCalls('stageBlock')).toHaveLength(3);
    });

    it('should clone a write stream as a new write stream', async () => {
      const provider = await create();
      const data = filled(5);
      const context = contextFor(5);
      await provider.allocate(context);
      const original = provider.openForWrite(context);

      const clone = await provider.cloneStream(context, original);
      original.destroy();

      if (!(clone instanceof BlobWriteStream)) {
        throw new Error('clone is not a write stream');
      }
      expect(clone).not.toBe(original);
      expect(clone.writable).toBe(true);
      expect(clone).not.toBeInstanceOf(Readable);

      await pipeline(Readable.from([Buffer.from(data)]), clone);
      expect(await readAll(await provider.openForRead(context))).toEqual(data);
    });

    it('should clone a read stream as a new read stream over the same content', async () => {
      const provider = await create();
      const data = filled(250);
      const context = contextFor(250);
      await provider.allocate(context);
      await upload(provider, context, data);
      const original = await provider.openForRead(context);

      const clone = await provider.cloneStream(context, original);

      if (!(clone instanceof BlobReadStream)) {
        throw new Error('clone is not a read stream');
      }
      expect(clone).not.toBe(original);
      expect(clone.length).toBe(original.length);
      expect(clone.length).toBe(250);
      expect(clone.readable).toBe(true);
      expect(clone).not.toBeInstanceOf(Writable);
      expect(await readAll(clone)).toEqual(data);
      original.destroy();
    });
  });

  describe('provider data', () => {
    it('should serialize and parse', async () => {
      const provider = await create();
      const text = provider.serializeData({ blobId: 'abc', chunkSize: 100 });

      expect(text).toBe('{"BlobId":"abc","ChunkSize":100}');
      expect(provider.parseData(text)).toEqual({ blobId: 'abc', chunkSize: 100 });
    });

    it('should fall back to the configured chunk size', async () => {
      const provider = await create();
      expect(provider.parseData('{"BlobId":"abc"}')).toEqual({ blobId: 'abc', chunkSize: 100 });
    });
  });

  describe('listIds', () => {
    it('should page through every blob id', async () => {
      const provider = await create();
      for (const id of ['id-c', 'id-a', 'id-b']) {
        await provider.allocate(contextFor(0, id));
      }

      const ids: string[] = [];
      for await (const id of provider.listIds({ pageSize: 2 })) {
        ids.push(id);
      }

      expect(ids).toEqual(['id-a', 'id-b', 'id-c']);
      expect(store.getCalls('listBlobs')).toHaveLength(2);
    });

    it('should start a fresh listing on each call', async () => {
      const provider = await create();
      await provider.allocate(contextFor(0, 'only'));

      const first: string[] = [];
      for await (const id of provider.listIds()) {
        first.push(id);
      }
      const second: string[] = [];
      for await (const id of provider.listIds()) {
        second.push(id);
      }

      expect(first).toEqual(['only']);
      expect(second).toEqual(['only']);
    });

    it('should filter by prefix', async () => {
      const provider = await create();
      await provider.allocate(contextFor(0, 'keep-1'));
      await provider.allocate(contextFor(0, 'skip-1'));

      const ids: string[] = [];
      for await (const id of provider.listIds({ prefix: 'keep-' })) {
        ids.push(id);
      }
      expect(ids).toEqual(['keep-1']);
    });
  });
});
