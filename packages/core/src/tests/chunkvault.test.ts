import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { Chunkvault, EmptyPoolError, NotFoundError } from '../index.js';
import type { ChunkvaultConfig } from '../index.js';
import { silentLogger } from '../logger.js';
import { MemoryFetcher, MemoryUploader, TEST_ENDPOINTS, createTempDir, patternBuffer, removeTempDir } from './helpers.js';

describe('Chunkvault', () => {
  let testDir: string;
  let store: Map<string, Buffer>;
  let uploader: MemoryUploader;

  function open(config: ChunkvaultConfig = {}): Chunkvault {
    return new Chunkvault(
      {
        endpoints: TEST_ENDPOINTS,
        registryPath: join(testDir, 'files_cache.json'),
        downloadDir: join(testDir, 'downloads'),
        tempDir: join(testDir, 'scratch'),
        chunkSize: 8,
        retryInitialDelayMs: 1,
        ...config,
      },
      { uploader, fetcher: new MemoryFetcher(store), logger: silentLogger },
    );
  }

  beforeEach(async () => {
    testDir = await createTempDir('facade');
    store = new Map();
    uploader = new MemoryUploader(store);
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should upload, list and download a file', async () => {
    const vault = open();
    const source = join(testDir, 'report.pdf');
    await writeFile(source, patternBuffer(20));

    const uploaded = await vault.upload(source);
    assert.deepStrictEqual(await vault.list(), [{ id: uploaded.fileId, filename: 'report.pdf', size: 20 }]);

    const downloaded = await vault.download(uploaded.fileId);
    assert.strictEqual(downloaded.path, join(testDir, 'downloads', 'report.pdf'));
    assert.ok((await readFile(downloaded.path)).equals(patternBuffer(20)));
  });

  it('should upload buffers and streams under the given name', async () => {
    const vault = open();

    const fromBuffer = await vault.uploadBuffer(Buffer.from('buffer data'), 'a.txt');
    const fromStream = await vault.uploadStream(Readable.from([Buffer.from('stream data')]), 'b.txt');

    assert.strictEqual((await vault.get(fromBuffer.fileId)).filename, 'a.txt');
    assert.strictEqual((await vault.get(fromStream.fileId)).size, 11);
  });

  it('should download into an explicit directory', async () => {
    const vault = open();
    const { fileId } = await vault.uploadBuffer(Buffer.from('x'), 'x.txt');

    const result = await vault.download(fileId, join(testDir, 'elsewhere'));

    assert.strictEqual(result.path, join(testDir, 'elsewhere', 'x.txt'));
  });

  it('should report unknown ids as NotFound', async () => {
    const vault = open();
    await assert.rejects(vault.get(42), NotFoundError);
    await assert.rejects(vault.download(42), NotFoundError);
  });

  it('should browse and download without endpoints but refuse to upload', async () => {
    const writer = open();
    const { fileId } = await writer.uploadBuffer(Buffer.from('shared'), 'shared.txt');

    const reader = open({ endpoints: [] });
    await assert.rejects(reader.uploadBuffer(Buffer.from('y'), 'y.txt'), EmptyPoolError);
    const result = await reader.download(fileId);
    assert.strictEqual(await readFile(result.path, 'utf-8'), 'shared');
  });

  it('should move records between registries through export and import', async () => {
    const vault = open();
    const { fileId } = await vault.uploadBuffer(Buffer.from('portable'), 'p.txt');

    const exported = await vault.exportTo(join(testDir, 'exports'), [fileId]);
    const other = open({ registryPath: join(testDir, 'other.json') });
    const imported = await other.importFrom(exported);

    assert.deepStrictEqual(imported, [fileId]);
    assert.deepStrictEqual(await other.get(fileId), await vault.get(fileId));
  });

  it('should store records under explicit ids', async () => {
    const vault = open();
    await vault.put(7, { filename: 'seven.txt', size: 1, urls: ['https://cdn.test/seven'] });
    assert.deepStrictEqual(await vault.get(7), { id: 7, filename: 'seven.txt', size: 1, urls: ['https://cdn.test/seven'] });
  });

  it('should report status', async () => {
    const vault = open();
    await vault.uploadBuffer(Buffer.from('one'), 'one.txt');

    assert.deepStrictEqual(await vault.status(), {
      endpoints: 2,
      registryPath: join(testDir, 'files_cache.json'),
      files: 1,
      chunkSize: 8,
    });
  });

  it('should close the uploader on destroy', async () => {
    const vault = open();
    await vault.destroy();
    assert.strictEqual(uploader.destroyed, true);
  });

  it('should read its config from the environment', () => {
    const config = Chunkvault.configFromEnv({ CHUNK_SIZE: '1024' });
    assert.deepStrictEqual(config, { chunkSize: 1024 });
  });
});
