import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { countChunks, splitFile, splitStream } from '../chunker/splitter.js';
import { ConfigError, LocalIOError } from '../errors.js';
import type { ChunkInput } from '../types.js';
import { createTempDir, patternBuffer, removeTempDir } from './helpers.js';

async function collect(chunks: AsyncIterable<ChunkInput>): Promise<ChunkInput[]> {
  const result: ChunkInput[] = [];
  for await (const chunk of chunks) result.push(chunk);
  return result;
}

async function* pieces(...parts: string[]): AsyncGenerator<string> {
  for (const part of parts) yield part;
}

describe('countChunks', () => {
  it('should round up to whole chunks', () => {
    assert.strictEqual(countChunks(0, 10), 0);
    assert.strictEqual(countChunks(1, 10), 1);
    assert.strictEqual(countChunks(10, 10), 1);
    assert.strictEqual(countChunks(11, 10), 2);
    assert.strictEqual(countChunks(50_000_000, 24_000_000), 3);
  });

  it('should reject a non-positive chunk size', () => {
    assert.throws(() => countChunks(10, 0), ConfigError);
    assert.throws(() => countChunks(10, 1.5), ConfigError);
  });
});

describe('splitStream', () => {
  it('should regroup arbitrary pieces into fixed-size chunks', async () => {
    const chunks = await collect(splitStream(pieces('abc', 'defg', 'h'), 3));

    assert.deepStrictEqual(
      chunks.map(c => [c.ordinal, c.data.toString()]),
      [
        [0, 'abc'],
        [1, 'def'],
        [2, 'gh'],
      ],
    );
  });

  it('should yield nothing for an empty source', async () => {
    const chunks = await collect(splitStream(pieces(), 5));
    assert.strictEqual(chunks.length, 0);
  });

  it('should produce an exact multiple without a trailing empty chunk', async () => {
    const chunks = await collect(splitStream(Readable.from([patternBuffer(30)]), 10));
    assert.deepStrictEqual(
      chunks.map(c => c.data.length),
      [10, 10, 10],
    );
  });

  it('should split 50,000,000 bytes at 24,000,000 into 24M, 24M and 2M', async () => {
    async function* megabytes(): AsyncGenerator<Buffer> {
      const block = Buffer.alloc(1_000_000, 7);
      for (let i = 0; i < 50; i++) yield block;
    }

    const sizes: number[] = [];
    const ordinals: number[] = [];
    for await (const chunk of splitStream(megabytes(), 24_000_000)) {
      sizes.push(chunk.data.length);
      ordinals.push(chunk.ordinal);
    }

    assert.deepStrictEqual(sizes, [24_000_000, 24_000_000, 2_000_000]);
    assert.deepStrictEqual(ordinals, [0, 1, 2]);
  });

  it('should reject an invalid chunk size on first read', async () => {
    await assert.rejects(collect(splitStream(pieces('abc'), 0)), ConfigError);
  });
});

describe('splitFile', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir('splitter');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should split a file and preserve its bytes', async () => {
    const source = patternBuffer(25);
    const filePath = join(testDir, 'data.bin');
    await writeFile(filePath, source);

    const chunks = await collect(splitFile(filePath, 10));

    assert.deepStrictEqual(
      chunks.map(c => c.data.length),
      [10, 10, 5],
    );
    assert.ok(Buffer.concat(chunks.map(c => c.data)).equals(source));
  });

  it('should report a missing file as LocalIOError', async () => {
    await assert.rejects(collect(splitFile(join(testDir, 'missing.bin'), 10)), LocalIOError);
  });
});
