import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { mergeChunks } from '../chunker/merger.js';
import { IncompleteTransferError, LocalIOError } from '../errors.js';
import { createTempDir, removeTempDir } from './helpers.js';

function errnoError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: operation failed`), { code });
}

describe('mergeChunks', () => {
  let testDir: string;
  let partsDir: string;
  let outDir: string;

  async function writeParts(...contents: string[]): Promise<string[]> {
    const paths: string[] = [];
    for (const [ordinal, content] of contents.entries()) {
      const partPath = join(partsDir, `${ordinal}.part`);
      await writeFile(partPath, content);
      paths.push(partPath);
    }
    return paths;
  }

  beforeEach(async () => {
    testDir = await createTempDir('merger');
    partsDir = join(testDir, 'parts');
    outDir = join(testDir, 'out');
    await mkdir(partsDir);
    await mkdir(outDir);
  });

  afterEach(async () => {
    mock.restoreAll();
    await removeTempDir(testDir);
  });

  it('should concatenate parts in ordinal order', async () => {
    const parts = await writeParts('abc', 'def', 'g');

    const written = await mergeChunks(parts, 7, join(outDir, 'result.txt'));

    assert.strictEqual(written, join(outDir, 'result.txt'));
    assert.strictEqual(await readFile(written, 'utf-8'), 'abcdefg');
    assert.deepStrictEqual(await readdir(outDir), ['result.txt']);
  });

  it('should report progress after each part', async () => {
    const parts = await writeParts('abc', 'def');
    const merged: Array<[number, number]> = [];

    await mergeChunks(parts, 6, join(outDir, 'result.txt'), {
      onPartMerged: (ordinal, bytes) => merged.push([ordinal, bytes]),
    });

    assert.deepStrictEqual(merged, [
      [0, 3],
      [1, 6],
    ]);
  });

  it('should pick a free name instead of replacing an existing file', async () => {
    await writeFile(join(outDir, 'result.txt'), 'original');
    const parts = await writeParts('new');

    const written = await mergeChunks(parts, 3, join(outDir, 'result.txt'));

    assert.strictEqual(written, join(outDir, 'result (1).txt'));
    assert.strictEqual(await readFile(join(outDir, 'result.txt'), 'utf-8'), 'original');
    assert.strictEqual(await readFile(written, 'utf-8'), 'new');
  });

  it('should replace an existing file when overwrite is set', async () => {
    await writeFile(join(outDir, 'result.txt'), 'original');
    const parts = await writeParts('new');

    const written = await mergeChunks(parts, 3, join(outDir, 'result.txt'), { overwrite: true });

    assert.strictEqual(written, join(outDir, 'result.txt'));
    assert.strictEqual(await readFile(written, 'utf-8'), 'new');
    assert.deepStrictEqual(await readdir(outDir), ['result.txt']);
  });

  it('should leave nothing behind when the byte count is wrong', async () => {
    const parts = await writeParts('abc', 'de');

    await assert.rejects(mergeChunks(parts, 6, join(outDir, 'result.txt')), IncompleteTransferError);
    assert.deepStrictEqual(await readdir(outDir), []);
  });

  it('should fail on a missing part', async () => {
    const parts = await writeParts('abc');
    parts.push(join(partsDir, '1.part'));

    await assert.rejects(mergeChunks(parts, 6, join(outDir, 'result.txt')), IncompleteTransferError);
    assert.deepStrictEqual(await readdir(outDir), []);
  });

  it('should write an empty file for zero parts', async () => {
    const written = await mergeChunks([], 0, join(outDir, 'empty.bin'));
    assert.strictEqual((await readFile(written)).length, 0);
  });

  it('should copy into place where hard links are unavailable', async () => {
    await writeFile(join(outDir, 'result.txt'), 'existing');
    const parts = await writeParts('abc', 'def');
    mock.method(fs.promises, 'link', async () => {
      throw errnoError('EPERM');
    });

    const written = await mergeChunks(parts, 6, join(outDir, 'result.txt'));

    assert.strictEqual(written, join(outDir, 'result (1).txt'));
    assert.strictEqual(await readFile(written, 'utf-8'), 'abcdef');
    assert.strictEqual(await readFile(join(outDir, 'result.txt'), 'utf-8'), 'existing');
    assert.deepStrictEqual((await readdir(outDir)).sort(), ['result (1).txt', 'result.txt']);
  });

  it('should report a failed commit as LocalIOError and clean up', async () => {
    const parts = await writeParts('abc');
    mock.method(fs.promises, 'rename', async () => {
      throw errnoError('EXDEV');
    });

    await assert.rejects(
      mergeChunks(parts, 3, join(outDir, 'result.txt'), { overwrite: true }),
      (error: unknown) => error instanceof LocalIOError && error.message.includes('EXDEV'),
    );
    assert.deepStrictEqual(await readdir(outDir), []);
  });
});
