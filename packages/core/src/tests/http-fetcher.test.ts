import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { HttpChunkFetcher, parseRetryAfter } from '../download/http-fetcher.js';
import { TransportError } from '../errors.js';

const CHUNK_URL = 'https://cdn.test/attachments/1/file.part001of002';

describe('HttpChunkFetcher', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should return the response body', async () => {
    const requested: unknown[] = [];
    mock.method(globalThis, 'fetch', async (input: unknown) => {
      requested.push(input);
      return new Response('chunk bytes');
    });

    const data = await new HttpChunkFetcher().fetch(CHUNK_URL, new AbortController().signal);

    assert.strictEqual(data.toString(), 'chunk bytes');
    assert.deepStrictEqual(requested, [CHUNK_URL]);
  });

  it('should report a missing chunk as a permanent TransportError', async () => {
    mock.method(globalThis, 'fetch', async () => new Response('gone', { status: 404 }));

    await assert.rejects(
      new HttpChunkFetcher().fetch(CHUNK_URL, new AbortController().signal),
      (error: unknown) =>
        error instanceof TransportError &&
        error.status === 404 &&
        !error.retryable &&
        error.message === `GET ${CHUNK_URL} failed: HTTP 404`,
    );
  });

  it('should retry server errors and honour Retry-After', async () => {
    mock.method(
      globalThis,
      'fetch',
      async () => new Response('busy', { status: 503, headers: { 'retry-after': '2' } }),
    );

    await assert.rejects(
      new HttpChunkFetcher().fetch(CHUNK_URL, new AbortController().signal),
      (error: unknown) =>
        error instanceof TransportError && error.status === 503 && error.retryable && error.retryAfterMs === 2000,
    );
  });

  it('should treat network failures as retryable', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new TypeError('fetch failed');
    });

    await assert.rejects(
      new HttpChunkFetcher().fetch(CHUNK_URL, new AbortController().signal),
      (error: unknown) => error instanceof TransportError && error.retryable && error.status === null,
    );
  });
});

describe('parseRetryAfter', () => {
  it('should read seconds', () => {
    assert.strictEqual(parseRetryAfter('3'), 3000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.UTC(2024, 0, 1, 0, 0, 0);
    assert.strictEqual(parseRetryAfter('Mon, 01 Jan 2024 00:00:05 GMT', now), 5000);
  });

  it('should ignore missing or unparseable values', () => {
    assert.strictEqual(parseRetryAfter(null), null);
    assert.strictEqual(parseRetryAfter('soon'), null);
  });
});
