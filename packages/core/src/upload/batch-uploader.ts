import { CancelledError, OperationFailedError } from '../errors.js';
import { createLinkedController, runWithTimeout, throwIfAborted } from '../utils/abort.js';
import { withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../utils/retry.js';
import type { EndpointPool } from '../discord/endpoint-pool.js';
import type { ChunkInput, ChunkUploader } from '../types.js';
import type { Logger } from '../logger.js';

export interface BatchUploadOptions {
  pool: EndpointPool;
  uploader: ChunkUploader;
  /** Max chunks in flight; the next batch starts when the whole batch is done */
  batchSize: number;
  retry: RetryConfig;
  requestTimeoutMs: number;
  /** Attachment name for the chunk at `ordinal` */
  nameFor: (ordinal: number) => string;
  signal?: AbortSignal;
  logger?: Logger;
  onChunkUploaded?: (ordinal: number, chunkBytes: number, bytesUploaded: number) => void;
}

/**
 * Upload chunks in consecutive batches of at most `batchSize`.
 *
 * Chunks of a batch go out concurrently, each through the endpoint the pool
 * assigns to its ordinal. If any chunk fails for good, its siblings are
 * cancelled, every locator gathered so far is dropped and an
 * OperationFailedError is thrown once the whole batch has settled.
 *
 * Returns locators indexed by ordinal.
 */
export async function uploadChunks(chunks: AsyncIterable<ChunkInput>, options: BatchUploadOptions): Promise<string[]> {
  const { pool, batchSize, logger, signal } = options;
  pool.assertNotEmpty();

  const locators: string[] = [];
  let bytesUploaded = 0;
  let batch: ChunkInput[] = [];

  const sendBatch = async (items: ChunkInput[]): Promise<void> => {
    const batchStart = Date.now();
    const urls = await uploadBatch(items, options, (ordinal, chunkBytes) => {
      bytesUploaded += chunkBytes;
      options.onChunkUploaded?.(ordinal, chunkBytes, bytesUploaded);
    });
    for (const [index, item] of items.entries()) {
      locators[item.ordinal] = urls[index];
    }
    logger?.debug(
      `batch [${items.map(i => i.ordinal).join(',')}] uploaded in ${Date.now() - batchStart}ms`,
    );
  };

  try {
    for await (const chunk of chunks) {
      throwIfAborted(signal);
      if (chunk.ordinal !== locators.length + batch.length) {
        throw new Error(`Chunk ${chunk.ordinal} arrived out of order`);
      }
      batch.push(chunk);
      if (batch.length >= batchSize) {
        const current = batch;
        batch = [];
        await sendBatch(current);
      }
    }
    if (batch.length > 0) {
      await sendBatch(batch);
    }
  } catch (error) {
    if (locators.length > 0) {
      logger?.warn(`Discarding ${locators.length} uploaded chunk(s) after failure`);
    }
    if (error instanceof OperationFailedError) throw error;
    if (error instanceof CancelledError) throw new OperationFailedError('upload', { cause: error });
    throw error;
  }

  return locators;
}

/**
 * Upload one batch; resolves with locators in batch order.
 */
async function uploadBatch(
  items: ChunkInput[],
  options: BatchUploadOptions,
  onChunkDone: (ordinal: number, chunkBytes: number) => void,
): Promise<string[]> {
  const { pool, uploader, retry, requestTimeoutMs, logger } = options;
  const batchController = createLinkedController(options.signal);
  const state: { failure: { ordinal: number; cause: unknown } | null } = { failure: null };

  const uploadOne = async (item: ChunkInput): Promise<string> => {
    const endpoint = pool.assign(item.ordinal);
    const name = options.nameFor(item.ordinal);
    try {
      const url = await withRetry(
        () => runWithTimeout(batchController.signal, requestTimeoutMs, s => uploader.upload(endpoint, { name, data: item.data }, s)),
        `upload chunk ${item.ordinal} via endpoint #${pool.indexOf(item.ordinal)}`,
        retry,
        { signal: batchController.signal, logger },
      );
      onChunkDone(item.ordinal, item.data.length);
      return url;
    } catch (error) {
      if (!state.failure) {
        state.failure = { ordinal: item.ordinal, cause: error };
        batchController.abort(new CancelledError(`Cancelled after chunk ${item.ordinal} failed`));
      }
      throw error;
    }
  };

  try {
    const settled = await Promise.allSettled(items.map(uploadOne));

    if (state.failure) {
      throw new OperationFailedError('upload', state.failure);
    }

    return settled.map((result, index) => {
      if (result.status === 'rejected') {
        throw new OperationFailedError('upload', { ordinal: items[index].ordinal, cause: result.reason });
      }
      return result.value;
    });
  } finally {
    batchController.dispose();
  }
}
