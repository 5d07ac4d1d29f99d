import fs from 'fs';
import path from 'path';
import { CancelledError, LocalIOError, OperationFailedError, formatError } from '../errors.js';
import { createLinkedController, runWithTimeout } from '../utils/abort.js';
import { withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../utils/retry.js';
import type { ChunkFetcher } from '../types.js';
import type { Logger } from '../logger.js';

export type DownloadProgressCallback = (
  completedParts: number,
  totalParts: number,
  bytesDownloaded: number,
) => void;

export interface PartDownloadOptions {
  fetcher: ChunkFetcher;
  /** Max fetches in flight; 0 = all at once */
  concurrency: number;
  retry: RetryConfig;
  requestTimeoutMs: number;
  /** Reported on failures */
  fileId?: number;
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: DownloadProgressCallback;
}

/**
 * Scratch file holding the chunk at `ordinal`.
 */
export function scratchPartPath(scratchDir: string, ordinal: number): string {
  return path.join(scratchDir, `${ordinal}.part`);
}

/**
 * Fetch every locator into `<scratchDir>/<ordinal>.part`.
 *
 * Resolves with the part paths in ordinal order once all fetches succeeded.
 * The first chunk that fails for good cancels the rest, and the returned
 * promise rejects with an OperationFailedError only after every in-flight
 * fetch has settled.
 */
export async function downloadPartsToScratch(
  urls: readonly string[],
  scratchDir: string,
  options: PartDownloadOptions,
): Promise<string[]> {
  const { fetcher, retry, requestTimeoutMs, logger, onProgress } = options;
  const concurrency = options.concurrency > 0 ? options.concurrency : Math.max(urls.length, 1);
  const controller = createLinkedController(options.signal);

  const queue = urls.map((url, ordinal) => ({ url, ordinal }));
  const inFlight = new Set<Promise<void>>();
  const partPaths: string[] = [];
  const state: { failure: { ordinal: number; cause: unknown } | null } = { failure: null };
  let completedParts = 0;
  let bytesDownloaded = 0;

  const fetchPart = async ({ url, ordinal }: { url: string; ordinal: number }): Promise<void> => {
    const data = await withRetry(
      () => runWithTimeout(controller.signal, requestTimeoutMs, s => fetcher.fetch(url, s)),
      `fetch chunk ${ordinal}`,
      retry,
      { signal: controller.signal, logger },
    );

    const partPath = scratchPartPath(scratchDir, ordinal);
    try {
      await fs.promises.writeFile(partPath, data);
    } catch (error) {
      throw new LocalIOError(`Cannot store chunk ${ordinal} in scratch space: ${formatError(error)}`, { cause: error });
    }
    partPaths[ordinal] = partPath;

    completedParts++;
    bytesDownloaded += data.length;
    onProgress?.(completedParts, urls.length, bytesDownloaded);
  };

  const startNext = (): void => {
    while (!state.failure && !controller.signal.aborted && inFlight.size < concurrency) {
      const item = queue.shift();
      if (!item) break;
      const promise: Promise<void> = fetchPart(item)
        .catch((error: unknown) => {
          if (!state.failure) {
            state.failure = { ordinal: item.ordinal, cause: error };
            controller.abort(new CancelledError(`Cancelled after chunk ${item.ordinal} failed`));
          }
        })
        .finally(() => {
          inFlight.delete(promise);
        });
      inFlight.add(promise);
    }
  };

  try {
    startNext();
    while (inFlight.size > 0) {
      await Promise.race(inFlight);
      startNext();
    }
  } finally {
    controller.dispose();
  }

  if (state.failure) {
    throw new OperationFailedError('download', { fileId: options.fileId, ...state.failure });
  }
  if (options.signal?.aborted) {
    throw new OperationFailedError('download', { fileId: options.fileId, cause: new CancelledError() });
  }
  if (completedParts !== urls.length) {
    throw new OperationFailedError('download', {
      fileId: options.fileId,
      cause: new Error(`Fetched ${completedParts} of ${urls.length} chunks`),
    });
  }
  return partPaths;
}
