import fs from 'fs';
import path from 'path';
import type { TransferProgress } from '@chunkvault/shared/types';
import type { ChunkFetcher, DownloadOptions, DownloadResult, ResolvedConfig } from '../types.js';
import type { FileRegistry } from '../registry/registry.js';
import type { Logger } from '../logger.js';
import { LocalIOError, formatError } from '../errors.js';
import { mergeChunks } from '../chunker/merger.js';
import { toSafeFilename } from '../utils/file.js';
import { DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { downloadPartsToScratch } from './part-downloader.js';

export interface DownloadDeps {
  registry: FileRegistry;
  fetcher: ChunkFetcher;
  config: ResolvedConfig;
  logger?: Logger;
}

async function ensureDirectory(dir: string, what: string): Promise<void> {
  try {
    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.access(dir, fs.constants.W_OK);
  } catch (error) {
    throw new LocalIOError(`${what} is not writable: ${formatError(error)}`, { cause: error });
  }
}

/**
 * Fetch every chunk of `fileId` and reassemble it inside `destDir`.
 *
 * Chunks land in a private scratch directory first; the output file appears
 * only after all of them arrived and were merged in order. The scratch
 * directory is removed on every exit path.
 */
export async function downloadFile(
  fileId: number,
  destDir: string,
  deps: DownloadDeps,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const { registry, fetcher, config, logger } = deps;

  const record = await registry.get(fileId);
  const totalChunks = record.urls.length;
  const progress = (stage: TransferProgress['stage'], completedChunks: number, bytesTransferred: number): void => {
    options.onProgress?.({
      stage,
      percent: record.size > 0 ? Math.round((bytesTransferred / record.size) * 100) : 100,
      completedChunks,
      totalChunks,
      bytesTransferred,
      totalBytes: record.size,
    });
  };

  await ensureDirectory(destDir, 'Download directory');
  await ensureDirectory(config.tempDir, 'Scratch directory');

  let scratchDir: string;
  try {
    scratchDir = await fs.promises.mkdtemp(path.join(config.tempDir, `download-${fileId}-`));
  } catch (error) {
    throw new LocalIOError(`Cannot create scratch space: ${formatError(error)}`, { cause: error });
  }

  logger?.info(`Downloading file ${fileId} (${record.filename}, ${totalChunks} chunk(s))`);
  const downloadStart = Date.now();

  try {
    progress('downloading', 0, 0);
    const partPaths = await downloadPartsToScratch(record.urls, scratchDir, {
      fetcher,
      concurrency: config.downloadConcurrency,
      retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: config.maxRetries, initialDelayMs: config.retryInitialDelayMs },
      requestTimeoutMs: config.requestTimeoutMs,
      fileId,
      signal: options.signal,
      logger,
      onProgress: (completed, _total, bytesDownloaded) => progress('downloading', completed, bytesDownloaded),
    });

    progress('merging', totalChunks, record.size);
    const writtenPath = await mergeChunks(partPaths, record.size, path.join(destDir, toSafeFilename(record.filename)), {
      overwrite: options.overwrite,
    });

    progress('finalizing', totalChunks, record.size);
    logger?.info(`Downloaded file ${fileId} in ${Date.now() - downloadStart}ms`);

    return { fileId, filename: record.filename, size: record.size, path: writtenPath };
  } finally {
    await fs.promises.rm(scratchDir, { recursive: true, force: true });
  }
}
