import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import type { TransferProgress } from '@chunkvault/shared/types';
import type { UploadOptions, UploadResult, ResolvedConfig, ChunkUploader, ChunkInput } from '../types.js';
import type { EndpointPool } from '../discord/endpoint-pool.js';
import type { FileRegistry } from '../registry/registry.js';
import type { Logger } from '../logger.js';
import { LocalIOError, formatError } from '../errors.js';
import { assertChunkSize, countChunks, splitFile, splitStream } from '../chunker/splitter.js';
import { getPartFilename } from '../utils/file.js';
import { DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { uploadChunks } from './batch-uploader.js';

export interface UploadDeps {
  registry: FileRegistry;
  pool: EndpointPool;
  uploader: ChunkUploader;
  config: ResolvedConfig;
  logger?: Logger;
  randomId?: (min: number, max: number) => number;
}

interface ResolvedSource {
  filename: string;
  /** Known up front for paths and buffers */
  size: number | null;
  chunks: AsyncGenerator<ChunkInput>;
}

async function resolveSource(
  input: string | Buffer | Readable,
  options: UploadOptions,
  chunkSize: number,
): Promise<ResolvedSource> {
  if (typeof input === 'string') {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(input);
    } catch (error) {
      throw new LocalIOError(`Cannot read source file ${path.basename(input)}: ${formatError(error)}`, { cause: error });
    }
    if (!stat.isFile()) {
      throw new LocalIOError(`Source is not a regular file: ${path.basename(input)}`);
    }
    return {
      filename: options.filename ?? path.basename(input),
      size: stat.size,
      chunks: splitFile(input, chunkSize),
    };
  }

  if (Buffer.isBuffer(input)) {
    return {
      filename: options.filename ?? 'file',
      size: input.length,
      chunks: splitStream(Readable.from([input]), chunkSize),
    };
  }

  return {
    filename: options.filename ?? 'file',
    size: null,
    chunks: splitStream(input, chunkSize),
  };
}

/**
 * Split a file, upload its chunks through the endpoint pool and record it in
 * the registry. Nothing is recorded unless every chunk made it.
 *
 * Supports file path, Buffer, or Readable stream as input.
 */
export async function uploadFile(
  input: string | Buffer | Readable,
  options: UploadOptions,
  deps: UploadDeps,
): Promise<UploadResult> {
  const { registry, pool, uploader, config, logger } = deps;

  // 1. Fail fast before touching the source
  pool.assertNotEmpty();
  const chunkSize = options.chunkSize ?? config.chunkSize;
  assertChunkSize(chunkSize);

  // 2. Resolve input to a lazy chunk sequence
  const source = await resolveSource(input, options, chunkSize);
  const totalChunks = source.size === null ? null : countChunks(source.size, chunkSize);
  const progress = (stage: TransferProgress['stage'], completedChunks: number, bytesTransferred: number): void => {
    options.onProgress?.({
      stage,
      percent: source.size ? Math.round((bytesTransferred / source.size) * 100) : stage === 'finalizing' ? 100 : 0,
      completedChunks,
      totalChunks,
      bytesTransferred,
      totalBytes: source.size,
    });
  };

  logger?.info(
    `Uploading ${source.filename}` +
      (totalChunks === null ? '' : ` (${totalChunks} chunk(s))`) +
      ` through ${pool.size} endpoint(s)`,
  );
  progress('reading', 0, 0);

  // 3. Upload in batches
  let completedChunks = 0;
  let bytesUploaded = 0;
  const urls = await uploadChunks(source.chunks, {
    pool,
    uploader,
    batchSize: config.batchSize,
    retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: config.maxRetries, initialDelayMs: config.retryInitialDelayMs },
    requestTimeoutMs: config.requestTimeoutMs,
    nameFor: ordinal =>
      totalChunks === 1 ? source.filename : getPartFilename(source.filename, ordinal + 1, totalChunks),
    signal: options.signal,
    logger,
    onChunkUploaded: (_ordinal, _chunkBytes, uploaded) => {
      completedChunks++;
      bytesUploaded = uploaded;
      progress('uploading', completedChunks, bytesUploaded);
    },
  });

  const size = source.size ?? bytesUploaded;
  if (source.size !== null && bytesUploaded !== source.size) {
    throw new LocalIOError(`Source changed while uploading: read ${bytesUploaded} of ${source.size} bytes`);
  }

  // 4. Commit the record
  progress('finalizing', completedChunks, size);
  const record = await registry.create(
    { filename: source.filename, size, urls },
    { min: config.idSpaceMin, max: config.idSpaceMax, random: deps.randomId },
  );

  logger?.info(`Uploaded ${record.filename} as file ${record.id} (${urls.length} chunk(s))`);

  return {
    fileId: record.id,
    filename: record.filename,
    size: record.size,
    totalChunks: urls.length,
    urls: record.urls,
  };
}
