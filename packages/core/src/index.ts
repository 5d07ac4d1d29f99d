import type { Readable } from 'stream';
import type { FileListing, RegistryDocument, RegistryEntry } from '@chunkvault/shared/types';
import type {
  ChunkvaultConfig,
  ChunkvaultDependencies,
  ChunkFetcher,
  ChunkUploader,
  DownloadOptions,
  DownloadResult,
  FileRecord,
  ResolvedConfig,
  StatusInfo,
  UploadOptions,
  UploadResult,
} from './types.js';
import { resolveConfig, configFromEnv } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { EndpointPool } from './discord/endpoint-pool.js';
import { WebhookUploader } from './discord/webhook-uploader.js';
import { HttpChunkFetcher } from './download/http-fetcher.js';
import { FileRegistry } from './registry/registry.js';
import { uploadFile } from './upload/orchestrator.js';
import { downloadFile } from './download/orchestrator.js';

export class Chunkvault {
  private readonly config: ResolvedConfig;
  private readonly registry: FileRegistry;
  private readonly pool: EndpointPool;
  private readonly uploader: ChunkUploader;
  private readonly fetcher: ChunkFetcher;
  private readonly logger: Logger;
  private readonly uploadLogger: Logger;
  private readonly downloadLogger: Logger;
  private readonly randomId?: (min: number, max: number) => number;

  constructor(config: ChunkvaultConfig = {}, deps: ChunkvaultDependencies = {}) {
    this.config = resolveConfig(config);
    const logFor = (prefix: string): Logger => deps.logger ?? createLogger(prefix, { debug: this.config.debug });
    this.logger = logFor('Chunkvault');
    this.uploadLogger = logFor('Upload');
    this.downloadLogger = logFor('Download');
    this.registry = new FileRegistry(this.config.registryPath, { logger: logFor('Registry') });
    this.pool = new EndpointPool(this.config.endpoints);
    this.uploader =
      deps.uploader ??
      new WebhookUploader({
        username: this.config.webhookUsername,
        requestTimeoutMs: this.config.requestTimeoutMs,
      });
    this.fetcher = deps.fetcher ?? new HttpChunkFetcher();
    this.randomId = deps.randomId;
  }

  // ==================== Upload ====================

  /**
   * Upload a file from disk.
   */
  async upload(filePath: string, opts?: UploadOptions): Promise<UploadResult> {
    return uploadFile(filePath, opts ?? {}, this.uploadDeps());
  }

  /**
   * Upload a Buffer.
   */
  async uploadBuffer(buf: Buffer, filename: string, opts?: UploadOptions): Promise<UploadResult> {
    return uploadFile(buf, { ...opts, filename }, this.uploadDeps());
  }

  /**
   * Upload a Readable stream.
   */
  async uploadStream(stream: Readable, filename: string, opts?: UploadOptions): Promise<UploadResult> {
    return uploadFile(stream, { ...opts, filename }, this.uploadDeps());
  }

  private uploadDeps() {
    return {
      registry: this.registry,
      pool: this.pool,
      uploader: this.uploader,
      config: this.config,
      logger: this.uploadLogger,
      randomId: this.randomId,
    };
  }

  // ==================== Download ====================

  /**
   * Download a file into `destDir` (default: the configured download directory).
   */
  async download(fileId: number, destDir?: string, opts?: DownloadOptions): Promise<DownloadResult> {
    return downloadFile(
      fileId,
      destDir ?? this.config.downloadDir,
      { registry: this.registry, fetcher: this.fetcher, config: this.config, logger: this.downloadLogger },
      opts,
    );
  }

  // ==================== Registry ====================

  /**
   * Look up a file record. Throws NotFoundError for unknown ids.
   */
  async get(fileId: number): Promise<FileRecord> {
    return this.registry.get(fileId);
  }

  async list(): Promise<FileListing[]> {
    return this.registry.list();
  }

  /**
   * Store a record under an explicit id, replacing any existing one.
   */
  async put(fileId: number, entry: RegistryEntry): Promise<void> {
    return this.registry.put(fileId, entry);
  }

  /**
   * Merge records from an exported document or a path to one.
   */
  async importFrom(source: RegistryDocument | string): Promise<number[]> {
    return this.registry.importFrom(source);
  }

  /**
   * Export the given ids to a new file in `destDir`; returns its path.
   */
  async exportTo(destDir: string, fileIds: readonly number[], baseName?: string): Promise<string> {
    return this.registry.exportTo(destDir, fileIds, baseName);
  }

  // ==================== Status & Lifecycle ====================

  async status(): Promise<StatusInfo> {
    const ids = await this.registry.ids();
    return {
      endpoints: this.pool.size,
      registryPath: this.registry.path,
      files: ids.length,
      chunkSize: this.config.chunkSize,
    };
  }

  /**
   * Close webhook clients.
   */
  async destroy(): Promise<void> {
    await this.uploader.destroy?.();
    this.logger.debug('destroyed');
  }

  /**
   * Read config from environment variables.
   *
   * ```ts
   * const vault = new Chunkvault({
   *   ...Chunkvault.configFromEnv(),
   *   registryPath: './my-files.json',
   * });
   * ```
   */
  static configFromEnv = configFromEnv;
}

// ==================== Re-exports ====================

export { Chunkvault as default };

// Config
export { resolveConfig, configFromEnv, DEFAULT_CHUNK_SIZE } from './config.js';

// Logging
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Errors
export {
  ChunkvaultError,
  LocalIOError,
  TransportError,
  OperationFailedError,
  IncompleteTransferError,
  CancelledError,
  RegistryError,
  NotFoundError,
  CorruptRegistryError,
  ExhaustedIdSpaceError,
  EmptyPoolError,
  ConfigError,
  formatError,
  isNodeError,
} from './errors.js';

// Components
export { EndpointPool, assertEndpointUrl, maskEndpoint } from './discord/endpoint-pool.js';
export { WebhookUploader } from './discord/webhook-uploader.js';
export { HttpChunkFetcher } from './download/http-fetcher.js';
export { FileRegistry } from './registry/registry.js';
export { allocateId } from './registry/id-allocator.js';
export { parseFileId } from './registry/document.js';
export { splitStream, splitFile, countChunks } from './chunker/splitter.js';
export { mergeChunks } from './chunker/merger.js';

// Orchestrators
export { uploadFile } from './upload/orchestrator.js';
export { uploadChunks } from './upload/batch-uploader.js';
export { downloadFile } from './download/orchestrator.js';
export { downloadPartsToScratch } from './download/part-downloader.js';

// Utilities
export { withRetry } from './utils/retry.js';
export { formatFileSize, getPartFilename } from './utils/file.js';

// Types
export type {
  ChunkvaultConfig,
  ChunkvaultDependencies,
  ResolvedConfig,
  ChunkInput,
  ChunkUploader,
  ChunkFetcher,
  UploadPayload,
  FileRecord,
  UploadOptions,
  UploadResult,
  DownloadOptions,
  DownloadResult,
  StatusInfo,
} from './types.js';
export type { FileListing, RegistryDocument, RegistryEntry, TransferProgress } from '@chunkvault/shared/types';
