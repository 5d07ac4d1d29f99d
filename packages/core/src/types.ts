import type { RegistryEntry, TransferProgress } from '@chunkvault/shared/types';
import type { Logger } from './logger.js';

// ==================== Config ====================

export interface ChunkvaultConfig {
  /** Upload endpoint identities (webhook URLs); required for uploads only */
  endpoints?: string[];
  /** Path to the registry JSON document (default: './files_cache.json') */
  registryPath?: string;
  /** Default directory for downloads (default: './downloads') */
  downloadDir?: string;
  /** Chunk size in bytes (default: 24,000,000) */
  chunkSize?: number;
  /** Chunks uploaded concurrently per batch (default: 3) */
  batchSize?: number;
  /** Parallel chunk fetches, 0 = all at once (default: 0) */
  downloadConcurrency?: number;
  /** Scratch directory for in-flight downloads (default: os.tmpdir()/chunkvault) */
  tempDir?: string;
  /** Attempts per chunk before the transfer fails (default: 3) */
  maxRetries?: number;
  /** Backoff base delay between attempts (default: 1000) */
  retryInitialDelayMs?: number;
  /** Timeout for one chunk request (default: 120000) */
  requestTimeoutMs?: number;
  /** Smallest file id handed out (default: 1) */
  idSpaceMin?: number;
  /** Largest file id handed out (default: 9999) */
  idSpaceMax?: number;
  /** Display name used when posting through a webhook (default: 'fs') */
  webhookUsername?: string;
  /** Print debug log lines (default: CHUNKVAULT_DEBUG) */
  debug?: boolean;
}

export interface ResolvedConfig {
  endpoints: string[];
  registryPath: string;
  downloadDir: string;
  chunkSize: number;
  batchSize: number;
  downloadConcurrency: number;
  tempDir: string;
  maxRetries: number;
  retryInitialDelayMs: number;
  requestTimeoutMs: number;
  idSpaceMin: number;
  idSpaceMax: number;
  webhookUsername: string;
  debug: boolean;
}

// ==================== Records ====================

export interface FileRecord extends RegistryEntry {
  id: number;
}

export interface ChunkInput {
  ordinal: number;
  data: Buffer;
}

// ==================== Transport contracts ====================

export interface UploadPayload {
  name: string;
  data: Buffer;
}

/**
 * "Store these bytes, give me back a URL anyone can GET."
 */
export interface ChunkUploader {
  upload(endpoint: string, payload: UploadPayload, signal: AbortSignal): Promise<string>;
  destroy?(): void | Promise<void>;
}

/**
 * Plain retrieval by URL of the bytes stored behind a locator.
 */
export interface ChunkFetcher {
  fetch(url: string, signal: AbortSignal): Promise<Buffer>;
}

// ==================== Upload ====================

export interface UploadOptions {
  /** Display name (defaults to basename of file path) */
  filename?: string;
  /** Override config chunk size for this upload */
  chunkSize?: number;
  /** Progress callback */
  onProgress?: (progress: TransferProgress) => void;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}

export interface UploadResult {
  fileId: number;
  filename: string;
  size: number;
  totalChunks: number;
  urls: string[];
}

// ==================== Download ====================

export interface DownloadOptions {
  /** Replace an existing file of the same name instead of picking "name (1)" */
  overwrite?: boolean;
  onProgress?: (progress: TransferProgress) => void;
  signal?: AbortSignal;
}

export interface DownloadResult {
  fileId: number;
  filename: string;
  size: number;
  /** Where the file was written */
  path: string;
}

// ==================== Facade ====================

export interface ChunkvaultDependencies {
  uploader?: ChunkUploader;
  fetcher?: ChunkFetcher;
  logger?: Logger;
  /** Random source for id allocation; returns an integer in [min, max] */
  randomId?: (min: number, max: number) => number;
}

export interface StatusInfo {
  endpoints: number;
  registryPath: string;
  files: number;
  chunkSize: number;
}
