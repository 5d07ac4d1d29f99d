import os from 'os';
import path from 'path';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_DOWNLOAD_CONCURRENCY,
  DEFAULT_ID_SPACE_MAX,
  DEFAULT_ID_SPACE_MIN,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REGISTRY_FILENAME,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_INITIAL_DELAY_MS,
  DEFAULT_UPLOAD_BATCH_SIZE,
  DEFAULT_WEBHOOK_USERNAME,
} from '@chunkvault/shared/constants';
import { ConfigError } from './errors.js';
import type { ChunkvaultConfig, ResolvedConfig } from './types.js';

export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_DOWNLOAD_CONCURRENCY,
  DEFAULT_UPLOAD_BATCH_SIZE,
  DEFAULT_ID_SPACE_MIN,
  DEFAULT_ID_SPACE_MAX,
};

/**
 * Throw a ConfigError unless `value` is a safe integer >= `min`.
 */
export function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got ${value})`);
  }
}

/**
 * Resolve a partial config into a fully resolved config with defaults.
 */
export function resolveConfig(config: ChunkvaultConfig = {}): ResolvedConfig {
  const resolved: ResolvedConfig = {
    endpoints: (config.endpoints ?? []).map(e => e.trim()).filter(e => e.length > 0),
    registryPath: config.registryPath ?? path.resolve(DEFAULT_REGISTRY_FILENAME),
    downloadDir: config.downloadDir ?? path.resolve('downloads'),
    chunkSize: config.chunkSize ?? DEFAULT_CHUNK_SIZE,
    batchSize: config.batchSize ?? DEFAULT_UPLOAD_BATCH_SIZE,
    downloadConcurrency: config.downloadConcurrency ?? DEFAULT_DOWNLOAD_CONCURRENCY,
    tempDir: config.tempDir ?? path.join(os.tmpdir(), 'chunkvault'),
    maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryInitialDelayMs: config.retryInitialDelayMs ?? DEFAULT_RETRY_INITIAL_DELAY_MS,
    requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    idSpaceMin: config.idSpaceMin ?? DEFAULT_ID_SPACE_MIN,
    idSpaceMax: config.idSpaceMax ?? DEFAULT_ID_SPACE_MAX,
    webhookUsername: config.webhookUsername ?? DEFAULT_WEBHOOK_USERNAME,
    debug: config.debug ?? false,
  };

  assertInteger('chunkSize', resolved.chunkSize, 1);
  assertInteger('batchSize', resolved.batchSize, 1);
  assertInteger('downloadConcurrency', resolved.downloadConcurrency, 0);
  assertInteger('maxRetries', resolved.maxRetries, 1);
  assertInteger('retryInitialDelayMs', resolved.retryInitialDelayMs, 0);
  assertInteger('requestTimeoutMs', resolved.requestTimeoutMs, 1);
  assertInteger('idSpaceMin', resolved.idSpaceMin, 1);
  assertInteger('idSpaceMax', resolved.idSpaceMax, resolved.idSpaceMin);

  return resolved;
}

/**
 * Read chunkvault config from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ChunkvaultConfig {
  const result: ChunkvaultConfig = {};

  const endpoints = getWebhookUrlsFromEnv(env);
  if (endpoints.length > 0) result.endpoints = endpoints;

  if (env.CHUNKVAULT_REGISTRY_PATH) result.registryPath = env.CHUNKVAULT_REGISTRY_PATH;
  if (env.CHUNKVAULT_DOWNLOAD_DIR) result.downloadDir = env.CHUNKVAULT_DOWNLOAD_DIR;
  if (env.UPLOAD_TEMP_DIR) result.tempDir = env.UPLOAD_TEMP_DIR;
  if (env.CHUNK_SIZE) result.chunkSize = parseInt(env.CHUNK_SIZE, 10);
  if (env.UPLOAD_BATCH_SIZE) result.batchSize = parseInt(env.UPLOAD_BATCH_SIZE, 10);
  if (env.DOWNLOAD_CONCURRENCY) result.downloadConcurrency = parseInt(env.DOWNLOAD_CONCURRENCY, 10);
  if (env.MAX_RETRIES) result.maxRetries = parseInt(env.MAX_RETRIES, 10);
  if (env.REQUEST_TIMEOUT_MS) result.requestTimeoutMs = parseInt(env.REQUEST_TIMEOUT_MS, 10);
  if (env.ID_SPACE_MAX) result.idSpaceMax = parseInt(env.ID_SPACE_MAX, 10);
  if (env.CHUNKVAULT_DEBUG !== undefined) {
    result.debug = env.CHUNKVAULT_DEBUG === '1' || env.CHUNKVAULT_DEBUG === 'true';
  }

  return result;
}

function getWebhookUrlsFromEnv(env: NodeJS.ProcessEnv): string[] {
  return Object.entries(env)
    .filter(([key]) => /^CHUNKVAULT_WEBHOOK_URL(_\d+)?$/.test(key))
    .map(([key, value]) => {
      const match = key.match(/^CHUNKVAULT_WEBHOOK_URL(?:_(\d+))?$/);
      const num = match?.[1] ? parseInt(match[1], 10) : 1;
      return { value: value?.trim() ?? '', num };
    })
    .sort((a, b) => a.num - b.num)
    .map(({ value }) => value)
    .filter(value => value.length > 0);
}
