// Default chunk size: 24MB (stays under the webhook attachment limit)
export const DEFAULT_CHUNK_SIZE = 24_000_000;

// Default number of chunks uploaded concurrently per batch
export const DEFAULT_UPLOAD_BATCH_SIZE = 3;

// Default concurrent chunk fetches (0 = all at once)
export const DEFAULT_DOWNLOAD_CONCURRENCY = 0;

// File identifier space
export const DEFAULT_ID_SPACE_MIN = 1;
export const DEFAULT_ID_SPACE_MAX = 9999;

// Retry / timeout settings
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_INITIAL_DELAY_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

// File names
export const DEFAULT_REGISTRY_FILENAME = 'files_cache.json';
export const DEFAULT_EXPORT_BASENAME = 'files_export.json';
export const DEFAULT_WEBHOOK_USERNAME = 'fs';
