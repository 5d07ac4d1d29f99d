export type ErrorCode =
  | 'LOCAL_IO'
  | 'TRANSPORT'
  | 'OPERATION_FAILED'
  | 'INCOMPLETE_TRANSFER'
  | 'CANCELLED'
  | 'NOT_FOUND'
  | 'CORRUPT_REGISTRY'
  | 'EXHAUSTED_ID_SPACE'
  | 'EMPTY_POOL'
  | 'CONFIG';

/**
 * Base class for every error raised by the chunkvault core.
 */
export class ChunkvaultError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Source file missing/unreadable, or destination/scratch storage unwritable.
 */
export class LocalIOError extends ChunkvaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOCAL_IO', message, options);
  }
}

export interface TransportErrorOptions {
  url?: string;
  status?: number | null;
  retryable?: boolean;
  /** Server-requested wait before the next attempt */
  retryAfterMs?: number | null;
  cause?: unknown;
}

/**
 * A single chunk upload or fetch failed.
 */
export class TransportError extends ChunkvaultError {
  readonly url: string | null;
  readonly status: number | null;
  readonly retryable: boolean;
  readonly retryAfterMs: number | null;

  constructor(message: string, options: TransportErrorOptions = {}) {
    super('TRANSPORT', message, { cause: options.cause });
    this.url = options.url ?? null;
    this.status = options.status ?? null;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export type TransferOperation = 'upload' | 'download';

export interface OperationFailedOptions {
  fileId?: number | null;
  ordinal?: number | null;
  cause?: unknown;
}

/**
 * A whole upload or download was aborted after a chunk failed for good.
 */
export class OperationFailedError extends ChunkvaultError {
  readonly operation: TransferOperation;
  readonly fileId: number | null;
  readonly ordinal: number | null;

  constructor(operation: TransferOperation, options: OperationFailedOptions = {}) {
    const subject = options.fileId != null ? ` of file ${options.fileId}` : '';
    const where = options.ordinal != null ? ` at chunk ${options.ordinal}` : '';
    super('OPERATION_FAILED', `${operation}${subject} failed${where}: ${formatError(options.cause)}`, {
      cause: options.cause,
    });
    this.operation = operation;
    this.fileId = options.fileId ?? null;
    this.ordinal = options.ordinal ?? null;
  }
}

export class IncompleteTransferError extends ChunkvaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INCOMPLETE_TRANSFER', message, options);
  }
}

export class CancelledError extends ChunkvaultError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
  }
}

// ==================== Registry ====================

export class RegistryError extends ChunkvaultError {}

export class NotFoundError extends RegistryError {
  readonly fileId: number;

  constructor(fileId: number) {
    super('NOT_FOUND', `No such file: ${fileId}`);
    this.fileId = fileId;
  }
}

export class CorruptRegistryError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORRUPT_REGISTRY', message, options);
  }
}

export class ExhaustedIdSpaceError extends RegistryError {
  constructor(min: number, max: number) {
    super('EXHAUSTED_ID_SPACE', `Every file id in ${min}-${max} is taken`);
  }
}

// ==================== Setup ====================

export class EmptyPoolError extends ChunkvaultError {
  constructor() {
    super('EMPTY_POOL', 'No upload endpoints configured');
  }
}

export class ConfigError extends ChunkvaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/**
 * Message of an unknown thrown value.
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
