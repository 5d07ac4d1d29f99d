import { abortReason, sleepUnlessAborted, throwIfAborted } from './abort.js';
import { TransportError, formatError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export interface RetryOptions {
  signal?: AbortSignal;
  logger?: Logger;
  /** Decide whether a failed attempt is worth repeating (default: retryable TransportErrors) */
  isRetryable?: (error: unknown) => boolean;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

/**
 * Delay before the attempt following `attempt` (1-based), with ±20% jitter.
 */
export function backoffDelay(attempt: number, config: RetryConfig, retryAfterMs?: number): number {
  let delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  if (retryAfterMs != null) {
    delay = Math.max(delay, retryAfterMs);
  }
  delay = delay * (0.8 + Math.random() * 0.4);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Retry wrapper with exponential backoff for chunk transfers.
 * Only retryable errors are repeated; cancellation stops immediately, also
 * during the backoff wait.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string = 'operation',
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {},
): Promise<T> {
  const { signal, logger } = options;
  const isRetryable = options.isRetryable ?? isRetryableError;
  const maxRetries = Math.max(1, config.maxRetries);

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await operation(attempt);
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxRetries) {
        logger?.error(`${operationName} failed after ${maxRetries} attempts`);
        throw error;
      }

      const retryAfterMs = error instanceof TransportError ? error.retryAfterMs ?? undefined : undefined;
      const delay = backoffDelay(attempt, config, retryAfterMs);
      logger?.warn(
        `${operationName} failed (attempt ${attempt}/${maxRetries}), ` +
          `retrying in ${Math.round(delay)}ms... Error: ${formatError(error)}`,
      );
      await sleepUnlessAborted(delay, signal);
    }
  }
}
