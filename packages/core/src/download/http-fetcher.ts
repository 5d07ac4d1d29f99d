import { TransportError, formatError } from '../errors.js';
import type { ChunkFetcher } from '../types.js';

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

/**
 * Fetches chunk bytes with a plain GET.
 */
export class HttpChunkFetcher implements ChunkFetcher {
  async fetch(url: string, signal: AbortSignal): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(url, { signal });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new TransportError(`GET ${url} failed: ${formatError(error)}`, {
        url,
        retryable: true,
        cause: error,
      });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(`GET ${url} failed: HTTP ${response.status}`, {
        url,
        status: response.status,
        retryable: response.status === 429 || response.status >= 500,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      });
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (signal.aborted) throw error;
      throw new TransportError(`Reading body of ${url} failed: ${formatError(error)}`, {
        url,
        retryable: true,
        cause: error,
      });
    }
  }
}
