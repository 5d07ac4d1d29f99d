import { ConfigError, EmptyPoolError } from '../errors.js';

/**
 * Ordered set of upload endpoint identities. Chunk `i` always goes through
 * `endpoints[i mod n]`.
 */
export class EndpointPool {
  private readonly endpoints: readonly string[];

  constructor(endpoints: readonly string[]) {
    for (const endpoint of endpoints) {
      assertEndpointUrl(endpoint);
    }
    this.endpoints = [...endpoints];
  }

  get size(): number {
    return this.endpoints.length;
  }

  list(): readonly string[] {
    return this.endpoints;
  }

  assertNotEmpty(): void {
    if (this.endpoints.length === 0) {
      throw new EmptyPoolError();
    }
  }

  /**
   * Endpoint responsible for the chunk at `ordinal`.
   */
  assign(ordinal: number): string {
    this.assertNotEmpty();
    if (!Number.isSafeInteger(ordinal) || ordinal < 0) {
      throw new RangeError(`Invalid chunk ordinal: ${ordinal}`);
    }
    return this.endpoints[ordinal % this.endpoints.length];
  }

  /**
   * Index into the pool for `ordinal` (useful for logging without exposing the URL).
   */
  indexOf(ordinal: number): number {
    this.assertNotEmpty();
    return ordinal % this.endpoints.length;
  }
}

export function assertEndpointUrl(endpoint: string): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigError(`Invalid endpoint URL: ${maskEndpoint(endpoint)}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError(`Endpoint must be an http(s) URL: ${maskEndpoint(endpoint)}`);
  }
}

/**
 * Endpoint URL with its secret part hidden, for logs and error messages.
 * "https://discord.com/api/webhooks/123/abc" -> "https://discord.com/api/webhooks/123/***"
 */
export function maskEndpoint(endpoint: string): string {
  const withoutQuery = endpoint.split('?')[0];
  const segments = withoutQuery.split('/');
  if (segments.length <= 3) return withoutQuery;
  segments[segments.length - 1] = '***';
  return segments.join('/');
}
