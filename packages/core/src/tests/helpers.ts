import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { TransportError } from '../errors.js';
import type { ChunkFetcher, ChunkUploader, UploadPayload } from '../types.js';
import type { RetryConfig } from '../utils/retry.js';

export const FAST_RETRY: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1,
  maxDelayMs: 5,
  backoffMultiplier: 2,
};

export const TEST_ENDPOINTS = [
  'https://discord.test/api/webhooks/1/test-secret-a',
  'https://discord.test/api/webhooks/2/test-secret-b',
];

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `chunkvault-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Deterministic bytes: byte i is i mod 251.
 */
export function patternBuffer(size: number): Buffer {
  const buf = Buffer.alloc(size);
  for (let i = 0; i < size; i++) buf[i] = i % 251;
  return buf;
}

export function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Resolves after `ms`, or rejects with the abort reason.
 */
export function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

export interface UploadCall {
  endpoint: string;
  name: string;
  size: number;
  signal: AbortSignal;
}

/** Return an error to fail this call, or null to let it through */
export type UploadFailure = (call: UploadCall, attempt: number) => Error | null;

/**
 * In-memory uploader: every payload gets a URL the matching MemoryFetcher can read.
 */
export class MemoryUploader implements ChunkUploader {
  readonly store: Map<string, Buffer>;
  readonly calls: UploadCall[] = [];
  destroyed = false;
  inFlight = 0;
  maxInFlight = 0;
  private counter = 0;
  private readonly attempts = new Map<string, number>();

  constructor(
    store: Map<string, Buffer> = new Map(),
    private readonly options: { fail?: UploadFailure; delayMs?: number; delayFor?: (name: string) => number } = {},
  ) {
    this.store = store;
  }

  async upload(endpoint: string, payload: UploadPayload, signal: AbortSignal): Promise<string> {
    const call: UploadCall = { endpoint, name: payload.name, size: payload.data.length, signal };
    this.calls.push(call);
    const attempt = (this.attempts.get(payload.name) ?? 0) + 1;
    this.attempts.set(payload.name, attempt);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const delay = this.options.delayFor?.(payload.name) ?? this.options.delayMs ?? 0;
      if (delay > 0) await waitOrAbort(delay, signal);

      const failure = this.options.fail?.(call, attempt);
      if (failure) throw failure;

      const url = `https://cdn.test/attachments/${++this.counter}/${payload.name}`;
      this.store.set(url, Buffer.from(payload.data));
      return url;
    } finally {
      this.inFlight--;
    }
  }

  destroy(): void {
    this.destroyed = true;
  }

  /** Uploaded sizes in call order */
  sizes(): number[] {
    return this.calls.map(call => call.size);
  }
}

export type FetchFailure = (url: string, attempt: number) => Error | null;

/**
 * Serves the bytes a MemoryUploader stored; unknown URLs answer 404.
 */
export class MemoryFetcher implements ChunkFetcher {
  readonly requested: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly attempts = new Map<string, number>();

  constructor(
    private readonly store: Map<string, Buffer>,
    private readonly options: { fail?: FetchFailure; delayMs?: number; hang?: (url: string) => boolean } = {},
  ) {}

  async fetch(url: string, signal: AbortSignal): Promise<Buffer> {
    this.requested.push(url);
    const attempt = (this.attempts.get(url) ?? 0) + 1;
    this.attempts.set(url, attempt);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.options.hang?.(url)) {
        await waitOrAbort(60_000, signal);
      } else if (this.options.delayMs) {
        await waitOrAbort(this.options.delayMs, signal);
      }

      const failure = this.options.fail?.(url, attempt);
      if (failure) throw failure;

      const data = this.store.get(url);
      if (!data) {
        throw new TransportError(`GET ${url} failed: HTTP 404`, { url, status: 404 });
      }
      return Buffer.from(data);
    } finally {
      this.inFlight--;
    }
  }
}

export function retryableError(message = 'HTTP 503'): TransportError {
  return new TransportError(message, { status: 503, retryable: true });
}

export function permanentError(message = 'HTTP 404'): TransportError {
  return new TransportError(message, { status: 404, retryable: false });
}
