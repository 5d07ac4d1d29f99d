import { AttachmentBuilder, WebhookClient } from 'discord.js';
import type { WebhookMessageCreateOptions } from 'discord.js';
import { TransportError, formatError } from '../errors.js';
import { abortable, throwIfAborted } from '../utils/abort.js';
import { maskEndpoint } from './endpoint-pool.js';
import type { ChunkUploader, UploadPayload } from '../types.js';

/** What a webhook send returns that the uploader reads */
export interface WebhookMessage {
  attachments: Array<{ url: string }>;
}

/** The part of a webhook client the uploader needs */
export interface WebhookSender {
  send(options: WebhookMessageCreateOptions): Promise<WebhookMessage>;
  destroy(): void;
}

export interface WebhookUploaderOptions {
  /** Display name attached to every message (default: 'fs') */
  username?: string;
  /** REST timeout for one send, ms */
  requestTimeoutMs?: number;
  /** Client factory, replaceable for tests */
  createClient?: (url: string, requestTimeoutMs: number) => WebhookSender;
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function defaultCreateClient(url: string, requestTimeoutMs: number): WebhookSender {
  return new WebhookClient({ url }, { rest: { timeout: requestTimeoutMs } });
}

function readStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function readCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Classify a failed webhook send. Rate limits, server errors, timeouts and
 * network failures are worth retrying; other statuses are not.
 */
export function toTransportError(error: unknown, endpoint: string): TransportError {
  if (error instanceof TransportError) return error;

  const status = readStatus(error);
  const code = readCode(error);
  const isTimeout = error instanceof Error && error.name === 'AbortError';
  const retryable =
    status === 429 ||
    (status !== null && status >= 500) ||
    isTimeout ||
    (code !== null && NETWORK_ERROR_CODES.has(code)) ||
    formatError(error).toLowerCase().includes('rate limit');

  return new TransportError(`Webhook upload to ${maskEndpoint(endpoint)} failed: ${formatError(error)}`, {
    url: maskEndpoint(endpoint),
    status,
    retryable,
    cause: error,
  });
}

/**
 * Uploads each chunk as a single attachment through a Discord webhook and
 * returns the attachment's CDN URL.
 */
export class WebhookUploader implements ChunkUploader {
  private readonly clients = new Map<string, WebhookSender>();
  private readonly username: string;
  private readonly requestTimeoutMs: number;
  private readonly createClient: (url: string, requestTimeoutMs: number) => WebhookSender;

  constructor(options: WebhookUploaderOptions = {}) {
    this.username = options.username ?? 'fs';
    this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
    this.createClient = options.createClient ?? defaultCreateClient;
  }

  private clientFor(endpoint: string): WebhookSender {
    let client = this.clients.get(endpoint);
    if (!client) {
      try {
        client = this.createClient(endpoint, this.requestTimeoutMs);
      } catch (error) {
        throw new TransportError(`Invalid webhook ${maskEndpoint(endpoint)}: ${formatError(error)}`, {
          url: maskEndpoint(endpoint),
          cause: error,
        });
      }
      this.clients.set(endpoint, client);
    }
    return client;
  }

  async upload(endpoint: string, payload: UploadPayload, signal: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const client = this.clientFor(endpoint);

    let message: WebhookMessage;
    try {
      message = await abortable(
        client.send({
          username: this.username,
          files: [new AttachmentBuilder(payload.data, { name: payload.name })],
        }),
        signal,
      );
    } catch (error) {
      if (signal.aborted) throw error;
      throw toTransportError(error, endpoint);
    }

    const attachment = message.attachments[0];
    if (!attachment) {
      throw new TransportError(`Webhook ${maskEndpoint(endpoint)} returned no attachment for ${payload.name}`, {
        url: maskEndpoint(endpoint),
        retryable: true,
      });
    }
    return attachment.url;
  }

  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}
