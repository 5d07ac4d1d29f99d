import fs from 'fs';
import { ConfigError, LocalIOError, formatError } from '../errors.js';
import type { ChunkInput } from '../types.js';

export type ByteSource = AsyncIterable<Buffer | Uint8Array | string>;

/** Read granularity when streaming a file from disk */
const READ_HIGH_WATER_MARK = 1024 * 1024;

export function assertChunkSize(chunkSize: number): void {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`Chunk size must be a positive integer (got ${chunkSize})`);
  }
}

/**
 * Number of chunks a source of `size` bytes splits into.
 */
export function countChunks(size: number, chunkSize: number): number {
  assertChunkSize(chunkSize);
  return size === 0 ? 0 : Math.ceil(size / chunkSize);
}

/**
 * Lazily cut a byte stream into ordered chunks of exactly `chunkSize` bytes
 * (the last one may be shorter). An empty source yields nothing.
 *
 * Only the chunk being assembled is held in memory; the source is not read
 * further until the consumer asks for the next chunk.
 */
export async function* splitStream(source: ByteSource, chunkSize: number): AsyncGenerator<ChunkInput> {
  assertChunkSize(chunkSize);

  let pending: Buffer[] = [];
  let pendingBytes = 0;
  let ordinal = 0;

  for await (const piece of source) {
    let buf = typeof piece === 'string' ? Buffer.from(piece) : Buffer.isBuffer(piece) ? piece : Buffer.from(piece);

    while (buf.length > 0) {
      const take = Math.min(chunkSize - pendingBytes, buf.length);
      pending.push(buf.subarray(0, take));
      pendingBytes += take;
      buf = buf.subarray(take);

      if (pendingBytes === chunkSize) {
        yield { ordinal: ordinal++, data: Buffer.concat(pending, pendingBytes) };
        pending = [];
        pendingBytes = 0;
      }
    }
  }

  if (pendingBytes > 0) {
    yield { ordinal, data: Buffer.concat(pending, pendingBytes) };
  }
}

async function* readFileStream(filePath: string): AsyncGenerator<Buffer> {
  const stream = fs.createReadStream(filePath, { highWaterMark: READ_HIGH_WATER_MARK });
  try {
    for await (const piece of stream) {
      yield Buffer.isBuffer(piece) ? piece : Buffer.from(piece);
    }
  } catch (error) {
    throw new LocalIOError(`Cannot read source file: ${formatError(error)}`, { cause: error });
  } finally {
    stream.destroy();
  }
}

/**
 * Split a file on disk. Read failures surface as LocalIOError.
 */
export function splitFile(filePath: string, chunkSize: number): AsyncGenerator<ChunkInput> {
  return splitStream(readFileStream(filePath), chunkSize);
}
