import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { IncompleteTransferError, LocalIOError, formatError, isNodeError } from '../errors.js';
import { linkIntoFreeName } from '../utils/file.js';

export interface MergeOptions {
  /** Replace an existing destination instead of picking "name (1)" */
  overwrite?: boolean;
  /** Called after each part is appended */
  onPartMerged?: (ordinal: number, bytesWritten: number) => void;
}

/**
 * Concatenate ordinal-indexed part files into `destPath`.
 *
 * Parts are written in ordinal order into a temporary file beside the
 * destination; only when exactly `totalSize` bytes were written is it moved
 * into place. Nothing is left at the destination on failure.
 *
 * Returns the path actually written (differs from `destPath` when the name was
 * taken and `overwrite` is off).
 */
export async function mergeChunks(
  partPaths: readonly string[],
  totalSize: number,
  destPath: string,
  options: MergeOptions = {},
): Promise<string> {
  const dir = path.dirname(destPath);
  const tempPath = path.join(dir, `.${path.basename(destPath)}.${crypto.randomUUID()}.partial`);

  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(tempPath, 'wx');
  } catch (error) {
    throw new LocalIOError(`Cannot write to ${dir}: ${formatError(error)}`, { cause: error });
  }

  let committed = false;
  try {
    let written = 0;
    try {
      for (let ordinal = 0; ordinal < partPaths.length; ordinal++) {
        written += await appendPart(handle, partPaths[ordinal], ordinal);
        options.onPartMerged?.(ordinal, written);
      }
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (written !== totalSize) {
      throw new IncompleteTransferError(`Merged ${written} bytes, expected ${totalSize}`);
    }

    const finalPath = await commit(tempPath, destPath, options.overwrite ?? false);
    committed = true;
    return finalPath;
  } finally {
    if (!committed) {
      await fs.promises.rm(tempPath, { force: true });
    }
  }
}

async function commit(tempPath: string, destPath: string, overwrite: boolean): Promise<string> {
  try {
    if (overwrite) {
      await fs.promises.rename(tempPath, destPath);
      return destPath;
    }
    return await linkIntoFreeName(tempPath, path.dirname(destPath), path.basename(destPath));
  } catch (error) {
    throw new LocalIOError(`Cannot save ${destPath}: ${formatError(error)}`, { cause: error });
  }
}

async function appendPart(handle: fs.promises.FileHandle, partPath: string | undefined, ordinal: number): Promise<number> {
  if (partPath === undefined) {
    throw new IncompleteTransferError(`Chunk ${ordinal} is missing`);
  }

  let bytes = 0;
  try {
    for await (const piece of fs.createReadStream(partPath)) {
      const buf = Buffer.isBuffer(piece) ? piece : Buffer.from(piece);
      await handle.write(buf);
      bytes += buf.length;
    }
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new IncompleteTransferError(`Chunk ${ordinal} is missing`, { cause: error });
    }
    throw new LocalIOError(`Cannot merge chunk ${ordinal}: ${formatError(error)}`, { cause: error });
  }
  return bytes;
}
