import fs from 'fs';
import path from 'path';
import { isNodeError } from '../errors.js';

/**
 * Generate part filename: "video.mp4.part001of013", or "video.mp4.part001"
 * when the total is not known up front.
 */
export function getPartFilename(baseName: string, partNum: number, totalParts?: number | null): string {
  const partStr = String(partNum).padStart(3, '0');
  if (totalParts == null) {
    return baseName + '.part' + partStr;
  }
  const totalStr = String(totalParts).padStart(3, '0');
  return baseName + '.part' + partStr + 'of' + totalStr;
}

/**
 * Extract base name and extension from filename
 */
export function parseFilename(filename: string): { name: string; ext: string } {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1 || lastDot === 0) {
    return { name: filename, ext: '' };
  }
  return {
    name: filename.substring(0, lastDot),
    ext: filename.substring(lastDot),
  };
}

/**
 * Disambiguated variant of a filename: "report.json" -> "report (2).json".
 * Attempt 0 is the filename itself.
 */
export function disambiguateFilename(filename: string, attempt: number): string {
  if (attempt === 0) return filename;
  const { name, ext } = parseFilename(filename);
  return `${name} (${attempt})${ext}`;
}

/**
 * Reduce a stored display name to something safe to create inside a directory.
 */
export function toSafeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  if (base === '' || base === '.' || base === '..') return 'file';
  return base;
}

/**
 * Format file size for display (e.g. "1.50 MB")
 */
export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return size.toFixed(2) + ' ' + units[unitIndex];
}

/** link() failures that mean hard links are unavailable here */
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'EXDEV', 'ENOSYS', 'EMLINK']);

/**
 * Move `sourcePath` into `dir` under `filename` without ever replacing an
 * existing file: the first free name among "name", "name (1)", ... wins.
 * Where hard links are unavailable the file is copied exclusively instead.
 * Returns the final path.
 */
export async function linkIntoFreeName(sourcePath: string, dir: string, filename: string): Promise<string> {
  let useCopy = false;
  for (let attempt = 0; ; attempt++) {
    const candidate = path.join(dir, disambiguateFilename(filename, attempt));
    try {
      if (useCopy) {
        await fs.promises.copyFile(sourcePath, candidate, fs.constants.COPYFILE_EXCL);
      } else {
        await fs.promises.link(sourcePath, candidate);
      }
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') continue;
      if (!useCopy && isNodeError(error) && LINK_UNSUPPORTED.has(error.code ?? '')) {
        useCopy = true;
        attempt--;
        continue;
      }
      throw error;
    }
    await fs.promises.unlink(sourcePath);
    return candidate;
  }
}

/**
 * Create a new file in `dir` with `contents`, never replacing an existing one.
 * Returns the path that was written.
 */
export async function writeToFreeName(dir: string, filename: string, contents: string): Promise<string> {
  for (let attempt = 0; ; attempt++) {
    const candidate = path.join(dir, disambiguateFilename(filename, attempt));
    try {
      await fs.promises.writeFile(candidate, contents, { encoding: 'utf-8', flag: 'wx' });
      return candidate;
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') continue;
      throw error;
    }
  }
}

/**
 * Sleep helper
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
