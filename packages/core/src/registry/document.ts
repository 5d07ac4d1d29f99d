import type { RegistryDocument, RegistryEntry } from '@chunkvault/shared/types';
import { CorruptRegistryError } from '../errors.js';

const ID_KEY = /^[1-9]\d*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the string key of a registry entry into a file id.
 */
export function parseFileId(key: string): number | null {
  if (!ID_KEY.test(key)) return null;
  const id = Number(key);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Check one entry; returns a description of the problem, or null when valid.
 */
export function describeEntryProblem(entry: unknown): string | null {
  if (!isRecord(entry)) return 'entry is not an object';
  const { filename, size, urls } = entry;
  if (typeof filename !== 'string' || filename.length === 0) return 'filename must be a non-empty string';
  if (typeof size !== 'number' || !Number.isSafeInteger(size) || size < 0) return 'size must be a non-negative integer';
  if (!Array.isArray(urls) || !urls.every(u => typeof u === 'string')) return 'urls must be an array of strings';
  if (size === 0 && urls.length > 0) return 'empty file cannot have chunks';
  if (size > 0 && urls.length === 0) return 'non-empty file has no chunks';
  if (size > 0 && urls.length > size) return 'more chunks than bytes';
  return null;
}

export function toRegistryEntry(entry: RegistryEntry): RegistryEntry {
  return { filename: entry.filename, size: entry.size, urls: [...entry.urls] };
}

/**
 * Validate an untrusted value as a registry document. Extra fields on an
 * entry are dropped.
 */
export function parseRegistryDocument(raw: unknown, source: string): RegistryDocument {
  if (!isRecord(raw)) {
    throw new CorruptRegistryError(`${source}: expected an object of file records`);
  }

  const doc: RegistryDocument = {};
  for (const [key, entry] of Object.entries(raw)) {
    if (parseFileId(key) === null) {
      throw new CorruptRegistryError(`${source}: invalid file id "${key}"`);
    }
    const problem = describeEntryProblem(entry);
    if (problem !== null || !isRecord(entry)) {
      throw new CorruptRegistryError(`${source}: file ${key}: ${problem ?? 'invalid entry'}`);
    }
    doc[key] = {
      filename: String(entry.filename),
      size: Number(entry.size),
      urls: Array.isArray(entry.urls) ? entry.urls.map(String) : [],
    };
  }
  return doc;
}

/**
 * Parse registry JSON text.
 */
export function parseRegistryJson(text: string, source: string): RegistryDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CorruptRegistryError(`${source}: not valid JSON`, { cause: error });
  }
  return parseRegistryDocument(raw, source);
}

export function serializeRegistry(doc: RegistryDocument): string {
  return JSON.stringify(doc, null, 4) + '\n';
}
