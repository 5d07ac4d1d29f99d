import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type { FileListing, RegistryDocument, RegistryEntry } from '@chunkvault/shared/types';
import { DEFAULT_EXPORT_BASENAME } from '@chunkvault/shared/constants';
import { CorruptRegistryError, LocalIOError, NotFoundError, formatError, isNodeError } from '../errors.js';
import { createMutex } from '../utils/mutex.js';
import type { Mutex } from '../utils/mutex.js';
import { writeToFreeName } from '../utils/file.js';
import { allocateId } from './id-allocator.js';
import type { IdAllocationOptions } from './id-allocator.js';
import {
  describeEntryProblem,
  parseFileId,
  parseRegistryDocument,
  parseRegistryJson,
  serializeRegistry,
  toRegistryEntry,
} from './document.js';
import type { FileRecord } from '../types.js';
import type { Logger } from '../logger.js';

/**
 * Durable id -> file record mapping kept in one JSON document.
 *
 * Every read loads the whole document; every write replaces it atomically
 * (temp file, fsync, rename). Mutations are serialized so concurrent uploads
 * in this process never lose each other's records.
 */
export class FileRegistry {
  private readonly filePath: string;
  private readonly mutex: Mutex = createMutex();
  private readonly logger?: Logger;

  constructor(filePath: string, options: { logger?: Logger } = {}) {
    this.filePath = path.resolve(filePath);
    this.logger = options.logger;
  }

  get path(): string {
    return this.filePath;
  }

  // ==================== Persistence ====================

  /**
   * Load the full document. A missing file reads as an empty registry.
   */
  async load(): Promise<RegistryDocument> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return {};
      throw new CorruptRegistryError(`Cannot read registry: ${formatError(error)}`, { cause: error });
    }
    if (text.trim() === '') return {};
    return parseRegistryJson(text, 'registry');
  }

  private async save(doc: RegistryDocument): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${crypto.randomUUID()}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      const handle = await fs.promises.open(tempPath, 'w');
      try {
        await handle.writeFile(serializeRegistry(doc), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw new LocalIOError(`Cannot write registry: ${formatError(error)}`, { cause: error });
    }
  }

  /**
   * Read-modify-write under the registry lock.
   */
  private mutate<T>(change: (doc: RegistryDocument) => T): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const doc = await this.load();
      const result = change(doc);
      await this.save(doc);
      return result;
    });
  }

  // ==================== Lookups ====================

  async find(id: number): Promise<FileRecord | null> {
    const doc = await this.load();
    const entry = doc[String(id)];
    return entry ? { id, ...toRegistryEntry(entry) } : null;
  }

  async get(id: number): Promise<FileRecord> {
    const record = await this.find(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }

  async ids(): Promise<number[]> {
    const doc = await this.load();
    return Object.keys(doc)
      .map(parseFileId)
      .filter((id): id is number => id !== null)
      .sort((a, b) => a - b);
  }

  /**
   * Id, name and size of every file, ordered by id.
   */
  async list(): Promise<FileListing[]> {
    const doc = await this.load();
    return Object.entries(doc)
      .map(([key, entry]) => ({ id: Number(key), filename: entry.filename, size: entry.size }))
      .sort((a, b) => a.id - b.id);
  }

  // ==================== Mutations ====================

  /**
   * Insert or replace the record for `id`.
   */
  async put(id: number, entry: RegistryEntry): Promise<void> {
    assertValidEntry(id, entry);
    await this.mutate(doc => {
      doc[String(id)] = toRegistryEntry(entry);
    });
    this.logger?.debug(`put file ${id} (${entry.urls.length} chunks)`);
  }

  /**
   * Allocate a fresh id and store `entry` under it in one locked step.
   */
  async create(entry: RegistryEntry, allocation: IdAllocationOptions = {}): Promise<FileRecord> {
    const id = await this.mutate(doc => {
      const existing = Object.keys(doc)
        .map(parseFileId)
        .filter((value): value is number => value !== null);
      const allocated = allocateId(existing, allocation);
      assertValidEntry(allocated, entry);
      doc[String(allocated)] = toRegistryEntry(entry);
      return allocated;
    });
    this.logger?.debug(`created file ${id} (${entry.urls.length} chunks)`);
    return { id, ...toRegistryEntry(entry) };
  }

  /**
   * Merge an external document (or a path to one) into the registry. For ids
   * present in both, the external record replaces the local one.
   *
   * Returns the imported ids.
   */
  async importFrom(source: RegistryDocument | string): Promise<number[]> {
    const external = typeof source === 'string' ? await readExternalDocument(source) : parseRegistryDocument(source, 'import');

    const ids = await this.mutate(doc => {
      for (const [key, entry] of Object.entries(external)) {
        doc[key] = toRegistryEntry(entry);
      }
      return Object.keys(external).map(Number);
    });
    this.logger?.info(`Imported ${ids.length} file record(s)`);
    return ids.sort((a, b) => a - b);
  }

  /**
   * Write the records for `ids` to a new file in `destinationDirectory`.
   * An existing file is never replaced: " (1)", " (2)", ... is inserted before
   * the extension until the name is free.
   *
   * Returns the path written.
   */
  async exportTo(
    destinationDirectory: string,
    ids: readonly number[],
    baseName: string = DEFAULT_EXPORT_BASENAME,
  ): Promise<string> {
    const doc = await this.load();
    const snapshot: RegistryDocument = {};
    for (const id of ids) {
      const entry = doc[String(id)];
      if (!entry) throw new NotFoundError(id);
      snapshot[String(id)] = toRegistryEntry(entry);
    }

    try {
      await fs.promises.mkdir(destinationDirectory, { recursive: true });
      const written = await writeToFreeName(destinationDirectory, path.basename(baseName), serializeRegistry(snapshot));
      this.logger?.info(`Exported ${ids.length} file record(s)`);
      return written;
    } catch (error) {
      throw new LocalIOError(`Cannot write export: ${formatError(error)}`, { cause: error });
    }
  }
}

function assertValidEntry(id: number, entry: RegistryEntry): void {
  if (parseFileId(String(id)) === null) {
    throw new CorruptRegistryError(`Invalid file id: ${id}`);
  }
  const problem = describeEntryProblem(entry);
  if (problem !== null) {
    throw new CorruptRegistryError(`File ${id}: ${problem}`);
  }
}

async function readExternalDocument(filePath: string): Promise<RegistryDocument> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new LocalIOError(`Cannot read import file: ${formatError(error)}`, { cause: error });
  }
  return parseRegistryJson(text, path.basename(filePath));
}
