/**
 * One entry of the persisted registry document, keyed by the string form of
 * the file id.
 */
export interface RegistryEntry {
  filename: string;
  size: number;
  /** Chunk locators; index = ordinal */
  urls: string[];
}

export type RegistryDocument = Record<string, RegistryEntry>;

export interface FileListing {
  id: number;
  filename: string;
  size: number;
}

export interface TransferProgress {
  stage: 'reading' | 'uploading' | 'downloading' | 'merging' | 'finalizing';
  percent: number;
  completedChunks: number;
  totalChunks: number | null;
  bytesTransferred: number;
  totalBytes: number | null;
}
