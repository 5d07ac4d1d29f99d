/**
 * Display Functions
 * Table output and progress spinners
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { formatFileSize } from '@chunkvault/core';
import type { FileListing, TransferProgress } from '@chunkvault/core';

export const DISPLAY = {
  ID_WIDTH: 8,
  FILENAME_WIDTH: 32,
  FILENAME_TRUNCATE_SUFFIX: 29,
  DIVIDER_LENGTH: 56,
} as const;

function fitFilename(filename: string): string {
  if (filename.length <= DISPLAY.FILENAME_WIDTH) return filename.padEnd(DISPLAY.FILENAME_WIDTH);
  return (filename.slice(0, DISPLAY.FILENAME_TRUNCATE_SUFFIX) + '...').padEnd(DISPLAY.FILENAME_WIDTH);
}

/**
 * Lines of the file table: header, divider, one row per file.
 */
export function formatFileTable(files: readonly FileListing[]): string[] {
  const lines = [
    chalk.gray('id'.padEnd(DISPLAY.ID_WIDTH)) + chalk.gray('filename'.padEnd(DISPLAY.FILENAME_WIDTH)) + chalk.gray('size'),
    chalk.gray('─'.repeat(DISPLAY.DIVIDER_LENGTH)),
  ];
  for (const file of files) {
    lines.push(
      chalk.cyan(String(file.id).padEnd(DISPLAY.ID_WIDTH)) +
        chalk.white(fitFilename(file.filename)) +
        chalk.yellow(formatFileSize(file.size)),
    );
  }
  return lines;
}

const STAGE_LABELS: Record<TransferProgress['stage'], string> = {
  reading: 'Reading',
  uploading: 'Uploading',
  downloading: 'Downloading',
  merging: 'Merging',
  finalizing: 'Finalizing',
};

export function describeProgress(progress: TransferProgress): string {
  const chunks =
    progress.totalChunks === null
      ? `${progress.completedChunks} chunk(s)`
      : `${progress.completedChunks}/${progress.totalChunks} chunks`;
  const percent = progress.totalBytes === null ? '' : ` ${progress.percent}%`;
  return `${STAGE_LABELS[progress.stage]}... ${chunks}${percent} (${formatFileSize(progress.bytesTransferred)})`;
}

/**
 * Spinner driven by transfer progress; inert when not interactive.
 */
export class TransferSpinner {
  private readonly spinner: Ora | null;

  constructor(text: string, interactive: boolean) {
    this.spinner = interactive ? ora({ text, color: 'cyan' }).start() : null;
  }

  readonly onProgress = (progress: TransferProgress): void => {
    if (this.spinner) this.spinner.text = describeProgress(progress);
  };

  succeed(text: string): void {
    this.spinner?.succeed(chalk.green(text));
  }

  fail(text: string): void {
    this.spinner?.fail(chalk.red(text));
  }
}
