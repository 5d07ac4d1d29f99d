import type { CliCommand } from '../command.js';
import { uploadCommand } from './upload.js';
import { downloadCommand } from './download.js';
import { listCommand } from './list.js';
import { importCommand } from './import.js';
import { exportCommand } from './export.js';
import { addWebhookCommand, setDownloadDirCommand } from './config.js';

export const commands: readonly CliCommand[] = [
  uploadCommand,
  downloadCommand,
  listCommand,
  importCommand,
  exportCommand,
  addWebhookCommand,
  setDownloadDirCommand,
];

export {
  uploadCommand,
  downloadCommand,
  listCommand,
  importCommand,
  exportCommand,
  addWebhookCommand,
  setDownloadDirCommand,
};
