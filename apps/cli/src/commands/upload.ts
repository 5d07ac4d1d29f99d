import path from 'path';
import { formatFileSize } from '@chunkvault/core';
import { parsePositiveInteger, stringOption, withVault } from '../command.js';
import type { CliCommand } from '../command.js';
import { TransferSpinner } from '../display.js';

export const uploadCommand: CliCommand = {
  name: 'upload',
  description: 'Upload a file and print its id',
  arguments: [{ syntax: '<file>', description: 'Path of the file to upload' }],
  options: [{ flags: '--chunk-size <bytes>', description: 'Chunk size in bytes' }],

  async run(context, [file], options) {
    const chunkSizeText = stringOption(options, 'chunkSize');
    const chunkSize = chunkSizeText === undefined ? undefined : parsePositiveInteger(chunkSizeText, 'chunk size');

    await withVault(context, async vault => {
      const spinner = new TransferSpinner(`Uploading ${path.basename(file)}...`, context.interactive);
      try {
        const result = await vault.upload(file, { chunkSize, onProgress: spinner.onProgress });
        spinner.succeed(`Uploaded ${result.filename} (${result.totalChunks} chunk(s))`);
        context.output.log(`File ID: ${result.fileId}`);
        context.output.log(`Size: ${formatFileSize(result.size)}`);
      } catch (error) {
        spinner.fail('Upload failed');
        throw error;
      }
    });
  },
};
