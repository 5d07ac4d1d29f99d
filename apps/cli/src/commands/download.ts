import { flagOption, parsePositiveInteger, stringOption, withVault } from '../command.js';
import type { CliCommand } from '../command.js';
import { TransferSpinner } from '../display.js';

export const downloadCommand: CliCommand = {
  name: 'download',
  description: 'Download a file by id',
  arguments: [{ syntax: '<id>', description: 'File id' }],
  options: [
    { flags: '-d, --dir <dir>', description: 'Destination directory (default: configured download directory)' },
    { flags: '--overwrite', description: 'Replace an existing file with the same name' },
  ],

  async run(context, [idText], options) {
    const fileId = parsePositiveInteger(idText, 'file id');

    await withVault(context, async vault => {
      // Unknown ids fail here, before anything is written
      const record = await vault.get(fileId);
      const spinner = new TransferSpinner(`Downloading ${record.filename}...`, context.interactive);
      try {
        const result = await vault.download(fileId, stringOption(options, 'dir'), {
          overwrite: flagOption(options, 'overwrite'),
          onProgress: spinner.onProgress,
        });
        spinner.succeed(`Downloaded ${result.filename}`);
        context.output.log(`Saved to: ${result.path}`);
      } catch (error) {
        spinner.fail('Download failed');
        throw error;
      }
    });
  },
};
