import { parsePositiveInteger, stringOption, withVault } from '../command.js';
import type { CliCommand } from '../command.js';

export const exportCommand: CliCommand = {
  name: 'export',
  description: 'Write the records of the given ids to a new JSON document',
  arguments: [{ syntax: '<ids...>', description: 'File ids to export' }],
  options: [
    { flags: '-d, --dir <dir>', description: 'Directory to write into (default: configured download directory)' },
    { flags: '-n, --name <name>', description: 'Base file name (default: files_export.json)' },
  ],

  async run(context, idTexts, options) {
    const ids = idTexts.map(text => parsePositiveInteger(text, 'file id'));
    const written = await withVault(context, (vault, settings) =>
      vault.exportTo(stringOption(options, 'dir') ?? (settings.download_dir || '.'), ids, stringOption(options, 'name')),
    );
    context.output.log(`Exported ${ids.length} file record(s) to ${written}`);
  },
};
