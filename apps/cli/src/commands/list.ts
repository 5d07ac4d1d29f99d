import chalk from 'chalk';
import { withVault } from '../command.js';
import type { CliCommand } from '../command.js';
import { formatFileTable } from '../display.js';

export const listCommand: CliCommand = {
  name: 'list',
  description: 'List stored files',

  async run(context) {
    const files = await withVault(context, vault => vault.list());
    if (files.length === 0) {
      context.output.log(chalk.gray('No files stored'));
      return;
    }
    for (const line of formatFileTable(files)) {
      context.output.log(line);
    }
  },
};
