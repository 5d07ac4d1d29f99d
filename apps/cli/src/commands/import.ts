import { withVault } from '../command.js';
import type { CliCommand } from '../command.js';

export const importCommand: CliCommand = {
  name: 'import',
  description: 'Merge file records from an exported document',
  arguments: [{ syntax: '<file>', description: 'Exported JSON document' }],

  async run(context, [file]) {
    const ids = await withVault(context, vault => vault.importFrom(file));
    context.output.log(`Imported ${ids.length} file record(s)` + (ids.length > 0 ? `: ${ids.join(', ')}` : ''));
  },
};
