import { addWebhooks, loadSettings, saveSettings, setDownloadDir } from '../settings.js';
import type { CliCommand } from '../command.js';

export const addWebhookCommand: CliCommand = {
  name: 'config:add-webhook',
  description: 'Add upload webhook URLs to config.json',
  arguments: [{ syntax: '<urls...>', description: 'Webhook URLs' }],

  async run(context, urls) {
    const settings = addWebhooks(await loadSettings(context.settingsPath), urls);
    await saveSettings(context.settingsPath, settings);
    context.output.log(`${settings.webhooks.length} webhook(s) configured`);
  },
};

export const setDownloadDirCommand: CliCommand = {
  name: 'config:set-download-dir',
  description: 'Set the default download directory in config.json',
  arguments: [{ syntax: '<dir>', description: 'Existing directory' }],

  async run(context, [dir]) {
    const settings = await setDownloadDir(await loadSettings(context.settingsPath), dir);
    await saveSettings(context.settingsPath, settings);
    context.output.log(`Download directory set to ${settings.download_dir}`);
  },
};
