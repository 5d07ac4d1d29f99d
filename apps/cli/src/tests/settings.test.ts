import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigError } from '@chunkvault/core';
import { addWebhooks, emptySettings, loadSettings, saveSettings, setDownloadDir, toVaultConfig } from '../settings.js';

const WEBHOOK_A = 'https://discord.test/api/webhooks/1/test-secret-a';
const WEBHOOK_B = 'https://discord.test/api/webhooks/2/test-secret-b';

describe('CLI settings', () => {
  let testDir: string;
  let settingsPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'chunkvault-settings-'));
    settingsPath = join(testDir, 'config.json');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read a missing file as empty settings', async () => {
    assert.deepStrictEqual(await loadSettings(settingsPath), { webhooks: [], download_dir: '' });
  });

  it('should save with four-space indentation and load back', async () => {
    const settings = { webhooks: [WEBHOOK_A], download_dir: '/data/downloads' };

    await saveSettings(settingsPath, settings);

    assert.strictEqual(await readFile(settingsPath, 'utf-8'), JSON.stringify(settings, null, 4) + '\n');
    assert.deepStrictEqual(await loadSettings(settingsPath), settings);
  });

  it('should accept a file with only some keys', async () => {
    await writeFile(settingsPath, JSON.stringify({ webhooks: [WEBHOOK_B] }));
    assert.deepStrictEqual(await loadSettings(settingsPath), { webhooks: [WEBHOOK_B], download_dir: '' });
  });

  it('should reject malformed files', async () => {
    await writeFile(settingsPath, '{ nope');
    await assert.rejects(loadSettings(settingsPath), ConfigError);

    await writeFile(settingsPath, JSON.stringify({ webhooks: 'one' }));
    await assert.rejects(loadSettings(settingsPath), ConfigError);
  });

  it('should add webhooks once each', () => {
    const settings = addWebhooks({ webhooks: [WEBHOOK_A], download_dir: '' }, [` ${WEBHOOK_B} `, WEBHOOK_A]);
    assert.deepStrictEqual(settings.webhooks, [WEBHOOK_A, WEBHOOK_B]);
  });

  it('should reject invalid or missing webhook URLs', () => {
    assert.throws(() => addWebhooks(emptySettings(), ['not a url']), ConfigError);
    assert.throws(() => addWebhooks(emptySettings(), ['  ']), ConfigError);
  });

  it('should only accept an existing download directory', async () => {
    const downloads = join(testDir, 'downloads');
    await assert.rejects(setDownloadDir(emptySettings(), downloads), ConfigError);

    await mkdir(downloads);
    const settings = await setDownloadDir(emptySettings(), downloads);
    assert.strictEqual(settings.download_dir, downloads);
  });

  it('should layer config.json over the environment', () => {
    const env = {
      CHUNKVAULT_WEBHOOK_URL: WEBHOOK_A,
      CHUNKVAULT_DOWNLOAD_DIR: '/env/downloads',
      CHUNK_SIZE: '100',
    };

    assert.deepStrictEqual(toVaultConfig(emptySettings(), env), {
      endpoints: [WEBHOOK_A],
      downloadDir: '/env/downloads',
      chunkSize: 100,
    });
    assert.deepStrictEqual(toVaultConfig({ webhooks: [WEBHOOK_B], download_dir: '/cfg/downloads' }, env), {
      endpoints: [WEBHOOK_B],
      downloadDir: '/cfg/downloads',
      chunkSize: 100,
    });
  });
});
