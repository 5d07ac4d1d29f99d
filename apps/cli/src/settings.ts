/**
 * CLI Settings
 * Loads and persists config.json ({ webhooks, download_dir })
 */

import fs from 'fs';
import path from 'path';
import { ConfigError, LocalIOError, assertEndpointUrl, configFromEnv, formatError, isNodeError } from '@chunkvault/core';
import type { ChunkvaultConfig } from '@chunkvault/core';

export const DEFAULT_SETTINGS_FILE = 'config.json';

export interface CliSettings {
  webhooks: string[];
  download_dir: string;
}

export function emptySettings(): CliSettings {
  return { webhooks: [], download_dir: '' };
}

function parseSettings(raw: unknown, source: string): CliSettings {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source}: expected an object`);
  }

  const settings = emptySettings();
  if ('webhooks' in raw && raw.webhooks !== undefined) {
    const { webhooks } = raw;
    if (!Array.isArray(webhooks) || !webhooks.every((url): url is string => typeof url === 'string')) {
      throw new ConfigError(`${source}: "webhooks" must be an array of strings`);
    }
    settings.webhooks = webhooks;
  }
  if ('download_dir' in raw && raw.download_dir !== undefined && raw.download_dir !== null) {
    if (typeof raw.download_dir !== 'string') {
      throw new ConfigError(`${source}: "download_dir" must be a string`);
    }
    settings.download_dir = raw.download_dir;
  }
  return settings;
}

/**
 * Read settings. A missing file reads as empty settings.
 */
export async function loadSettings(filePath: string): Promise<CliSettings> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return emptySettings();
    throw new LocalIOError(`Cannot read ${path.basename(filePath)}: ${formatError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${path.basename(filePath)} is not valid JSON: ${formatError(error)}`, { cause: error });
  }
  return parseSettings(raw, path.basename(filePath));
}

export async function saveSettings(filePath: string, settings: CliSettings): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify(settings, null, 4) + '\n', 'utf-8');
  } catch (error) {
    throw new LocalIOError(`Cannot write ${path.basename(filePath)}: ${formatError(error)}`, { cause: error });
  }
}

/**
 * Append webhook URLs, skipping ones already configured.
 */
export function addWebhooks(settings: CliSettings, urls: readonly string[]): CliSettings {
  const trimmed = urls.map(url => url.trim()).filter(url => url !== '');
  if (trimmed.length === 0) {
    throw new ConfigError('No webhook URLs given');
  }
  trimmed.forEach(assertEndpointUrl);

  const webhooks = [...settings.webhooks];
  for (const url of trimmed) {
    if (!webhooks.includes(url)) webhooks.push(url);
  }
  return { ...settings, webhooks };
}

/**
 * Point downloads at an existing directory, stored as an absolute path.
 */
export async function setDownloadDir(settings: CliSettings, dir: string): Promise<CliSettings> {
  const absolute = path.resolve(dir);
  let isDirectory = false;
  try {
    isDirectory = (await fs.promises.stat(absolute)).isDirectory();
  } catch (error) {
    if (!isNodeError(error) || error.code !== 'ENOENT') {
      throw new LocalIOError(`Cannot access ${absolute}: ${formatError(error)}`, { cause: error });
    }
  }
  if (!isDirectory) {
    throw new ConfigError(`Directory not found: ${absolute}`);
  }
  return { ...settings, download_dir: absolute };
}

/**
 * Library config from the environment with config.json values layered on top.
 */
export function toVaultConfig(settings: CliSettings, env: NodeJS.ProcessEnv = process.env): ChunkvaultConfig {
  const config = configFromEnv(env);
  if (settings.webhooks.length > 0) {
    config.endpoints = settings.webhooks;
  }
  if (settings.download_dir !== '') {
    config.downloadDir = settings.download_dir;
  }
  return config;
}
