/**
 * Command abstraction
 * Every CLI command has the same shape and is invoked through runCommand
 */

import chalk from 'chalk';
import {
  Chunkvault,
  ChunkvaultError,
  ConfigError,
  EmptyPoolError,
  NotFoundError,
  createLogger,
  formatError,
  silentLogger,
} from '@chunkvault/core';
import type { ChunkvaultDependencies, Logger } from '@chunkvault/core';
import { loadSettings, toVaultConfig } from './settings.js';
import type { CliSettings } from './settings.js';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  /** Path of config.json */
  settingsPath: string;
  env: NodeJS.ProcessEnv;
  output: CliOutput;
  /** Show spinners */
  interactive: boolean;
  /** Injected into every Chunkvault the command opens */
  dependencies?: ChunkvaultDependencies;
}

export interface CliArgument {
  syntax: string;
  description: string;
}

export interface CliOption {
  flags: string;
  description: string;
}

export type CliOptionValues = Record<string, unknown>;

export interface CliCommand {
  name: string;
  description: string;
  arguments?: CliArgument[];
  options?: CliOption[];
  run(context: CliContext, args: string[], options: CliOptionValues): Promise<void>;
}

export const consoleOutput: CliOutput = {
  log: line => console.log(line),
  error: line => console.error(line),
};

/**
 * Library logger for the CLI: warnings and errors only, unless CHUNKVAULT_DEBUG is set.
 */
export function createCliLogger(env: NodeJS.ProcessEnv): Logger {
  const debug = env.CHUNKVAULT_DEBUG === '1' || env.CHUNKVAULT_DEBUG === 'true';
  const logger = createLogger('Chunkvault', { debug });
  return debug ? logger : { ...silentLogger, warn: logger.warn, error: logger.error };
}

/**
 * Load settings, open a Chunkvault on them and close it after `task`.
 */
export async function withVault<T>(
  context: CliContext,
  task: (vault: Chunkvault, settings: CliSettings) => Promise<T>,
): Promise<T> {
  const settings = await loadSettings(context.settingsPath);
  const vault = new Chunkvault(toVaultConfig(settings, context.env), context.dependencies);
  try {
    return await task(vault, settings);
  } finally {
    await vault.destroy();
  }
}

export function stringOption(options: CliOptionValues, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

export function flagOption(options: CliOptionValues, key: string): boolean {
  return options[key] === true;
}

/**
 * Parse a positive integer argument.
 */
export function parsePositiveInteger(value: string, what: string): number {
  const parsed = /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ConfigError(`Invalid ${what}: ${value}`);
  }
  return parsed;
}

/**
 * Run a command and map its outcome to an exit code.
 */
export async function runCommand(
  command: CliCommand,
  context: CliContext,
  args: string[],
  options: CliOptionValues = {},
): Promise<number> {
  try {
    await command.run(context, args, options);
    return 0;
  } catch (error) {
    context.output.error(describeFailure(error));
    return 1;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof NotFoundError) {
    return chalk.yellow(error.message);
  }
  if (error instanceof EmptyPoolError) {
    return chalk.red(`❌ ${error.message}. Add one with: config:add-webhook <url>`);
  }
  if (error instanceof ChunkvaultError) {
    return chalk.red(`❌ ${error.message}`);
  }
  return chalk.red(`❌ Unexpected error: ${formatError(error)}`);
}
