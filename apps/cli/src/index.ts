#!/usr/bin/env node

import fs from 'fs';
import dotenv from 'dotenv';
import { Command } from 'commander';
import { commands } from './commands/index.js';
import { consoleOutput, createCliLogger, runCommand } from './command.js';
import type { CliCommand, CliContext } from './command.js';
import { DEFAULT_SETTINGS_FILE } from './settings.js';

function readVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

/**
 * Attach `command` to `program`; its exit code lands in process.exitCode.
 */
function registerCommand(program: Command, command: CliCommand, createContext: () => CliContext): void {
  const sub = program.command(command.name).description(command.description);
  for (const argument of command.arguments ?? []) {
    sub.argument(argument.syntax, argument.description);
  }
  for (const option of command.options ?? []) {
    sub.option(option.flags, option.description);
  }
  sub.action(async function (this: Command) {
    process.exitCode = await runCommand(command, createContext(), this.args, this.opts());
  });
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name('chunkvault')
    .description('Store files of any size as chunked webhook attachments')
    .version(readVersion())
    .option('-c, --config <file>', 'Path to config.json', process.env.CHUNKVAULT_CONFIG ?? DEFAULT_SETTINGS_FILE);

  const createContext = (): CliContext => {
    const settingsPath = program.opts().config;
    return {
      settingsPath: typeof settingsPath === 'string' ? settingsPath : DEFAULT_SETTINGS_FILE,
      env: process.env,
      output: consoleOutput,
      interactive: process.stdout.isTTY === true,
      dependencies: { logger: createCliLogger(process.env) },
    };
  };

  for (const command of commands) {
    registerCommand(program, command, createContext);
  }
  return program;
}

dotenv.config();
await buildProgram().parseAsync(process.argv);
