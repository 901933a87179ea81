#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { createLogger, isLogLevel } from '@seedling/shared';
import type { LogLevel } from '@seedling/shared';
import { loadConfig } from './config-loader.js';
import { deployCommand } from './commands/deploy.js';
import { listCommand } from './commands/list.js';
import { validateCommand } from './commands/validate.js';

const logger = createLogger('cli');

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  }
  return value;
}

const program = new Command();

program
  .name('seedling')
  .description('Deploy the modules linked to a seed record onto the local filesystem')
  .version('0.0.1');

program
  .command('deploy')
  .description('Deploy a seed by name (prompts when omitted)')
  .argument('[seed]', 'Seed name or part of it')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <dir>', 'Directory to create the workspace in')
  .option('--no-command', 'Do not run the seed command after deploying')
  .option('--exact', 'Require the seed title to match exactly')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)', parseLogLevel, 'warn')
  .action(async (seed: string | undefined, options: {
    config?: string;
    output?: string;
    command: boolean;
    exact?: boolean;
    logLevel: LogLevel;
  }) => {
    const config = loadConfig(options.config);
    const { exitCode } = await deployCommand(config, seed, {
      output: options.output,
      // --no-command only ever turns the seed command off
      command: options.command ? undefined : false,
      exact: options.exact,
      logLevel: options.logLevel,
    });
    process.exitCode = exitCode;
  });

program
  .command('list')
  .description('List every seed in the seed database')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    const config = loadConfig(options.config);
    await listCommand(config);
  });

program
  .command('validate')
  .description('Validate the configuration')
  .option('-c, --config <path>', 'Path to config file')
  .action((options: { config?: string }) => {
    validateCommand(options.config);
  });

program.parseAsync().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
