import { createInterface } from 'node:readline/promises';
import { createLogger, setLogLevel } from '@seedling/shared';
import type { Config, DeploymentReport, LogLevel, RecordStore } from '@seedling/shared';
import { DeploymentOrchestrator, ShellCommandRunner } from '@seedling/deployer';
import type { CommandRunner } from '@seedling/deployer';
import { createStore } from '../context.js';
import { createConsoleReporter, exitCodeFor, summarize } from '../reporter.js';

export interface DeployCommandOptions {
  output?: string;
  command?: boolean;
  exact?: boolean;
  logLevel?: LogLevel;
  store?: RecordStore;
  runner?: CommandRunner;
  print?: (line: string) => void;
}

async function promptSeedName(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(
      "Enter the Seed name (e.g., '_SEED, 2026-01-25 [App Name] (Description)'): ",
    );
    return answer.trim();
  } finally {
    rl.close();
  }
}

export async function deployCommand(
  config: Config,
  seedName: string | undefined,
  options: DeployCommandOptions = {},
): Promise<{ report: DeploymentReport; exitCode: number }> {
  const logger = createLogger('cli');

  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  const name = seedName?.trim() || (await promptSeedName());
  if (!name) {
    throw new Error('A seed name is required');
  }

  const print = options.print ?? console.log;
  const orchestrator = new DeploymentOrchestrator({
    store: options.store ?? createStore(config),
    seedDatabaseId: config.notion.seedDatabaseId,
    moduleDatabaseId: config.notion.moduleDatabaseId,
    properties: config.properties,
    commandRunner: options.runner ?? new ShellCommandRunner(),
    outputDir: options.output ?? config.deploy.outputDir,
    runCommand: options.command ?? config.deploy.runCommand,
    commandPolicy: config.deploy.commandPolicy,
    exact: options.exact,
    onEvent: createConsoleReporter(print),
  });

  logger.debug(`Deploying seed '${name}'`);
  const report = await orchestrator.run(name);
  if (report.outcomes.length > 0) {
    print(summarize(report));
  }
  return { report, exitCode: exitCodeFor(report) };
}
