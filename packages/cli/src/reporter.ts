import type { DeployEvent, DeploymentReport, ModuleOutcome } from '@seedling/shared';

type Print = (line: string) => void;

/**
 * Console progress output for a deployment run, driven entirely by
 * orchestrator events.
 */
export function createConsoleReporter(print: Print = console.log): (event: DeployEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'seed-found':
        print(`Seed: ${event.seed.name} (${event.matches} match${event.matches === 1 ? '' : 'es'})`);
        break;
      case 'seed-not-found':
        print(`Seed '${event.name}' not found in seed database.`);
        break;
      case 'workspace':
        print(`Workspace: ${event.dir}`);
        break;
      case 'no-linked-modules':
        print('No modules linked to this seed. Check the Modules relation.');
        break;
      case 'modules-resolved':
        print(`Linked modules: ${event.moduleIds.join(', ')}`);
        break;
      case 'module-start':
        print(`[${event.index + 1}/${event.total}] Deploying module ${event.moduleId}`);
        break;
      case 'empty-code-block':
        print(`  empty code block #${event.blockIndex} in ${event.filename}`);
        break;
      case 'path-escape':
        print(`  path '${event.rawSubPath}' leaves the workspace, writing to its root`);
        break;
      case 'foreign-module':
        print(`  module page belongs to database ${event.parentDatabaseId}`);
        break;
      case 'module-done':
        print(`  ${describeOutcome(event.outcome)}`);
        break;
      case 'command':
        if (event.dispatch.error) {
          print(`Could not run ${event.dispatch.command}: ${event.dispatch.error.message}`);
        } else {
          print(event.dispatch.dispatched
            ? `Ran: ${event.dispatch.command} (exit ${event.dispatch.exitCode ?? 'signal'})`
            : `Skipped command (${event.dispatch.skippedReason ?? 'not run'}): ${event.dispatch.command}`);
        }
        break;
      case 'state':
        break;
    }
  };
}

export function describeOutcome(outcome: ModuleOutcome): string {
  switch (outcome.status) {
    case 'deployed':
      return `deployed ${outcome.filename} -> ${outcome.path}`;
    case 'empty':
      return `no code in ${outcome.filename}, nothing written`;
    case 'failed':
      return `failed [${outcome.error.code}] ${outcome.error.message}`;
  }
}

export function summarize(report: DeploymentReport): string {
  const count = (status: string) => report.outcomes.filter((o) => o.status === status).length;
  return `${count('deployed')} deployed, ${count('empty')} empty, ${count('failed')} failed`;
}

/** Process exit code for a finished run. */
export function exitCodeFor(report: DeploymentReport): number {
  if (report.state === 'NOT_FOUND') return 1;
  if (report.result === 'PARTIAL_FAILURE') return 1;
  if (report.command?.error) return 1;
  const exit = report.command?.exitCode;
  if (report.command?.dispatched && exit !== 0) {
    return typeof exit === 'number' ? exit : 1;
  }
  return 0;
}
