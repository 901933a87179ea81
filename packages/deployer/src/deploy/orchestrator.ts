import { mkdir } from "node:fs/promises";
import { resolve } from "node:path";
import { createLogger, SeedNotFound, toErrorInfo } from "@seedling/shared";
import type {
  CommandDispatch,
  CommandPolicy,
  DeployEvent,
  DeployEventHandler,
  DeploymentReport,
  DeploymentState,
  ModuleOutcome,
  PropertyNames,
  RecordStore,
  Seed,
} from "@seedling/shared";
import { ModuleDeployer } from "./module-deployer.js";
import { SeedResolver } from "./seed-resolver.js";
import { resolveWorkspaceDir } from "./workspace.js";
import type { CommandRunner } from "./command-runner.js";

export interface OrchestratorOptions {
  store: RecordStore;
  seedDatabaseId: string;
  moduleDatabaseId?: string;
  commandRunner: CommandRunner;
  properties?: PropertyNames;
  // Directory the workspace is created in; defaults to process.cwd()
  outputDir?: string;
  runCommand?: boolean;
  commandPolicy?: CommandPolicy;
  // Require the seed title to equal the requested name
  exact?: boolean;
  onEvent?: DeployEventHandler;
}

/**
 * DeploymentOrchestrator runs one seed end to end: look the seed up,
 * deploy its linked modules in relation order, then dispatch the seed's
 * command in the workspace.
 */
export class DeploymentOrchestrator {
  private logger = createLogger("deploy-orchestrator");
  private options: OrchestratorOptions;
  private resolver: SeedResolver;
  private deployer: ModuleDeployer;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.resolver = new SeedResolver({
      store: options.store,
      seedDatabaseId: options.seedDatabaseId,
      properties: options.properties,
    });
    this.deployer = new ModuleDeployer({
      store: options.store,
      properties: options.properties,
      moduleDatabaseId: options.moduleDatabaseId,
      onEvent: options.onEvent,
    });
  }

  async run(seedName: string): Promise<DeploymentReport> {
    const report: DeploymentReport = { seedName, state: "IDLE", outcomes: [] };

    this.setState(report, "SEED_LOOKUP");
    const match = await this.resolver.match(seedName, this.options.exact ?? false);
    if (!match) {
      this.logger.error(`Seed '${seedName}' not found in seed database`);
      report.error = toErrorInfo(new SeedNotFound(seedName));
      this.emit({ type: "seed-not-found", name: seedName });
      this.setState(report, "NOT_FOUND");
      return report;
    }

    const { seed } = match;
    report.seed = seed;
    this.emit({ type: "seed-found", seed, matches: match.matches });

    const outputDir = resolve(this.options.outputDir ?? process.cwd());
    const workspaceDir = resolveWorkspaceDir(seed, outputDir);
    report.workspaceDir = workspaceDir;
    this.logger.info(`Workspace: ${workspaceDir}`);
    this.emit({ type: "workspace", dir: workspaceDir });

    if (seed.modules.length === 0) {
      this.logger.warn(`No modules linked to seed '${seed.name}'`);
      this.emit({ type: "no-linked-modules", seed });
      this.setState(report, "NO_LINKED_MODULES");
      return report;
    }

    this.setState(report, "MODULES_RESOLVED");
    this.emit({ type: "modules-resolved", moduleIds: [...seed.modules] });

    this.setState(report, "DEPLOYING");
    // The seed command runs here even if no module writes a file
    await mkdir(workspaceDir, { recursive: true });

    for (const [index, moduleId] of seed.modules.entries()) {
      this.emit({ type: "module-start", moduleId, index, total: seed.modules.length });
      const outcome = await this.deployModule(moduleId, workspaceDir);
      report.outcomes.push(outcome);
      this.emit({ type: "module-done", outcome });
    }

    const failed = report.outcomes.filter((o) => o.status === "failed").length;
    const result = failed > 0 ? "PARTIAL_FAILURE" : "ALL_DEPLOYED";
    report.result = result;
    this.setState(report, result);

    if (seed.command !== undefined) {
      this.setState(report, "COMMAND_DISPATCH");
      report.command = await this.dispatchCommand(seed, workspaceDir, failed);
      this.emit({ type: "command", dispatch: report.command });
    }

    this.setState(report, "DONE");
    return report;
  }

  private async deployModule(moduleId: string, workspaceDir: string): Promise<ModuleOutcome> {
    try {
      const deployed = await this.deployer.deploy(moduleId, workspaceDir);
      if (deployed.path === undefined) {
        return { moduleId, status: "empty", filename: deployed.filename };
      }
      return { moduleId, status: "deployed", filename: deployed.filename, path: deployed.path };
    } catch (err) {
      const error = toErrorInfo(err);
      this.logger.error(`Module ${moduleId} failed: ${error.message}`);
      return { moduleId, status: "failed", error };
    }
  }

  private async dispatchCommand(
    seed: Seed,
    cwd: string,
    failedModules: number,
  ): Promise<CommandDispatch> {
    const command = seed.command ?? "";

    if (this.options.runCommand === false) {
      return { command, cwd, dispatched: false, skippedReason: "disabled" };
    }
    if (this.options.commandPolicy === "all-deployed" && failedModules > 0) {
      this.logger.warn(`Skipping command, ${failedModules} module(s) failed`);
      return { command, cwd, dispatched: false, skippedReason: "module-failures" };
    }

    this.logger.info(`Running: ${command}`);
    try {
      const result = await this.options.commandRunner.run(command, cwd);
      return { command, cwd, dispatched: true, exitCode: result.exitCode };
    } catch (err) {
      const error = toErrorInfo(err);
      this.logger.error(`Command could not be started: ${error.message}`);
      return { command, cwd, dispatched: false, error };
    }
  }

  private setState(report: DeploymentReport, state: DeploymentState): void {
    report.state = state;
    this.logger.debug(`Seed '${report.seedName}': ${state}`);
    this.emit({ type: "state", state });
  }

  private emit(event: DeployEvent): void {
    this.options.onEvent?.(event);
  }
}
