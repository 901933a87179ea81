export { DeploymentOrchestrator, type OrchestratorOptions } from "./orchestrator.js";
export { ModuleDeployer, type ModuleDeployerOptions, type DeployedModule } from "./module-deployer.js";
export { SeedResolver, type SeedResolverOptions, type SeedMatch } from "./seed-resolver.js";
export { extractCode, type ExtractOptions } from "./code-extractor.js";
export { normalizeSubPath, sanitizeSubPath, type NormalizedSubPath } from "./path-sanitizer.js";
export { workspaceNameFromSeed, resolveWorkspaceDir } from "./workspace.js";
export { ShellCommandRunner, type CommandRunner, type CommandResult } from "./command-runner.js";
