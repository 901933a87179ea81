import type { Seed } from "./records.js";

export type DeploymentState =
  | "IDLE"
  | "SEED_LOOKUP"
  | "NOT_FOUND"
  | "MODULES_RESOLVED"
  | "NO_LINKED_MODULES"
  | "DEPLOYING"
  | "PARTIAL_FAILURE"
  | "ALL_DEPLOYED"
  | "COMMAND_DISPATCH"
  | "DONE";

export interface ErrorInfo {
  code: string;
  message: string;
}

export type ModuleOutcome =
  | { moduleId: string; status: "deployed"; filename: string; path: string }
  | { moduleId: string; status: "empty"; filename: string }
  | { moduleId: string; status: "failed"; error: ErrorInfo };

export type CommandPolicy = "always" | "all-deployed";

export interface CommandDispatch {
  command: string;
  cwd: string;
  dispatched: boolean;
  // Set when the command was not handed to the runner
  skippedReason?: "disabled" | "module-failures";
  exitCode?: number | null;
  // The runner failed to start the command
  error?: ErrorInfo;
}

export interface DeploymentReport {
  seedName: string;
  // Terminal state of the run: NOT_FOUND, NO_LINKED_MODULES or DONE
  state: DeploymentState;
  // PARTIAL_FAILURE or ALL_DEPLOYED once modules were deployed
  result?: "PARTIAL_FAILURE" | "ALL_DEPLOYED";
  seed?: Seed;
  workspaceDir?: string;
  outcomes: ModuleOutcome[];
  command?: CommandDispatch;
  // Why the run stopped early, for NOT_FOUND
  error?: ErrorInfo;
}

export type DeployEvent =
  | { type: "state"; state: DeploymentState }
  | { type: "seed-found"; seed: Seed; matches: number }
  | { type: "seed-not-found"; name: string }
  | { type: "workspace"; dir: string }
  | { type: "no-linked-modules"; seed: Seed }
  | { type: "modules-resolved"; moduleIds: string[] }
  | { type: "module-start"; moduleId: string; index: number; total: number }
  | { type: "empty-code-block"; moduleId: string; filename: string; blockIndex: number }
  | { type: "path-escape"; moduleId: string; rawSubPath: string }
  | { type: "foreign-module"; moduleId: string; parentDatabaseId: string }
  | { type: "module-done"; outcome: ModuleOutcome }
  | { type: "command"; dispatch: CommandDispatch };

export type DeployEventHandler = (event: DeployEvent) => void;
