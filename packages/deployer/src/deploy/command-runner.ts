import { spawn } from "node:child_process";
import { createLogger } from "@seedling/shared";

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface CommandRunner {
  run(command: string, cwd: string): Promise<CommandResult>;
}

/**
 * Runs a command line through the system shell with inherited stdio.
 * Resolves with the exit status; rejects only if the shell cannot start.
 */
export class ShellCommandRunner implements CommandRunner {
  private logger = createLogger("command-runner");

  run(command: string, cwd: string): Promise<CommandResult> {
    this.logger.debug(`Spawning shell in ${cwd}: ${command}`);
    return new Promise((resolve, reject) => {
      const child = spawn(command, { cwd, shell: true, stdio: "inherit" });
      child.once("error", reject);
      child.once("close", (exitCode, signal) => {
        resolve({ exitCode, signal });
      });
    });
  }
}
