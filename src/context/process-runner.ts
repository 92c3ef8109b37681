/**
 * Process runner on node:child_process. Commands run through the shell
 * with the terminal's stdio so editors and pagers take over the screen.
 */

import { spawn, spawnSync } from "node:child_process";
import type { ProcessRunner } from "./types.js";

export interface NodeProcessRunnerOptions {
  /** Working directory for spawned commands */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Use "ignore" when the terminal must not be shared */
  stdio?: "inherit" | "ignore";
}

export class NodeProcessRunner implements ProcessRunner {
  constructor(private options: NodeProcessRunnerOptions = {}) {}

  runBlocking(command: string): number {
    const result = spawnSync(command, {
      shell: true,
      stdio: this.options.stdio ?? "inherit",
      cwd: this.options.cwd,
      env: this.options.env,
    });
    if (result.error) {
      throw result.error;
    }
    // Killed by a signal: no exit code
    return result.status ?? -1;
  }

  runInBackground(command: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        shell: true,
        stdio: this.options.stdio ?? "inherit",
        cwd: this.options.cwd,
        env: this.options.env,
      });
      child.once("error", reject);
      child.once("close", (code) => resolve(code ?? -1));
    });
  }
}
