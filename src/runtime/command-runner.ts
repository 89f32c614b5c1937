import { execFile as defaultExecFile } from "node:child_process";
import type { CommandResult } from "./runtime-client.js";

export interface RunOptions {
  timeoutMs?: number;
  input?: string;
}

export type CommandRunner = (file: string, args: readonly string[], options?: RunOptions) => Promise<CommandResult>;

/** Exit code reported for a command killed on timeout, as coreutils `timeout` does. */
export const TIMEOUT_EXIT_CODE = 124;

const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Build a runner over `execFile`. A non-zero exit resolves with its code;
 * only a failure to spawn the program at all rejects.
 */
export function createCommandRunner(execFn: typeof defaultExecFile = defaultExecFile): CommandRunner {
  return (file, args, options = {}) =>
    new Promise<CommandResult>((resolve, reject) => {
      const child = execFn(
        file,
        [...args],
        { encoding: "utf8", timeout: options.timeoutMs ?? 0, maxBuffer: MAX_BUFFER },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }
          if (err.killed) {
            resolve({ exitCode: TIMEOUT_EXIT_CODE, stdout, stderr: stderr || `${file} timed out` });
            return;
          }
          if (typeof err.code === "number") {
            resolve({ exitCode: err.code, stdout, stderr });
            return;
          }
          reject(new Error(`Failed to run ${file}: ${err.message}`));
        },
      );
      if (options.input !== undefined) {
        child.stdin?.end(options.input);
      }
    });
}
