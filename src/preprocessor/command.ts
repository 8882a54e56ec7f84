/**
 * Command execution for the preprocessor module.
 */

import { spawn } from "child_process";

import { PreprocessError } from "./types.js";

export interface RunCommandOptions {
  cwd: string;
  input: string;
  timeoutMs: number;
}

/**
 * Run a command as a text filter: `input` is written to stdin, stdout is
 * collected. Rejects on spawn failure, non-zero exit or timeout.
 */
export function runFilterCommand(
  cmd: string,
  args: string[],
  options: RunCommandOptions,
): Promise<string> {
  return new Promise((resolve, reject) => {
    let stdout = "";
    let stderr = "";
    let settled = false;

    const proc = spawn(cmd, args, { cwd: options.cwd });

    const fail = (message: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new PreprocessError(message));
    };

    const timer = setTimeout(() => {
      proc.kill("SIGKILL");
      fail(`${cmd} timed out after ${options.timeoutMs}ms`);
    }, options.timeoutMs);

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    // EPIPE when the command exits without reading its input
    proc.stdin.on("error", (err) => {
      fail(`Failed to write to ${cmd}: ${err.message}`);
    });

    proc.on("error", (err) => fail(`Failed to run ${cmd}: ${err.message}`));
    proc.on("close", (code) => {
      if (code === 0) {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(stdout);
      } else {
        const detail = stderr.trim();
        fail(
          `${cmd} exited with code ${code}` + (detail ? `:\n${detail}` : ""),
        );
      }
    });

    proc.stdin.end(options.input);
  });
}
