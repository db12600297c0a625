/**
 * @summary Child-process plumbing for the external trainer and auditor.
 *
 * Used by:
 * - VwTrainer / VwAuditor (vw.ts) for every invocation
 */

import { spawn } from "node:child_process";
import { createWriteStream } from "node:fs";
import { TrainerProcessError } from "@varscope/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Write the child's stdout to this file instead of discarding it */
  stdoutPath?: string | undefined;
}

export interface RunResult {
  exitCode: number;
  /** Tail of stderr */
  stderr: string;
}

/**
 * Runs one command to completion. Rejects with TrainerProcessError.
 */
export type CommandRunner = (
  binary: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<RunResult>;

/** Bytes of stderr kept for error reports */
export const STDERR_TAIL = 4096;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Render a command line the operator can paste into a shell.
 *
 * @example
 * formatCommand("vw", ["-d", "my data.txt"]); // "vw -d 'my data.txt'"
 */
export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./^-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Spawn a command and wait for it to exit.
 *
 * stdin is closed; stdout is discarded unless `stdoutPath` is set. A
 * non-zero exit status or a spawn failure rejects with TrainerProcessError
 * carrying the command line and the stderr tail.
 */
export const runCommand: CommandRunner = (binary, args, options = {}) => {
  const command = formatCommand(binary, args);

  return new Promise<RunResult>((resolve, reject) => {
    const out = options.stdoutPath !== undefined ? createWriteStream(options.stdoutPath) : undefined;
    const child = spawn(binary, [...args], {
      stdio: ["ignore", out ? "pipe" : "ignore", "pipe"],
    });

    let stderr = "";
    child.stderr?.setEncoding("utf-8");
    child.stderr?.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL);
    });

    if (out) {
      child.stdout?.pipe(out);
      out.on("error", (error) => {
        child.kill();
        reject(new TrainerProcessError(command, null, stderr, error));
      });
    }

    child.on("error", (error) => {
      out?.destroy();
      reject(new TrainerProcessError(command, null, stderr, error));
    });

    child.on("close", (code) => {
      const settle = (): void => {
        if (code === 0) {
          resolve({ exitCode: 0, stderr });
        } else {
          reject(new TrainerProcessError(command, code, stderr.trim()));
        }
      };

      if (out && !out.writableFinished) {
        out.once("finish", settle);
      } else {
        settle();
      }
    });
  });
};
