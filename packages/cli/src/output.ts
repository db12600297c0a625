/**
 * @summary Console helpers shared by the CLI commands.
 *
 * The report itself goes to stdout uncolored so it can be piped; banners,
 * diagnostics and errors go to stderr.
 */

import chalk from "chalk";
import { TrainerProcessError } from "@varscope/core";
import type { DiagnosticLogger } from "@varscope/core";
import { keptArtifactsOf } from "@varscope/runner-vw";
import type { ArtifactPaths } from "@varscope/runner-vw";

export const LOG_PREFIX = "[varscope]";

/**
 * Diagnostic logger for `--verbose`; undefined when quiet.
 */
export function createLogger(verbose: boolean): DiagnosticLogger | undefined {
  if (!verbose) return undefined;
  return (message) => {
    console.error(chalk.gray(`${LOG_PREFIX} ${message}`));
  };
}

export function printKeptArtifacts(paths: ArtifactPaths): void {
  console.error(chalk.yellow(`${LOG_PREFIX} Artifacts kept in ${paths.dir}`));
  console.error(chalk.gray("  Probe:          "), paths.probe);
  console.error(chalk.gray("  Model:          "), paths.model);
  console.error(chalk.gray("  Readable model: "), paths.readableModel);
  console.error(chalk.gray("  Audit:          "), paths.audit);
}

/**
 * One-line description of a fatal error.
 *
 * A failed trainer invocation gets the last line of its stderr appended,
 * or the spawn error when it never started.
 */
export function fatalMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (!(error instanceof TrainerProcessError)) return message;

  const detail = lastLine(error.stderr) ?? error.cause?.message;
  return detail !== undefined ? `${message} (${detail})` : message;
}

function lastLine(text: string): string | undefined {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

/**
 * Print a fatal error the way the entry point reports it, followed by the
 * artifact paths when the failed run kept them.
 */
export function printFatal(error: unknown): void {
  console.error(chalk.red("Fatal error:"), fatalMessage(error));

  const kept = keptArtifactsOf(error);
  if (kept) {
    printKeptArtifacts(kept);
  }
}
