/**
 * @summary Main entry point for the varscope command-line tool.
 *
 * Trains a linear learner on a namespaced sparse-vector dataset, audits a
 * probe example that carries every known feature, and prints each
 * feature's value range, weight and relative score.
 *
 * Available commands:
 * - varscope [options] <dataset> [trainer-args...]  - Analyze (default)
 * - varscope probe <dataset> [trainer-args...]      - Print probe examples
 * - varscope doctor                                 - Check configuration
 *
 * Options go before the dataset; everything after it is forwarded to the
 * trainer unchanged.
 */

import chalk from "chalk";
import { createProgram } from "./program.js";
import { printFatal } from "./output.js";

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const program = createProgram();

  // Show help if no command provided
  if (!process.argv.slice(2).length) {
    console.error(chalk.cyan("\nvarscope"));
    console.error(chalk.gray("Feature weight report for linear models\n"));
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

// Run the CLI
main().catch((error: unknown) => {
  printFatal(error);
  process.exit(1);
});
