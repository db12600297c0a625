/**
 * @summary CLI command to check the resolved configuration and environment.
 */

import chalk from "chalk";
import type { Command } from "commander";
import { locateBinary } from "@varscope/runner-vw";
import type { VarscopeConfig } from "../config.js";
import { addCommonOptions, configFor } from "./shared.js";
import type { CommonOptions } from "./shared.js";

export interface DoctorReport {
  config: VarscopeConfig;
  /** Resolved trainer path, undefined if not found */
  trainerPath: string | undefined;
  lines: string[];
}

export async function runDoctor(
  options: CommonOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<DoctorReport> {
  const config = await configFor(options, env);
  const trainerPath = await locateBinary(config.trainer.binary, env);

  const lines = [
    `Trainer:        ${config.trainer.binary} (${trainerPath ?? "not found"})`,
    `Temp dir:       ${config.tmpDir}`,
    `Keep artifacts: ${config.keepArtifacts ? "yes" : "no"}`,
    `Order:          ${config.order}`,
    `Metric:         ${config.metric}`,
  ];
  return { config, trainerPath, lines };
}

/**
 * Register the 'doctor' command. Exits with status 2 when the trainer
 * cannot be found.
 */
export function registerDoctorCommand(program: Command): void {
  const command = program.command("doctor").description("Check configuration and environment");

  addCommonOptions(command).action(async (options: CommonOptions) => {
    const report = await runDoctor(options);
    for (const line of report.lines) {
      console.log(line);
    }

    if (report.trainerPath === undefined) {
      console.log(chalk.yellow("\nTrainer not found; install vw or pass --trainer <path>"));
      process.exitCode = 2;
    }
  });
}
