/**
 * @summary CLI command that prints the probe examples without training.
 *
 * Useful for checking which namespaces and keys the catalog picked up and
 * how --keep/--ignore/-q/--oaa change them.
 */

import type { Command } from "commander";
import { buildProbeSet } from "@varscope/core";
import type { ProbeSet } from "@varscope/core";
import { readLines } from "@varscope/runner-vw";
import { createLogger } from "../output.js";
import { addCommonOptions, configFor, trainerArgsFrom } from "./shared.js";
import type { CommonOptions } from "./shared.js";

export async function runProbe(
  dataset: string,
  rawTrainerArgs: readonly string[],
  options: CommonOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ProbeSet> {
  const config = await configFor(options, env);
  const log = createLogger(config.verbose);

  const set = await buildProbeSet(readLines(dataset), trainerArgsFrom(rawTrainerArgs), dataset);
  log?.(
    `${set.catalog.recordCount} records, ${set.catalog.namespaces().length} namespaces, ` +
      `${set.plan.labels.length} probe example(s)`
  );
  return set;
}

/**
 * Register the 'probe' command.
 *
 * @example
 * ```bash
 * varscope probe train.txt --oaa 3 --ignore c
 * ```
 */
export function registerProbeCommand(program: Command): void {
  const command = program
    .command("probe")
    .description("Print the probe examples built from a dataset, without training")
    .argument("<dataset>", "Training corpus, optionally gzipped")
    .argument("[trainer-args...]", "Trainer arguments that shape the catalog");

  addCommonOptions(command)
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (dataset: string, trainerArgs: string[], options: CommonOptions) => {
      const set = await runProbe(dataset, trainerArgs, options);
      for (const line of set.probes) {
        console.log(line);
      }
    });
}
