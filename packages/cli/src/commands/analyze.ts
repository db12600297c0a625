/**
 * @summary Default CLI command: train, audit and rank every feature.
 *
 * Used by:
 * - The main CLI entry point (index.ts), as the default command
 */

import type { Command } from "commander";
import { analyzeFeatures, formatReport } from "@varscope/core";
import type { FeatureReport } from "@varscope/core";
import { VwAuditor, VwTrainer, readLines, withWorkspace } from "@varscope/runner-vw";
import type { ArtifactPaths, CommandRunner } from "@varscope/runner-vw";
import { createLogger, printKeptArtifacts } from "../output.js";
import { addCommonOptions, configFor, trainerArgsFrom } from "./shared.js";
import type { CommonOptions } from "./shared.js";

export interface AnalyzeOutcome {
  report: FeatureReport;
  /** Rendered report, ready for stdout */
  text: string;
  /** Artifact paths in keep mode */
  kept: ArtifactPaths | undefined;
}

/**
 * Run a full analysis of `dataset`.
 *
 * @param run - Replaces the child-process runner (tests)
 */
export async function runAnalyze(
  dataset: string,
  rawTrainerArgs: readonly string[],
  options: CommonOptions,
  env: NodeJS.ProcessEnv = process.env,
  run?: CommandRunner
): Promise<AnalyzeOutcome> {
  const config = await configFor(options, env);
  const log = createLogger(config.verbose);
  const trainerArgs = trainerArgsFrom(rawTrainerArgs);
  const runner = { binary: config.trainer.binary, run, log };

  const { result: report, kept } = await withWorkspace(
    { tmpDir: config.tmpDir, keep: config.keepArtifacts },
    (workspace) =>
      analyzeFeatures(
        {
          corpusPath: dataset,
          corpus: readLines(dataset),
          trainerArgs,
          metric: config.metric,
          order: config.order,
        },
        {
          trainer: new VwTrainer(workspace.paths, runner),
          auditor: new VwAuditor(workspace.paths, runner),
          probes: workspace,
          log,
        }
      )
  );

  const text = formatReport(report.labels, report.plan.mode === "multiclass");
  log?.(`report: ${report.labels.length} label(s), ${report.labels.reduce((n, l) => n + l.rows.length, 0)} rows`);
  return { report, text, kept };
}

/**
 * Register the default `analyze` command.
 *
 * @example
 * ```bash
 * varscope train.txt -q ab --passes 3
 * varscope -K -O a train.txt.gz --oaa 4
 * ```
 */
export function registerAnalyzeCommand(program: Command): void {
  const command = program
    .command("analyze", { isDefault: true })
    .description("Train on a dataset and report the weight of every feature")
    .argument("<dataset>", "Training corpus, optionally gzipped")
    .argument("[trainer-args...]", "Arguments forwarded to the trainer")
    .option("-K, --keep-artifacts", "Keep the probe, model and audit files")
    .option("-O, --order <r|a>", "r: signed relative score, a: absolute")
    .option("-M, --metric <w>", "Scoring metric (only w: weight)");

  addCommonOptions(command)
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (dataset: string, trainerArgs: string[], options: CommonOptions) => {
      const outcome = await runAnalyze(dataset, trainerArgs, options);

      console.log(outcome.text);
      if (outcome.kept) {
        printKeptArtifacts(outcome.kept);
      }
    });
}
