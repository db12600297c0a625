/**
 * @summary Options and configuration plumbing common to every command.
 */

import type { Command } from "commander";
import { resolveConfig } from "../config.js";
import type { PartialConfig, VarscopeConfig } from "../config.js";

/**
 * Raw option values as commander hands them to an action.
 */
export interface CommonOptions {
  config?: string;
  trainer?: string;
  tmpDir?: string;
  verbose?: boolean;
  keepArtifacts?: boolean;
  order?: string;
  metric?: string;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "JSON configuration file")
    .option("--trainer <path>", "Trainer executable (default: vw on PATH)")
    .option("--tmp-dir <path>", "Parent directory for run artifacts")
    .option("-v, --verbose", "Print diagnostics to stderr");
}

export function flagsLayer(options: CommonOptions): PartialConfig {
  return {
    trainer: options.trainer !== undefined ? { binary: options.trainer } : undefined,
    tmpDir: options.tmpDir,
    keepArtifacts: options.keepArtifacts,
    verbose: options.verbose,
    order: options.order,
    metric: options.metric,
  };
}

export function configFor(options: CommonOptions, env: NodeJS.ProcessEnv): Promise<VarscopeConfig> {
  return resolveConfig({ configPath: options.config, env, flags: flagsLayer(options) });
}

/**
 * Drop the `--` a user may put between the dataset and the trainer arguments.
 */
export function trainerArgsFrom(args: readonly string[]): string[] {
  return args[0] === "--" ? args.slice(1) : [...args];
}
