/**
 * @summary Trainer and Auditor backed by the `vw` command-line learner.
 *
 * Training:  `vw -d <corpus> <args...> -f <model> --readable_model <dump> --quiet`
 * Auditing:  `vw -t -i <model> --audit -d <probe> --quiet > <audit capture>`
 *
 * Used by:
 * - The CLI `analyze` command
 */

import { formatCommand, runCommand } from "./process.js";
import type { CommandRunner } from "./process.js";
import { readLines } from "./lines.js";
import type { ArtifactPaths } from "./workspace.js";
import type { Auditor, DiagnosticLogger, LineSource, Trainer } from "@varscope/core";

/** Binary looked up on PATH when none is configured */
export const DEFAULT_TRAINER_BINARY = "vw";

export interface VwOptions {
  binary?: string | undefined;
  /** Replaces the child-process runner (tests) */
  run?: CommandRunner | undefined;
  log?: DiagnosticLogger | undefined;
}

type WorkspacePaths = Pick<ArtifactPaths, "model" | "readableModel" | "audit">;

abstract class VwCommand {
  protected readonly binary: string;
  protected readonly run: CommandRunner;
  protected readonly log: DiagnosticLogger | undefined;

  constructor(protected readonly paths: WorkspacePaths, options: VwOptions) {
    this.binary = options.binary ?? DEFAULT_TRAINER_BINARY;
    this.run = options.run ?? runCommand;
    this.log = options.log;
  }

  protected async exec(args: readonly string[], stdoutPath?: string): Promise<void> {
    this.log?.(`running ${formatCommand(this.binary, args)}`);
    await this.run(this.binary, args, { stdoutPath });
  }
}

export class VwTrainer extends VwCommand implements Trainer {
  async train(corpusPath: string, options: readonly string[]): Promise<string> {
    const { model, readableModel } = this.paths;
    await this.exec(["-d", corpusPath, ...options, "-f", model, "--readable_model", readableModel, "--quiet"]);
    return model;
  }
}

export class VwAuditor extends VwCommand implements Auditor {
  async audit(modelPath: string, probePath: string): Promise<LineSource> {
    await this.exec(["-t", "-i", modelPath, "--audit", "-d", probePath, "--quiet"], this.paths.audit);
    return readLines(this.paths.audit);
  }
}
