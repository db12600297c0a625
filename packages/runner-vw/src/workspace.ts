/**
 * @summary Scoped temporary directory for the artifacts of one run.
 *
 * Holds the probe file, the model, the readable-model dump and the audit
 * capture. The directory is removed when the run ends, whether it succeeded
 * or not, unless keep mode is on.
 *
 * Used by:
 * - The CLI `analyze` command (as the ProbeSink and artifact layout)
 * - VwTrainer / VwAuditor for their output paths
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ProbeSink } from "@varscope/core";

export interface ArtifactPaths {
  dir: string;
  probe: string;
  model: string;
  readableModel: string;
  audit: string;
}

export interface WorkspaceOptions {
  /** Parent directory; defaults to the OS temp directory */
  tmpDir?: string | undefined;
  /** Leave the artifacts in place on dispose() */
  keep?: boolean | undefined;
}

const DIR_PREFIX = "varscope-";

export class RunWorkspace implements ProbeSink {
  readonly paths: ArtifactPaths;
  readonly keep: boolean;
  private disposed = false;

  private constructor(dir: string, keep: boolean) {
    this.keep = keep;
    this.paths = {
      dir,
      probe: path.join(dir, "probe.txt"),
      model: path.join(dir, "model.bin"),
      readableModel: path.join(dir, "model.readable.txt"),
      audit: path.join(dir, "audit.txt"),
    };
  }

  /**
   * Create a fresh private directory under `tmpDir`.
   */
  static async create(options: WorkspaceOptions = {}): Promise<RunWorkspace> {
    const parent = options.tmpDir ?? os.tmpdir();
    await fs.mkdir(parent, { recursive: true });
    const dir = await fs.mkdtemp(path.join(parent, DIR_PREFIX));
    return new RunWorkspace(dir, options.keep ?? false);
  }

  async writeProbe(lines: readonly string[]): Promise<string> {
    const payload = lines.map((line) => `${line}\n`).join("");
    await fs.writeFile(this.paths.probe, payload, "utf-8");
    return this.paths.probe;
  }

  /**
   * Remove the directory, or keep it and return its artifact paths.
   * Calling it again does nothing.
   */
  async dispose(): Promise<ArtifactPaths | undefined> {
    if (this.disposed) return undefined;
    this.disposed = true;

    if (this.keep) return this.paths;
    await fs.rm(this.paths.dir, { recursive: true, force: true });
    return undefined;
  }
}

const keptOnFailure = new WeakMap<object, ArtifactPaths>();

/**
 * Artifact paths left behind by a run that failed with `error` in keep mode.
 */
export function keptArtifactsOf(error: unknown): ArtifactPaths | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  return keptOnFailure.get(error);
}

/**
 * Run `fn` inside a workspace and dispose of it on every exit path.
 *
 * In keep mode a failure is rethrown unchanged; its artifact paths are
 * available through keptArtifactsOf().
 *
 * @returns The callback's result, plus the artifact paths in keep mode
 */
export async function withWorkspace<T>(
  options: WorkspaceOptions,
  fn: (workspace: RunWorkspace) => Promise<T>
): Promise<{ result: T; kept: ArtifactPaths | undefined }> {
  const workspace = await RunWorkspace.create(options);
  let result: T;
  try {
    result = await fn(workspace);
  } catch (error) {
    const kept = await workspace.dispose();
    if (kept && typeof error === "object" && error !== null) {
      keptOnFailure.set(error, kept);
    }
    throw error;
  }
  const kept = await workspace.dispose();
  return { result, kept };
}
