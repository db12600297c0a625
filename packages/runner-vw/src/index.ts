/**
 * @summary Main entry point for the @varscope/runner-vw package.
 *
 * Connects the analysis core to a real `vw` executable: the Trainer and
 * Auditor implementations, the child-process runner, the per-run artifact
 * workspace and the (optionally gzipped) line reader.
 *
 * Usage:
 * ```typescript
 * import { analyzeFeatures } from "@varscope/core";
 * import { VwAuditor, VwTrainer, readLines, withWorkspace } from "@varscope/runner-vw";
 *
 * const { result } = await withWorkspace({}, (ws) =>
 *   analyzeFeatures(
 *     { corpusPath, corpus: readLines(corpusPath), trainerArgs },
 *     { trainer: new VwTrainer(ws.paths, {}), auditor: new VwAuditor(ws.paths, {}), probes: ws }
 *   )
 * );
 * ```
 */

export { runCommand, formatCommand, STDERR_TAIL } from "./process.js";
export type { CommandRunner, RunOptions, RunResult } from "./process.js";

export { readLines, isGzip } from "./lines.js";

export { RunWorkspace, withWorkspace, keptArtifactsOf } from "./workspace.js";
export type { ArtifactPaths, WorkspaceOptions } from "./workspace.js";

export { VwTrainer, VwAuditor, DEFAULT_TRAINER_BINARY } from "./vw.js";
export type { VwOptions } from "./vw.js";

export { locateBinary } from "./locate.js";
