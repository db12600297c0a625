/**
 * @summary Capability interfaces for the work varscope delegates.
 *
 * The analysis core never spawns processes or manages files. It trains and
 * audits through these contracts, which lets tests substitute an in-process
 * model and lets @varscope/runner-vw plug in a real executable.
 */

import type { LineSource } from "../audit/audit-parser.js";

/**
 * Trains a model on a corpus file.
 */
export interface Trainer {
  /**
   * @param corpusPath - Corpus file as given by the user (may be gzipped)
   * @param options - Forwarded trainer arguments
   * @returns Path of the trained model
   */
  train(corpusPath: string, options: readonly string[]): Promise<string>;
}

/**
 * Runs a model over probe examples with feature tracing enabled.
 */
export interface Auditor {
  /**
   * @returns The two-lines-per-example audit stream
   */
  audit(modelPath: string, probePath: string): Promise<LineSource>;
}

/**
 * Persists probe examples where the auditor can read them.
 */
export interface ProbeSink {
  /**
   * @returns Path of the written probe file
   */
  writeProbe(lines: readonly string[]): Promise<string>;
}
