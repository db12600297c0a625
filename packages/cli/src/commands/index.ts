/**
 * @summary Central export point for all CLI commands.
 *
 * Used by:
 * - The main CLI entry point (src/index.ts) to import and register all commands
 */

export { registerAnalyzeCommand, runAnalyze } from "./analyze.js";
export type { AnalyzeOutcome } from "./analyze.js";
export { registerProbeCommand, runProbe } from "./probe.js";
export { registerDoctorCommand, runDoctor } from "./doctor.js";
export type { DoctorReport } from "./doctor.js";
