import { Command } from "commander";
import { VERSION } from "@varscope/core";
import {
  registerAnalyzeCommand,
  registerDoctorCommand,
  registerProbeCommand,
} from "./commands/index.js";

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("varscope")
    .description("Rank the features of a linear model by learned weight and value range")
    .version(VERSION)
    .enablePositionalOptions();

  registerAnalyzeCommand(program);
  registerProbeCommand(program);
  registerDoctorCommand(program);

  return program;
}
