/**
 * Option groups shared by the commands that run stages.
 */
import { InvalidArgumentError, type Command } from "commander";

import type { StageName } from "../stages/index.js";

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Add the input and reference option groups.
 *
 * Only the options the given stages read are added: `--genome-index` and
 * `--threads` for align, `--annotation`, `--gene-id` and `--region-name` for
 * assemble.
 */
export function addInputOptions(
  command: Command,
  stages: readonly StageName[],
): Command {
  command
    .optionsGroup("Input Options:")
    .option("-c, --config <path>", "Path to config file (default: pipeline.yaml)")
    .option("-i, --input <dir>", "Input directory for the first stage");

  if (stages.includes("align") || stages.includes("assemble")) {
    command.optionsGroup("Reference Options:");
  }
  if (stages.includes("align")) {
    command
      .option("--genome-index <path>", "HISAT2 genome index")
      .option("--threads <n>", "Aligner threads", parsePositiveInt);
  }
  if (stages.includes("assemble")) {
    command
      .option("--annotation <path>", "Reference annotation (GTF)")
      .option("--gene-id <id>", "Gene whose annotation is extracted")
      .option("--region-name <name>", "Name of the extracted region file");
  }

  return command;
}

/**
 * Add the input groups plus the execution and output groups of commands
 * that run stages.
 */
export function addRunOptions(
  command: Command,
  stages: readonly StageName[],
): Command {
  return addInputOptions(command, stages)
    .optionsGroup("Execution Mode:")
    .option("--dr, --dry-run", "Print commands instead of running them")
    .optionsGroup("Output Options:")
    .option("-v, --verbose", "Log every command before it runs")
    .option("-s, --summary <path>", "Write a run summary to this file")
    .option("-f, --format <format>", "Summary format: json|yaml (default: json)");
}
