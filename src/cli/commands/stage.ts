/**
 * Single-stage commands: trim, align, convert, assemble.
 *
 * Each runs one stage against `--input`, writing to the stage's usual
 * sibling directory, so a failed run can be continued stage by stage.
 */

import { handleCLIError } from "../helpers.js";
import { addRunOptions } from "../options.js";
import { runStages } from "./run.js";
import { outputFinalSummary } from "../formatters.js";

import type { StageName } from "../../stages/index.js";
import type { Command } from "commander";

const STAGE_DESCRIPTIONS: Record<StageName, string> = {
  trim: "Stage 1: trim adapters from paired FASTQ files (cutadapt)",
  align: "Stage 2: align trimmed reads to the genome index (hisat2)",
  convert: "Stage 3: convert SAM alignments to BAM (samtools)",
  assemble: "Stage 4: assemble and merge transcripts for a region (stringtie)",
};

/**
 * Register the command that runs a single stage.
 */
export function registerStageCommand(program: Command, name: StageName): void {
  const command = program
    .command(name)
    .description(STAGE_DESCRIPTIONS[name]);

  addRunOptions(command, [name]).action((options: Record<string, unknown>) => {
    try {
      outputFinalSummary(runStages([name], options));
    } catch (err) {
      handleCLIError(err);
    }
  });
}
