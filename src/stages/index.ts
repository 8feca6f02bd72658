/**
 * Domain stage plan.
 *
 * Turns a validated configuration into the ordered list of stage definitions
 * the driver runs: trim → align → convert → assemble.
 */

import { createTrimStage } from "./1-trim/index.js";
import { createAlignStage } from "./2-align/index.js";
import { createConvertStage } from "./3-convert/index.js";
import { createAssembleStage } from "./4-assemble/index.js";

import type { PipelineConfig } from "../config/index.js";
import type { StageDefinition } from "../pipeline/index.js";

export const STAGE_NAMES = ["trim", "align", "convert", "assemble"] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/**
 * Build one stage from configuration.
 *
 * @throws Error if a path the stage requires is not configured
 */
export function createStage(
  name: StageName,
  config: PipelineConfig,
): StageDefinition {
  const { tools } = config;

  switch (name) {
    case "trim":
      return createTrimStage({ trim: config.trim, cutadapt: tools.cutadapt });
    case "align": {
      const genomeIndex = config.align.genome_index;
      if (genomeIndex === undefined) {
        throw new Error(
          "Genome index is not configured: set align.genome_index or pass --genome-index",
        );
      }
      return createAlignStage({
        align: config.align,
        genomeIndex,
        hisat2: tools.hisat2,
      });
    }
    case "convert":
      return createConvertStage({
        convert: config.convert,
        samtools: tools.samtools,
      });
    case "assemble": {
      const annotation = config.assemble.annotation;
      if (annotation === undefined) {
        throw new Error(
          "Annotation file is not configured: set assemble.annotation or pass --annotation",
        );
      }
      return createAssembleStage({
        assemble: config.assemble,
        annotation,
        stringtie: tools.stringtie,
        awk: tools.awk,
      });
    }
  }
}

/**
 * Build the stages to run, in pipeline order.
 *
 * @param names - Subset of stages; defaults to all four
 */
export function buildStagePlan(
  config: PipelineConfig,
  names: readonly StageName[] = STAGE_NAMES,
): StageDefinition[] {
  return STAGE_NAMES.filter((name) => names.includes(name)).map((name) =>
    createStage(name, config),
  );
}

export { createTrimStage, trimmedNames } from "./1-trim/index.js";
export { createAlignStage, alignedName } from "./2-align/index.js";
export { createConvertStage } from "./3-convert/index.js";
export {
  createAssembleStage,
  coveredTranscriptsName,
  MANIFEST_NAME,
  MERGED_NAME,
} from "./4-assemble/index.js";
