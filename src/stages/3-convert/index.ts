/**
 * Stage 3: SAM to BAM conversion
 */

import path from "node:path";

import {
  command,
  defineStage,
  endsWith,
  perFile,
  stripExtension,
  type StageDefinition,
} from "../../pipeline/index.js";

import type { ConvertConfig } from "../../config/index.js";

export interface ConvertStageOptions {
  convert: ConvertConfig;
  /** samtools executable */
  samtools: string;
}

export function createConvertStage(
  options: ConvertStageOptions,
): StageDefinition {
  const { convert, samtools } = options;

  return defineStage({
    name: "convert",
    label: convert.output_label,
    phases: [
      perFile("samtools-view", endsWith(".sam"), (match, ctx) => {
        const bam = path.join(
          ctx.outputDir,
          `${stripExtension(match.name)}.bam`,
        );
        return command([samtools, "view", "-bS", match.path, "-o", bam], {
          outputs: [bam],
        });
      }),
    ],
  });
}
