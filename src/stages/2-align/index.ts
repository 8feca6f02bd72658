/**
 * Stage 2: Alignment
 *
 * Aligns trimmed reads to the reference with HISAT2, one SAM file per input.
 * `--dta-cufflinks` tailors the alignments for downstream transcript assembly.
 */

import path from "node:path";

import {
  command,
  contains,
  defineStage,
  perFile,
  stripExtension,
  type StageDefinition,
} from "../../pipeline/index.js";

import type { AlignConfig } from "../../config/index.js";

export interface AlignStageOptions {
  align: AlignConfig;
  /** Genome index file, checked before the stage creates its output directory */
  genomeIndex: string;
  /** hisat2 executable */
  hisat2: string;
}

/** SAM file name for an aligned input, e.g. `aligned.trimmed.s_1.sam`. */
export function alignedName(inputName: string): string {
  return `aligned.${stripExtension(inputName)}.sam`;
}

export function createAlignStage(options: AlignStageOptions): StageDefinition {
  const { align, genomeIndex, hisat2 } = options;

  return defineStage({
    name: "align",
    label: align.output_label,
    requires: [{ path: genomeIndex, description: "genome index file" }],
    phases: [
      perFile("hisat2", contains(align.match), (match, ctx) => {
        const sam = path.join(ctx.outputDir, alignedName(match.name));

        return command(
          [
            hisat2,
            "-q",
            "-p",
            String(align.threads),
            "--dta-cufflinks",
            "-x",
            genomeIndex,
            "-U",
            match.path,
            "-S",
            sam,
          ],
          { outputs: [sam] },
        );
      }),
    ],
  });
}
