/**
 * Stage 1: Adapter trimming
 *
 * Trims Illumina adapters from paired-end reads with cutadapt. Forward reads
 * are discovered by suffix; the reverse mate is derived from the forward
 * read's name. The reverse output is gzip-compressed by cutadapt based on its
 * `.gz` extension.
 */

import path from "node:path";

import {
  command,
  defineStage,
  endsWith,
  perFile,
  type StageDefinition,
} from "../../pipeline/index.js";

import type { TrimConfig } from "../../config/index.js";

export interface TrimStageOptions {
  trim: TrimConfig;
  /** cutadapt executable */
  cutadapt: string;
}

/**
 * File names cutadapt writes for one read pair.
 *
 * @param base - Sample name with the forward suffix removed
 */
export function trimmedNames(
  base: string,
  trim: Pick<TrimConfig, "forward_suffix" | "reverse_suffix">,
): { forward: string; reverse: string } {
  return {
    forward: `trimmed.${base}${trim.forward_suffix}`,
    reverse: `trimmed.${base}${trim.reverse_suffix}.gz`,
  };
}

export function createTrimStage(options: TrimStageOptions): StageDefinition {
  const { trim, cutadapt } = options;

  return defineStage({
    name: "trim",
    label: trim.output_label,
    phases: [
      perFile("cutadapt", endsWith(trim.forward_suffix), (match, ctx) => {
        const base = match.name.slice(0, -trim.forward_suffix.length);
        const mate = path.join(match.dir, `${base}${trim.reverse_suffix}`);
        const names = trimmedNames(base, trim);
        const forwardOut = path.join(ctx.outputDir, names.forward);
        const reverseOut = path.join(ctx.outputDir, names.reverse);

        return command(
          [
            cutadapt,
            "-a",
            trim.adapter_forward,
            "-A",
            trim.adapter_reverse,
            "-o",
            forwardOut,
            "-p",
            reverseOut,
            match.path,
            mate,
          ],
          { outputs: [forwardOut, reverseOut] },
        );
      }),
    ],
  });
}
