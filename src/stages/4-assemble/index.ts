/**
 * Stage 4: Transcript assembly
 *
 * Restricts the annotation to one gene region, then assembles transcripts
 * covering that region with StringTie:
 *
 * 1. region: extract the gene's records into `<region>.gtf` (awk, stdout
 *    redirected)
 * 2. estimate: per BAM, collect reference transcripts covered by the reads
 * 3. manifest: list the estimate outputs in `assembly_gtf_list.txt`
 * 4. merge: merge the per-sample transcripts into one annotation
 * 5. re-estimate: per BAM whose name starts with `reestimate_prefix`,
 *    against the merged annotation
 */

import path from "node:path";

import { regionFilterArgv } from "./region-filter.js";
import {
  aggregate,
  allOf,
  command,
  defineStage,
  endsWith,
  perFile,
  startsWith,
  stripExtension,
  type StageDefinition,
} from "../../pipeline/index.js";

import type { AssembleConfig } from "../../config/index.js";

export const MANIFEST_NAME = "assembly_gtf_list.txt";
export const MERGED_NAME = "ref_merged_transcripts.gtf";

export interface AssembleStageOptions {
  assemble: AssembleConfig;
  /** Annotation GTF, checked before the stage creates its output directory */
  annotation: string;
  /** stringtie executable */
  stringtie: string;
  /** awk executable */
  awk: string;
}

/** Coverage file name for a BAM; `merged` selects the re-estimation pass. */
export function coveredTranscriptsName(bamName: string, merged = false): string {
  const stem = stripExtension(bamName);
  return merged
    ? `covered_transcripts_${stem}.merged.gtf`
    : `covered_transcripts_${stem}.gtf`;
}

export function createAssembleStage(
  options: AssembleStageOptions,
): StageDefinition {
  const { assemble, annotation, stringtie, awk } = options;
  const isBam = endsWith(".bam");

  return defineStage({
    name: "assemble",
    label: assemble.output_label,
    requires: [{ path: annotation, description: "annotation file" }],
    phases: [
      aggregate("region", (ctx) => {
        const regionGtf = path.join(ctx.outputDir, `${assemble.region_name}.gtf`);
        return command(regionFilterArgv(awk, assemble.gene_id, annotation), {
          stdout: regionGtf,
          outputs: [regionGtf],
        });
      }),

      perFile("estimate", isBam, (match, ctx) => {
        const covered = path.join(ctx.outputDir, coveredTranscriptsName(match.name));
        return command(
          [
            stringtie,
            match.path,
            "-G",
            ctx.artifact("region"),
            "-C",
            covered,
            "-l",
            stripExtension(match.name),
          ],
          { outputs: [covered] },
        );
      }),

      aggregate("manifest", (ctx) => ({
        kind: "write",
        path: path.join(ctx.outputDir, MANIFEST_NAME),
        content: ctx
          .artifacts("estimate")
          .map((gtf) => `${gtf}\n`)
          .join(""),
      })),

      aggregate("merge", (ctx) => {
        const merged = path.join(ctx.outputDir, MERGED_NAME);
        return command(
          [
            stringtie,
            "--merge",
            "-G",
            ctx.artifact("region"),
            "-o",
            merged,
            ctx.artifact("manifest"),
          ],
          { outputs: [merged] },
        );
      }),

      perFile(
        "re-estimate",
        allOf(startsWith(assemble.reestimate_prefix), isBam),
        (match, ctx) => {
          const covered = path.join(
            ctx.outputDir,
            coveredTranscriptsName(match.name, true),
          );
          return command(
            [
              stringtie,
              match.path,
              "-G",
              ctx.artifact("merge"),
              "-C",
              covered,
              "-l",
              stripExtension(match.name),
            ],
            { outputs: [covered] },
          );
        },
      ),
    ],
  });
}
