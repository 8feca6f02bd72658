/**
 * Zod schemas for `pipeline.yaml`.
 *
 * Parsing an empty object yields a complete configuration; only the paths a
 * stage needs (input directory, genome index, annotation) have no default.
 * Unknown keys are rejected at every level.
 */

import { z } from "zod";

import {
  ADAPTER_READ_1,
  ADAPTER_READ_2,
  DEFAULT_ALIGN_MATCH,
  DEFAULT_ALIGN_THREADS,
  DEFAULT_FORWARD_SUFFIX,
  DEFAULT_GENE_ID,
  DEFAULT_LABELS,
  DEFAULT_REESTIMATE_PREFIX,
  DEFAULT_REGION_NAME,
  DEFAULT_REVERSE_SUFFIX,
  DEFAULT_TOOLS,
} from "./defaults.js";

/**
 * A single path segment: used for output directory and region file names.
 */
export const PathSegmentSchema = z
  .string()
  .min(1)
  .refine((value) => !/[\\/]/.test(value) && value !== "." && value !== "..", {
    message: "must be a single path segment",
  });

const AdapterSchema = z
  .string()
  .regex(/^[ACGTN]+$/i, { message: "must be a nucleotide sequence" });

export const ToolsConfigSchema = z
  .object({
    cutadapt: z.string().min(1).default(DEFAULT_TOOLS.cutadapt),
    hisat2: z.string().min(1).default(DEFAULT_TOOLS.hisat2),
    samtools: z.string().min(1).default(DEFAULT_TOOLS.samtools),
    stringtie: z.string().min(1).default(DEFAULT_TOOLS.stringtie),
    awk: z.string().min(1).default(DEFAULT_TOOLS.awk),
  })
  .strict();

export const TrimConfigSchema = z
  .object({
    adapter_forward: AdapterSchema.default(ADAPTER_READ_1),
    adapter_reverse: AdapterSchema.default(ADAPTER_READ_2),
    forward_suffix: z.string().min(1).default(DEFAULT_FORWARD_SUFFIX),
    reverse_suffix: z.string().min(1).default(DEFAULT_REVERSE_SUFFIX),
    output_label: PathSegmentSchema.default(DEFAULT_LABELS.trim),
  })
  .strict()
  .refine((trim) => trim.forward_suffix !== trim.reverse_suffix, {
    message: "forward_suffix and reverse_suffix must differ",
    path: ["reverse_suffix"],
  });

export const AlignConfigSchema = z
  .object({
    genome_index: z.string().min(1).optional(),
    threads: z.number().int().positive().default(DEFAULT_ALIGN_THREADS),
    match: z.string().min(1).default(DEFAULT_ALIGN_MATCH),
    output_label: PathSegmentSchema.default(DEFAULT_LABELS.align),
  })
  .strict();

export const ConvertConfigSchema = z
  .object({
    output_label: PathSegmentSchema.default(DEFAULT_LABELS.convert),
  })
  .strict();

export const AssembleConfigSchema = z
  .object({
    annotation: z.string().min(1).optional(),
    gene_id: z.string().min(1).default(DEFAULT_GENE_ID),
    region_name: PathSegmentSchema.default(DEFAULT_REGION_NAME),
    // An empty prefix re-estimates every BAM
    reestimate_prefix: z.string().default(DEFAULT_REESTIMATE_PREFIX),
    output_label: PathSegmentSchema.default(DEFAULT_LABELS.assemble),
  })
  .strict();

export const OutputFormatSchema = z.enum(["json", "yaml"]);

export const PipelineConfigSchema = z
  .object({
    input_dir: z.string().min(1).optional(),
    tools: ToolsConfigSchema.default({}),
    trim: TrimConfigSchema.default({}),
    align: AlignConfigSchema.default({}),
    convert: ConvertConfigSchema.default({}),
    assemble: AssembleConfigSchema.default({}),
    verbose: z.boolean().default(false),
    dry_run: z.boolean().default(false),
  })
  .strict();

export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type TrimConfig = z.infer<typeof TrimConfigSchema>;
export type AlignConfig = z.infer<typeof AlignConfigSchema>;
export type ConvertConfig = z.infer<typeof ConvertConfigSchema>;
export type AssembleConfig = z.infer<typeof AssembleConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
