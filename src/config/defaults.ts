/**
 * Default values for pipeline configuration.
 *
 * Every value here can be overridden in `pipeline.yaml`; tool names can also
 * be overridden from the environment.
 *
 * @module config/defaults
 */

// =============================================================================
// Configuration file
// =============================================================================

/** Config file read from the working directory when `--config` is not given. */
export const DEFAULT_CONFIG_PATH = "pipeline.yaml";

// =============================================================================
// External tools
// =============================================================================

/** Executable names, resolved through PATH unless overridden. */
export const DEFAULT_TOOLS = {
  cutadapt: "cutadapt",
  hisat2: "hisat2",
  samtools: "samtools",
  stringtie: "stringtie",
  awk: "awk",
} as const;

export type ToolName = keyof typeof DEFAULT_TOOLS;

/** Environment variables that override a tool's executable path. */
export const TOOL_ENV_VARS: Record<ToolName, string> = {
  cutadapt: "CUTADAPT_PATH",
  hisat2: "HISAT2_PATH",
  samtools: "SAMTOOLS_PATH",
  stringtie: "STRINGTIE_PATH",
  awk: "AWK_PATH",
};

// =============================================================================
// Stage 1: Adapter trimming
// =============================================================================

/** Illumina TruSeq read 1 adapter. */
export const ADAPTER_READ_1 = "AGATCGGAAGAGCACACGTCTGAACTCCAGTCA";

/** Illumina TruSeq read 2 adapter. */
export const ADAPTER_READ_2 = "AGATCGGAAGAGCGTCGTGTAGGGAAAGAGTGT";

export const DEFAULT_FORWARD_SUFFIX = "_1.fastq";
export const DEFAULT_REVERSE_SUFFIX = "_2.fastq";

// =============================================================================
// Stage 2: Alignment
// =============================================================================

export const DEFAULT_ALIGN_THREADS = 2;

/** Substring that marks a file as trimmed reads. */
export const DEFAULT_ALIGN_MATCH = "trimmed";

// =============================================================================
// Stage 4: Transcript assembly
// =============================================================================

/** Ensembl gene ID of mouse Dcx (doublecortin). */
export const DEFAULT_GENE_ID = "ENSMUSG00000031285";

export const DEFAULT_REGION_NAME = "Dcx";

/** Prefix of the BAM files re-estimated against the merged annotation. */
export const DEFAULT_REESTIMATE_PREFIX = "sorted.";

// =============================================================================
// Output directory labels
// =============================================================================

export const DEFAULT_LABELS = {
  trim: "FASTQ_output",
  align: "hisat2_output",
  convert: "bam",
  assemble: "mapped_transcripts",
} as const;
