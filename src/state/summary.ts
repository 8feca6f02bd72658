/**
 * Run summary operations.
 *
 * Pure update functions return new summaries without mutating their input;
 * callers persist with saveSummary().
 */

import {
  ExternalToolError,
  isPipelineError,
  type StageResult,
} from "../pipeline/index.js";
import { generateRunId, writeJson, writeYaml } from "../utils/file-io.js";

import type { RunFailure, RunSummary } from "./types.js";
import type { OutputFormat } from "../config/index.js";

export interface CreateSummaryOptions {
  inputDir: string;
  runId?: string;
  now?: Date;
}

export function createRunSummary(options: CreateSummaryOptions): RunSummary {
  const now = options.now ?? new Date();
  return {
    run_id: options.runId ?? generateRunId(now),
    status: "running",
    started_at: now.toISOString(),
    input_dir: options.inputDir,
    stages: [],
  };
}

export function updateSummaryAfterStage(
  summary: RunSummary,
  result: StageResult,
): RunSummary {
  return {
    ...summary,
    stages: [
      ...summary.stages,
      {
        stage: result.stage,
        input_dir: result.inputDir,
        output_dir: result.outputDir,
        invocations: result.invocations,
      },
    ],
  };
}

export function updateSummaryComplete(
  summary: RunSummary,
  outputDir: string,
  now: Date = new Date(),
): RunSummary {
  return {
    ...summary,
    status: "completed",
    output_dir: outputDir,
    completed_at: now.toISOString(),
  };
}

/**
 * Describe an error for the summary, keeping whatever context it carries.
 */
export function describeFailure(err: unknown): RunFailure {
  const failure: RunFailure = {
    message: err instanceof Error ? err.message : String(err),
  };

  if (isPipelineError(err)) {
    failure.code = err.code;
    if (err.stage !== undefined) {
      failure.failed_stage = err.stage;
    }
    if (err.file !== undefined) {
      failure.failed_file = err.file;
    }
  }
  if (err instanceof ExternalToolError) {
    failure.exit_code = err.exitCode;
    failure.argv = [...err.argv];
  }

  return failure;
}

export function updateSummaryWithError(
  summary: RunSummary,
  err: unknown,
  now: Date = new Date(),
): RunSummary {
  return {
    ...summary,
    status: "failed",
    completed_at: now.toISOString(),
    error: describeFailure(err),
  };
}

/**
 * Write a summary as JSON or YAML.
 */
export function saveSummary(
  filePath: string,
  summary: RunSummary,
  format: OutputFormat = "json",
): void {
  if (format === "yaml") {
    writeYaml(filePath, summary);
  } else {
    writeJson(filePath, summary);
  }
}

/**
 * Format a summary for display.
 */
export function formatSummary(summary: RunSummary): string {
  const lines: string[] = [
    `Run ID: ${summary.run_id}`,
    `Status: ${summary.status}`,
    `Input: ${summary.input_dir}`,
  ];

  for (const record of summary.stages) {
    lines.push(
      `  ${record.stage}: ${record.output_dir} (${String(record.invocations)} commands)`,
    );
  }

  if (summary.output_dir) {
    lines.push(`Output: ${summary.output_dir}`);
  }

  if (summary.error) {
    const where = [summary.error.failed_stage, summary.error.failed_file]
      .filter((part) => part !== undefined)
      .join(" / ");
    lines.push(
      where
        ? `Error (${where}): ${summary.error.message}`
        : `Error: ${summary.error.message}`,
    );
  }

  return lines.join("\n");
}
