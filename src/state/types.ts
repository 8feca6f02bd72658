/**
 * Run summary type definitions.
 */

import type { PipelineErrorCode } from "../pipeline/index.js";

export type RunStatus = "running" | "completed" | "failed";

/**
 * One completed stage.
 */
export interface StageRecord {
  stage: string;
  input_dir: string;
  output_dir: string;
  /** External commands run by the stage */
  invocations: number;
}

/**
 * Where and how a run failed.
 */
export interface RunFailure {
  message: string;
  /** Present for orchestrator errors */
  code?: PipelineErrorCode;
  failed_stage?: string;
  failed_file?: string;
  /** Present when an external tool exited unsuccessfully */
  exit_code?: number | null;
  argv?: string[];
}

/**
 * Record of one pipeline invocation, optionally written to disk.
 */
export interface RunSummary {
  /** Unique identifier for this run */
  run_id: string;
  status: RunStatus;
  started_at: string;
  completed_at?: string;
  input_dir: string;
  /** Final output directory (set on success) */
  output_dir?: string;
  stages: StageRecord[];
  error?: RunFailure;
}
