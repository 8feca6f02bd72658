#!/usr/bin/env node
/**
 * rnaseq-stages CLI entry point.
 *
 * env.js must be the first import so `.env` is loaded before any module
 * reads tool paths from the environment.
 */
import "./env.js";

// =============================================================================
// CLI Entry Point
// =============================================================================

import { program } from "./cli/index.js";

// =============================================================================
// Public API Exports
// =============================================================================
// Import them via: import { runPipeline } from 'rnaseq-stages';

/** Orchestrator core: stages, runners, file selection and errors */
export * from "./pipeline/index.js";

/** The four RNA-seq stages and the plan builder */
export {
  buildStagePlan,
  createStage,
  STAGE_NAMES,
  type StageName,
} from "./stages/index.js";

/** Configuration loading with CLI overrides */
export {
  loadConfigWithOverrides,
  type CLIOptions,
  type PipelineConfig,
} from "./config/index.js";

/** Run summaries */
export {
  createRunSummary,
  formatSummary,
  saveSummary,
  type RunSummary,
} from "./state/index.js";

program.parse();
