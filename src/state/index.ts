/**
 * Run summaries.
 *
 * Records which stages ran, where their outputs went and, on failure, which
 * stage, file and command failed.
 */

export type {
  RunFailure,
  RunStatus,
  RunSummary,
  StageRecord,
} from "./types.js";

export {
  createRunSummary,
  describeFailure,
  formatSummary,
  saveSummary,
  updateSummaryAfterStage,
  updateSummaryComplete,
  updateSummaryWithError,
} from "./summary.js";
