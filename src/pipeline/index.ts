/**
 * Staged file-pipeline orchestrator.
 *
 * Re-exports the reusable core:
 * - predicates: declarative file-name filters
 * - file-selector: directory listing as a lazy, filtered sequence
 * - directory-resolver: deterministic sibling output directories
 * - command-runner: synchronous external process execution
 * - stage: phases, stage definitions and stage execution
 * - driver: sequential multi-stage runs
 * - errors: the failure taxonomy
 */

export type { PipelineErrorCode } from "./errors.js";
export {
  PipelineError,
  DirectoryNotFoundError,
  FileNotFoundError,
  DirectoryCreationError,
  ToolNotFoundError,
  ExternalToolError,
  isPipelineError,
} from "./errors.js";

export type { FilePredicate } from "./predicates.js";
export {
  allOf,
  anyOf,
  contains,
  endsWith,
  not,
  startsWith,
  stripExtension,
} from "./predicates.js";

export type { FileMatch, FileSource, OverlaySource } from "./file-selector.js";
export {
  createOverlaySource,
  fsFileSource,
  selectFiles,
} from "./file-selector.js";

export { outputDirFor, resolveOutputDir } from "./directory-resolver.js";

export type { CommandRunner, RunOptions } from "./command-runner.js";
export {
  createDryRunRunner,
  createSpawnRunner,
  formatCommand,
} from "./command-runner.js";

export type {
  AggregatePhase,
  AuxiliaryInput,
  CommandAction,
  PerFilePhase,
  PhaseAction,
  PhaseContext,
  StageDefinition,
  StageExecutionOptions,
  StagePhase,
  StageResult,
  WriteAction,
} from "./stage.js";
export {
  aggregate,
  command,
  defineStage,
  executeStage,
  perFile,
} from "./stage.js";

export type { PipelineOptions, PipelineResult } from "./driver.js";
export { runPipeline } from "./driver.js";
