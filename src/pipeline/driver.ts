/**
 * Pipeline Driver.
 *
 * Runs stages in a fixed order, feeding each stage's output directory to the
 * next one as its input. The first failure aborts the run and is rethrown
 * unchanged; the error's `stage` field names the stage that failed.
 */

import { createOverlaySource, fsFileSource } from "./file-selector.js";
import { executeStage } from "./stage.js";
import { logger } from "../utils/logging.js";

import type {
  StageDefinition,
  StageExecutionOptions,
  StageResult,
} from "./stage.js";

/**
 * Per-run state owned by the driver. Created when a run starts and dropped
 * when it ends.
 */
interface RunContext {
  inputDir: string;
  readonly completed: StageResult[];
}

export interface PipelineResult {
  /** Output directory of the last stage (the initial input when no stages ran) */
  readonly outputDir: string;
  /** One entry per completed stage, in execution order */
  readonly stages: readonly StageResult[];
}

export interface PipelineOptions extends StageExecutionOptions {
  /** Called after each stage completes */
  onStageComplete?: (result: StageResult, index: number, total: number) => void;
}

/**
 * Run `stages` in order starting from `initialInputDir`.
 *
 * On a dry run every artifact a stage reports is added to the listing seen
 * by later stages, so their commands are reported too.
 *
 * @throws The first error raised by any stage; later stages never start
 */
export function runPipeline(
  initialInputDir: string,
  stages: readonly StageDefinition[],
  options: PipelineOptions = {},
): PipelineResult {
  const { onStageComplete, ...stageOptions } = options;
  const overlay = options.dryRun
    ? createOverlaySource(options.source ?? fsFileSource)
    : undefined;
  if (overlay) {
    stageOptions.source = overlay;
  }
  const ctx: RunContext = { inputDir: initialInputDir, completed: [] };

  for (const [index, stage] of stages.entries()) {
    logger.stageHeader(
      `Stage ${String(index + 1)}/${String(stages.length)}: ${stage.name}`,
    );

    let result: StageResult;
    try {
      result = executeStage(ctx.inputDir, stage, stageOptions);
    } catch (err) {
      logger.error(`Stage '${stage.name}' failed`);
      throw err;
    }

    logger.success(`Stage '${stage.name}' output: ${result.outputDir}`);
    overlay?.add(Object.values(result.artifacts).flat());
    ctx.completed.push(result);
    ctx.inputDir = result.outputDir;
    onStageComplete?.(result, index, stages.length);
  }

  return { outputDir: ctx.inputDir, stages: ctx.completed };
}
