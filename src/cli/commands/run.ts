/**
 * Run command - the full trim → align → convert → assemble pipeline.
 */

import {
  loadConfigWithOverrides,
  extractCLIOptions,
} from "../../config/index.js";
import { runPipeline, type CommandRunner } from "../../pipeline/index.js";
import {
  buildStagePlan,
  STAGE_NAMES,
  type StageName,
} from "../../stages/index.js";
import {
  createRunSummary,
  saveSummary,
  updateSummaryAfterStage,
  updateSummaryComplete,
  updateSummaryWithError,
  type RunSummary,
} from "../../state/index.js";
import { logger } from "../../utils/index.js";
import { outputFinalSummary } from "../formatters.js";
import {
  createRunner,
  extractConfigPath,
  handleCLIError,
  requireInputDir,
} from "../helpers.js";
import { addRunOptions } from "../options.js";

import type { Command } from "commander";

/**
 * Collaborators for {@link runStages} (injectable for testing).
 */
export interface RunStagesDeps {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from raw CLI options and run the named stages.
 *
 * A summary file, when requested, is written whether the run succeeds or
 * fails.
 *
 * @returns The final run summary
 * @throws The first error raised by configuration or by a stage
 */
export function runStages(
  names: readonly StageName[],
  options: Record<string, unknown>,
  deps: RunStagesDeps = {},
): RunSummary {
  const cliOptions = extractCLIOptions(options);
  const config = loadConfigWithOverrides(
    extractConfigPath(options),
    cliOptions,
    deps.env,
  );

  if (config.verbose) {
    logger.configure({ level: "debug" });
  }

  const inputDir = requireInputDir(config);
  const stages = buildStagePlan(config, names);
  const runner = deps.runner ?? createRunner(config);

  let summary = createRunSummary({ inputDir });
  logger.info(
    `Run ${summary.run_id}: ${stages.map((stage) => stage.name).join(" → ")}`,
  );
  if (config.dry_run) {
    logger.warn("Dry run: commands are printed, not executed");
  }

  const persist = (): void => {
    if (cliOptions.summary !== undefined) {
      saveSummary(cliOptions.summary, summary, cliOptions.format);
      logger.info(`Summary written to ${cliOptions.summary}`);
    }
  };

  try {
    const result = runPipeline(inputDir, stages, {
      runner,
      dryRun: config.dry_run,
      onStageComplete: (stageResult) => {
        summary = updateSummaryAfterStage(summary, stageResult);
      },
    });
    summary = updateSummaryComplete(summary, result.outputDir);
  } catch (err) {
    summary = updateSummaryWithError(summary, err);
    persist();
    throw err;
  }

  persist();
  return summary;
}

/**
 * Register the run command on the program.
 */
export function registerRunCommand(program: Command): void {
  const command = program
    .command("run")
    .description("Run all four stages: trim, align, convert, assemble");

  addRunOptions(command, STAGE_NAMES).action(
    (options: Record<string, unknown>) => {
      try {
        outputFinalSummary(runStages(STAGE_NAMES, options));
      } catch (err) {
        handleCLIError(err);
      }
    },
  );
}
