/**
 * Plan command - show what a run would do without touching the filesystem.
 */

import {
  extractCLIOptions,
  loadConfigWithOverrides,
} from "../../config/index.js";
import {
  outputDirFor,
  type StageDefinition,
} from "../../pipeline/index.js";
import { buildStagePlan, STAGE_NAMES } from "../../stages/index.js";
import { formatPlan, type PlanEntry } from "../formatters.js";
import {
  extractConfigPath,
  handleCLIError,
  requireInputDir,
} from "../helpers.js";
import { addInputOptions } from "../options.js";

import type { Command } from "commander";

/**
 * Chain stage directories from `inputDir` the way the driver will.
 */
export function describePlan(
  inputDir: string,
  stages: readonly StageDefinition[],
): PlanEntry[] {
  const entries: PlanEntry[] = [];
  let current = inputDir;

  for (const stage of stages) {
    const outputDir = outputDirFor(current, stage.label);
    entries.push({
      stage: stage.name,
      label: stage.label,
      inputDir: current,
      outputDir,
      phases: stage.phases.map((phase) => phase.name),
      requires: stage.requires.map(
        (aux) => `${aux.description} ${aux.path}`,
      ),
    });
    current = outputDir;
  }

  return entries;
}

/**
 * Register the plan command on the program.
 */
export function registerPlanCommand(program: Command): void {
  const command = program
    .command("plan")
    .description("Show the stage order and the directories each stage uses");

  addInputOptions(command, STAGE_NAMES).action(
    (options: Record<string, unknown>) => {
      try {
        const config = loadConfigWithOverrides(
          extractConfigPath(options),
          extractCLIOptions(options),
        );
        const stages = buildStagePlan(config);
        console.log(formatPlan(describePlan(requireInputDir(config), stages)));
      } catch (err) {
        handleCLIError(err);
      }
    },
  );
}
