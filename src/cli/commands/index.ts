/**
 * CLI command registration.
 */

import { registerPlanCommand } from "./plan.js";
import { registerRunCommand } from "./run.js";
import { registerStageCommand } from "./stage.js";
import { STAGE_NAMES } from "../../stages/index.js";

import type { Command } from "commander";

/**
 * Register the full-run commands on the program.
 */
export function registerPipelineCommands(program: Command): void {
  program.commandsGroup("Pipeline Commands:");
  registerRunCommand(program);
  registerPlanCommand(program);
}

/**
 * Register one command per stage on the program.
 */
export function registerStageCommands(program: Command): void {
  program.commandsGroup("Stage Commands:");
  for (const name of STAGE_NAMES) {
    registerStageCommand(program, name);
  }
}

/**
 * Register all CLI commands on the program.
 */
export function registerAllCommands(program: Command): void {
  registerPipelineCommands(program);
  registerStageCommands(program);
}
