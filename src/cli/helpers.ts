/**
 * CLI helper functions shared by the commands.
 */
import {
  createDryRunRunner,
  createSpawnRunner,
  ExternalToolError,
  formatCommand,
  isPipelineError,
  type CommandRunner,
} from "../pipeline/index.js";
import { logger } from "../utils/logging.js";

import type { PipelineConfig } from "../config/index.js";

/**
 * Handle CLI errors consistently across all commands.
 *
 * Logs the message, plus the failing stage, file and command line when the
 * error carries them, and exits with code 1.
 *
 * @param err - Error to handle (can be Error instance or any other value)
 */
export function handleCLIError(err: unknown): never {
  logger.error(err instanceof Error ? err.message : String(err));

  if (isPipelineError(err)) {
    if (err.stage !== undefined) {
      logger.error(`  stage: ${err.stage}`);
    }
    if (err.file !== undefined) {
      logger.error(`  file: ${err.file}`);
    }
  }
  if (err instanceof ExternalToolError) {
    logger.error(`  command: ${formatCommand(err.argv)}`);
  }

  process.exit(1);
}

/**
 * Extract config file path from CLI options.
 *
 * @param options - Raw options from Commander.js
 * @param defaultPath - Default config path if not specified (defaults to undefined)
 * @returns Config file path or undefined/default
 */
export function extractConfigPath(
  options: Record<string, unknown>,
  defaultPath?: string,
): string | undefined {
  return typeof options["config"] === "string"
    ? options["config"]
    : defaultPath;
}

/**
 * The configured input directory.
 *
 * @throws Error if neither the config file nor `--input` set one
 */
export function requireInputDir(config: PipelineConfig): string {
  if (config.input_dir === undefined) {
    throw new Error(
      "Input directory is not configured: set input_dir or pass --input",
    );
  }
  return config.input_dir;
}

/**
 * Pick the runner for a configuration: one that prints commands on a dry
 * run, one that spawns them otherwise.
 */
export function createRunner(config: PipelineConfig): CommandRunner {
  if (config.dry_run) {
    return createDryRunRunner((commandLine) => {
      logger.info(commandLine);
    });
  }
  return createSpawnRunner();
}
