/**
 * External Command Runner.
 *
 * Narrow capability interface around synchronous process execution. Stages
 * only ever see {@link CommandRunner}, so tests swap in a recorder instead of
 * spawning real aligners.
 *
 * There is no timeout: a hung external process blocks the pipeline until it
 * is terminated out-of-band.
 */

import { spawnSync, type StdioOptions } from "node:child_process";
import { closeSync, openSync } from "node:fs";

import { ExternalToolError, ToolNotFoundError } from "./errors.js";

export interface RunOptions {
  /**
   * Write the process's standard output to this path (created or truncated).
   * When omitted, stdout and stderr are inherited from the caller.
   */
  stdout?: string;
}

export interface CommandRunner {
  /**
   * Run `argv[0]` with the remaining tokens as arguments and block until it
   * exits.
   *
   * @throws ToolNotFoundError if the executable cannot be located
   * @throws ExternalToolError if the process exits non-zero or is killed
   */
  run(argv: readonly string[], options?: RunOptions): void;
}

const SAFE_TOKEN = /^[\w@%+=:,./-]+$/;

/**
 * Render an argument vector as a copy-pasteable shell command line.
 */
export function formatCommand(
  argv: readonly string[],
  options: RunOptions = {},
): string {
  const line = argv
    .map((token) =>
      SAFE_TOKEN.test(token) ? token : `'${token.replaceAll("'", `'\\''`)}'`,
    )
    .join(" ");
  return options.stdout ? `${line} > ${formatCommand([options.stdout])}` : line;
}

function isMissingExecutable(error: Error): boolean {
  const code = "code" in error ? error.code : undefined;
  return code === "ENOENT" || code === "EACCES";
}

/**
 * Runner that spawns real processes with `spawnSync` (no shell).
 */
export function createSpawnRunner(): CommandRunner {
  return {
    run(argv, options = {}) {
      const [command, ...args] = argv;
      if (command === undefined || command.length === 0) {
        throw new Error("Cannot run an empty command");
      }

      const stdoutFd =
        options.stdout === undefined ? undefined : openSync(options.stdout, "w");
      const stdio: StdioOptions = [
        "inherit",
        stdoutFd ?? "inherit",
        "inherit",
      ];

      try {
        const result = spawnSync(command, args, { stdio });

        if (result.error) {
          if (isMissingExecutable(result.error)) {
            throw new ToolNotFoundError(command);
          }
          throw result.error;
        }

        if (result.status !== 0) {
          throw new ExternalToolError(result.status, [...argv], result.signal);
        }
      } finally {
        if (stdoutFd !== undefined) {
          closeSync(stdoutFd);
        }
      }
    },
  };
}

/**
 * Runner that reports each command instead of executing it.
 *
 * @param report - Receives the formatted command line
 */
export function createDryRunRunner(
  report: (commandLine: string) => void,
): CommandRunner {
  return {
    run(argv, options = {}) {
      report(formatCommand(argv, options));
    },
  };
}
