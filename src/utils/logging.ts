/**
 * Console logger.
 *
 * Informational output goes to stdout, warnings and errors to stderr.
 * Verbosity is process-wide and set once from the CLI via `configure`.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level: LogLevel;
}

class Logger {
  private level: LogLevel = "info";

  configure(options: Partial<LoggerOptions>): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(chalk.gray(`[debug] ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`${chalk.blue("ℹ")} ${message}`);
    }
  }

  success(message: string): void {
    if (this.enabled("info")) {
      console.log(`${chalk.green("✔")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`${chalk.yellow("⚠")} ${message}`);
    }
  }

  error(message: string): void {
    if (this.enabled("error")) {
      console.error(`${chalk.red("✖")} ${message}`);
    }
  }

  /** Print a section header for a pipeline stage. */
  stageHeader(title: string): void {
    if (!this.enabled("info")) {
      return;
    }
    console.log(`\n${chalk.bold.cyan(title)}`);
    console.log(chalk.dim("─".repeat(Math.max(title.length, 20))));
  }
}

export const logger = new Logger();
