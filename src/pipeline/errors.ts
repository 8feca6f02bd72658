/**
 * Pipeline error taxonomy.
 *
 * Every failure raised by the orchestrator core is a {@link PipelineError}.
 * Nothing in the core retries or substitutes a default: errors propagate to
 * the top-level caller as the same instance, with `stage` and `file` filled in
 * by the stage that was running when the failure happened.
 */

/**
 * Stable machine-readable error codes.
 */
export type PipelineErrorCode =
  | "DIRECTORY_NOT_FOUND"
  | "FILE_NOT_FOUND"
  | "DIRECTORY_CREATION_FAILED"
  | "TOOL_NOT_FOUND"
  | "EXTERNAL_TOOL_FAILED";

/**
 * Base class for all orchestrator failures.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  /** Stage that was executing when the error was raised */
  stage: string | undefined;

  /** File being processed when the error was raised (per-file phases only) */
  file: string | undefined;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Record where the failure happened. Existing context is never overwritten,
   * so the innermost stage wins.
   */
  attachContext(context: { stage?: string; file?: string }): this {
    this.stage ??= context.stage;
    this.file ??= context.file;
    return this;
  }
}

export class DirectoryNotFoundError extends PipelineError {
  readonly code = "DIRECTORY_NOT_FOUND";

  constructor(readonly path: string) {
    super(`The directory '${path}' does not exist.`);
  }
}

/**
 * A required auxiliary input (genome index, annotation file) is missing.
 */
export class FileNotFoundError extends PipelineError {
  readonly code = "FILE_NOT_FOUND";

  constructor(
    readonly path: string,
    readonly description = "file",
  ) {
    super(`The ${description} '${path}' does not exist.`);
  }
}

export class DirectoryCreationError extends PipelineError {
  readonly code = "DIRECTORY_CREATION_FAILED";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not create directory '${path}': ${reason}`, { cause });
  }
}

export class ToolNotFoundError extends PipelineError {
  readonly code = "TOOL_NOT_FOUND";

  constructor(readonly toolName: string) {
    super(
      `External tool '${toolName}' was not found. Check that it is installed and on PATH.`,
    );
  }
}

/**
 * The external process ran but did not exit cleanly.
 *
 * `exitCode` is null when the process was terminated by a signal.
 */
export class ExternalToolError extends PipelineError {
  readonly code = "EXTERNAL_TOOL_FAILED";

  constructor(
    readonly exitCode: number | null,
    readonly argv: readonly string[],
    readonly signal: string | null = null,
  ) {
    const status =
      exitCode === null
        ? `was terminated by signal ${signal ?? "unknown"}`
        : `exited with code ${String(exitCode)}`;
    super(`Command '${argv[0] ?? ""}' ${status}`);
  }
}

/**
 * Type guard for orchestrator errors.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
