/**
 * Pipeline Stage.
 *
 * A stage binds file selection, argument-vector construction, output
 * directory resolution and the command runner into one unit. Its work is an
 * ordered list of phases:
 *
 * - `per-file`: one action for every entry of the input directory that matches
 *   the phase's predicate, in listing order
 * - `aggregate`: exactly one action
 *
 * Each action either runs an external command or writes a small file in
 * process. Paths an action declares as its output are recorded per phase, and
 * later phases read them back through {@link PhaseContext.artifacts}. A phase
 * only starts once every action of the previous phase has returned, so a
 * manifest built from earlier outputs never depends on listing order.
 */

import path from "node:path";

import {
  createSpawnRunner,
  formatCommand,
  type CommandRunner,
} from "./command-runner.js";
import { resolveOutputDir } from "./directory-resolver.js";
import {
  DirectoryNotFoundError,
  FileNotFoundError,
  isPipelineError,
} from "./errors.js";
import {
  fsFileSource,
  selectFiles,
  type FileMatch,
  type FileSource,
} from "./file-selector.js";
import { writeText } from "../utils/file-io.js";
import { logger } from "../utils/logging.js";

import type { FilePredicate } from "./predicates.js";

/** Run an external tool. */
export interface CommandAction {
  readonly kind: "command";
  readonly argv: readonly string[];
  /** Redirect the tool's stdout to this path */
  readonly stdout?: string;
  /** Paths the tool produces, recorded as this phase's artifacts */
  readonly outputs?: readonly string[];
}

/** Write a file in process (e.g. a manifest). The path is recorded as an artifact. */
export interface WriteAction {
  readonly kind: "write";
  readonly path: string;
  readonly content: string;
}

export type PhaseAction = CommandAction | WriteAction;

/**
 * What a phase can see while building its actions.
 */
export interface PhaseContext {
  readonly stage: string;
  readonly inputDir: string;
  readonly outputDir: string;
  /** Paths recorded by an earlier phase, in the order they were produced */
  artifacts(phase: string): readonly string[];
  /** The single path recorded by an earlier aggregate phase */
  artifact(phase: string): string;
}

export interface PerFilePhase {
  readonly kind: "per-file";
  readonly name: string;
  readonly select: FilePredicate;
  build(match: FileMatch, ctx: PhaseContext): PhaseAction;
}

export interface AggregatePhase {
  readonly kind: "aggregate";
  readonly name: string;
  build(ctx: PhaseContext): PhaseAction;
}

export type StagePhase = PerFilePhase | AggregatePhase;

/**
 * A file the stage needs besides its input directory (genome index,
 * annotation). Checked before the output directory is created.
 */
export interface AuxiliaryInput {
  readonly path: string;
  readonly description: string;
}

/**
 * Immutable description of one pipeline stage.
 */
export interface StageDefinition {
  readonly name: string;
  /** Output directory name, sited next to the stage's input directory */
  readonly label: string;
  readonly requires: readonly AuxiliaryInput[];
  readonly phases: readonly StagePhase[];
}

export interface StageResult {
  readonly stage: string;
  readonly inputDir: string;
  readonly outputDir: string;
  /** Number of external commands run */
  readonly invocations: number;
  readonly artifacts: Readonly<Record<string, readonly string[]>>;
}

/**
 * Collaborators for stage execution (injectable for testing).
 */
export interface StageExecutionOptions {
  runner?: CommandRunner;
  source?: FileSource;
  /** Report in-process writes instead of performing them */
  dryRun?: boolean;
}

/**
 * Build a frozen stage definition.
 */
export function defineStage(definition: {
  name: string;
  label: string;
  requires?: readonly AuxiliaryInput[];
  phases: readonly StagePhase[];
}): StageDefinition {
  if (definition.phases.length === 0) {
    throw new Error(`Stage '${definition.name}' must declare at least one phase`);
  }
  const names = new Set(definition.phases.map((phase) => phase.name));
  if (names.size !== definition.phases.length) {
    throw new Error(`Stage '${definition.name}' has duplicate phase names`);
  }

  return Object.freeze({
    name: definition.name,
    label: definition.label,
    requires: Object.freeze([...(definition.requires ?? [])]),
    phases: Object.freeze([...definition.phases]),
  });
}

/**
 * Build a phase that runs once for every matching input file.
 */
export function perFile(
  name: string,
  select: FilePredicate,
  build: (match: FileMatch, ctx: PhaseContext) => PhaseAction,
): PerFilePhase {
  return { kind: "per-file", name, select, build };
}

export function aggregate(
  name: string,
  build: (ctx: PhaseContext) => PhaseAction,
): AggregatePhase {
  return { kind: "aggregate", name, build };
}

/** Shorthand for a {@link CommandAction}. */
export function command(
  argv: readonly string[],
  extra: { stdout?: string; outputs?: readonly string[] } = {},
): CommandAction {
  return { kind: "command", argv, ...extra };
}

function checkPreconditions(
  inputDir: string,
  stage: StageDefinition,
  source: FileSource,
): void {
  if (!source.isDirectory(inputDir)) {
    throw new DirectoryNotFoundError(inputDir);
  }
  for (const aux of stage.requires) {
    if (!source.isFile(aux.path)) {
      throw new FileNotFoundError(aux.path, aux.description);
    }
  }
}

function createPhaseContext(
  stage: string,
  inputDir: string,
  outputDir: string,
  produced: ReadonlyMap<string, string[]>,
): PhaseContext {
  const artifacts = (phase: string): readonly string[] => {
    const paths = produced.get(phase);
    if (!paths) {
      throw new Error(
        `Phase '${phase}' has not run before this point in stage '${stage}'`,
      );
    }
    return paths;
  };

  return {
    stage,
    inputDir,
    outputDir,
    artifacts,
    artifact(phase) {
      const paths = artifacts(phase);
      const [only] = paths;
      if (only === undefined || paths.length !== 1) {
        throw new Error(
          `Phase '${phase}' produced ${String(paths.length)} artifacts, expected exactly 1`,
        );
      }
      return only;
    },
  };
}

/**
 * Execute one stage against `inputDir`.
 *
 * Preconditions (input directory, auxiliary inputs) are checked before the
 * output directory is created. The first failing action stops the stage;
 * outputs already written are left in place.
 *
 * @returns The stage result; `outputDir` is `parent(inputDir)/stage.label`
 */
export function executeStage(
  inputDir: string,
  stage: StageDefinition,
  options: StageExecutionOptions = {},
): StageResult {
  const runner = options.runner ?? createSpawnRunner();
  const source = options.source ?? fsFileSource;
  const resolvedInput = path.resolve(inputDir);

  let currentFile: string | undefined;
  try {
    checkPreconditions(resolvedInput, stage, source);
    const outputDir = resolveOutputDir(resolvedInput, stage.label);

    const produced = new Map<string, string[]>();
    const ctx = createPhaseContext(
      stage.name,
      resolvedInput,
      outputDir,
      produced,
    );
    let invocations = 0;

    const perform = (action: PhaseAction, recorded: string[]): void => {
      if (action.kind === "write") {
        if (options.dryRun) {
          logger.info(`write ${action.path}`);
        } else {
          writeText(action.path, action.content);
        }
        recorded.push(action.path);
        return;
      }
      logger.debug(`$ ${formatCommand(action.argv, { stdout: action.stdout })}`);
      invocations++;
      runner.run(action.argv, { stdout: action.stdout });
      recorded.push(...(action.outputs ?? []));
    };

    for (const phase of stage.phases) {
      const recorded: string[] = [];

      if (phase.kind === "aggregate") {
        perform(phase.build(ctx), recorded);
      } else {
        for (const match of selectFiles(resolvedInput, phase.select, source)) {
          currentFile = match.name;
          perform(phase.build(match, ctx), recorded);
        }
        currentFile = undefined;
      }

      produced.set(phase.name, recorded);
      logger.debug(
        `Phase '${phase.name}' finished with ${String(recorded.length)} artifact(s)`,
      );
    }

    return {
      stage: stage.name,
      inputDir: resolvedInput,
      outputDir,
      invocations,
      artifacts: Object.fromEntries(produced),
    };
  } catch (err) {
    if (isPipelineError(err)) {
      err.attachContext({ stage: stage.name, file: currentFile });
    }
    throw err;
  }
}
