import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runPipeline } from "../../../src/pipeline/driver.js";
import { ExternalToolError } from "../../../src/pipeline/errors.js";
import { endsWith } from "../../../src/pipeline/predicates.js";
import {
  command,
  defineStage,
  perFile,
  type StageDefinition,
} from "../../../src/pipeline/stage.js";
import { logger } from "../../../src/utils/logging.js";
import { createRecordingRunner } from "../../mocks/recording-runner.js";

vi.mock("../../../src/utils/logging.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    stageHeader: vi.fn(),
  },
}));

/** A stage that turns every `.txt` into `<name>` in its own output directory. */
function passThrough(name: string): StageDefinition {
  return defineStage({
    name,
    label: `${name}_out`,
    phases: [
      perFile(name, endsWith(".txt"), (match, ctx) => {
        const out = path.join(ctx.outputDir, match.name);
        return command([`tool-${name}`, match.path, "-o", out], {
          outputs: [out],
        });
      }),
    ],
  });
}

const STAGES = ["one", "two", "three", "four"].map(passThrough);

describe("runPipeline", () => {
  let root: string;
  let input: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "driver-"));
    input = path.join(root, "raw");
    mkdirSync(input);
    writeFileSync(path.join(input, "sample.txt"), "");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("chains each stage's output directory into the next", () => {
    const runner = createRecordingRunner({ produce: true });

    const result = runPipeline(input, STAGES, { runner });

    expect(result.outputDir).toBe(path.join(root, "four_out"));
    expect(result.stages.map((stage) => stage.inputDir)).toEqual([
      input,
      path.join(root, "one_out"),
      path.join(root, "two_out"),
      path.join(root, "three_out"),
    ]);
    expect(runner.calls.map((call) => call.argv[0])).toEqual([
      "tool-one",
      "tool-two",
      "tool-three",
      "tool-four",
    ]);
  });

  it("aborts before later stages run when a stage fails", () => {
    const runner = createRecordingRunner({
      produce: true,
      fail: (argv) =>
        argv[0] === "tool-two" ? new ExternalToolError(1, argv) : undefined,
    });
    const completed: string[] = [];

    let caught: unknown;
    try {
      runPipeline(input, STAGES, {
        runner,
        onStageComplete: (result) => completed.push(result.stage),
      });
    } catch (err) {
      caught = err;
    }

    const invocations = (tool: string): number =>
      runner.calls.filter((call) => call.argv[0] === tool).length;
    expect(invocations("tool-three")).toBe(0);
    expect(invocations("tool-four")).toBe(0);
    expect(completed).toEqual(["one"]);
    expect(caught).toBeInstanceOf(ExternalToolError);
    if (caught instanceof ExternalToolError) {
      expect(caught.stage).toBe("two");
      expect(caught.file).toBe("sample.txt");
    }
    expect(logger.error).toHaveBeenCalledWith("Stage 'two' failed");
  });

  it("reports progress for every stage", () => {
    const runner = createRecordingRunner({ produce: true });
    const onStageComplete = vi.fn();

    runPipeline(input, STAGES.slice(0, 2), { runner, onStageComplete });

    expect(logger.stageHeader).toHaveBeenCalledWith("Stage 1/2: one");
    expect(logger.stageHeader).toHaveBeenCalledWith("Stage 2/2: two");
    expect(onStageComplete).toHaveBeenCalledTimes(2);
    expect(onStageComplete).toHaveBeenLastCalledWith(
      expect.objectContaining({ stage: "two" }),
      1,
      2,
    );
  });

  it("hands reported outputs to later stages on a dry run", () => {
    const runner = createRecordingRunner();

    const result = runPipeline(input, STAGES, { runner, dryRun: true });

    const dirs = [
      input,
      ...["one", "two", "three", "four"].map((name) =>
        path.join(root, `${name}_out`),
      ),
    ];
    expect(runner.calls.map((call) => call.argv)).toEqual(
      ["one", "two", "three", "four"].map((name, index) => [
        `tool-${name}`,
        path.join(dirs[index] ?? "", "sample.txt"),
        "-o",
        path.join(dirs[index + 1] ?? "", "sample.txt"),
      ]),
    );
    expect(result.stages.map((stage) => stage.invocations)).toEqual([1, 1, 1, 1]);
  });

  it("sees only real files without a dry run", () => {
    const runner = createRecordingRunner();

    runPipeline(input, STAGES, { runner });

    expect(runner.calls.map((call) => call.argv[0])).toEqual(["tool-one"]);
  });

  it("returns the initial directory when there are no stages", () => {
    const result = runPipeline(input, []);

    expect(result).toEqual({ outputDir: input, stages: [] });
  });
});
