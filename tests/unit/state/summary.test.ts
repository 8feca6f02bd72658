import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import YAML from "yaml";

import {
  DirectoryNotFoundError,
  ExternalToolError,
  type StageResult,
} from "../../../src/pipeline/index.js";
import {
  createRunSummary,
  describeFailure,
  formatSummary,
  saveSummary,
  updateSummaryAfterStage,
  updateSummaryComplete,
  updateSummaryWithError,
} from "../../../src/state/summary.js";

const STARTED = new Date(2025, 0, 15, 9, 30, 5);
const FINISHED = new Date(2025, 0, 15, 10, 0, 0);

function stageResult(stage: string, outputDir: string): StageResult {
  return {
    stage,
    inputDir: "/runs/raw",
    outputDir,
    invocations: 3,
    artifacts: {},
  };
}

describe("createRunSummary", () => {
  it("starts a running summary", () => {
    const summary = createRunSummary({
      inputDir: "/runs/raw",
      runId: "run-1",
      now: STARTED,
    });

    expect(summary).toEqual({
      run_id: "run-1",
      status: "running",
      started_at: STARTED.toISOString(),
      input_dir: "/runs/raw",
      stages: [],
    });
  });

  it("generates a timestamped run ID", () => {
    const summary = createRunSummary({ inputDir: "/x", now: STARTED });

    expect(summary.run_id).toMatch(/^20250115-093005-[\w-]{4}$/);
  });
});

describe("summary updates", () => {
  const initial = createRunSummary({
    inputDir: "/runs/raw",
    runId: "run-1",
    now: STARTED,
  });

  it("appends stage records without mutating the input", () => {
    const updated = updateSummaryAfterStage(
      initial,
      stageResult("trim", "/runs/FASTQ_output"),
    );

    expect(initial.stages).toEqual([]);
    expect(updated.stages).toEqual([
      {
        stage: "trim",
        input_dir: "/runs/raw",
        output_dir: "/runs/FASTQ_output",
        invocations: 3,
      },
    ]);
  });

  it("marks completion", () => {
    const done = updateSummaryComplete(initial, "/runs/mapped_transcripts", FINISHED);

    expect(done.status).toBe("completed");
    expect(done.output_dir).toBe("/runs/mapped_transcripts");
    expect(done.completed_at).toBe(FINISHED.toISOString());
  });

  it("records a failure", () => {
    const error = new ExternalToolError(1, ["hisat2", "-q"]).attachContext({
      stage: "align",
      file: "trimmed.s_1.fastq",
    });

    const failed = updateSummaryWithError(initial, error, FINISHED);

    expect(failed.status).toBe("failed");
    expect(failed.error).toEqual({
      message: "Command 'hisat2' exited with code 1",
      code: "EXTERNAL_TOOL_FAILED",
      failed_stage: "align",
      failed_file: "trimmed.s_1.fastq",
      exit_code: 1,
      argv: ["hisat2", "-q"],
    });
  });
});

describe("describeFailure", () => {
  it("keeps only the message for other errors", () => {
    expect(describeFailure(new Error("boom"))).toEqual({ message: "boom" });
    expect(describeFailure("text")).toEqual({ message: "text" });
  });

  it("omits context that was never attached", () => {
    expect(describeFailure(new DirectoryNotFoundError("/x"))).toEqual({
      message: "The directory '/x' does not exist.",
      code: "DIRECTORY_NOT_FOUND",
    });
  });
});

describe("formatSummary", () => {
  it("lists stages and the output directory", () => {
    let summary = createRunSummary({
      inputDir: "/runs/raw",
      runId: "run-1",
      now: STARTED,
    });
    summary = updateSummaryAfterStage(summary, stageResult("trim", "/runs/FASTQ_output"));
    summary = updateSummaryComplete(summary, "/runs/FASTQ_output", FINISHED);

    expect(formatSummary(summary)).toBe(
      [
        "Run ID: run-1",
        "Status: completed",
        "Input: /runs/raw",
        "  trim: /runs/FASTQ_output (3 commands)",
        "Output: /runs/FASTQ_output",
      ].join("\n"),
    );
  });

  it("shows where a run failed", () => {
    const error = new ExternalToolError(2, ["samtools"]).attachContext({
      stage: "convert",
      file: "a.sam",
    });
    const summary = updateSummaryWithError(
      createRunSummary({ inputDir: "/runs/raw", runId: "run-2", now: STARTED }),
      error,
      FINISHED,
    );

    expect(formatSummary(summary).split("\n").at(-1)).toBe(
      "Error (convert / a.sam): Command 'samtools' exited with code 2",
    );
  });
});

describe("saveSummary", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "summary-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const summary = createRunSummary({
    inputDir: "/runs/raw",
    runId: "run-1",
    now: STARTED,
  });

  it("writes JSON by default", () => {
    const file = path.join(root, "run.json");

    saveSummary(file, summary);

    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual(summary);
  });

  it("writes YAML on request", () => {
    const file = path.join(root, "nested", "run.yaml");

    saveSummary(file, summary, "yaml");

    expect(YAML.parse(readFileSync(file, "utf-8"))).toEqual(summary);
  });
});
