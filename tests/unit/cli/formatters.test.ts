import { describe, expect, it, vi } from "vitest";

import {
  formatPlan,
  outputFinalSummary,
} from "../../../src/cli/formatters.js";
import { createRunSummary } from "../../../src/state/summary.js";

describe("formatPlan", () => {
  it("renders one block per stage", () => {
    const text = formatPlan([
      {
        stage: "trim",
        label: "FASTQ_output",
        inputDir: "/runs/raw",
        outputDir: "/runs/FASTQ_output",
        phases: ["cutadapt"],
        requires: [],
      },
      {
        stage: "align",
        label: "hisat2_output",
        inputDir: "/runs/FASTQ_output",
        outputDir: "/runs/hisat2_output",
        phases: ["hisat2"],
        requires: ["genome index file /ref/genome"],
      },
    ]);

    expect(text).toBe(
      [
        "1. trim (cutadapt)",
        "   in:  /runs/raw",
        "   out: /runs/FASTQ_output",
        "2. align (hisat2)",
        "   in:  /runs/FASTQ_output",
        "   out: /runs/hisat2_output",
        "   needs: genome index file /ref/genome",
      ].join("\n"),
    );
  });

  it("joins phases with arrows", () => {
    const text = formatPlan([
      {
        stage: "assemble",
        label: "mapped_transcripts",
        inputDir: "/runs/bam",
        outputDir: "/runs/mapped_transcripts",
        phases: ["region", "estimate", "merge"],
        requires: [],
      },
    ]);

    expect(text.split("\n")[0]).toBe("1. assemble (region → estimate → merge)");
  });
});

describe("outputFinalSummary", () => {
  it("prints the summary between rules", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const summary = createRunSummary({ inputDir: "/runs/raw", runId: "run-9" });

    outputFinalSummary(summary);

    expect(log.mock.calls).toEqual([
      ["\n" + "=".repeat(60)],
      ["RUN SUMMARY"],
      ["=".repeat(60)],
      [["Run ID: run-9", "Status: running", "Input: /runs/raw"].join("\n")],
      ["=".repeat(60) + "\n"],
    ]);
  });
});
