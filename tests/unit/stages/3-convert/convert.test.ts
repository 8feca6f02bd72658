import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConvertConfigSchema } from "../../../../src/config/schema.js";
import { executeStage } from "../../../../src/pipeline/stage.js";
import { createConvertStage } from "../../../../src/stages/3-convert/index.js";
import { createRecordingRunner } from "../../../mocks/recording-runner.js";

vi.mock("../../../../src/utils/logging.js", () => ({
  logger: { debug: vi.fn() },
}));

describe("createConvertStage", () => {
  let root: string;
  let input: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "convert-"));
    input = path.join(root, "hisat2_output");
    mkdirSync(input);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("converts each SAM file to BAM in the bam directory", () => {
    writeFileSync(path.join(input, "aligned.trimmed.s_1.sam"), "");
    writeFileSync(path.join(input, "summary.log"), "");
    const runner = createRecordingRunner();

    const result = executeStage(
      input,
      createConvertStage({
        convert: ConvertConfigSchema.parse({}),
        samtools: "samtools",
      }),
      { runner },
    );

    const outDir = path.join(root, "bam");
    expect(result.outputDir).toBe(outDir);
    expect(runner.calls).toEqual([
      {
        argv: [
          "samtools",
          "view",
          "-bS",
          path.join(input, "aligned.trimmed.s_1.sam"),
          "-o",
          path.join(outDir, "aligned.trimmed.s_1.bam"),
        ],
      },
    ]);
  });
});
