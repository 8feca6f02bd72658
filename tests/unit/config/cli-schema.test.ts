import { describe, expect, it } from "vitest";

import {
  CLIOptionsSchema,
  extractCLIOptions,
} from "../../../src/config/cli-schema.js";

describe("CLIOptionsSchema", () => {
  describe("string options", () => {
    it.each(["input", "genomeIndex", "annotation", "geneId", "regionName", "summary"])(
      "validates %s as a non-empty string",
      (optionName) => {
        const result = CLIOptionsSchema.parse({ [optionName]: "value" });
        expect(result).toEqual({ [optionName]: "value" });

        expect(() => CLIOptionsSchema.parse({ [optionName]: "" })).toThrow();
      },
    );
  });

  describe("boolean options", () => {
    it.each(["dryRun", "verbose"])("validates %s as boolean", (optionName) => {
      expect(CLIOptionsSchema.parse({ [optionName]: true })).toEqual({
        [optionName]: true,
      });
    });

    it("rejects non-boolean for boolean options", () => {
      expect(() => CLIOptionsSchema.parse({ dryRun: "true" })).toThrow();
      expect(() => CLIOptionsSchema.parse({ verbose: 1 })).toThrow();
    });
  });

  describe("threads", () => {
    it("accepts positive integers", () => {
      expect(CLIOptionsSchema.parse({ threads: 4 }).threads).toBe(4);
    });

    it("rejects zero, fractions and NaN", () => {
      expect(() => CLIOptionsSchema.parse({ threads: 0 })).toThrow();
      expect(() => CLIOptionsSchema.parse({ threads: 2.5 })).toThrow();
      expect(() => CLIOptionsSchema.parse({ threads: Number.NaN })).toThrow();
    });
  });

  describe("format", () => {
    it("accepts json and yaml only", () => {
      expect(CLIOptionsSchema.parse({ format: "yaml" }).format).toBe("yaml");
      expect(() => CLIOptionsSchema.parse({ format: "xml" })).toThrow();
    });
  });
});

describe("extractCLIOptions", () => {
  it("drops undefined values", () => {
    const result = extractCLIOptions({
      input: "./raw",
      genomeIndex: undefined,
      verbose: true,
    });

    expect(result).toEqual({ input: "./raw", verbose: true });
    expect("genomeIndex" in result).toBe(false);
  });

  it("ignores options it does not know", () => {
    expect(extractCLIOptions({ config: "pipeline.yaml" })).toEqual({});
  });

  it("lists every invalid option", () => {
    expect(() => extractCLIOptions({ threads: -1, format: "xml" })).toThrow(
      /^Invalid CLI options: threads: .+, format: .+$/,
    );
  });
});
