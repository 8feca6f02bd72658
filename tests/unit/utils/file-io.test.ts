import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ensureDir,
  generateRunId,
  pathExists,
  readYaml,
  writeJson,
  writeText,
  writeYaml,
} from "../../../src/utils/file-io.js";

describe("file-io", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "file-io-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("ensureDir creates nested directories and tolerates existing ones", () => {
    const dir = path.join(root, "a", "b");

    ensureDir(dir);
    ensureDir(dir);

    expect(existsSync(dir)).toBe(true);
  });

  it("round-trips JSON and YAML", () => {
    const data = { stage: "trim", invocations: 2, outputs: ["a", "b"] };

    writeJson(path.join(root, "out", "data.json"), data);
    writeYaml(path.join(root, "out", "data.yaml"), data);

    expect(
      JSON.parse(readFileSync(path.join(root, "out", "data.json"), "utf-8")),
    ).toEqual(data);
    expect(readYaml(path.join(root, "out", "data.yaml"))).toEqual(data);
  });

  it("writes compact JSON when asked", () => {
    const file = path.join(root, "compact.json");

    writeJson(file, { a: 1 }, false);

    expect(readFileSync(file, "utf-8")).toBe('{"a":1}');
  });

  it("writes text files, creating the parent directory", () => {
    const file = path.join(root, "x", "list.txt");

    writeText(file, "a\nb\n");

    expect(readFileSync(file, "utf-8")).toBe("a\nb\n");
    expect(pathExists(file)).toBe(true);
    expect(pathExists(path.join(root, "nope"))).toBe(false);
  });
});

describe("generateRunId", () => {
  it("formats the local timestamp with a random suffix", () => {
    const id = generateRunId(new Date(2024, 11, 3, 7, 8, 9));

    expect(id).toMatch(/^20241203-070809-[\w-]{4}$/);
  });

  it("differs between calls", () => {
    const now = new Date();

    expect(generateRunId(now)).not.toBe(generateRunId(now));
  });
});
