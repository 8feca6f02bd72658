/**
 * Directory Resolver.
 *
 * Derives a stage's output directory as a sibling of its input directory and
 * makes sure it exists.
 */

import path from "node:path";

import { DirectoryCreationError } from "./errors.js";
import { ensureDir } from "../utils/file-io.js";

/**
 * Compute the output directory for a stage without touching storage.
 *
 * @param inputDir - Directory the stage reads from
 * @param label - Stage output label, used as the directory name
 * @returns `parent(inputDir)/label`, as an absolute path
 */
export function outputDirFor(inputDir: string, label: string): string {
  return path.join(path.dirname(path.resolve(inputDir)), label);
}

/**
 * Resolve a stage's output directory and create it (with any missing
 * ancestors) if needed. Calling it again for the same inputs is a no-op.
 *
 * @throws DirectoryCreationError if the output would be `inputDir` itself
 *   (its name equals `label`) or storage rejects the creation
 */
export function resolveOutputDir(inputDir: string, label: string): string {
  const outputDir = outputDirFor(inputDir, label);
  if (outputDir === path.resolve(inputDir)) {
    throw new DirectoryCreationError(
      outputDir,
      "the output directory would be the input directory itself",
    );
  }

  try {
    ensureDir(outputDir);
  } catch (err) {
    throw new DirectoryCreationError(outputDir, err);
  }

  return outputDir;
}
