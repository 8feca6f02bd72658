/**
 * File I/O utilities.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { nanoid } from "nanoid";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

/**
 * Ensure a directory exists, creating it and any missing ancestors.
 *
 * @param dirPath - Path to directory
 * @throws If the path (or an ancestor) exists but is not a directory, or
 *   creation is not permitted
 */
export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

/**
 * Write a JSON file.
 *
 * @param filePath - Path to file
 * @param data - Data to write
 * @param pretty - Whether to format with indentation (default: true)
 */
export function writeJson(
  filePath: string,
  data: unknown,
  pretty = true,
): void {
  ensureDir(path.dirname(filePath));
  const content = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Read a YAML file.
 *
 * @param filePath - Path to file
 * @returns Parsed YAML content
 * @throws Error if file doesn't exist or isn't valid YAML
 */
export function readYaml(filePath: string): unknown {
  const content = readFileSync(filePath, "utf-8");
  return parseYaml(content) as unknown;
}

/**
 * Write a YAML file.
 *
 * @param filePath - Path to file
 * @param data - Data to write
 */
export function writeYaml(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  const content = stringifyYaml(data);
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Write a text file.
 *
 * @param filePath - Path to file
 * @param content - Content to write
 */
export function writeText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Whether a file or directory exists at `target`.
 */
export function pathExists(target: string): boolean {
  return existsSync(target);
}

/**
 * Generate a unique run ID.
 *
 * Format: YYYYMMDD-HHMMSS-XXXX (timestamp + random suffix)
 *
 * @returns Unique run ID
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");

  const timePart = [
    String(now.getHours()).padStart(2, "0"),
    String(now.getMinutes()).padStart(2, "0"),
    String(now.getSeconds()).padStart(2, "0"),
  ].join("");

  const randomPart = nanoid(4);

  return `${datePart}-${timePart}-${randomPart}`;
}
