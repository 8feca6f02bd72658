/**
 * Configuration loading.
 *
 * Precedence, highest first: CLI flags, environment, `pipeline.yaml`,
 * built-in defaults. Relative paths inside the config file are resolved
 * against the file's own directory; CLI paths against the working directory.
 */

import path from "node:path";

import { formatIssues, type CLIOptions } from "./cli-schema.js";
import { DEFAULT_CONFIG_PATH, TOOL_ENV_VARS } from "./defaults.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";
import { pathExists, readYaml } from "../utils/file-io.js";

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read the raw YAML document.
 *
 * An explicitly requested file must exist; the default file is optional.
 */
function readRawConfig(configPath: string | undefined): {
  raw: RawConfig;
  baseDir: string;
} {
  const target = configPath ?? DEFAULT_CONFIG_PATH;

  if (!pathExists(target)) {
    if (configPath !== undefined) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return { raw: {}, baseDir: process.cwd() };
  }

  const parsed = readYaml(target);
  if (parsed === null || parsed === undefined) {
    return { raw: {}, baseDir: path.dirname(path.resolve(target)) };
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${target} must contain a YAML mapping`);
  }
  return { raw: parsed, baseDir: path.dirname(path.resolve(target)) };
}

/**
 * Merge defined override values into a config section, keeping the section's
 * original value untouched when there is nothing to override.
 */
function mergeSection(base: unknown, overrides: RawConfig): unknown {
  const defined = Object.entries(overrides).filter(
    ([, value]) => value !== undefined,
  );
  if (defined.length === 0) {
    return base;
  }
  return { ...(isRecord(base) ? base : {}), ...Object.fromEntries(defined) };
}

function resolveFrom(baseDir: string, value: unknown): unknown {
  return typeof value === "string" && value.length > 0
    ? path.resolve(baseDir, value)
    : value;
}

/**
 * Resolve the file's relative paths against the file's directory.
 */
function resolveFilePaths(raw: RawConfig, baseDir: string): RawConfig {
  const resolved: RawConfig = {
    ...raw,
    input_dir: resolveFrom(baseDir, raw["input_dir"]),
  };

  const align = raw["align"];
  if (isRecord(align)) {
    resolved["align"] = {
      ...align,
      genome_index: resolveFrom(baseDir, align["genome_index"]),
    };
  }

  const assemble = raw["assemble"];
  if (isRecord(assemble)) {
    resolved["assemble"] = {
      ...assemble,
      annotation: resolveFrom(baseDir, assemble["annotation"]),
    };
  }

  return resolved;
}

function toolOverridesFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {};
  for (const [tool, variable] of Object.entries(TOOL_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value.length > 0) {
      overrides[tool] = value;
    }
  }
  return overrides;
}

function cliPath(value: string | undefined): string | undefined {
  return value === undefined ? undefined : path.resolve(value);
}

/**
 * Load `pipeline.yaml` (or `configPath`) and apply environment and CLI
 * overrides.
 *
 * @param configPath - Explicit config file; the default file is optional
 * @param cliOptions - Validated CLI options
 * @param env - Environment to read tool overrides from
 * @returns Validated configuration
 * @throws Error listing every invalid field
 */
export function loadConfigWithOverrides(
  configPath: string | undefined,
  cliOptions: CLIOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const { raw, baseDir } = readRawConfig(configPath);
  const fromFile = resolveFilePaths(raw, baseDir);

  const merged: RawConfig = {
    ...fromFile,
    tools: mergeSection(fromFile["tools"], toolOverridesFromEnv(env)),
    align: mergeSection(fromFile["align"], {
      genome_index: cliPath(cliOptions.genomeIndex),
      threads: cliOptions.threads,
    }),
    assemble: mergeSection(fromFile["assemble"], {
      annotation: cliPath(cliOptions.annotation),
      gene_id: cliOptions.geneId,
      region_name: cliOptions.regionName,
    }),
  };

  const inputDir = cliPath(cliOptions.input);
  if (inputDir !== undefined) {
    merged["input_dir"] = inputDir;
  }
  if (cliOptions.verbose !== undefined) {
    merged["verbose"] = cliOptions.verbose;
  }
  if (cliOptions.dryRun !== undefined) {
    merged["dry_run"] = cliOptions.dryRun;
  }

  const result = PipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
