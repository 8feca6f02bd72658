/**
 * Configuration: schemas, defaults and loading.
 */

export {
  CLIOptionsSchema,
  extractCLIOptions,
  formatIssues,
  type CLIOptions,
} from "./cli-schema.js";
export * from "./defaults.js";
export { loadConfigWithOverrides } from "./loader.js";
export {
  AlignConfigSchema,
  AssembleConfigSchema,
  ConvertConfigSchema,
  OutputFormatSchema,
  PathSegmentSchema,
  PipelineConfigSchema,
  ToolsConfigSchema,
  TrimConfigSchema,
  type AlignConfig,
  type AssembleConfig,
  type ConvertConfig,
  type OutputFormat,
  type PipelineConfig,
  type ToolsConfig,
  type TrimConfig,
} from "./schema.js";
