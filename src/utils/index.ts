/**
 * Shared utilities.
 */

export {
  ensureDir,
  generateRunId,
  pathExists,
  readYaml,
  writeJson,
  writeText,
  writeYaml,
} from "./file-io.js";
export { logger, type LogLevel, type LoggerOptions } from "./logging.js";
