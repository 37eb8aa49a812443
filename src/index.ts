/**
 * Reduction spec compiler.
 *
 * Stage A reads the observation database and writes a YAML reduction spec
 * (`generateReductionSpec`); stage B compiles a reduction spec into a shell
 * script (`compileScript`, `generateCommands`).
 */

export * from "./visits/index.js";
export * from "./merge/index.js";
export * from "./spec/index.js";
export * from "./compiler/index.js";
export * from "./opdb/index.js";
export { loadConfig, ConfigError, expandEnvVars, type AppConfig } from "./config/index.js";
export {
  createLogger,
  createSilentLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
} from "./logging/index.js";
