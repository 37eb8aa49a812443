/**
 * Reduction spec → shell script compiler.
 */

export { quoteShellArg, shellCommand } from "./shell.js";
export { SelectionError, PreconditionError, PolicyConflictError } from "./errors.js";
export {
  DEVELOPMENT_OPTIONS,
  sourceFilterArgs,
  commandConfigArgs,
  calibConstructionCommands,
  ingestLine,
  cleanCommand,
  scienceStepCommand,
  initDetectorMapPaths,
  initIngestCommand,
  type CommandContext,
  type IngestOptions,
} from "./commands.js";
export {
  ExecutionPolicySchema,
  resolveExecutionPolicy,
  compileScript,
  type CompileOptions,
  type ExecutionPolicy,
} from "./compiler.js";
export { generateCommands, type GenerateCommandsOptions } from "./generate.js";
