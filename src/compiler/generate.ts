/**
 * File-level entry point: reduction spec file in, executable script out.
 */

import { chmodSync, existsSync, statSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { loadReductionSpecFile } from "../spec/loader.js";
import { compileScript, resolveExecutionPolicy, type CompileOptions } from "./compiler.js";
import { PreconditionError } from "./errors.js";

export type GenerateCommandsOptions = CompileOptions & {
  /** YAML reduction spec */
  specFile: string;
  /** Script to write */
  output: string;
};

/** Owner and group execute bits */
const EXECUTE_BITS = 0o110;

function requireDirectory(
  path: string,
  message: string,
  force: boolean,
  logger: Logger
): void {
  if (existsSync(path)) {
    return;
  }
  if (!force) {
    throw new PreconditionError(message, path);
  }
  logger.warn(message);
}

/**
 * Compile `specFile` into the shell script `output` and make it executable.
 * Paths are made absolute first. Nothing is written if any check fails.
 *
 * @returns The text written to `output`
 * @throws PolicyConflictError, PreconditionError, SpecValidationError, SelectionError
 */
export function generateCommands(
  options: GenerateCommandsOptions,
  logger: Logger = createSilentLogger()
): string {
  const { specFile, output, ...compileOptions } = options;

  const policy = resolveExecutionPolicy({
    ...compileOptions,
    dataDir: resolve(compileOptions.dataDir),
    calib: compileOptions.calib === undefined ? undefined : resolve(compileOptions.calib),
  });

  requireDirectory(policy.dataDir, `'${policy.dataDir}' doesn't exist`, policy.force, logger);
  if (!policy.init) {
    requireDirectory(
      policy.calib,
      `'${policy.calib}' doesn't exist (To start without this directory, use the init option)`,
      policy.force,
      logger
    );
  }

  const spec = loadReductionSpecFile(specFile);
  const script = compileScript(spec, policy, logger);

  logger.info(`Writing shell commands to '${output}'`);
  writeFileSync(output, script, "utf-8");
  chmodSync(output, statSync(output).mode | EXECUTE_BITS);

  return script;
}
