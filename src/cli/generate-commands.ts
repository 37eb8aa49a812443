#!/usr/bin/env node
/**
 * CLI: compile a YAML reduction spec into a shell script.
 *
 * Usage:
 *   generate-commands <dataDir> <specFile> <output> [options]
 *
 * Options:
 *   --init                   Ingest the initial detectorMaps first
 *   --blocks <names>         Blocks to run (default: all)
 *   --calib <dir>            Calibration directory (default: <dataDir>/CALIB)
 *   --calibTypes <types>     Calib types to build (default: all)
 *   --clean                  Remove byproducts after ingesting calibs
 *   --copyMode <mode>        move | copy | link | skip (default: copy)
 *   --devel                  Development mode (no versioning)
 *   --force                  Warn instead of failing on missing paths and unknown names
 *   -j, --processes <n>      Processes per command (default: $PIPELINE_PROCESSES or 1)
 *   -L, --loglevel <level>   debug | info | warn | error (default: $LOG_LEVEL or info)
 *   --overwriteCalib         Overwrite old calibs on ingestion
 *   --rerun <name>           Rerun name (default: noname)
 *   --scienceSteps <steps>   Science steps to run (default: all)
 *   --allowErrors            Keep going when a command fails
 *   -h, --help               Show help
 *
 * List options may be repeated or given comma-separated.
 *
 * Exit codes:
 *   0 - Script written
 *   1 - Error
 */

import { parseArgs } from "node:util";
import { loadConfig, ConfigError } from "../config/index.js";
import { generateCommands, type GenerateCommandsOptions } from "../compiler/generate.js";
import { createLogger, initRunId, type LogLevel } from "../logging/index.js";
import { CopyMode } from "../spec/enums.js";
import {
  isMainModule,
  parseIntegerOption,
  parseLogLevelOption,
  runCli,
  splitListOption,
} from "./run.js";

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: generate-commands <dataDir> <specFile> <output> [options]

Options:
  --init                   Ingest the initial detectorMaps first
  --blocks <names>         Blocks to run (default: all)
  --calib <dir>            Calibration directory (default: <dataDir>/CALIB)
  --calibTypes <types>     Calib types to build (default: all)
  --clean                  Remove byproducts after ingesting calibs
  --copyMode <mode>        move | copy | link | skip (default: copy)
  --devel                  Development mode (no versioning)
  --force                  Warn instead of failing on missing paths and unknown names
  -j, --processes <n>      Processes per command (default: $PIPELINE_PROCESSES or 1)
  -L, --loglevel <level>   debug | info | warn | error (default: $LOG_LEVEL or info)
  --overwriteCalib         Overwrite old calibs on ingestion
  --rerun <name>           Rerun name (default: noname)
  --scienceSteps <steps>   Science steps to run (default: all)
  --allowErrors            Keep going when a command fails
  -h, --help               Show this help message

List options may be repeated or given comma-separated.
`;

export type GenerateCommandsCliArgs =
  | { help: true }
  | {
      help: false;
      options: GenerateCommandsOptions;
      /** Absent when not given on the command line */
      processes?: number;
      logLevel?: LogLevel;
    };

/**
 * Parse command-line arguments (without the node and script paths).
 *
 * @throws ConfigError on malformed arguments
 */
export function parseGenerateCommandsArgs(argv: string[]): GenerateCommandsCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      init: { type: "boolean", default: false },
      blocks: { type: "string", multiple: true },
      calib: { type: "string" },
      calibTypes: { type: "string", multiple: true },
      clean: { type: "boolean", default: false },
      copyMode: { type: "string", default: "copy" },
      devel: { type: "boolean", default: false },
      force: { type: "boolean", default: false },
      processes: { type: "string", short: "j" },
      loglevel: { type: "string", short: "L" },
      overwriteCalib: { type: "boolean", default: false },
      rerun: { type: "string", default: "noname" },
      scienceSteps: { type: "string", multiple: true },
      allowErrors: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return { help: true };
  }

  const [dataDir, specFile, output, ...extra] = positionals;
  if (dataDir === undefined || specFile === undefined || output === undefined || extra.length > 0) {
    throw new ConfigError("Expected exactly three arguments: <dataDir> <specFile> <output>");
  }

  const copyMode = CopyMode.safeParse(values.copyMode);
  if (!copyMode.success) {
    throw new ConfigError(
      `Invalid --copyMode: ${values.copyMode}. Must be one of ${CopyMode.options.join(", ")}.`
    );
  }

  return {
    help: false,
    options: {
      dataDir,
      specFile,
      output,
      calib: values.calib,
      init: values.init,
      blocks: splitListOption(values.blocks),
      calibTypes: splitListOption(values.calibTypes),
      scienceSteps: splitListOption(values.scienceSteps),
      clean: values.clean,
      copyMode: copyMode.data,
      devel: values.devel,
      force: values.force,
      overwriteCalib: values.overwriteCalib,
      rerun: values.rerun,
      allowErrors: values.allowErrors,
    },
    processes:
      values.processes === undefined
        ? undefined
        : parseIntegerOption("processes", values.processes),
    logLevel: values.loglevel === undefined ? undefined : parseLogLevelOption(values.loglevel),
  };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseGenerateCommandsArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  initRunId();
  const logger = createLogger({
    level: args.logLevel ?? config.logLevel,
    scope: "generateCommands",
    ...(config.logDir === undefined ? {} : { file: true, logDir: config.logDir }),
  });

  generateCommands(
    { ...args.options, processes: args.processes ?? config.processes },
    logger
  );
  logger.info(`Wrote '${args.options.output}'`);
}

if (isMainModule(import.meta.url)) {
  runCli(main);
}
