#!/usr/bin/env node
/**
 * CLI: read the observation database and write a YAML reduction spec,
 * which `generate-commands` turns into a shell script.
 *
 * Usage:
 *   generate-reduction-spec <output.yaml> [options]
 *
 * To keep `$VAR` in --detectorMapDir unexpanded in the output, escape the
 * "$" from the shell.
 *
 * Exit codes:
 *   0 - Spec written
 *   1 - Error
 */

import { parseArgs } from "node:util";
import { loadConfig, ConfigError } from "../config/index.js";
import { createLogger, initRunId, type LogLevel } from "../logging/index.js";
import type { SelectionCriteria } from "../opdb/criteria.js";
import {
  DEFAULT_MAX_ARCS,
  generateReductionSpec,
  writeReductionSpec,
} from "../opdb/reduction-spec.js";
import { PgObservationSource } from "../opdb/source.js";
import {
  isMainModule,
  parseIntegerOption,
  parseLogLevelOption,
  runCli,
} from "./run.js";

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: generate-reduction-spec <output.yaml> [options]

Options:
  --detectorMapDir <dir>   Directory of the initial detectorMaps
  -d, --dbname <url>       Observation database (default: $OPDB_URL or postgres:///<user>)
  --maxarcs <n>            Max arc visits per detectorMap (default: ${DEFAULT_MAX_ARCS})
  --date-start <date>      Only visits issued at or after this date
  --date-end <date>        Only visits issued before this date
  --visit-start <n>        Only visits numbered at least this
  --visit-end <n>          Only visits numbered below this
  -L, --loglevel <level>   debug | info | warn | error (default: $LOG_LEVEL or info)
  -h, --help               Show this help message
`;

export type GenerateReductionSpecCliArgs =
  | { help: true }
  | {
      help: false;
      output: string;
      detectorMapDir?: string;
      dbname?: string;
      maxArcs: number;
      criteria: SelectionCriteria;
      logLevel?: LogLevel;
    };

function parseDateOption(name: string, value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigError(`--${name} is not a valid date: ${value}`);
  }
  return date;
}

/**
 * Parse command-line arguments (without the node and script paths).
 *
 * @throws ConfigError on malformed arguments
 */
export function parseGenerateReductionSpecArgs(argv: string[]): GenerateReductionSpecCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      detectorMapDir: { type: "string" },
      dbname: { type: "string", short: "d" },
      maxarcs: { type: "string" },
      "date-start": { type: "string" },
      "date-end": { type: "string" },
      "visit-start": { type: "string" },
      "visit-end": { type: "string" },
      loglevel: { type: "string", short: "L" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return { help: true };
  }

  const [output, ...extra] = positionals;
  if (output === undefined || extra.length > 0) {
    throw new ConfigError("Expected exactly one argument: <output>");
  }

  const criteria: SelectionCriteria = {};
  if (values["date-start"] !== undefined) {
    criteria.dateStart = parseDateOption("date-start", values["date-start"]);
  }
  if (values["date-end"] !== undefined) {
    criteria.dateEnd = parseDateOption("date-end", values["date-end"]);
  }
  if (values["visit-start"] !== undefined) {
    criteria.visitStart = parseIntegerOption("visit-start", values["visit-start"]);
  }
  if (values["visit-end"] !== undefined) {
    criteria.visitEnd = parseIntegerOption("visit-end", values["visit-end"]);
  }

  return {
    help: false,
    output,
    detectorMapDir: values.detectorMapDir,
    dbname: values.dbname,
    maxArcs:
      values.maxarcs === undefined
        ? DEFAULT_MAX_ARCS
        : parseIntegerOption("maxarcs", values.maxarcs),
    criteria,
    logLevel: values.loglevel === undefined ? undefined : parseLogLevelOption(values.loglevel),
  };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseGenerateReductionSpecArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  initRunId();
  const logger = createLogger({
    level: args.logLevel ?? config.logLevel,
    scope: "generateReductionSpec",
    ...(config.logDir === undefined ? {} : { file: true, logDir: config.logDir }),
  });

  const source = new PgObservationSource(args.dbname ?? config.opdbUrl);
  try {
    const document = await generateReductionSpec(
      source,
      {
        criteria: args.criteria,
        maxArcs: args.maxArcs,
        detectorMapDir: args.detectorMapDir,
      },
      logger
    );
    writeReductionSpec(args.output, document);
    logger.info(`Wrote ${document.calibBlock.length} calib block(s) to '${args.output}'`);
  } finally {
    await source.close();
  }
}

if (isMainModule(import.meta.url)) {
  runCli(main);
}
