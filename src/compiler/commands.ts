/**
 * Builders for the argument vectors of the external programs.
 *
 * Every builder returns the tokens of one command; quoting and joining is
 * left to `shellCommand`. The ingest command is the exception: its file
 * glob must stay outside the quotes, so it is returned as a finished line.
 */

import { isAbsolute, join } from "node:path";
import { expandEnvVars } from "../config/env.js";
import { DEFAULT_CALIB_VALIDITY, type CopyMode } from "../spec/enums.js";
import type {
  CalibSource,
  CommandConfig,
  FiberProfilesGroup,
  FiberProfilesSource,
  InitSource,
  ScienceStep,
  SourceFilter,
} from "../spec/model.js";
import {
  INGEST_COMMAND,
  getCalibTypeInfo,
  getScienceStepInfo,
  type ConcurrencyStyle,
} from "../spec/registry.js";
import { quoteShellArg, shellCommand } from "./shell.js";

/**
 * Settings shared by every construction and science command.
 */
export interface CommandContext {
  /** Root of the data repository */
  dataDir: string;
  /** Calibration directory */
  calib: string;
  /** Rerun the command writes to */
  rerun: string;
  processes: number;
  /** Development mode: no versioning */
  devel: boolean;
  /** Omit `--doraise` */
  allowErrors: boolean;
}

export const DEVELOPMENT_OPTIONS: readonly string[] = ["--no-versions", "--clobber-config"];

/**
 * `--id a=1 b=2`, or nothing for an empty filter.
 */
export function sourceFilterArgs(filter: SourceFilter, option = "id"): string[] {
  return filter.terms.length > 0 ? [`--${option}`, ...filter.terms] : [];
}

/**
 * `--configfile=path --config a=1 b=2`; the configfile comes first.
 */
export function commandConfigArgs(config: CommandConfig): string[] {
  const args: string[] = [];
  if (config.configfile) {
    args.push(`--configfile=${config.configfile}`);
  }
  if (config.configs.length > 0) {
    args.push("--config", ...config.configs);
  }
  return args;
}

function concurrencyArgs(style: ConcurrencyStyle, processes: number): string[] {
  return style === "pool"
    ? ["--batch-type=smp", `--cores=${processes}`]
    : [`-j${processes}`];
}

/**
 * Leading tokens common to all commands up to the selector flags.
 */
function commandPrefix(
  commandName: string,
  concurrency: ConcurrencyStyle,
  ctx: CommandContext
): string[] {
  const command = [
    commandName,
    ctx.dataDir,
    `--calib=${ctx.calib}`,
    `--rerun=${ctx.rerun}`,
    "--longlog=1",
    ...concurrencyArgs(concurrency, ctx.processes),
  ];
  if (!ctx.allowErrors) {
    command.push("--doraise");
  }
  if (ctx.devel) {
    command.push(...DEVELOPMENT_OPTIONS);
  }
  return command;
}

function mergeCommandConfigs(outer: CommandConfig, inner: CommandConfig): CommandConfig {
  const configfile = inner.configfile ?? outer.configfile;
  const configs = [...outer.configs, ...inner.configs];
  return configfile === undefined ? { configs } : { configs, configfile };
}

function fiberProfilesGroups(source: FiberProfilesSource): FiberProfilesGroup[] {
  if (source.groups.length === 0) {
    return [{ config: source.config, source: source.source, normSource: source.normSource }];
  }
  return source.groups.map((group) => ({
    config: mergeCommandConfigs(source.config, group.config),
    source: group.source,
    normSource: group.normSource.terms.length > 0 ? group.normSource : source.normSource,
  }));
}

/**
 * Commands that build one calib. Bootstrap and grouped fiberProfiles
 * recipes give one command per group; the rest give exactly one.
 */
export function calibConstructionCommands(
  source: CalibSource,
  ctx: CommandContext
): string[][] {
  const info = getCalibTypeInfo(source.type);
  const prefix = (): string[] => commandPrefix(info.commandName, info.concurrency, ctx);

  switch (source.type) {
    case "bootstrap":
      return source.groups.map((group) => [
        ...prefix(),
        ...sourceFilterArgs(group.flatSource, "flatId"),
        ...sourceFilterArgs(group.arcSource, "arcId"),
        ...commandConfigArgs(group.config),
      ]);
    case "fiberProfiles":
      return fiberProfilesGroups(source).map((group) => [
        ...prefix(),
        ...sourceFilterArgs(group.source),
        ...commandConfigArgs(group.config),
        ...sourceFilterArgs(group.normSource, "normId"),
      ]);
    default:
      return [
        [...prefix(), ...sourceFilterArgs(source.source), ...commandConfigArgs(source.config)],
      ];
  }
}

export interface IngestOptions {
  copyMode: CopyMode;
  /** Replace calibs already in the calibration directory */
  overwrite: boolean;
}

/**
 * Line ingesting the products of one calib recipe, e.g.
 * `ingestPfsCalibs.py /data --output=/data/CALIB ... -- /data/rerun/x/BIAS/*.fits`.
 * Ingestion always raises on error, even when the script keeps going.
 */
export function ingestLine(
  source: CalibSource,
  dataDir: string,
  calib: string,
  rerun: string,
  options: IngestOptions
): string {
  const info = getCalibTypeInfo(source.type);
  const command = [
    INGEST_COMMAND,
    dataDir,
    `--output=${calib}`,
    `--validity=${source.validity}`,
    "--longlog=1",
    `--mode=${options.copyMode}`,
    "--doraise",
  ];
  if (options.overwrite || info.alwaysOverwrite) {
    command.push("--config", "clobber=True");
  }

  const fileDir = join(dataDir, "rerun", rerun, info.outputSubdir);
  return `${shellCommand(command)} -- ${quoteShellArg(fileDir)}/*.fits`;
}

/**
 * Removes everything a calib recipe wrote under its rerun.
 */
export function cleanCommand(dataDir: string, rerun: string): string[] {
  return ["rm", "-r", "-f", join(dataDir, "rerun", rerun)];
}

/**
 * One science step run over the exposures of its block.
 */
export function scienceStepCommand(
  step: ScienceStep,
  source: SourceFilter,
  ctx: CommandContext
): string[] {
  const info = getScienceStepInfo(step.name);
  return [
    ...commandPrefix(info.commandName, "processes", ctx),
    ...sourceFilterArgs(source),
    ...commandConfigArgs(step.config),
  ];
}

/**
 * Paths of the initial detectorMaps. `$VAR` references in the directory are
 * expanded from `env`; a relative directory is taken under `dataDir`.
 */
export function initDetectorMapPaths(
  init: InitSource,
  dataDir: string,
  env: Record<string, string | undefined> = process.env
): { dir: string; files: string[] } {
  const expanded = expandEnvVars(init.dirName, env);
  const dir = isAbsolute(expanded) ? expanded : join(dataDir, expanded);
  const files = init.arms.map((arm) =>
    join(dir, init.detectorMapFmt.replaceAll("{arm}", arm))
  );
  return { dir, files };
}

/**
 * Creates the calibration directory and ingests the initial detectorMaps.
 */
export function initIngestCommand(
  files: readonly string[],
  dataDir: string,
  calib: string,
  allowErrors: boolean
): string[] {
  const command = [
    INGEST_COMMAND,
    dataDir,
    `--output=${calib}`,
    `--validity=${DEFAULT_CALIB_VALIDITY}`,
    "--create",
    "--longlog=1",
    "--mode=copy",
  ];
  if (!allowErrors) {
    command.push("--doraise");
  }
  command.push("--", ...files);
  return command;
}
