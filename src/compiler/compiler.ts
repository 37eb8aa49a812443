/**
 * Compilation of a reduction spec into a shell script.
 *
 * The script is built in one pass with no branching back:
 *
 *   header → [init] → calib blocks → science blocks
 *
 * Blocks run in the order the caller asks for them (calib blocks first).
 * Inside a block, calib types and science steps always run in their
 * canonical order, whatever order the caller gives.
 */

import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "../config/env.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { CalibType, CopyMode, ScienceStepName } from "../spec/enums.js";
import type { ReductionSpec } from "../spec/model.js";
import {
  calibConstructionCommands,
  cleanCommand,
  ingestLine,
  initDetectorMapPaths,
  initIngestCommand,
  scienceStepCommand,
  type CommandContext,
} from "./commands.js";
import { PolicyConflictError, SelectionError } from "./errors.js";
import { shellCommand } from "./shell.js";

/**
 * Options of one compilation.
 */
export const ExecutionPolicySchema = z
  .object({
    /** Root of the data repository */
    dataDir: z.string().min(1),
    /** Calibration directory; `<dataDir>/CALIB` when absent */
    calib: z.string().min(1).optional(),
    /** Rerun name under which every product is written */
    rerun: z.string().min(1).default("noname"),
    processes: z.number().int().positive().default(1),
    copyMode: CopyMode.default("copy"),
    /** Overwrite old calibs on ingestion */
    overwriteCalib: z.boolean().default(false),
    /** Development mode: no versioning */
    devel: z.boolean().default(false),
    /** Let commands fail without stopping the script */
    allowErrors: z.boolean().default(false),
    /** Remove rerun byproducts once a calib is ingested */
    clean: z.boolean().default(false),
    /** Warn instead of failing on unknown names */
    force: z.boolean().default(false),
    /** Ingest the initial detectorMaps first */
    init: z.boolean().default(false),
    /** Blocks to run; every block when empty */
    blocks: z.array(z.string()).default([]),
    /** Calib types to build; every type when empty */
    calibTypes: z.array(z.string()).default([]),
    /** Science steps to run; every step when empty */
    scienceSteps: z.array(z.string()).default([]),
    /** Environment used to expand `$VAR` in the init directory */
    env: z.record(z.string().optional()).optional(),
  })
  .strict();

export type CompileOptions = z.input<typeof ExecutionPolicySchema>;

export type ExecutionPolicy = Omit<z.output<typeof ExecutionPolicySchema>, "calib"> & {
  calib: string;
};

/**
 * Validate compile options and fill in defaults.
 *
 * @throws ConfigError on malformed options
 * @throws PolicyConflictError when `clean` is combined with link mode
 */
export function resolveExecutionPolicy(options: CompileOptions): ExecutionPolicy {
  const result = ExecutionPolicySchema.safeParse(options);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid execution options: ${details}`);
  }

  const policy = result.data;
  if (policy.clean && policy.copyMode === "link") {
    throw new PolicyConflictError(
      "When copyMode is 'link', clean must not be set: it would delete the ingested files."
    );
  }

  return { ...policy, calib: policy.calib ?? join(policy.dataDir, "CALIB") };
}

function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

/**
 * Names in `requested` that are not in `known` raise, or are logged and
 * dropped under `force`.
 */
function checkSelection(
  kind: string,
  requested: readonly string[],
  known: readonly string[],
  force: boolean,
  logger: Logger
): void {
  const unknown = unique(requested.filter((name) => !known.includes(name)));
  if (unknown.length === 0) {
    return;
  }
  if (!force) {
    throw new SelectionError(
      `Unrecognised ${kind}: ${unknown.join(", ")} (possible: ${known.join(", ")})`
    );
  }
  logger.warn(`Unrecognised ${kind}: ${unknown.join(", ")}`, { possible: [...known] });
}

/**
 * Canonical-order subset of `all` named by `requested` (all when empty).
 */
function canonicalSubset<T extends string>(all: readonly T[], requested: readonly string[]): T[] {
  return requested.length === 0 ? [...all] : all.filter((name) => requested.includes(name));
}

/**
 * Compile `spec` into the text of a shell script.
 *
 * @throws PolicyConflictError, ConfigError on bad options
 * @throws SelectionError for unknown names (unless `force`) or an init
 *   request without an init section
 */
export function compileScript(
  spec: ReductionSpec,
  options: CompileOptions,
  logger: Logger = createSilentLogger()
): string {
  const policy = resolveExecutionPolicy(options);

  const calibBlocks = new Map(spec.calibBlocks.map((block) => [block.name, block]));
  const scienceBlocks = new Map(spec.scienceBlocks.map((block) => [block.name, block]));
  const possibleBlocks = unique([...calibBlocks.keys(), ...scienceBlocks.keys()]);

  const blocks = policy.blocks.length > 0 ? policy.blocks : possibleBlocks;
  checkSelection("blocks", blocks, possibleBlocks, policy.force, logger);
  checkSelection("calib types", policy.calibTypes, CalibType.options, policy.force, logger);
  checkSelection("science steps", policy.scienceSteps, ScienceStepName.options, policy.force, logger);

  const calibTypes = canonicalSubset(CalibType.options, policy.calibTypes);
  const scienceSteps = canonicalSubset(ScienceStepName.options, policy.scienceSteps);

  const lines = ["#!/bin/sh", policy.allowErrors ? "set -ux" : "set -eux"];

  if (policy.init) {
    if (spec.init === undefined) {
      throw new SelectionError("No 'init' block to execute");
    }
    const { dir, files } = initDetectorMapPaths(spec.init, policy.dataDir, policy.env);
    logger.info(`Reading init files from '${dir}'`);
    lines.push(
      shellCommand(initIngestCommand(files, policy.dataDir, policy.calib, policy.allowErrors))
    );
  }

  const context = (rerun: string): CommandContext => ({
    dataDir: policy.dataDir,
    calib: policy.calib,
    rerun,
    processes: policy.processes,
    devel: policy.devel,
    allowErrors: policy.allowErrors,
  });

  for (const name of blocks) {
    const block = calibBlocks.get(name);
    if (block === undefined) {
      continue;
    }
    logger.info(`Processing calib block '${name}'`);

    for (const type of calibTypes) {
      const source = block.sources[type];
      if (source === undefined) {
        continue;
      }
      const rerun = `${policy.rerun}/${name}/${type}`;

      for (const command of calibConstructionCommands(source, context(rerun))) {
        lines.push(shellCommand(command));
      }
      lines.push(
        ingestLine(source, policy.dataDir, policy.calib, rerun, {
          copyMode: policy.copyMode,
          overwrite: policy.overwriteCalib,
        })
      );
      if (policy.clean) {
        lines.push(shellCommand(cleanCommand(policy.dataDir, rerun)));
      }
    }
  }

  for (const name of blocks) {
    const block = scienceBlocks.get(name);
    if (block === undefined) {
      continue;
    }
    logger.info(`Processing science block '${name}'`);

    const ctx = context(`${policy.rerun}/pipeline`);
    for (const step of scienceSteps) {
      lines.push(shellCommand(scienceStepCommand(block.policies[step], block.source, ctx)));
    }
  }

  return lines.join("\n") + "\n";
}
