/**
 * Generation of a YAML reduction spec from the observation database.
 *
 * Calib blocks are produced per arm and then merged, so a recipe shared by
 * several arms becomes one block ("flat_br" with "arm=b^r"). Blocks whose
 * names are not unique after merging (one per beam configuration, one per
 * chunk of arcs) get serial numbers.
 */

import { readdirSync, writeFileSync } from "node:fs";
import YAML from "yaml";
import { expandEnvVars } from "../config/env.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import {
  addSerialNumbersToNames,
  mergeCalibBlocks,
  nameYamlMapping,
  type NamedBlock,
  type YamlMapping,
} from "../merge/merger.js";
import { Arm } from "../spec/enums.js";
import { splitSources } from "../visits/chunk.js";
import { compareBeamConfigs, getSourceFilterFromListOfFileId } from "../visits/file-id.js";
import type { SelectionCriteria } from "./criteria.js";
import type { ObservationSource } from "./source.js";

export const INIT_DETECTOR_MAP_FMT = "detectorMap-sim-{arm}.fits";

export const DEFAULT_MAX_ARCS = 10;

export interface ReductionSpecDocument {
  init?: YamlMapping;
  calibBlock: NamedBlock[];
}

export interface GenerateReductionSpecOptions {
  criteria?: SelectionCriteria;
  /** Max number of arc visits used for one detectorMap */
  maxArcs?: number;
  /** Directory of the initial detectorMaps; no `init` section when absent */
  detectorMapDir?: string;
  /** Environment used to expand `$VAR` in `detectorMapDir` */
  env?: Record<string, string | undefined>;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `init` section listing the arms that have an initial detectorMap in
 * `dirName`. The directory is written as given, so `$VAR` references stay
 * unexpanded in the document.
 *
 * @throws Error if no detectorMap file is found
 */
export function getInitSpec(
  dirName: string,
  env: Record<string, string | undefined> = process.env
): YamlMapping {
  const pattern = new RegExp(
    "^" + INIT_DETECTOR_MAP_FMT.split("{arm}").map(escapeRegExp).join("(.*)") + "$"
  );

  const arms: string[] = [];
  for (const name of readdirSync(expandEnvVars(dirName, env))) {
    const match = pattern.exec(name);
    if (match) {
      arms.push(match[1]);
    }
  }
  if (arms.length === 0) {
    throw new Error(`No detectorMap files found in '${dirName}'`);
  }

  return {
    dirName,
    detectorMapFmt: INIT_DETECTOR_MAP_FMT,
    arms: arms.sort(),
  };
}

/**
 * Bias and dark blocks, one per arm before merging. Arm "m" shares the
 * bias and dark of arm "r".
 */
export async function getBiasDarkSpecs(
  source: ObservationSource,
  namePrefix: string,
  criteria: SelectionCriteria
): Promise<NamedBlock[]> {
  const calibTypes = [
    ["bias", "masterBiases"],
    ["dark", "masterDarks"],
  ] as const;

  const blocks: NamedBlock[] = [];
  for (const arm of Arm.options.filter((arm) => arm !== "m")) {
    const block: YamlMapping = {};
    for (const [calibType, sequenceType] of calibTypes) {
      const sources = await source.getSources({ sequenceType, arm, criteria });
      if (arm === "r") {
        sources.push(...(await source.getSources({ sequenceType, arm: "m", criteria })));
      }
      if (sources.length > 0) {
        block[calibType] = { id: getSourceFilterFromListOfFileId(sources) };
      }
    }
    if (Object.keys(block).length > 0) {
      blocks.push(nameYamlMapping(`${namePrefix}${arm}`, block));
    }
  }

  return mergeCalibBlocks(blocks);
}

export async function getFlatSpecs(
  source: ObservationSource,
  namePrefix: string,
  criteria: SelectionCriteria
): Promise<NamedBlock[]> {
  const blocks: NamedBlock[] = [];
  for (const arm of Arm.options) {
    const sources = await source.getSources({ sequenceType: "ditheredFlats", arm, criteria });
    if (sources.length > 0) {
      blocks.push(
        nameYamlMapping(`${namePrefix}${arm}`, {
          flat: { id: getSourceFilterFromListOfFileId(sources) },
        })
      );
    }
  }

  return mergeCalibBlocks(blocks);
}

/**
 * FiberProfiles blocks per beam configuration and arm. All traces of one
 * beam configuration form a single group.
 */
export async function getFiberProfilesSpecs(
  source: ObservationSource,
  namePrefix: string,
  criteria: SelectionCriteria
): Promise<NamedBlock[]> {
  const beamConfigs = await source.getBeamConfigs(["scienceTrace"], criteria);

  const blocks: NamedBlock[] = [];
  for (const beamConfig of [...beamConfigs].sort(compareBeamConfigs)) {
    for (const arm of Arm.options) {
      const sources = await source.getSources({
        sequenceType: "scienceTrace",
        arm,
        criteria,
        beamConfig,
      });
      if (sources.length > 0) {
        blocks.push(
          nameYamlMapping(`${namePrefix}${arm}`, {
            fiberProfiles: { group: [{ id: getSourceFilterFromListOfFileId(sources) }] },
          })
        );
      }
    }
  }

  return addSerialNumbersToNames(mergeCalibBlocks(blocks));
}

/**
 * DetectorMap blocks per beam configuration, arm and chunk of at most
 * `maxArcs` contiguous arc visits.
 */
export async function getDetectorMapSpecs(
  source: ObservationSource,
  namePrefix: string,
  criteria: SelectionCriteria,
  maxArcs: number
): Promise<NamedBlock[]> {
  const beamConfigs = await source.getBeamConfigs(["scienceArc"], criteria);

  const blocks: NamedBlock[] = [];
  for (const beamConfig of [...beamConfigs].sort(compareBeamConfigs)) {
    for (const arm of Arm.options) {
      const sources = await source.getSources({
        sequenceType: "scienceArc",
        arm,
        criteria,
        beamConfig,
      });
      for (const chunk of splitSources(sources, maxArcs)) {
        blocks.push(
          nameYamlMapping(`${namePrefix}${arm}`, {
            detectorMap: { id: getSourceFilterFromListOfFileId(chunk) },
          })
        );
      }
    }
  }

  return addSerialNumbersToNames(mergeCalibBlocks(blocks));
}

/**
 * Build a reduction spec covering every calib the database has sources for.
 */
export async function generateReductionSpec(
  source: ObservationSource,
  options: GenerateReductionSpecOptions = {},
  logger: Logger = createSilentLogger()
): Promise<ReductionSpecDocument> {
  const criteria = options.criteria ?? {};
  const maxArcs = options.maxArcs ?? DEFAULT_MAX_ARCS;
  if (!Number.isInteger(maxArcs) || maxArcs <= 0) {
    throw new RangeError(`maxArcs must be a positive integer (${maxArcs})`);
  }

  const init =
    options.detectorMapDir === undefined
      ? undefined
      : getInitSpec(options.detectorMapDir, options.env);

  const biasDark = await getBiasDarkSpecs(source, "biasdark_", criteria);
  logger.info(`Generated ${biasDark.length} bias/dark block(s)`);
  const flat = await getFlatSpecs(source, "flat_", criteria);
  logger.info(`Generated ${flat.length} flat block(s)`);
  const fiberProfiles = await getFiberProfilesSpecs(source, "fiberProfiles_", criteria);
  logger.info(`Generated ${fiberProfiles.length} fiberProfiles block(s)`);
  const detectorMap = await getDetectorMapSpecs(source, "detectorMap_", criteria, maxArcs);
  logger.info(`Generated ${detectorMap.length} detectorMap block(s)`);

  const calibBlock = [...biasDark, ...flat, ...fiberProfiles, ...detectorMap];
  return init === undefined ? { calibBlock } : { init, calibBlock };
}

/**
 * Serialize `document` to `path` as YAML, keys in insertion order.
 */
export function writeReductionSpec(path: string, document: ReductionSpecDocument): void {
  writeFileSync(path, YAML.stringify(document), "utf-8");
}
