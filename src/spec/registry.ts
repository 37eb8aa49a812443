/**
 * Static tables mapping calib types and science steps to the external
 * programs that build them.
 */

import type { CalibType, ScienceStepName } from "./enums.js";

/**
 * How a construction command is told its degree of parallelism.
 * - "pool": `--batch-type=smp --cores=N`
 * - "processes": `-jN`
 */
export type ConcurrencyStyle = "pool" | "processes";

export interface CalibTypeInfo {
  readonly commandName: string;
  /** Directory under `rerun/<rerun>/` where the command writes its products */
  readonly outputSubdir: string;
  /** Ingest with `clobber=True` even when overwriting was not requested */
  readonly alwaysOverwrite: boolean;
  readonly concurrency: ConcurrencyStyle;
}

export const CALIB_TYPE_TABLE = {
  bias: {
    commandName: "constructPfsBias.py",
    outputSubdir: "BIAS",
    alwaysOverwrite: false,
    concurrency: "pool",
  },
  dark: {
    commandName: "constructPfsDark.py",
    outputSubdir: "DARK",
    alwaysOverwrite: false,
    concurrency: "pool",
  },
  flat: {
    commandName: "constructFiberFlat.py",
    outputSubdir: "FLAT",
    alwaysOverwrite: false,
    concurrency: "pool",
  },
  bootstrap: {
    commandName: "bootstrapDetectorMap.py",
    outputSubdir: "DETECTORMAP",
    alwaysOverwrite: true,
    concurrency: "processes",
  },
  fiberProfiles: {
    commandName: "reduceProfiles.py",
    outputSubdir: "FIBERPROFILES",
    alwaysOverwrite: false,
    concurrency: "processes",
  },
  detectorMap: {
    commandName: "reduceArc.py",
    outputSubdir: "DETECTORMAP",
    alwaysOverwrite: true,
    concurrency: "processes",
  },
} as const satisfies Record<CalibType, CalibTypeInfo>;

export interface ScienceStepInfo {
  readonly commandName: string;
}

export const SCIENCE_STEP_TABLE = {
  reduceExposure: { commandName: "reduceExposure.py" },
  mergeArms: { commandName: "mergeArms.py" },
  calculateReferenceFlux: { commandName: "calculateReferenceFlux.py" },
  fluxCalibrate: { commandName: "fluxCalibrate.py" },
  coaddSpectra: { commandName: "coaddSpectra.py" },
} as const satisfies Record<ScienceStepName, ScienceStepInfo>;

/** Program that ingests built calibs into the calibration directory */
export const INGEST_COMMAND = "ingestPfsCalibs.py";

export function getCalibTypeInfo(type: CalibType): CalibTypeInfo {
  return CALIB_TYPE_TABLE[type];
}

export function getScienceStepInfo(step: ScienceStepName): ScienceStepInfo {
  return SCIENCE_STEP_TABLE[step];
}
