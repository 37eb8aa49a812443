/**
 * Closed vocabularies of the reduction spec.
 *
 * The order of `CalibType` and `ScienceStepName` is the execution order:
 * the compiler always walks them in the order listed here, whatever order
 * a caller or a YAML file gives.
 */

import { z } from "zod";

/**
 * Spectral channels of the instrument.
 * b = blue, r = red, n = near-infrared, m = medium-resolution red.
 */
export const Arm = z.enum(["b", "r", "n", "m"]);
export type Arm = z.infer<typeof Arm>;

/**
 * Calibration products, in build order.
 */
export const CalibType = z.enum([
  "bias",
  "dark",
  "flat",
  "bootstrap",
  "fiberProfiles",
  "detectorMap",
]);
export type CalibType = z.infer<typeof CalibType>;

/**
 * Science processing steps, in execution order.
 */
export const ScienceStepName = z.enum([
  "reduceExposure",
  "mergeArms",
  "calculateReferenceFlux",
  "fluxCalibrate",
  "coaddSpectra",
]);
export type ScienceStepName = z.infer<typeof ScienceStepName>;

/**
 * How ingestion moves calibration files into the calibration directory.
 */
export const CopyMode = z.enum(["move", "copy", "link", "skip"]);
export type CopyMode = z.infer<typeof CopyMode>;

/** Valid days of a calib when its YAML block gives no `validity`. */
export const DEFAULT_CALIB_VALIDITY = 1800;
