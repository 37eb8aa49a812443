/**
 * Raw-exposure identifiers and their conversion to `--id` selectors.
 */

import type { Arm } from "../spec/enums.js";
import { getCompactNotationFromIntegers } from "./compact.js";

/**
 * Keys that uniquely identify one raw exposure file.
 */
export interface FileId {
  readonly visit: number;
  readonly arm: Arm;
  readonly spectrograph: number;
}

/**
 * A top-end configuration epoch. Sources taken under different beam
 * configurations never share a calibration block.
 */
export interface BeamConfig {
  readonly beamConfigDate: number;
  readonly pfsDesignId: number;
}

/**
 * Total order on beam configurations: by date, then by design ID.
 */
export function compareBeamConfigs(a: BeamConfig, b: BeamConfig): number {
  if (a.beamConfigDate !== b.beamConfigDate) {
    return a.beamConfigDate < b.beamConfigDate ? -1 : 1;
  }
  if (a.pfsDesignId !== b.pfsDesignId) {
    return a.pfsDesignId < b.pfsDesignId ? -1 : 1;
  }
  return 0;
}

/**
 * Convert file IDs to `--id` arguments, e.g.
 * `["visit=1..10", "arm=b^r", "spectrograph=1"]`.
 *
 * The IDs must form the full Cartesian product visits × arms × spectrographs,
 * since that is all an intersection of three selectors can express.
 *
 * @throws Error on an empty list or an incomplete product
 */
export function getSourceFilterFromListOfFileId(ids: Iterable<FileId>): string[] {
  const list = [...ids];
  if (list.length === 0) {
    throw new Error("Empty list of FileId cannot be expressed in --id format.");
  }

  const visits = new Set(list.map((id) => id.visit));
  const arms = new Set(list.map((id) => id.arm));
  const spectrographs = new Set(list.map((id) => id.spectrograph));

  if (list.length !== visits.size * arms.size * spectrographs.size) {
    const shown = list
      .map((id) => `(${id.visit}, ${id.arm}, ${id.spectrograph})`)
      .join(", ");
    throw new Error(`List of FileId cannot be expressed in --id format: [${shown}]`);
  }

  return [
    `visit=${getCompactNotationFromIntegers(visits)}`,
    `arm=${[...arms].sort().join("^")}`,
    `spectrograph=${getCompactNotationFromIntegers(spectrographs)}`,
  ];
}
