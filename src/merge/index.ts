/**
 * Merging of per-arm calibration blocks in YAML form.
 */

export {
  isMergeable,
  isYamlMapping,
  mergeNodes,
  mergeBlockNames,
  mergeCalibBlocks,
  addSerialNumbersToNames,
  nameYamlMapping,
  MergeError,
  type YamlNode,
  type YamlMapping,
  type NamedBlock,
} from "./merger.js";
