/**
 * Visit-number utilities: compact notation, chunking and `--id` selectors.
 */

export {
  getSpansFromIntegers,
  getCompactNotationFromIntegers,
  expandCompactNotation,
  formatSpan,
  type Span,
} from "./compact.js";

export { splitSources, splitContiguousRuns } from "./chunk.js";

export {
  compareBeamConfigs,
  getSourceFilterFromListOfFileId,
  type FileId,
  type BeamConfig,
} from "./file-id.js";
