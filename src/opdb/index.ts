/**
 * Reduction spec generation from the observation database.
 */

export {
  criteriaToSql,
  toNaiveUtc,
  type SelectionCriteria,
  type SqlExpression,
} from "./criteria.js";
export {
  PgObservationSource,
  type ObservationSource,
  type SourceQuery,
} from "./source.js";
export {
  INIT_DETECTOR_MAP_FMT,
  DEFAULT_MAX_ARCS,
  getInitSpec,
  getBiasDarkSpecs,
  getFlatSpecs,
  getFiberProfilesSpecs,
  getDetectorMapSpecs,
  generateReductionSpec,
  writeReductionSpec,
  type ReductionSpecDocument,
  type GenerateReductionSpecOptions,
} from "./reduction-spec.js";
