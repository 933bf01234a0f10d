export * from "./dimensions.js";
export {
  Normalizer,
  evaluateRecord,
  normalizeBatch,
  normalizeRecord,
  type NormalizedBatch,
  type RecordOutcome,
  type RegionStore,
  type SkipReason,
} from "./normalizer.js";
export { classifyRow, type RawObservation } from "./observation.js";
