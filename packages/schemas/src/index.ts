export type * from "./types.js";
export {
  SimulationError,
  ConfigError,
  OutOfBoundsError,
  CorruptSnapshotError,
  CollaboratorFailureError,
  TickInProgressError,
} from "./errors.js";
export type { ErrorCode, CollaboratorPhase } from "./errors.js";
export {
  validateWorldConfigData,
  validateJournalEventData,
  validateScratchData,
  validateSpatialTreeData,
  validateConceptNodesData,
  validateKeywordStrengthData,
} from "./validator.js";
export type { ValidationResult, WorldConfigDocument, KeywordStrengthData } from "./validator.js";
export { WorldConfigSchema } from "./world-config.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export {
  ScratchSchema,
  SpatialTreeSchema,
  ConceptNodeSchema,
  ConceptNodeListSchema,
  KeywordStrengthSchema,
} from "./memory.schema.js";
