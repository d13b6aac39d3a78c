import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { WorldConfigSchema } from "./world-config.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import {
  ScratchSchema,
  SpatialTreeSchema,
  ConceptNodeListSchema,
  KeywordStrengthSchema,
} from "./memory.schema.js";
import type {
  WorldConfig,
  LayerName,
  JournalEvent,
  ScratchData,
  SpatialTreeData,
  ConceptNode,
} from "./types.js";

// ajv and ajv-formats are CommonJS; under ESM their classes sit on `.default`.
const ajv = new Ajv.default({ allErrors: true, strict: false });
addFormats.default(ajv);

/** World config as written on disk: codes may be numbers in YAML. */
export type WorldConfigDocument = Omit<WorldConfig, "layers"> & {
  layers: Record<LayerName, Array<string | number>>;
};

export interface KeywordStrengthData {
  event: Record<string, number>;
  thought: Record<string, number>;
}

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: string[] };

function check<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) return { valid: true, value: data, errors: [] };
  return { valid: false, errors: formatErrors(validate.errors) };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
}

const validateWorldConfig = ajv.compile<WorldConfigDocument>(WorldConfigSchema);
const validateJournalEvent = ajv.compile<JournalEvent>(JournalEventSchema);
const validateScratch = ajv.compile<ScratchData>(ScratchSchema);
const validateSpatialTree = ajv.compile<SpatialTreeData>(SpatialTreeSchema);
const validateConceptNodes = ajv.compile<ConceptNode[]>(ConceptNodeListSchema);
const validateKeywordStrength = ajv.compile<KeywordStrengthData>(KeywordStrengthSchema);

export function validateWorldConfigData(data: unknown): ValidationResult<WorldConfigDocument> {
  return check(validateWorldConfig, data);
}

export function validateJournalEventData(data: unknown): ValidationResult<JournalEvent> {
  return check(validateJournalEvent, data);
}

export function validateScratchData(data: unknown): ValidationResult<ScratchData> {
  return check(validateScratch, data);
}

export function validateSpatialTreeData(data: unknown): ValidationResult<SpatialTreeData> {
  return check(validateSpatialTree, data);
}

export function validateConceptNodesData(data: unknown): ValidationResult<ConceptNode[]> {
  return check(validateConceptNodes, data);
}

export function validateKeywordStrengthData(data: unknown): ValidationResult<KeywordStrengthData> {
  return check(validateKeywordStrength, data);
}
