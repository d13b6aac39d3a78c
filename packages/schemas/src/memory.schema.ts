export const ScratchSchema = {
  type: "object",
  required: ["name", "curr_tile", "curr_time"],
  properties: {
    name: { type: "string", minLength: 1 },
    curr_tile: {
      anyOf: [
        { type: "null" },
        { type: "array", items: { type: "integer" }, minItems: 2, maxItems: 2 },
      ],
    },
    curr_time: {
      anyOf: [{ type: "null" }, { type: "string", format: "date-time" }],
    },
    fields: { type: "object" },
  },
  additionalProperties: false,
} as const;

export const SpatialTreeSchema = {
  type: "object",
  additionalProperties: {
    type: "object",
    additionalProperties: {
      type: "object",
      additionalProperties: { type: "array", items: { type: "string" } },
    },
  },
} as const;

export const ConceptNodeSchema = {
  type: "object",
  required: [
    "node_id", "kind", "type_count", "depth", "created", "last_accessed",
    "subject", "predicate", "object", "description", "poignancy", "keywords", "evidence",
  ],
  properties: {
    node_id: { type: "string", minLength: 1 },
    kind: { type: "string", enum: ["event", "thought", "chat"] },
    type_count: { type: "integer", minimum: 1 },
    depth: { type: "integer", minimum: 0 },
    created: { type: "string", format: "date-time" },
    last_accessed: { type: "string", format: "date-time" },
    subject: { type: "string" },
    predicate: { type: "string" },
    object: { type: "string" },
    description: { type: "string" },
    poignancy: { type: "number" },
    keywords: { type: "array", items: { type: "string" } },
    evidence: { type: "array", items: { type: "string" } },
  },
  additionalProperties: false,
} as const;

export const ConceptNodeListSchema = {
  type: "array",
  items: ConceptNodeSchema,
} as const;

export const KeywordStrengthSchema = {
  type: "object",
  required: ["event", "thought"],
  properties: {
    event: { type: "object", additionalProperties: { type: "integer", minimum: 0 } },
    thought: { type: "object", additionalProperties: { type: "integer", minimum: 0 } },
  },
  additionalProperties: false,
} as const;
