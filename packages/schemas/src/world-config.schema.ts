const CodeLayerSchema = {
  type: "array",
  items: { type: ["string", "number"] },
} as const;

const BlockTableSchema = {
  type: "object",
  additionalProperties: { type: "string" },
} as const;

export const WorldConfigSchema = {
  type: "object",
  required: ["meta", "world_name", "layers", "blocks"],
  properties: {
    meta: {
      type: "object",
      required: ["width", "height", "tile_size"],
      properties: {
        width: { type: "integer", minimum: 1 },
        height: { type: "integer", minimum: 1 },
        tile_size: { type: "integer", minimum: 1 },
        special_constraint: {},
      },
      additionalProperties: false,
    },
    world_name: { type: "string", minLength: 1 },
    layers: {
      type: "object",
      required: ["collision", "sector", "arena", "game_object", "spawning_location"],
      properties: {
        collision: CodeLayerSchema,
        sector: CodeLayerSchema,
        arena: CodeLayerSchema,
        game_object: CodeLayerSchema,
        spawning_location: CodeLayerSchema,
      },
      additionalProperties: false,
    },
    blocks: {
      type: "object",
      required: ["sector", "arena", "game_object", "spawning_location"],
      properties: {
        sector: BlockTableSchema,
        arena: BlockTableSchema,
        game_object: BlockTableSchema,
        spawning_location: BlockTableSchema,
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;
