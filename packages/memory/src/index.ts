export { SpatialMemory, spatialMemoryCodec } from "./spatial-memory.js";
export { AssociativeMemory, associativeMemoryCodec } from "./associative-memory.js";
export type { ConceptInput, EventTriple } from "./associative-memory.js";
export { Scratch, scratchCodec } from "./scratch.js";
export {
  loadAgentMemory,
  saveAgentMemory,
  defaultMemoryCodecs,
  SPATIAL_MEMORY_PATH,
  ASSOCIATIVE_MEMORY_PATH,
  SCRATCH_PATH,
} from "./snapshot.js";
export type { AgentMemory, MemoryCodecs } from "./snapshot.js";
export { readJsonFile, writeJsonAtomic } from "./store-io.js";
