import { join } from "node:path";
import type { MemoryStoreCodec } from "@townsim/schemas";
import { CorruptSnapshotError } from "@townsim/schemas";
import { SpatialMemory, spatialMemoryCodec } from "./spatial-memory.js";
import { AssociativeMemory, associativeMemoryCodec } from "./associative-memory.js";
import { Scratch, scratchCodec } from "./scratch.js";

export const SPATIAL_MEMORY_PATH = "spatial_memory.json";
export const ASSOCIATIVE_MEMORY_PATH = "associative_memory";
export const SCRATCH_PATH = "scratch.json";

export interface AgentMemory {
  spatial: SpatialMemory;
  associative: AssociativeMemory;
  scratch: Scratch;
}

export interface MemoryCodecs {
  spatial: MemoryStoreCodec<SpatialMemory>;
  associative: MemoryStoreCodec<AssociativeMemory>;
  scratch: MemoryStoreCodec<Scratch>;
}

export const defaultMemoryCodecs: MemoryCodecs = {
  spatial: spatialMemoryCodec,
  associative: associativeMemoryCodec,
  scratch: scratchCodec,
};

async function loadStore<T>(store: string, codec: MemoryStoreCodec<T>, path: string): Promise<T> {
  try {
    return await codec.load(path);
  } catch (err) {
    throw new CorruptSnapshotError(store, path, err);
  }
}

/** Loads the three stores of one agent folder. */
export async function loadAgentMemory(folder: string, codecs: MemoryCodecs = defaultMemoryCodecs): Promise<AgentMemory> {
  const spatial = await loadStore("spatial memory", codecs.spatial, join(folder, SPATIAL_MEMORY_PATH));
  const associative = await loadStore("associative memory", codecs.associative, join(folder, ASSOCIATIVE_MEMORY_PATH));
  const scratch = await loadStore("scratch", codecs.scratch, join(folder, SCRATCH_PATH));
  return { spatial, associative, scratch };
}

/**
 * Writes each store on its own. A crash between writes can leave the folder
 * with stores from different ticks.
 */
export async function saveAgentMemory(folder: string, memory: AgentMemory, codecs: MemoryCodecs = defaultMemoryCodecs): Promise<void> {
  await codecs.spatial.save(memory.spatial, join(folder, SPATIAL_MEMORY_PATH));
  await codecs.associative.save(memory.associative, join(folder, ASSOCIATIVE_MEMORY_PATH));
  await codecs.scratch.save(memory.scratch, join(folder, SCRATCH_PATH));
}
