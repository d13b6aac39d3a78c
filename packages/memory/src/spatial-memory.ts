import type { MemoryStoreCodec, SpatialTreeData } from "@townsim/schemas";
import { validateSpatialTreeData } from "@townsim/schemas";
import { readValidatedJson, writeJsonAtomic } from "./store-io.js";

/**
 * What an agent knows of the world's layout: world → sector → arena → the
 * game objects seen there.
 */
export class SpatialMemory {
  private tree: SpatialTreeData;

  constructor(tree: SpatialTreeData = {}) {
    this.tree = structuredClone(tree);
  }

  /** Records every non-empty prefix of the path. */
  learn(world: string, sector: string, arena: string, gameObject: string): void {
    if (!world) return;
    const sectors = (this.tree[world] ??= {});
    if (!sector) return;
    const arenas = (sectors[sector] ??= {});
    if (!arena) return;
    const objects = (arenas[arena] ??= []);
    if (gameObject && !objects.includes(gameObject)) objects.push(gameObject);
  }

  knows(world: string, sector?: string, arena?: string): boolean {
    const sectors = this.tree[world];
    if (!sectors) return false;
    if (sector === undefined) return true;
    const arenas = sectors[sector];
    if (!arenas) return false;
    if (arena === undefined) return true;
    return arenas[arena] !== undefined;
  }

  worlds(): string[] {
    return Object.keys(this.tree);
  }

  sectors(world: string): string[] {
    return Object.keys(this.tree[world] ?? {});
  }

  arenas(world: string, sector: string): string[] {
    return Object.keys(this.tree[world]?.[sector] ?? {});
  }

  objects(world: string, sector: string, arena: string): string[] {
    return [...(this.tree[world]?.[sector]?.[arena] ?? [])];
  }

  toJSON(): SpatialTreeData {
    return structuredClone(this.tree);
  }
}

export const spatialMemoryCodec: MemoryStoreCodec<SpatialMemory> = {
  async load(path) {
    return new SpatialMemory(await readValidatedJson(path, validateSpatialTreeData));
  },
  async save(memory, path) {
    await writeJsonAtomic(path, memory.toJSON());
  },
};
