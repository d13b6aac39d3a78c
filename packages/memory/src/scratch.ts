import type { MemoryStoreCodec, ScratchData, TileCoord } from "@townsim/schemas";
import { validateScratchData } from "@townsim/schemas";
import { readValidatedJson, writeJsonAtomic } from "./store-io.js";

/**
 * Short-term working state: where and when the agent is, plus whatever the
 * planner and executor keep between ticks under their own keys.
 */
export class Scratch {
  readonly name: string;
  currTile: TileCoord | null;
  currTime: Date | null;
  private entries: Map<string, unknown>;

  constructor(name: string, init?: { currTile?: TileCoord | null; currTime?: Date | null; fields?: Record<string, unknown> }) {
    this.name = name;
    this.currTile = init?.currTile ?? null;
    this.currTime = init?.currTime ?? null;
    this.entries = new Map(Object.entries(init?.fields ?? {}));
  }

  static fromData(data: ScratchData): Scratch {
    return new Scratch(data.name, {
      currTile: data.curr_tile,
      currTime: data.curr_time === null ? null : new Date(data.curr_time),
      fields: data.fields,
    });
  }

  set(key: string, value: unknown): void { this.entries.set(key, value); }
  get(key: string): unknown { return this.entries.get(key); }
  has(key: string): boolean { return this.entries.has(key); }
  delete(key: string): boolean { return this.entries.delete(key); }

  list(): Array<{ key: string; value: unknown }> {
    return [...this.entries.entries()].map(([key, value]) => ({ key, value }));
  }

  toJSON(): ScratchData {
    return {
      name: this.name,
      curr_tile: this.currTile ? [this.currTile[0], this.currTile[1]] : null,
      curr_time: this.currTime ? this.currTime.toISOString() : null,
      fields: Object.fromEntries(this.entries),
    };
  }
}

export const scratchCodec: MemoryStoreCodec<Scratch> = {
  async load(path) {
    return Scratch.fromData(await readValidatedJson(path, validateScratchData));
  },
  async save(scratch, path) {
    await writeJsonAtomic(path, scratch.toJSON());
  },
};
