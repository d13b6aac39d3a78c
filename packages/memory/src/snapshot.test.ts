import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, writeFile, readFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { CorruptSnapshotError } from "@townsim/schemas";
import { loadAgentMemory, saveAgentMemory, defaultMemoryCodecs } from "./snapshot.js";
import { SpatialMemory } from "./spatial-memory.js";
import { AssociativeMemory } from "./associative-memory.js";
import { Scratch } from "./scratch.js";

async function writeSnapshot(folder: string): Promise<void> {
  await mkdir(join(folder, "associative_memory"), { recursive: true });
  await writeFile(join(folder, "spatial_memory.json"), JSON.stringify({ Town: { park: { bench: ["chessboard"] } } }), "utf-8");
  await writeFile(join(folder, "associative_memory", "nodes.json"), "[]", "utf-8");
  await writeFile(join(folder, "scratch.json"), JSON.stringify({ name: "Klaus", curr_tile: null, curr_time: null }), "utf-8");
}

describe("agent memory snapshots", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "townsim-snapshot-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads all three stores from one folder", async () => {
    await writeSnapshot(dir);
    const memory = await loadAgentMemory(dir);
    expect(memory.spatial.objects("Town", "park", "bench")).toEqual(["chessboard"]);
    expect(memory.associative.size).toBe(0);
    expect(memory.scratch.name).toBe("Klaus");
    expect(memory.scratch.list()).toEqual([]);
  });

  it("saves stores that load back equal", async () => {
    const associative = new AssociativeMemory();
    associative.addEvent({
      created: new Date(Date.UTC(2023, 1, 13, 9)), subject: "Klaus", predicate: "is", object: "reading",
      description: "Klaus is reading", poignancy: 2, keywords: ["reading"],
    });
    const scratch = new Scratch("Klaus", { currTile: [1, 2], currTime: new Date(Date.UTC(2023, 1, 13, 9)) });
    scratch.set("act_address", "Town:library");
    const out = join(dir, "saved");
    await saveAgentMemory(out, { spatial: new SpatialMemory({ Town: {} }), associative, scratch });

    expect(existsSync(join(out, "associative_memory", "kw_strength.json"))).toBe(true);
    expect(existsSync(join(out, "scratch.json.tmp"))).toBe(false);
    const loaded = await loadAgentMemory(out);
    expect(loaded.spatial.toJSON()).toEqual({ Town: {} });
    expect(loaded.associative.toJSON()).toEqual(associative.toJSON());
    expect(loaded.scratch.toJSON()).toEqual(scratch.toJSON());
  });

  it("names the store that failed to load", async () => {
    await writeSnapshot(dir);
    await writeFile(join(dir, "scratch.json"), "{ not json", "utf-8");
    const err = await loadAgentMemory(dir).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CorruptSnapshotError);
    expect(err).toMatchObject({ store: "scratch", code: "CORRUPT_SNAPSHOT" });
  });

  it("rejects a store that does not match its schema", async () => {
    await writeSnapshot(dir);
    await writeFile(join(dir, "spatial_memory.json"), JSON.stringify({ Town: ["park"] }), "utf-8");
    await expect(loadAgentMemory(dir)).rejects.toThrow(/^Failed to load spatial memory from .*spatial_memory\.json: Invalid contents/);
  });

  it("treats a missing store as corrupt", async () => {
    await expect(loadAgentMemory(dir)).rejects.toBeInstanceOf(CorruptSnapshotError);
  });

  it("writes stores one after another without cross-store rollback", async () => {
    await writeSnapshot(dir);
    const memory = await loadAgentMemory(dir);
    memory.spatial.learn("Town", "cafe", "", "");
    const codecs = {
      ...defaultMemoryCodecs,
      associative: { ...defaultMemoryCodecs.associative, save: vi.fn().mockRejectedValue(new Error("disk full")) },
    };
    await expect(saveAgentMemory(dir, memory, codecs)).rejects.toThrow("disk full");
    const spatial = JSON.parse(await readFile(join(dir, "spatial_memory.json"), "utf-8"));
    expect(spatial).toEqual({ Town: { park: { bench: ["chessboard"] }, cafe: {} } });
  });
});
