import { describe, it, expect } from "vitest";
import { SpatialMemory } from "./spatial-memory.js";
import { AssociativeMemory, type ConceptInput } from "./associative-memory.js";
import { Scratch } from "./scratch.js";

describe("SpatialMemory", () => {
  it("learns every non-empty prefix of a path", () => {
    const mem = new SpatialMemory();
    mem.learn("Town", "park", "bench", "chessboard");
    mem.learn("Town", "park", "bench", "chessboard");
    mem.learn("Town", "cafe", "", "");
    expect(mem.toJSON()).toEqual({ Town: { park: { bench: ["chessboard"] }, cafe: {} } });
  });

  it("ignores paths without a world", () => {
    const mem = new SpatialMemory();
    mem.learn("", "park", "bench", "chessboard");
    expect(mem.worlds()).toEqual([]);
  });

  it("lists what is known at each level", () => {
    const mem = new SpatialMemory({ Town: { park: { bench: ["chessboard"], pond: [] }, cafe: {} } });
    expect(mem.sectors("Town")).toEqual(["park", "cafe"]);
    expect(mem.arenas("Town", "park")).toEqual(["bench", "pond"]);
    expect(mem.objects("Town", "park", "bench")).toEqual(["chessboard"]);
    expect(mem.objects("Town", "harbor", "dock")).toEqual([]);
    expect(mem.knows("Town", "park", "pond")).toBe(true);
    expect(mem.knows("Town", "harbor")).toBe(false);
  });

  it("does not share state with the tree it was built from", () => {
    const tree = { Town: { park: { bench: ["chessboard"] } } };
    const mem = new SpatialMemory(tree);
    mem.learn("Town", "park", "bench", "lamp");
    expect(tree.Town.park.bench).toEqual(["chessboard"]);
  });
});

describe("AssociativeMemory", () => {
  const at = (minute: number) => new Date(Date.UTC(2023, 1, 13, 9, minute));
  const event = (minute: number, subject: string, predicate: string, object: string, keywords: string[]): ConceptInput => ({
    created: at(minute),
    subject,
    predicate,
    object,
    description: `${subject} ${predicate} ${object}`,
    poignancy: 1,
    keywords,
  });

  it("numbers nodes and counts per kind", () => {
    const mem = new AssociativeMemory();
    const e1 = mem.addEvent(event(0, "Klaus", "is", "reading", ["Klaus", "reading"]));
    const c1 = mem.addChat(event(1, "Klaus", "chat with", "Maria", ["Klaus", "Maria"]));
    const e2 = mem.addEvent(event(2, "Maria", "is", "studying", ["Maria"]));
    expect([e1.node_id, c1.node_id, e2.node_id]).toEqual(["node_1", "node_2", "node_3"]);
    expect([e1.type_count, c1.type_count, e2.type_count]).toEqual([1, 1, 2]);
    expect(e1.keywords).toEqual(["klaus", "reading"]);
    expect(e1.created).toBe("2023-02-13T09:00:00.000Z");
    expect(e1.last_accessed).toBe(e1.created);
  });

  it("places thoughts above their deepest evidence", () => {
    const mem = new AssociativeMemory();
    const e = mem.addEvent(event(0, "Klaus", "is", "reading", ["reading"]));
    const t1 = mem.addThought({ ...event(1, "Klaus", "likes", "books", ["books"]), evidence: [e.node_id] });
    const t2 = mem.addThought({ ...event(2, "Klaus", "is", "a scholar", ["scholar"]), evidence: [t1.node_id, e.node_id] });
    expect([e.depth, t1.depth, t2.depth]).toEqual([0, 1, 2]);
  });

  it("summarizes the latest events newest first", () => {
    const mem = new AssociativeMemory();
    mem.addEvent(event(0, "Klaus", "is", "reading", []));
    mem.addThought(event(1, "Klaus", "likes", "books", []));
    mem.addEvent(event(2, "Maria", "is", "studying", []));
    mem.addEvent(event(3, "Isabella", "is", "baking", []));
    expect(mem.latestEventSummaries(2)).toEqual([
      ["Isabella", "is", "baking"],
      ["Maria", "is", "studying"],
    ]);
    expect(mem.latestEventSummaries(0)).toEqual([]);
  });

  it("retrieves by keyword, newest first and each node once", () => {
    const mem = new AssociativeMemory();
    const a = mem.addEvent(event(0, "Klaus", "is", "reading", ["klaus", "library"]));
    mem.addThought(event(1, "Klaus", "likes", "the library", ["library"]));
    const b = mem.addEvent(event(2, "Maria", "is", "in", ["maria", "library"]));
    expect(mem.retrieveByKeywords(["Library", "klaus"], "event").map((n) => n.node_id)).toEqual([b.node_id, a.node_id]);
    expect(mem.retrieveByKeywords(["library"], "event", 1).map((n) => n.node_id)).toEqual([b.node_id]);
    expect(mem.retrieveByKeywords(["library"], "thought")).toHaveLength(1);
    expect(mem.retrieveByKeywords(["harbor"], "event")).toEqual([]);
  });

  it("tracks keyword strength but not for idle events", () => {
    const mem = new AssociativeMemory();
    mem.addEvent(event(0, "Town:park:bench:chessboard", "is", "idle", ["chessboard", "idle"]));
    mem.addEvent(event(1, "Klaus", "is", "playing chess", ["klaus", "chessboard"]));
    mem.addThought(event(2, "Klaus", "enjoys", "chess", ["chessboard"]));
    expect(mem.keywordStrength("event", "chessboard")).toBe(1);
    expect(mem.keywordStrength("event", "idle")).toBe(0);
    expect(mem.keywordStrength("thought", "Chessboard")).toBe(1);
  });

  it("marks nodes as accessed", () => {
    const mem = new AssociativeMemory();
    const node = mem.addEvent(event(0, "Klaus", "is", "reading", []));
    mem.touch([node.node_id, "node_404"], at(30));
    expect(mem.getNode(node.node_id)?.last_accessed).toBe("2023-02-13T09:30:00.000Z");
  });

  it("finds loaded nodes whatever the case of their stored keywords", () => {
    const stored = new AssociativeMemory();
    const node = stored.addEvent(event(0, "Klaus", "is", "reading", ["reading"]));
    const restored = new AssociativeMemory(
      [{ ...node, keywords: ["Reading", "LIBRARY"] }],
      { event: { Reading: 2, reading: 1 }, thought: { Books: 1 } }
    );
    expect(restored.retrieveByKeywords(["library"], "event").map((n) => n.node_id)).toEqual([node.node_id]);
    expect(restored.getNode(node.node_id)?.keywords).toEqual(["reading", "library"]);
    expect(restored.keywordStrength("event", "reading")).toBe(3);
    expect(restored.keywordStrength("thought", "books")).toBe(1);
  });

  it("round-trips through its JSON form without id collisions", () => {
    const mem = new AssociativeMemory();
    mem.addEvent(event(0, "Klaus", "is", "reading", ["reading"]));
    mem.addThought(event(1, "Klaus", "likes", "books", ["books"]));
    const { nodes, kw_strength } = mem.toJSON();
    const restored = new AssociativeMemory(nodes, kw_strength);
    expect(restored.size).toBe(2);
    expect(restored.keywordStrength("event", "reading")).toBe(1);
    expect(restored.addEvent(event(2, "Maria", "is", "here", [])).node_id).toBe("node_3");
  });
});

describe("Scratch", () => {
  it("starts without a tile or time", () => {
    const scratch = new Scratch("Klaus");
    expect(scratch.currTile).toBeNull();
    expect(scratch.currTime).toBeNull();
    expect(scratch.toJSON()).toEqual({ name: "Klaus", curr_tile: null, curr_time: null, fields: {} });
  });

  it("keeps opaque planner fields", () => {
    const scratch = new Scratch("Klaus");
    scratch.set("daily_plan", ["wake up", "read"]);
    expect(scratch.has("daily_plan")).toBe(true);
    expect(scratch.get("daily_plan")).toEqual(["wake up", "read"]);
    expect(scratch.list()).toEqual([{ key: "daily_plan", value: ["wake up", "read"] }]);
    expect(scratch.delete("daily_plan")).toBe(true);
    expect(scratch.get("daily_plan")).toBeUndefined();
  });

  it("serializes time as ISO-8601 and restores it", () => {
    const scratch = new Scratch("Klaus", { currTile: [3, 4], currTime: new Date(Date.UTC(2023, 1, 13, 9)) });
    const data = scratch.toJSON();
    expect(data).toEqual({ name: "Klaus", curr_tile: [3, 4], curr_time: "2023-02-13T09:00:00.000Z", fields: {} });
    const restored = Scratch.fromData(data);
    expect(restored.currTile).toEqual([3, 4]);
    expect(restored.currTime?.getTime()).toBe(Date.UTC(2023, 1, 13, 9));
  });
});
