import { describe, it, expect } from "vitest";
import type { ConceptInput } from "@townsim/memory";
import { KeywordRetriever } from "./retriever.js";
import { agentContext } from "./test-fixtures.js";

const at = (minute: number): Date => new Date(Date.UTC(2023, 1, 13, 9, minute));

function concept(minute: number, description: string, keywords: string[]): ConceptInput {
  return { created: at(minute), subject: "Maria", predicate: "is", object: "reading", description, poignancy: 3, keywords };
}

describe("KeywordRetriever", () => {
  it("gathers older events and thoughts that share a keyword, keyed by description", async () => {
    const agent = agentContext("Isabella");
    const older = agent.associative.addEvent(concept(0, "Maria is reading", ["maria", "reading"]));
    agent.associative.addEvent(concept(1, "Klaus is cooking", ["klaus", "cooking"]));
    const thought = agent.associative.addThought(concept(2, "Maria likes novels", ["maria"]));
    const focus = agent.associative.addEvent(concept(3, "Maria is reading a book", ["maria"]));

    const retrieved = await new KeywordRetriever({ limit: 5 }).retrieve(agent, [focus]);

    expect([...retrieved.keys()]).toEqual(["Maria is reading a book"]);
    const entry = retrieved.get("Maria is reading a book");
    expect(entry?.focus).toBe(focus);
    expect(entry?.events.map((n) => n.node_id)).toEqual([older.node_id]);
    expect(entry?.thoughts.map((n) => n.node_id)).toEqual([thought.node_id]);
  });

  it("keeps the newest matches up to its limit", async () => {
    const agent = agentContext("Isabella");
    agent.associative.addEvent(concept(0, "first", ["library"]));
    const second = agent.associative.addEvent(concept(1, "second", ["library"]));
    const third = agent.associative.addEvent(concept(2, "third", ["library"]));
    const focus = agent.associative.addEvent(concept(3, "focus", ["library"]));

    const retrieved = await new KeywordRetriever({ limit: 2 }).retrieve(agent, [focus]);
    expect(retrieved.get("focus")?.events.map((n) => n.description)).toEqual([third.description, second.description]);
  });

  it("returns nothing for nothing perceived", async () => {
    const retrieved = await new KeywordRetriever({ limit: 2 }).retrieve(agentContext("Isabella"), []);
    expect(retrieved.size).toBe(0);
  });
});
