import { vi, type Mock } from "vitest";
import type { AgentAction, WorldConfig } from "@townsim/schemas";
import { AssociativeMemory, Scratch, SpatialMemory } from "@townsim/memory";
import type {
  AgentContext,
  CognitionModules,
  ConversationEngine,
  Executor,
  Perceiver,
  Planner,
  Reflector,
  Retriever,
} from "./cognition.js";

/**
 * 4x2 "Town", sector "park" everywhere. Columns 0-2 are the arena "bench"
 * with a chessboard at (1,0); column 3 is the arena "pond" with a lamp at (3,0).
 */
export function parkConfig(): WorldConfig {
  return {
    meta: { width: 4, height: 2, tile_size: 32 },
    world_name: "Town",
    layers: {
      collision: ["0", "0", "0", "0", "0", "0", "0", "0"],
      sector: ["10", "10", "10", "10", "10", "10", "10", "10"],
      arena: ["20", "20", "20", "21", "20", "20", "20", "21"],
      game_object: ["0", "30", "0", "31", "0", "0", "0", "0"],
      spawning_location: ["0", "0", "0", "0", "0", "0", "0", "0"],
    },
    blocks: {
      sector: { "10": "park" },
      arena: { "20": "bench", "21": "pond" },
      game_object: { "30": "chessboard", "31": "lamp" },
      spawning_location: {},
    },
  };
}

export function agentContext(name: string): AgentContext {
  return {
    name,
    scratch: new Scratch(name),
    spatial: new SpatialMemory(),
    associative: new AssociativeMemory(),
  };
}

export const PLAN = "Town:park:bench:chessboard";

export const MOVE: AgentAction = { kind: "move", target: [1, 0], description: "walking to the chessboard" };

export interface FakeCognition extends CognitionModules {
  perceiver: { perceive: Mock<Perceiver["perceive"]> };
  retriever: { retrieve: Mock<Retriever["retrieve"]> };
  planner: { plan: Mock<Planner["plan"]> };
  reflector: { reflect: Mock<Reflector["reflect"]> };
  executor: { execute: Mock<Executor["execute"]> };
  conversation: { openConversation: Mock<ConversationEngine["openConversation"]> };
}

/** Collaborator fakes that record the order they were called in. */
export function fakeCognition(calls: string[]): FakeCognition {
  return {
    perceiver: {
      perceive: vi.fn<Perceiver["perceive"]>(async () => {
        calls.push("perceive");
        return [];
      }),
    },
    retriever: {
      retrieve: vi.fn<Retriever["retrieve"]>(async () => {
        calls.push("retrieve");
        return new Map();
      }),
    },
    planner: {
      plan: vi.fn<Planner["plan"]>(async (_agent, _world, _peers, dayFlag) => {
        calls.push(`plan:${dayFlag}`);
        return PLAN;
      }),
    },
    reflector: {
      reflect: vi.fn<Reflector["reflect"]>(async () => {
        calls.push("reflect");
      }),
    },
    executor: {
      execute: vi.fn<Executor["execute"]>(async () => {
        calls.push("execute");
        return MOVE;
      }),
    },
    conversation: {
      openConversation: vi.fn<ConversationEngine["openConversation"]>(async () => {}),
    },
  };
}
