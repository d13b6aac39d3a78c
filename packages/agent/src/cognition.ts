import type { Address, AgentAction, ConceptNode, ConversationMode, DayFlag } from "@townsim/schemas";
import type { WorldGrid } from "@townsim/world";
import type { AssociativeMemory, Scratch, SpatialMemory } from "@townsim/memory";

/**
 * What collaborators see of an agent. Peers are handed to the planner and
 * executor in the same shape.
 */
export interface AgentContext {
  readonly name: string;
  readonly scratch: Scratch;
  readonly spatial: SpatialMemory;
  readonly associative: AssociativeMemory;
}

export type Peers = ReadonlyMap<string, AgentContext>;

export interface RetrievedEntry {
  /** The perceived node the memories were retrieved for. */
  focus: ConceptNode;
  events: ConceptNode[];
  thoughts: ConceptNode[];
}

/** Keyed by the focus node's description. */
export type RetrievedMemories = Map<string, RetrievedEntry>;

export interface Perceiver {
  perceive(agent: AgentContext, world: WorldGrid): Promise<ConceptNode[]>;
}

export interface Retriever {
  retrieve(agent: AgentContext, perceived: ConceptNode[]): Promise<RetrievedMemories>;
}

export interface Planner {
  /** Returns the address the agent will act on next. */
  plan(agent: AgentContext, world: WorldGrid, peers: Peers, dayFlag: DayFlag, retrieved: RetrievedMemories): Promise<Address>;
}

export interface Reflector {
  reflect(agent: AgentContext): Promise<void>;
}

export interface Executor {
  execute(agent: AgentContext, world: WorldGrid, peers: Peers, plan: Address): Promise<AgentAction>;
}

export interface ConversationEngine {
  openConversation(agent: AgentContext, mode: ConversationMode): Promise<void>;
}

export interface CognitionModules {
  perceiver: Perceiver;
  retriever: Retriever;
  planner: Planner;
  reflector: Reflector;
  executor: Executor;
  conversation: ConversationEngine;
}
