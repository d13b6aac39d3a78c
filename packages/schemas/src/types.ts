/**
 * townsim core types
 *
 * Canonical data models shared by the world grid, the memory stores and the
 * agent orchestrator. Persisted and configuration shapes use snake_case keys.
 */

// ─── Grid ───────────────────────────────────────────────────────────

/** Discrete tile coordinate, `[x, y]`. */
export type TileCoord = readonly [x: number, y: number];

/** Continuous pixel coordinate, `[px, py]`. */
export type PixelCoord = readonly [px: number, py: number];

/** Colon-joined `world:sector:arena:object` path. */
export type Address = string;

export type AddressLevel = "world" | "sector" | "arena" | "object";

/**
 * A subject-centered fact attached to a tile. Two events are the same event
 * only when all four fields match. An idle event carries only its subject.
 */
export interface GridEvent {
  readonly subject: Address;
  readonly predicate: string | null;
  readonly object: string | null;
  readonly description: string | null;
}

// ─── World configuration ────────────────────────────────────────────

export interface WorldMeta {
  width: number;
  height: number;
  tile_size: number;
  /** Passed through unexamined. */
  special_constraint?: unknown;
}

export type LayerName = "collision" | "sector" | "arena" | "game_object" | "spawning_location";
export type BlockLayerName = Exclude<LayerName, "collision">;

export interface WorldConfig {
  meta: WorldMeta;
  world_name: string;
  /** Row-major per-cell codes, `width * height` entries each. */
  layers: Record<LayerName, string[]>;
  /** Code to name, per addressable layer. Unmapped codes resolve to "". */
  blocks: Record<BlockLayerName, Record<string, string>>;
}

// ─── Agent ──────────────────────────────────────────────────────────

export type DayFlag = "first_day" | "new_day" | "no_signal";

export type AgentPhase =
  | "idle"
  | "perceiving"
  | "retrieving"
  | "planning"
  | "reflecting"
  | "executing";

export type ConversationMode = "analysis" | "whisper";

export interface MoveAction {
  kind: "move";
  target: TileCoord;
  description: string;
}

export interface InteractAction {
  kind: "interact";
  target: TileCoord;
  object: Address;
  description: string;
}

export interface UtterAction {
  kind: "utter";
  target: TileCoord;
  utterance: string;
  addressee?: string;
  description: string;
}

export type AgentAction = MoveAction | InteractAction | UtterAction;

// ─── Memory ─────────────────────────────────────────────────────────

export type ConceptNodeKind = "event" | "thought" | "chat";

export interface ConceptNode {
  node_id: string;
  kind: ConceptNodeKind;
  /** Ordinal among nodes of the same kind, starting at 1. */
  type_count: number;
  depth: number;
  created: string;
  last_accessed: string;
  subject: string;
  predicate: string;
  object: string;
  description: string;
  poignancy: number;
  keywords: string[];
  evidence: string[];
}

export interface SpatialTreeData {
  [world: string]: {
    [sector: string]: {
      [arena: string]: string[];
    };
  };
}

export interface ScratchData {
  name: string;
  curr_tile: [number, number] | null;
  curr_time: string | null;
  fields?: Record<string, unknown>;
}

/** Load/save pair for one memory store; the store's schema is its own. */
export interface MemoryStoreCodec<T> {
  load(path: string): Promise<T>;
  save(instance: T, path: string): Promise<void>;
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "agent.loaded"
  | "agent.saved"
  | "tick.started"
  | "tick.phase"
  | "tick.completed"
  | "tick.failed"
  | "conversation.opened"
  | "conversation.failed";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  agent: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
