import type { AgentPhase } from "./types.js";

export type ErrorCode =
  | "CONFIG_ERROR"
  | "OUT_OF_BOUNDS"
  | "CORRUPT_SNAPSHOT"
  | "COLLABORATOR_FAILURE"
  | "TICK_IN_PROGRESS";

export class SimulationError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SimulationError";
    this.code = code;
    this.data = data;
  }
}

/** Malformed or inconsistent world configuration. Fatal at startup. */
export class ConfigError extends SimulationError {
  constructor(message: string, data?: { layer?: string; field?: string; file?: string; [key: string]: unknown }) {
    super("CONFIG_ERROR", message, data);
    this.name = "ConfigError";
  }
}

export class OutOfBoundsError extends SimulationError {
  constructor(x: number, y: number, width: number, height: number) {
    super("OUT_OF_BOUNDS", `Tile (${x}, ${y}) is outside the ${width}x${height} grid`, { x, y, width, height });
    this.name = "OutOfBoundsError";
  }
}

export class CorruptSnapshotError extends SimulationError {
  readonly store: string;

  constructor(store: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("CORRUPT_SNAPSHOT", `Failed to load ${store} from ${path}: ${reason}`, { store, path }, { cause });
    this.name = "CorruptSnapshotError";
    this.store = store;
  }
}

export type CollaboratorPhase = Exclude<AgentPhase, "idle"> | "conversing";

export class CollaboratorFailureError extends SimulationError {
  readonly phase: CollaboratorPhase;

  constructor(phase: CollaboratorPhase, agent: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("COLLABORATOR_FAILURE", `${agent}: ${phase} failed: ${reason}`, { phase, agent }, { cause });
    this.name = "CollaboratorFailureError";
    this.phase = phase;
  }
}

export class TickInProgressError extends SimulationError {
  constructor(agent: string) {
    super("TICK_IN_PROGRESS", `${agent}: tick() called while another tick is in progress`, { agent });
    this.name = "TickInProgressError";
  }
}
