import type { AgentAction, AgentPhase, ConversationMode, Logger, TileCoord } from "@townsim/schemas";
import { CollaboratorFailureError, TickInProgressError } from "@townsim/schemas";
import type { Journal } from "@townsim/journal";
import type { WorldGrid } from "@townsim/world";
import { loadAgentMemory, saveAgentMemory, defaultMemoryCodecs } from "@townsim/memory";
import type { AgentMemory, MemoryCodecs } from "@townsim/memory";
import type { AgentContext, CognitionModules, Peers } from "./cognition.js";
import { computeDayFlag } from "./day-flag.js";

export interface AgentOrchestratorConfig {
  name: string;
  /** Folder holding spatial_memory.json, associative_memory/ and scratch.json. */
  snapshotDir: string;
  cognition: CognitionModules;
  codecs?: MemoryCodecs;
  journal?: Journal;
  logger?: Logger;
}

type TickPhase = Exclude<AgentPhase, "idle">;

const VALID_TRANSITIONS: Record<AgentPhase, AgentPhase[]> = {
  idle: ["perceiving"],
  perceiving: ["retrieving"],
  retrieving: ["planning"],
  planning: ["reflecting"],
  reflecting: ["executing"],
  executing: ["idle"],
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one agent through its per-tick pipeline
 * perceive → retrieve → plan → reflect → execute and owns the agent's
 * memory stores between ticks.
 */
export class AgentOrchestrator {
  readonly name: string;
  readonly context: AgentContext;

  private memory: AgentMemory;
  private cognition: CognitionModules;
  private codecs: MemoryCodecs;
  private journal?: Journal;
  private logger?: Logger;
  private phase: AgentPhase = "idle";
  private running = false;
  private tickCount = 0;

  private constructor(config: AgentOrchestratorConfig, memory: AgentMemory) {
    this.name = config.name;
    this.memory = memory;
    this.cognition = config.cognition;
    this.codecs = config.codecs ?? defaultMemoryCodecs;
    this.journal = config.journal;
    this.logger = config.logger;
    this.context = {
      name: config.name,
      scratch: memory.scratch,
      spatial: memory.spatial,
      associative: memory.associative,
    };
  }

  /** Fails with CorruptSnapshotError when any store cannot be read. */
  static async load(config: AgentOrchestratorConfig): Promise<AgentOrchestrator> {
    const memory = await loadAgentMemory(config.snapshotDir, config.codecs ?? defaultMemoryCodecs);
    const orchestrator = new AgentOrchestrator(config, memory);
    await config.journal?.emit(config.name, "agent.loaded", {
      snapshot_dir: config.snapshotDir,
      nodes: memory.associative.size,
      curr_time: memory.scratch.currTime?.toISOString() ?? null,
    });
    config.logger?.info(`Loaded ${config.name} from ${config.snapshotDir}`, { nodes: memory.associative.size });
    return orchestrator;
  }

  getPhase(): AgentPhase {
    return this.phase;
  }

  /** Number of ticks that ran to completion. */
  getTickCount(): number {
    return this.tickCount;
  }

  /**
   * Advances the agent one simulation step and returns the action it takes.
   * Position and time are written before any collaborator runs and stay
   * written if a later step fails.
   */
  async tick(world: WorldGrid, peers: Peers, position: TileCoord, time: Date): Promise<AgentAction> {
    if (this.running) throw new TickInProgressError(this.name);
    this.running = true;
    const tick = this.tickCount + 1;
    const agent = this.context;
    const { perceiver, retriever, planner, reflector, executor } = this.cognition;

    try {
      // Stored as copies; callers may keep mutating their own clock and position
      agent.scratch.currTile = [position[0], position[1]];
      const dayFlag = computeDayFlag(agent.scratch.currTime, time);
      agent.scratch.currTime = new Date(time.getTime());
      await this.journal?.emit(this.name, "tick.started", {
        tick,
        position: [position[0], position[1]],
        time: time.toISOString(),
        day_flag: dayFlag,
      });

      const perceived = await this.step(tick, "perceiving", () => perceiver.perceive(agent, world));
      const retrieved = await this.step(tick, "retrieving", () => retriever.retrieve(agent, perceived));
      const plan = await this.step(tick, "planning", () => planner.plan(agent, world, peers, dayFlag, retrieved));
      await this.step(tick, "reflecting", () => reflector.reflect(agent));
      const action = await this.step(tick, "executing", () => executor.execute(agent, world, peers, plan));

      this.transition("idle");
      this.tickCount = tick;
      await this.journal?.tryEmit(this.name, "tick.completed", { tick, plan, action: action.kind });
      return action;
    } catch (err) {
      const failedPhase = this.phase;
      this.phase = "idle";
      this.logger?.error(`Tick ${tick} failed: ${errorMessage(err)}`, { phase: failedPhase });
      await this.journal?.tryEmit(this.name, "tick.failed", {
        tick,
        phase: err instanceof CollaboratorFailureError ? err.phase : failedPhase,
        error: errorMessage(err),
      });
      throw err;
    } finally {
      this.running = false;
    }
  }

  /** Writes the three stores one after another; there is no cross-store atomicity. */
  async save(folder: string): Promise<void> {
    await saveAgentMemory(folder, this.memory, this.codecs);
    await this.journal?.emit(this.name, "agent.saved", { folder, nodes: this.memory.associative.size });
    this.logger?.info(`Saved ${this.name} to ${folder}`);
  }

  /** "analysis" is a free-form session, "whisper" a directed one. */
  async openConversation(mode: ConversationMode): Promise<void> {
    try {
      await this.cognition.conversation.openConversation(this.context, mode);
    } catch (err) {
      const failure = new CollaboratorFailureError("conversing", this.name, err);
      await this.journal?.tryEmit(this.name, "conversation.failed", { mode, error: errorMessage(err) });
      throw failure;
    }
    await this.journal?.emit(this.name, "conversation.opened", { mode });
  }

  private async step<T>(tick: number, phase: TickPhase, call: () => Promise<T>): Promise<T> {
    this.transition(phase);
    await this.journal?.emit(this.name, "tick.phase", { tick, phase });
    this.logger?.debug(`Tick ${tick}: ${phase}`);
    try {
      return await call();
    } catch (err) {
      if (err instanceof CollaboratorFailureError) throw err;
      throw new CollaboratorFailureError(phase, this.name, err);
    }
  }

  private transition(next: AgentPhase): void {
    const allowed = VALID_TRANSITIONS[this.phase];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid agent phase transition: ${this.phase} → ${next}`);
    }
    this.phase = next;
  }
}
