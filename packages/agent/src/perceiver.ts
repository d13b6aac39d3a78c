import type { ConceptNode, GridEvent, TileCoord } from "@townsim/schemas";
import type { WorldGrid } from "@townsim/world";
import { addressLeaf, eventKey } from "@townsim/world";
import type { AgentContext, Perceiver } from "./cognition.js";

export interface ProximityPerceiverOptions {
  /** Radius, in tiles, of the square the agent sees. */
  visionRadius: number;
  /** How many of the nearest events the agent attends to per tick. */
  attentionBandwidth: number;
  /** How many recent events count as already known. */
  retention: number;
  /** Scores a non-idle event; idle events always score 1. Defaults to 1. */
  poignancy?: (agent: AgentContext, description: string) => number | Promise<number>;
}

interface Sighting {
  event: GridEvent;
  distance: number;
}

function distanceBetween(a: TileCoord, b: TileCoord): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

/**
 * Perceives what is on the tiles around the agent: maps the surroundings
 * into spatial memory and records the nearest new events in the agent's
 * arena as event nodes.
 */
export class ProximityPerceiver implements Perceiver {
  constructor(private readonly options: ProximityPerceiverOptions) {}

  async perceive(agent: AgentContext, world: WorldGrid): Promise<ConceptNode[]> {
    const position = agent.scratch.currTile;
    const now = agent.scratch.currTime;
    if (!position || !now) throw new Error(`${agent.name} has no current tile or time to perceive from`);

    const nearby = world.tilesNear(position, this.options.visionRadius);
    for (const coord of nearby) {
      const tile = world.accessTile(coord);
      agent.spatial.learn(tile.world, tile.sector, tile.arena, tile.game_object);
    }

    const currentArena = world.addressOf(position, "arena");
    const sightings = new Map<string, Sighting>();
    for (const coord of nearby) {
      const tile = world.accessTile(coord);
      if (tile.events.size === 0 || world.addressOf(coord, "arena") !== currentArena) continue;
      const distance = distanceBetween(coord, position);
      for (const event of tile.events) {
        const key = eventKey(event);
        const seen = sightings.get(key);
        if (!seen || distance < seen.distance) sightings.set(key, { event, distance });
      }
    }
    const attended = [...sightings.values()]
      .sort((a, b) => a.distance - b.distance)
      .slice(0, this.options.attentionBandwidth);

    const known = new Set(
      agent.associative.latestEventSummaries(this.options.retention).map((triple) => JSON.stringify(triple))
    );
    const perceived: ConceptNode[] = [];
    for (const { event } of attended) {
      const idle = !event.predicate;
      const predicate = idle ? "is" : event.predicate ?? "is";
      const object = idle ? "idle" : event.object ?? "";
      const what = idle ? "idle" : event.description ?? `${predicate} ${object}`;
      if (known.has(JSON.stringify([event.subject, predicate, object]))) continue;

      const description = `${addressLeaf(event.subject)} is ${what}`;
      const poignancy = idle ? 1 : await (this.options.poignancy?.(agent, description) ?? 1);
      perceived.push(
        agent.associative.addEvent({
          created: now,
          subject: event.subject,
          predicate,
          object,
          description,
          poignancy,
          keywords: [addressLeaf(event.subject), addressLeaf(object)].filter((k) => k.length > 0),
        })
      );
    }
    return perceived;
  }
}
