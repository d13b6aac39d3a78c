import type { Address, GridEvent } from "@townsim/schemas";

export function makeEvent(
  subject: Address,
  predicate: string | null = null,
  object: string | null = null,
  description: string | null = null
): GridEvent {
  return { subject, predicate, object, description };
}

export function makeIdleEvent(subject: Address): GridEvent {
  return makeEvent(subject);
}

export function isIdleEvent(event: GridEvent): boolean {
  return event.predicate === null && event.object === null && event.description === null;
}

/** Structural identity over all four fields; `null` and `""` stay distinct. */
export function eventKey(event: GridEvent): string {
  return JSON.stringify([event.subject, event.predicate, event.object, event.description]);
}

export function eventsEqual(a: GridEvent, b: GridEvent): boolean {
  return eventKey(a) === eventKey(b);
}

export interface ReadonlyEventSet extends Iterable<GridEvent> {
  readonly size: number;
  has(event: GridEvent): boolean;
  values(): GridEvent[];
}

/** Set of events with membership by structural equality. */
export class EventSet implements ReadonlyEventSet {
  private entries = new Map<string, GridEvent>();

  constructor(events: Iterable<GridEvent> = []) {
    for (const event of events) this.add(event);
  }

  get size(): number {
    return this.entries.size;
  }

  has(event: GridEvent): boolean {
    return this.entries.has(eventKey(event));
  }

  /** Returns false if an equal event was already present. */
  add(event: GridEvent): boolean {
    const key = eventKey(event);
    if (this.entries.has(key)) return false;
    this.entries.set(key, { ...event });
    return true;
  }

  delete(event: GridEvent): boolean {
    return this.entries.delete(eventKey(event));
  }

  deleteWhere(predicate: (event: GridEvent) => boolean): number {
    let removed = 0;
    for (const [key, event] of this.entries) {
      if (predicate(event)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  values(): GridEvent[] {
    return [...this.entries.values()];
  }

  [Symbol.iterator](): Iterator<GridEvent> {
    return this.values()[Symbol.iterator]();
  }
}
