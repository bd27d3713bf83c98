import type { DomainEvent, EventFilter } from "../../shared/src";
export type { EventFilter } from "../../shared/src";

export interface EventStore {
  append(event: DomainEvent): Promise<void>;
  appendMany(events: DomainEvent[]): Promise<void>;
  query(filter?: EventFilter): Promise<DomainEvent[]>;
  count(filter?: EventFilter): Promise<number>;
}

export const matchesFilter = (event: DomainEvent, filter?: EventFilter): boolean => {
  if (!filter) return true;
  if (filter.userId !== undefined && event.userId !== filter.userId) return false;
  if (filter.types && filter.types.length > 0 && !filter.types.includes(event.type)) return false;
  if (filter.since && new Date(event.timestamp) < new Date(filter.since)) return false;
  if (filter.until && new Date(event.timestamp) > new Date(filter.until)) return false;
  if (filter.correlationId && event.meta.correlationId !== filter.correlationId) return false;
  return true;
};

const byTimestamp = (a: DomainEvent, b: DomainEvent): number =>
  a.timestamp === b.timestamp ? a.id.localeCompare(b.id) : a.timestamp < b.timestamp ? -1 : 1;

export class InMemoryEventStore implements EventStore {
  private events: DomainEvent[];
  private ids: Set<string>;

  constructor(initialEvents?: DomainEvent[]) {
    this.events = initialEvents ? [...initialEvents] : [];
    this.ids = new Set(this.events.map((evt) => evt.id));
  }

  async append(event: DomainEvent): Promise<void> {
    await this.appendMany([event]);
  }

  async appendMany(events: DomainEvent[]): Promise<void> {
    for (const event of events) {
      if (this.ids.has(event.id)) continue;
      this.ids.add(event.id);
      this.events.push(event);
    }
  }

  async query(filter?: EventFilter): Promise<DomainEvent[]> {
    const filtered = this.events.filter((evt) => matchesFilter(evt, filter)).sort(byTimestamp);
    if (filter?.order === "desc") filtered.reverse();
    const offset = filter?.offset ?? 0;
    const end = filter?.limit && filter.limit > 0 ? offset + filter.limit : undefined;
    return filtered.slice(offset, end);
  }

  async count(filter?: EventFilter): Promise<number> {
    return this.events.filter((evt) => matchesFilter(evt, filter)).length;
  }
}
