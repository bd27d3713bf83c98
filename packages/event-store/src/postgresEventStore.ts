import type { Pool, PoolClient } from "pg";
import type { EventFilter, EventStore } from "./eventStore";
import type { DomainEvent, EventMeta } from "../../shared/src";

type PgDeps = {
  pool: Pool;
};

type EventRow = {
  id: string;
  user_id: string | number;
  type: string;
  ts: Date | string;
  payload: unknown;
  meta: EventMeta & { tags?: string[] };
};

const rowToEvent = (row: EventRow): DomainEvent => {
  const { tags, ...meta } = row.meta;
  return {
    id: row.id,
    userId: Number(row.user_id),
    type: row.type,
    timestamp: new Date(row.ts).toISOString(),
    payload: row.payload,
    meta,
    tags,
  };
};

export class PostgresEventStore implements EventStore {
  private pool: Pool;
  constructor({ pool }: PgDeps) {
    this.pool = pool;
  }

  private normalizeTimestamp(ts?: string) {
    return ts ? new Date(ts).toISOString() : new Date().toISOString();
  }

  private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  private where(filter: EventFilter): { clause: string; values: unknown[] } {
    const values: unknown[] = [];
    const where: string[] = [];
    const param = (value: unknown) => {
      values.push(value);
      return `$${values.length}`;
    };

    if (filter.userId !== undefined) where.push(`user_id = ${param(filter.userId)}`);
    if (filter.correlationId) where.push(`meta->>'correlationId' = ${param(filter.correlationId)}`);
    if (filter.types && filter.types.length > 0) where.push(`type = ANY(${param(filter.types)})`);
    if (filter.since) where.push(`ts >= ${param(filter.since)}`);
    if (filter.until) where.push(`ts <= ${param(filter.until)}`);

    return { clause: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
  }

  async append(event: DomainEvent): Promise<void> {
    await this.appendMany([event]);
  }

  async appendMany(events: DomainEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.withClient(async (client) => {
      await client.query("BEGIN");
      try {
        for (const ev of events) {
          await client.query(
            `
            INSERT INTO events(id, user_id, type, ts, payload, meta)
            VALUES($1,$2,$3,$4,$5,$6)
            ON CONFLICT (id) DO NOTHING
          `,
            [
              ev.id,
              ev.userId,
              ev.type,
              this.normalizeTimestamp(ev.timestamp),
              JSON.stringify(ev.payload ?? {}),
              JSON.stringify({ ...ev.meta, tags: ev.tags }),
            ]
          );
        }
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
    });
  }

  async query(filter: EventFilter = {}): Promise<DomainEvent[]> {
    const { clause, values } = this.where(filter);
    const direction = filter.order === "desc" ? "DESC" : "ASC";
    let sql = `SELECT * FROM events ${clause} ORDER BY ts ${direction}, id ${direction}`;
    if (filter.limit) {
      sql += ` LIMIT ${Math.trunc(filter.limit)}`;
    }
    if (filter.offset) {
      sql += ` OFFSET ${Math.trunc(filter.offset)}`;
    }
    const res = await this.pool.query<EventRow>(sql, values);
    return res.rows.map(rowToEvent);
  }

  async count(filter: EventFilter = {}): Promise<number> {
    const { clause, values } = this.where(filter);
    const res = await this.pool.query<{ total: string | number }>(`SELECT COUNT(*) AS total FROM events ${clause}`, values);
    return Number(res.rows[0]?.total ?? 0);
  }
}
