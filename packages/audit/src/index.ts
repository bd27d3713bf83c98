import { randomUUID } from "crypto";
import type { EventStore } from "../../event-store/src";
import type { DomainEvent, EventFilter, EventSource, UserId } from "../../shared/src";

export const AUDIT_EVENT_TYPE = "audit.record";

export type AuditStatus = "success" | "failure" | "denied";

export type AuditRecordPayload = {
  action: string;
  target: string;
  status: AuditStatus;
  reason?: string;
  data?: Record<string, unknown>;
};

export type AuditRecordInput = AuditRecordPayload & {
  userId: UserId;
  source?: EventSource;
  tags?: string[];
  requestId?: string;
  correlationId?: string;
};

export class AuditLogger {
  constructor(private readonly store: EventStore) {}

  async record(input: AuditRecordInput): Promise<DomainEvent<AuditRecordPayload>> {
    const event: DomainEvent<AuditRecordPayload> = {
      id: randomUUID(),
      userId: input.userId,
      type: AUDIT_EVENT_TYPE,
      timestamp: new Date().toISOString(),
      payload: {
        action: input.action,
        target: input.target,
        status: input.status,
        reason: input.reason,
        data: input.data,
      },
      meta: {
        source: input.source ?? "system",
        requestId: input.requestId,
        correlationId: input.correlationId ?? input.requestId,
      },
      tags: input.tags,
    };

    await this.store.append(event);
    return event;
  }
}

const isAuditEvent = (event: DomainEvent): event is DomainEvent<AuditRecordPayload> =>
  event.type === AUDIT_EVENT_TYPE;

export class AuditQueryService {
  constructor(private readonly store: EventStore) {}

  async list(filter?: EventFilter): Promise<DomainEvent<AuditRecordPayload>[]> {
    const events = await this.store.query({ ...(filter ?? {}), types: [AUDIT_EVENT_TYPE] });
    return events.filter(isAuditEvent);
  }
}

export * from "./activityLog";
