import { randomUUID } from "crypto";
import type { EventStore } from "../../event-store/src";
import type { DomainEvent, EventSource, Page, UserId } from "../../shared/src";

export const USER_ACTION_EVENT_TYPE = "user.action";

export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 100;

export type UserActionPayload = {
  action: string;
  entity?: string;
  entityId?: number;
  targetUserId?: number;
  changes?: { self: number; target: number };
  data?: Record<string, unknown>;
};

export type UserActionInput = UserActionPayload & {
  userId: UserId;
  source?: EventSource;
  requestId?: string;
};

const isUserActionEvent = (event: DomainEvent): event is DomainEvent<UserActionPayload> =>
  event.type === USER_ACTION_EVENT_TYPE;

/** What each user did, newest first. Fed by quota-guarded actions once they commit. */
export class ActivityLog {
  constructor(private readonly store: EventStore) {}

  async record(input: UserActionInput): Promise<DomainEvent<UserActionPayload>> {
    const { userId, source, requestId, ...payload } = input;
    const event: DomainEvent<UserActionPayload> = {
      id: randomUUID(),
      userId,
      type: USER_ACTION_EVENT_TYPE,
      timestamp: new Date().toISOString(),
      payload,
      meta: { source: source ?? "user", requestId, correlationId: requestId },
      tags: [payload.action],
    };
    await this.store.append(event);
    return event;
  }

  async list(
    userId: UserId,
    params: { offset?: number; limit?: number } = {}
  ): Promise<Page<DomainEvent<UserActionPayload>>> {
    const offset = Math.max(params.offset ?? 0, 0);
    const limit = Math.min(Math.max(params.limit ?? DEFAULT_PAGE_LIMIT, 1), MAX_PAGE_LIMIT);
    const filter = { userId, types: [USER_ACTION_EVENT_TYPE] };
    const [events, total] = await Promise.all([
      this.store.query({ ...filter, order: "desc", offset, limit }),
      this.store.count(filter),
    ]);
    return { entries: events.filter(isUserActionEvent), total, offset, limit };
  }
}
