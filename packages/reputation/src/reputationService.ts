import { randomUUID } from "crypto";
import type { EventStore } from "../../event-store/src";
import type { DomainEvent, User, UserId } from "../../shared/src";
import type { UserRepository } from "../../users/src";
import { ReputationConfigError, loadReputationChanges } from "./configLoader";
import {
  NO_CHANGE,
  type ReputationActionType,
  type ReputationChange,
  type ReputationChangeEntry,
  type ReputationChangeTable,
  type VoteEntity,
} from "./types";

const REPUTATION_UPDATED_EVENT = "reputation.updated";

export type ReputationUpdatedEvent = {
  userId: UserId;
  oldReputation: number;
  newReputation: number;
  reason: ReputationActionType;
  entity?: VoteEntity;
  role: "self" | "target";
};

export type ReputationApplication = {
  actorId: UserId;
  targetId?: UserId;
  type: ReputationActionType;
  entity?: VoteEntity;
  requestId?: string;
};

export type ReputationOutcome = {
  changes: ReputationChange;
  updates: ReputationUpdatedEvent[];
};

const isFlat = (entry: ReputationChangeEntry): entry is ReputationChange =>
  "self" in entry;

export class ReputationService {
  private readonly table: ReputationChangeTable;
  private readonly users: UserRepository;
  private readonly eventStore?: EventStore;

  constructor(deps: { users: UserRepository; table?: ReputationChangeTable; eventStore?: EventStore }) {
    this.users = deps.users;
    this.table = deps.table ?? loadReputationChanges();
    this.eventStore = deps.eventStore;
  }

  getTable(): ReputationChangeTable {
    return this.table;
  }

  /** Deltas for `type`; per-entity types need the entity. Types absent from the table change nothing. */
  changesFor(type: ReputationActionType, entity?: VoteEntity): ReputationChange {
    const entry = this.table[type];
    if (!entry) return NO_CHANGE;
    if (isFlat(entry)) return entry;
    if (!entity) {
      throw new ReputationConfigError(`Reputation changes for ${type} depend on the entity, none given`);
    }
    return entry[entity] ?? NO_CHANGE;
  }

  selfChange(type: ReputationActionType, entity?: VoteEntity): number {
    return this.changesFor(type, entity).self;
  }

  /**
   * Applies both deltas of an action. Acting on your own content moves nobody's reputation.
   */
  async apply(application: ReputationApplication): Promise<ReputationOutcome> {
    const { actorId, targetId, type, entity } = application;
    if (targetId !== undefined && targetId === actorId) {
      return { changes: NO_CHANGE, updates: [] };
    }
    // Both users must exist before either balance moves.
    if (targetId !== undefined) await this.users.loadById(targetId);

    const changes = this.changesFor(type, entity);
    const updates: ReputationUpdatedEvent[] = [];
    if (changes.self !== 0) {
      updates.push(await this.adjust(actorId, changes.self, "self", application));
    }
    if (targetId !== undefined && changes.target !== 0) {
      updates.push(await this.adjust(targetId, changes.target, "target", application));
    }
    if (this.eventStore && updates.length > 0) {
      await this.eventStore.appendMany(updates.map((update) => this.toEvent(update, application.requestId)));
    }
    return { changes, updates };
  }

  private async adjust(
    userId: UserId,
    delta: number,
    role: ReputationUpdatedEvent["role"],
    application: ReputationApplication
  ): Promise<ReputationUpdatedEvent> {
    const updated: User = await this.users.addReputation(userId, delta);
    return {
      userId,
      oldReputation: updated.reputation - delta,
      newReputation: updated.reputation,
      reason: application.type,
      entity: application.entity,
      role,
    };
  }

  private toEvent(update: ReputationUpdatedEvent, requestId?: string): DomainEvent<ReputationUpdatedEvent> {
    return {
      id: randomUUID(),
      userId: update.userId,
      type: REPUTATION_UPDATED_EVENT,
      timestamp: new Date().toISOString(),
      payload: update,
      meta: { source: "system", requestId, correlationId: requestId },
      tags: ["reputation"],
    };
  }
}

export const ReputationEvents = {
  REPUTATION_UPDATED_EVENT,
};
