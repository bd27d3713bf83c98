import { z } from "zod";
import type { User } from "../../shared/src";
import { PermissionsError } from "./errors";

export const ACTION_KINDS = [
  "add_comment",
  "add_video",
  "vote_up",
  "vote_down",
  "approve_history_action",
  "flag_history_action",
  "flag_comment",
  "add_statement",
  "edit_other_statement",
  "remove_statement",
  "restore_statement",
  "add_speaker",
  "remove_speaker",
  "edit_speaker",
  "restore_speaker",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/** `[negativeReputation, newUser, confirmedUser]` occurrences allowed per period. */
export type QuotaTiers = readonly [number, number, number];

export type TierIndex = 0 | 1 | 2;

export type MinReputationTable = Readonly<Record<ActionKind, number>>;
export type QuotaTable = Readonly<Record<ActionKind, QuotaTiers>>;

export const CONFIRMED_USER_THRESHOLD = 50;

// High enough that nobody acting in good faith reaches it.
export const MAX_LIMIT = 100;

export const MIN_REPUTATIONS: MinReputationTable = {
  add_comment: -25,
  add_video: 15,
  add_speaker: 15,
  edit_speaker: 30,
  add_statement: 15,
  vote_up: 15,
  approve_history_action: 0,
  flag_comment: 40,
  flag_history_action: 40,
  vote_down: 80,
  edit_other_statement: 0,
  remove_statement: 0,
  restore_statement: 0,
  remove_speaker: 0,
  restore_speaker: 0,
};

export const LIMITATIONS: QuotaTable = {
  add_comment: [3, 10, MAX_LIMIT],
  add_video: [0, 3, 10],
  // votes
  vote_up: [0, 10, MAX_LIMIT],
  vote_down: [0, 10, MAX_LIMIT],
  // flag / approve
  approve_history_action: [0, 10, MAX_LIMIT],
  flag_history_action: [0, 5, MAX_LIMIT],
  flag_comment: [0, 1, MAX_LIMIT],
  // statements
  add_statement: [0, 10, MAX_LIMIT],
  edit_other_statement: [0, 3, MAX_LIMIT],
  remove_statement: [0, 1, MAX_LIMIT],
  restore_statement: [0, 2, MAX_LIMIT],
  // speakers
  add_speaker: [0, 10, 50],
  remove_speaker: [0, 0, MAX_LIMIT],
  edit_speaker: [0, 5, MAX_LIMIT],
  restore_speaker: [0, 2, MAX_LIMIT],
};

const actionKindSet: ReadonlySet<string> = new Set(ACTION_KINDS);

export const isActionKind = (value: string): value is ActionKind => actionKindSet.has(value);

const tiersSchema = z.tuple([
  z.number().int().nonnegative(),
  z.number().int().nonnegative(),
  z.number().int().nonnegative(),
]);

const actionKindSchema = z.enum(ACTION_KINDS);

/** Overrides merged over the built-in tables; entries left out keep their default. */
export const policyConfigSchema = z.object({
  confirmedUserThreshold: z.number().int().default(CONFIRMED_USER_THRESHOLD),
  minReputations: z.record(actionKindSchema, z.number().int()).default({}),
  limitations: z.record(actionKindSchema, tiersSchema).default({}),
});

export type PolicyConfig = z.input<typeof policyConfigSchema>;

/**
 * Static lookup of who may do what, and how often. Pure and immutable once built, so it is
 * shared freely between the quota authority and the HTTP layer.
 */
export class PolicyTable {
  readonly confirmedUserThreshold: number;
  private readonly minRep: MinReputationTable;
  private readonly limits: QuotaTable;

  constructor(config: PolicyConfig = {}) {
    const parsed = policyConfigSchema.parse(config);
    this.confirmedUserThreshold = parsed.confirmedUserThreshold;
    this.minRep = Object.freeze({ ...MIN_REPUTATIONS, ...parsed.minReputations });
    const limits: Record<ActionKind, QuotaTiers> = { ...LIMITATIONS, ...parsed.limitations };
    for (const action of ACTION_KINDS) limits[action] = Object.freeze([...limits[action]]);
    this.limits = Object.freeze(limits);
  }

  tierIndex(reputation: number): TierIndex {
    if (reputation > this.confirmedUserThreshold) return 2;
    if (reputation >= 0) return 1;
    return 0;
  }

  minReputation(action: string): number | undefined {
    return isActionKind(action) ? this.minRep[action] : undefined;
  }

  /** Quota for `user` on `action` in the current period. Throws on an unknown action. */
  limit(user: Pick<User, "reputation">, action: string): number {
    if (!isActionKind(action)) throw new PermissionsError("unknown_action");
    return this.limits[action][this.tierIndex(user.reputation)];
  }

  limitations(): QuotaTable {
    return this.limits;
  }

  minReputations(): MinReputationTable {
    return this.minRep;
  }
}

export const defaultPolicy = new PolicyTable();
