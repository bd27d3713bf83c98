export const VOTE_ENTITIES = ["comment", "fact"] as const;
export type VoteEntity = (typeof VOTE_ENTITIES)[number];

export const VOTE_DIRECTIONS = ["up", "down", "down_to_up", "up_to_down"] as const;
export type VoteDirection = (typeof VOTE_DIRECTIONS)[number];

export type VoteType = `${VoteEntity}_vote_${VoteDirection}`;

export const REPUTATION_ACTION_TYPES = [
  "vote_up",
  "vote_down",
  "vote_down_to_up",
  "vote_up_to_down",
  "email_confirmed",
  "abused_flag",
  "confirmed_flag",
] as const;
export type ReputationActionType = (typeof REPUTATION_ACTION_TYPES)[number];

/** Reputation gained (or lost) by the user acting, and by the user acted upon. */
export type ReputationChange = {
  self: number;
  target: number;
};

export type ReputationChangeEntry = ReputationChange | Partial<Record<VoteEntity, ReputationChange>>;

export type ReputationChangeTable = Partial<Record<ReputationActionType, ReputationChangeEntry>>;

export const NO_CHANGE: ReputationChange = { self: 0, target: 0 };
