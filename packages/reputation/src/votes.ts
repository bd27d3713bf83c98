import type { VoteDirection, VoteEntity, VoteType } from "./types";

export type VotedComment = {
  /** Comments with a source are facts. */
  sourceId?: number | null;
};

export const voteEntity = (comment: VotedComment): VoteEntity => (comment.sourceId ? "fact" : "comment");

/**
 * Direction of a vote moving from `previous` (null when the user never voted) to `value`.
 * A vote taken back counts as going the opposite way.
 */
export const getVoteDirection = (previous: number | null, value: number): VoteDirection => {
  if (previous === null || previous === 0 || value === 0) {
    return value > (previous ?? 0) ? "up" : "down";
  }
  return previous < value ? "down_to_up" : "up_to_down";
};

/**
 * Classifies a vote change, e.g. `comment_vote_up` or `fact_vote_up_to_down`.
 * Returns null when nothing changes.
 */
export const getVoteType = (comment: VotedComment, previous: number | null, value: number): VoteType | null => {
  if (previous === null && value === 0) return null;
  if (previous === value) return null;
  return `${voteEntity(comment)}_vote_${getVoteDirection(previous, value)}`;
};
