import type { Logger, User, UserId } from "../../shared/src";
import { createLogger } from "../../shared/src";
import type { UserLoader } from "../../users/src";
import { PermissionsError, QUOTA_ERROR_MESSAGES, type QuotaErrorCode } from "./errors";
import { SerialQueue } from "./mutex";
import { type ActionKind, type PolicyTable, defaultPolicy, isActionKind } from "./policy";

export type QuotaSubject = User | UserId;

export type QuotaFailure = { ok: false; error: QuotaErrorCode; reason: string };

export type QuotaCheck = { ok: true } | QuotaFailure;

export type QuotaResult<T> = { ok: true; value: T } | QuotaFailure | { ok: false; error: "effect_failed"; cause: unknown };

export type QuotaEffect<T> = (user: User) => T | Promise<T>;

type UsageState = Map<UserId, Map<ActionKind, number>>;

export type QuotaAuthorityDeps = {
  users: UserLoader;
  policy?: PolicyTable;
  logger?: Logger;
};

const denied = (error: QuotaErrorCode): QuotaFailure => ({ ok: false, error, reason: QUOTA_ERROR_MESSAGES[error] });

/**
 * Tracks how many times each user performed each action during the current period and
 * decides whether they may do it again.
 *
 * One instance is built at process start and injected wherever a mutating user action is
 * handled. Its counters live only in memory: `reset()` empties them once per period (see
 * `DailyResetScheduler`), and a restart starts from zero.
 *
 * Every operation touching the counters goes through a single FIFO queue. `checkAndExecute`
 * holds that queue for the whole check, effect and record sequence, so an effect that never
 * settles stalls every other quota operation in the process. Keep effects short.
 */
export class QuotaAuthority {
  private state: UsageState = new Map();
  private readonly queue = new SerialQueue();
  private readonly users: UserLoader;
  readonly policy: PolicyTable;
  private readonly logger: Logger;

  constructor(deps: QuotaAuthorityDeps) {
    this.users = deps.users;
    this.policy = deps.policy ?? defaultPolicy;
    this.logger = deps.logger ?? createLogger("quota-authority");
    this.logger.info("user permissions and limitations tracker started");
  }

  async check(subject: QuotaSubject, action: string): Promise<QuotaCheck> {
    if (!isActionKind(action)) return denied("unknown_action");
    const user = await this.resolve(subject);
    return this.queue.run((): QuotaCheck => {
      const refused = this.refusal(user, action);
      return refused ? denied(refused) : { ok: true };
    });
  }

  /**
   * Counts one occurrence without looking at reputation or limits. Only for call sites that
   * already checked, or where a slightly exceeded quota is harmless; use `checkAndExecute`
   * everywhere else.
   */
  async record(subject: QuotaSubject, action: string): Promise<void> {
    if (!isActionKind(action)) throw new PermissionsError("unknown_action");
    const user = await this.resolve(subject);
    await this.queue.run(() => this.increment(user.id, action));
  }

  async checkAndExecute<T>(subject: QuotaSubject, action: string, effect: QuotaEffect<T>): Promise<QuotaResult<T>> {
    if (!isActionKind(action)) return denied("unknown_action");
    const user = await this.resolve(subject);
    return this.queue.run(async (): Promise<QuotaResult<T>> => {
      const refused = this.refusal(user, action);
      if (refused) return denied(refused);

      let value: T;
      try {
        value = await effect(user);
      } catch (cause) {
        this.logger.warn({ userId: user.id, action, err: cause }, "quota effect failed, nothing recorded");
        return { ok: false, error: "effect_failed", cause };
      }
      this.increment(user.id, action);
      return { ok: true, value };
    });
  }

  /**
   * Same as `checkAndExecute` but throws: a `PermissionsError` when the action is refused,
   * or whatever the effect threw, untouched.
   */
  async lock<T>(subject: QuotaSubject, action: string, effect: QuotaEffect<T>): Promise<T> {
    const result = await this.checkAndExecute(subject, action, effect);
    if (result.ok) return result.value;
    if (result.error === "effect_failed") throw result.cause;
    throw new PermissionsError(result.error);
  }

  occurrences(subject: QuotaSubject, action: string): number {
    const userId = typeof subject === "number" ? subject : subject.id;
    if (!isActionKind(action)) return 0;
    return this.state.get(userId)?.get(action) ?? 0;
  }

  async remaining(subject: QuotaSubject, action: string): Promise<number> {
    if (!isActionKind(action)) return 0;
    const user = await this.resolve(subject);
    if (user.reputation < this.policy.minReputations()[action]) return 0;
    return Math.max(this.policy.limit(user, action) - this.occurrences(user, action), 0);
  }

  usage(userId: UserId): Partial<Record<ActionKind, number>> {
    const counts: Partial<Record<ActionKind, number>> = {};
    for (const [action, count] of this.state.get(userId) ?? []) counts[action] = count;
    return counts;
  }

  /** Forgets every counter. Meant for the once-per-period scheduler only. */
  async reset(): Promise<void> {
    await this.queue.run(() => {
      this.logger.info({ users: this.state.size }, "resetting today's quotas");
      this.state = new Map();
    });
  }

  private async resolve(subject: QuotaSubject): Promise<User> {
    return typeof subject === "number" ? this.users.loadById(subject) : subject;
  }

  private refusal(user: User, action: ActionKind): QuotaErrorCode | null {
    if (user.reputation < this.policy.minReputations()[action]) return "insufficient_reputation";
    if (this.occurrences(user, action) >= this.policy.limit(user, action)) return "limit_reached";
    return null;
  }

  private increment(userId: UserId, action: ActionKind): void {
    let actions = this.state.get(userId);
    if (!actions) {
      actions = new Map();
      this.state.set(userId, actions);
    }
    actions.set(action, (actions.get(action) ?? 0) + 1);
  }
}
