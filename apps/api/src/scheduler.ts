import { createLogger, type Logger } from "../../../packages/shared/src";
import type { QuotaAuthority } from "../../../packages/permissions/src";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Milliseconds from `now` until the next `hourUtc`:00 UTC, always in the future. */
export const msUntilNextReset = (now: Date, hourUtc: number): number => {
  const next = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hourUtc);
  return next > now.getTime() ? next - now.getTime() : next + DAY_MS - now.getTime();
};

type SchedulerDeps = {
  authority: Pick<QuotaAuthority, "reset">;
  hourUtc?: number;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Empties the quota counters once a day. The only caller of `QuotaAuthority.reset()` besides
 * the admin endpoint.
 */
export class DailyResetScheduler {
  private timer: NodeJS.Timeout | null = null;
  private nextRun: Date | null = null;
  private readonly hourUtc: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: SchedulerDeps) {
    this.hourUtc = deps.hourUtc ?? 0;
    this.logger = deps.logger ?? createLogger("reset-scheduler");
    this.now = deps.now ?? (() => new Date());
  }

  get nextRunAt(): Date | null {
    return this.nextRun;
  }

  start(): void {
    if (this.timer) return;
    this.schedule();
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.nextRun = null;
  }

  async runOnce(): Promise<void> {
    try {
      await this.deps.authority.reset();
      this.logger.info("daily quotas reset");
    } catch (err) {
      this.logger.error({ err }, "daily quota reset failed");
    }
  }

  private schedule(): void {
    const now = this.now();
    const delay = msUntilNextReset(now, this.hourUtc);
    this.nextRun = new Date(now.getTime() + delay);
    const timer = setTimeout(() => {
      void this.runOnce().then(() => {
        // stop() or a later start() may have replaced this timer while the reset ran
        if (this.timer === timer) this.schedule();
      });
    }, delay);
    timer.unref();
    this.timer = timer;
  }
}
