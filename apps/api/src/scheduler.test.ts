import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DailyResetScheduler, msUntilNextReset } from "./scheduler";

describe("msUntilNextReset", () => {
  it("waits for the same day when the hour is still ahead", () => {
    expect(msUntilNextReset(new Date("2024-03-10T22:30:00.000Z"), 23)).toBe(30 * 60 * 1000);
  });

  it("rolls over to the next day once the hour has passed", () => {
    expect(msUntilNextReset(new Date("2024-03-10T23:59:00.000Z"), 0)).toBe(60 * 1000);
    expect(msUntilNextReset(new Date("2024-03-11T00:00:00.000Z"), 0)).toBe(24 * 60 * 60 * 1000);
  });
});

describe("DailyResetScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-10T23:59:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resets at midnight UTC and schedules the next day", async () => {
    const authority = { reset: vi.fn(async () => {}) };
    const scheduler = new DailyResetScheduler({ authority });
    scheduler.start();
    expect(scheduler.nextRunAt?.toISOString()).toBe("2024-03-11T00:00:00.000Z");

    await vi.advanceTimersByTimeAsync(59_999);
    expect(authority.reset).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(authority.reset).toHaveBeenCalledTimes(1);
    expect(scheduler.nextRunAt?.toISOString()).toBe("2024-03-12T00:00:00.000Z");

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(authority.reset).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it("keeps scheduling after a failed reset", async () => {
    const authority = { reset: vi.fn(async () => Promise.reject(new Error("boom"))) };
    const scheduler = new DailyResetScheduler({ authority, hourUtc: 0 });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(authority.reset).toHaveBeenCalledTimes(1);
    expect(scheduler.nextRunAt?.toISOString()).toBe("2024-03-12T00:00:00.000Z");
    scheduler.stop();
  });

  it("keeps a single timer when restarted during a reset", async () => {
    let release = () => {};
    const authority = {
      reset: vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      ),
    };
    const scheduler = new DailyResetScheduler({ authority });
    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(authority.reset).toHaveBeenCalledTimes(1);

    scheduler.stop();
    scheduler.start();
    release();
    await vi.advanceTimersByTimeAsync(0);

    expect(vi.getTimerCount()).toBe(1);
    scheduler.stop();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does nothing once stopped", async () => {
    const authority = { reset: vi.fn(async () => {}) };
    const scheduler = new DailyResetScheduler({ authority });
    scheduler.start();
    scheduler.stop();
    expect(scheduler.nextRunAt).toBeNull();

    await vi.advanceTimersByTimeAsync(2 * 24 * 60 * 60 * 1000);
    expect(authority.reset).not.toHaveBeenCalled();
  });
});
