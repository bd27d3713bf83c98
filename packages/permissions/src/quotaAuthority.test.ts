import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryUserRepository, UserNotFoundError } from "../../users/src";
import { PermissionsError, PolicyTable, QuotaAuthority } from "./index";

const user = { id: 1, reputation: 42 };

describe("QuotaAuthority", () => {
  let users: InMemoryUserRepository;
  let authority: QuotaAuthority;

  beforeEach(() => {
    users = new InMemoryUserRepository([user, { id: 2, reputation: -42 }, { id: 3, reputation: 20 }]);
    authority = new QuotaAuthority({ users });
  });

  describe("check", () => {
    it("allows a qualified user under quota", async () => {
      await expect(authority.check(user, "add_comment")).resolves.toEqual({ ok: true });
    });

    it("refuses unknown actions whoever asks", async () => {
      const expected = { ok: false, error: "unknown_action", reason: "unknown action" };
      await expect(authority.check(user, "eat_unicorn")).resolves.toEqual(expected);
      await expect(authority.check({ id: 9, reputation: 10_000 }, "eat_unicorn")).resolves.toEqual(expected);
      // the action is rejected before the user is looked up
      await expect(authority.check(404, "eat_unicorn")).resolves.toEqual(expected);
    });

    it("refuses users below the action's reputation floor", async () => {
      await expect(authority.check({ ...user, reputation: -42 }, "remove_statement")).resolves.toEqual({
        ok: false,
        error: "insufficient_reputation",
        reason: "not enough reputation",
      });
      await expect(authority.check({ id: 4, reputation: 79 }, "vote_down")).resolves.toMatchObject({
        error: "insufficient_reputation",
      });
    });

    it("refuses once the tier quota is used up", async () => {
      await expect(authority.check(user, "flag_comment")).resolves.toEqual({ ok: true });
      await authority.record(user, "flag_comment");
      await expect(authority.check(user, "flag_comment")).resolves.toEqual({
        ok: false,
        error: "limit_reached",
        reason: "limit reached",
      });
    });

    it("does not count anything itself", async () => {
      await authority.check(user, "add_comment");
      await authority.check(user, "add_comment");
      expect(authority.occurrences(user, "add_comment")).toBe(0);
    });

    it("counts per user and per action", async () => {
      await authority.record(user, "flag_comment");
      await expect(authority.check(user, "flag_history_action")).resolves.toEqual({ ok: true });
      await expect(authority.check({ id: 5, reputation: 42 }, "flag_comment")).resolves.toEqual({ ok: true });
    });
  });

  describe("record", () => {
    it("increments without enforcing limits", async () => {
      for (let i = 0; i < 6; i++) await authority.record(user, "flag_comment");
      expect(authority.occurrences(user, "flag_comment")).toBe(6);
      await expect(authority.check(user, "flag_comment")).resolves.toMatchObject({ error: "limit_reached" });
    });

    it("rejects unknown actions", async () => {
      await expect(authority.record(user, "eat_unicorn")).rejects.toBeInstanceOf(PermissionsError);
    });
  });

  describe("reset", () => {
    it("forgets every counter", async () => {
      await authority.record(user, "flag_comment");
      await authority.record(3, "add_video");
      await authority.reset();
      expect(authority.occurrences(user, "flag_comment")).toBe(0);
      expect(authority.usage(3)).toEqual({});
      await expect(authority.check(user, "flag_comment")).resolves.toEqual({ ok: true });
    });

    it("is idempotent under concurrent calls", async () => {
      await authority.record(user, "add_comment");
      await Promise.all([authority.reset(), authority.reset(), authority.reset()]);
      expect(authority.usage(user.id)).toEqual({});
    });
  });

  describe("checkAndExecute", () => {
    it("runs the effect with the resolved user and records on success", async () => {
      const effect = vi.fn(async (u: { id: number }) => `comment by ${u.id}`);
      const result = await authority.checkAndExecute(1, "add_comment", effect);

      expect(result).toEqual({ ok: true, value: "comment by 1" });
      expect(effect).toHaveBeenCalledWith(user);
      expect(authority.occurrences(user, "add_comment")).toBe(1);
    });

    it("accepts synchronous effects", async () => {
      await expect(authority.checkAndExecute(user, "add_statement", () => 7)).resolves.toEqual({ ok: true, value: 7 });
      expect(authority.occurrences(user, "add_statement")).toBe(1);
    });

    it("never calls the effect when refused", async () => {
      const effect = vi.fn(() => "never");
      const result = await authority.checkAndExecute(2, "remove_statement", effect);

      expect(result).toEqual({ ok: false, error: "insufficient_reputation", reason: "not enough reputation" });
      expect(effect).not.toHaveBeenCalled();
      expect(authority.usage(2)).toEqual({});
    });

    it("records nothing when the effect throws", async () => {
      const failure = new Error("db down");
      await authority.record(user, "add_comment");

      const result = await authority.checkAndExecute(user, "add_comment", () => {
        throw failure;
      });

      expect(result).toEqual({ ok: false, error: "effect_failed", cause: failure });
      expect(authority.occurrences(user, "add_comment")).toBe(1);
    });

    it("records nothing when an async effect rejects, and keeps serving", async () => {
      const result = await authority.checkAndExecute(user, "flag_comment", async () => {
        throw new Error("rejected");
      });
      expect(result).toMatchObject({ ok: false, error: "effect_failed" });
      expect(authority.occurrences(user, "flag_comment")).toBe(0);

      await expect(authority.checkAndExecute(user, "flag_comment", () => "ok")).resolves.toEqual({
        ok: true,
        value: "ok",
      });
    });

    it("grants exactly one of many concurrent calls when one slot is left", async () => {
      let effects = 0;
      const attempt = () =>
        authority.checkAndExecute(user, "flag_comment", async () => {
          await new Promise((r) => setTimeout(r, 2));
          effects += 1;
          return effects;
        });

      const results = await Promise.all([attempt(), attempt(), attempt(), attempt(), attempt()]);

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.filter((r) => !r.ok && r.error === "limit_reached")).toHaveLength(4);
      expect(effects).toBe(1);
      expect(authority.occurrences(user, "flag_comment")).toBe(1);
    });

    it("never grants more than the remaining slots", async () => {
      // reputation 20 gives a new-user quota of 3 videos
      await authority.record(3, "add_video");
      const results = await Promise.all(
        Array.from({ length: 6 }, () => authority.checkAndExecute(3, "add_video", async () => "video"))
      );
      expect(results.filter((r) => r.ok)).toHaveLength(2);
      expect(authority.occurrences(3, "add_video")).toBe(3);
    });

    it("holds other quota operations until the effect settles", async () => {
      let release = () => {};
      const gate = new Promise<void>((r) => {
        release = r;
      });
      const running = authority.checkAndExecute(user, "flag_comment", () => gate);
      const queuedCheck = authority.check(user, "flag_comment");

      let checked = false;
      void queuedCheck.then(() => {
        checked = true;
      });
      await new Promise((r) => setTimeout(r, 5));
      expect(checked).toBe(false);

      release();
      await expect(running).resolves.toMatchObject({ ok: true });
      await expect(queuedCheck).resolves.toMatchObject({ ok: false, error: "limit_reached" });
    });

    it("surfaces unknown users separately from quota errors", async () => {
      await expect(authority.checkAndExecute(404, "add_comment", () => 1)).rejects.toBeInstanceOf(UserNotFoundError);
      await expect(authority.check(404, "add_comment")).rejects.toBeInstanceOf(UserNotFoundError);
    });
  });

  describe("lock", () => {
    it("returns the effect's value", async () => {
      await expect(authority.lock(user, "vote_up", () => "voted")).resolves.toBe("voted");
      expect(authority.occurrences(user, "vote_up")).toBe(1);
    });

    it("throws PermissionsError with the refusal reason", async () => {
      const err = await authority.lock(user, "vote_down", () => "nope").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(PermissionsError);
      expect(err).toMatchObject({ code: "insufficient_reputation", message: "not enough reputation" });
    });

    it("rethrows the effect's own error untouched", async () => {
      const failure = new TypeError("bad payload");
      await expect(
        authority.lock(user, "add_comment", () => {
          throw failure;
        })
      ).rejects.toBe(failure);
      expect(authority.occurrences(user, "add_comment")).toBe(0);
    });
  });

  describe("remaining and usage", () => {
    it("reports what is left of the quota", async () => {
      await authority.record(user, "add_comment");
      await authority.record(user, "add_comment");
      await expect(authority.remaining(user, "add_comment")).resolves.toBe(8);
      await expect(authority.remaining(2, "add_video")).resolves.toBe(0);
      await expect(authority.remaining(user, "eat_unicorn")).resolves.toBe(0);
    });

    it("snapshots one user's counters", async () => {
      await authority.record(user, "add_comment");
      await authority.record(user, "vote_up");
      await authority.record(user, "vote_up");
      expect(authority.usage(user.id)).toEqual({ add_comment: 1, vote_up: 2 });
      expect(authority.occurrences(user, "eat_unicorn")).toBe(0);
    });
  });

  it("uses the injected policy", async () => {
    const strict = new QuotaAuthority({
      users,
      policy: new PolicyTable({ limitations: { add_comment: [0, 1, 1] } }),
    });
    await strict.record(user, "add_comment");
    await expect(strict.check(user, "add_comment")).resolves.toMatchObject({ error: "limit_reached" });
  });
});
