import { describe, it, expect } from "vitest";
import type Redis from "ioredis";
import { InMemoryRateLimiter, RedisRateLimiter } from "./rateLimit";

class FakeRedis {
  store = new Map<string, { value: string; expireAt?: number }>();
  async get(key: string) {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expireAt && entry.expireAt < Date.now()) return null;
    return entry.value;
  }
  async incr(key: string) {
    const current = Number((await this.get(key)) ?? "0");
    const next = current + 1;
    this.store.set(key, { value: String(next), expireAt: this.store.get(key)?.expireAt });
    return next;
  }
  async expire(key: string, ttl: number) {
    const entry = this.store.get(key);
    if (entry) {
      entry.expireAt = Date.now() + ttl * 1000;
    }
    return 1;
  }
  async ttl(key: string) {
    const entry = this.store.get(key);
    if (!entry?.expireAt) return -1;
    return Math.ceil((entry.expireAt - Date.now()) / 1000);
  }
}

const fakeRedis = (): Redis => {
  const fake: unknown = new FakeRedis();
  // only incr/expire/ttl are used by the limiter
  return fake as Redis;
};

describe("RedisRateLimiter (fake)", () => {
  it("blocks after limit", async () => {
    const limiter = new RedisRateLimiter(fakeRedis(), 1, 1000);
    const first = await limiter.hit("rl:test");
    expect(first.allowed).toBe(true);
    const second = await limiter.hit("rl:test");
    expect(second).toEqual({ allowed: false, retryAfter: 1 });
  });

  it("counts keys separately", async () => {
    const limiter = new RedisRateLimiter(fakeRedis(), 1, 1000);
    await limiter.hit("rl:a");
    expect((await limiter.hit("rl:b")).allowed).toBe(true);
  });
});

describe("InMemoryRateLimiter", () => {
  it("blocks after limit until the window ends", async () => {
    let now = 1_000;
    const limiter = new InMemoryRateLimiter(2, 10_000, () => now);
    expect((await limiter.hit("k")).allowed).toBe(true);
    expect((await limiter.hit("k")).allowed).toBe(true);
    expect(await limiter.hit("k")).toEqual({ allowed: false, retryAfter: 10 });

    now += 10_000;
    expect((await limiter.hit("k")).allowed).toBe(true);
  });
});
