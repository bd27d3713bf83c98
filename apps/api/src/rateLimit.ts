import type Redis from "ioredis";

export type RateLimitResult = { allowed: boolean; retryAfter?: number };

export interface RateLimiter {
  hit(key: string): Promise<RateLimitResult>;
}

export class RedisRateLimiter implements RateLimiter {
  constructor(private client: Redis, private limit: number, private windowMs: number) {}

  async hit(key: string): Promise<RateLimitResult> {
    const ttlSeconds = Math.ceil(this.windowMs / 1000);
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.expire(key, ttlSeconds);
    }
    if (count > this.limit) {
      const ttl = await this.client.ttl(key);
      return { allowed: false, retryAfter: ttl > 0 ? ttl : ttlSeconds };
    }
    return { allowed: true };
  }
}

// Per-process only; set REDIS_URL when several API instances sit behind one address.
export class InMemoryRateLimiter implements RateLimiter {
  private windows = new Map<string, { count: number; resetAt: number }>();

  constructor(private limit: number, private windowMs: number, private now: () => number = Date.now) {}

  async hit(key: string): Promise<RateLimitResult> {
    const now = this.now();
    const entry = this.windows.get(key);
    if (!entry || entry.resetAt <= now) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return { allowed: true };
    }
    entry.count += 1;
    if (entry.count > this.limit) {
      return { allowed: false, retryAfter: Math.ceil((entry.resetAt - now) / 1000) };
    }
    return { allowed: true };
  }
}
