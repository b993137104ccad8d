import type { Request, RequestHandler, Response } from "express";
import type { AppConfig, RateLimitConfig } from "../config";

export interface RateLimitWindow {
  hits: number;
  resetAt: number;
}

/** Fixed-window counters keyed by policy and caller. */
export interface RateLimitStore {
  hit(key: string, windowMs: number, nowMs: number): RateLimitWindow;
}

export interface RateLimitPolicy {
  name: string;
  limit: number;
  windowMs?: number;
}

export interface RateLimiterOptions {
  identify?: (req: Request) => string;
  now?: () => number;
}

const ONE_MINUTE_MS = 60_000;

const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  enabled: true,
  readPerMinute: 120,
  writePerMinute: 30
};

export function resolveRateLimitConfig(config: AppConfig): RateLimitConfig {
  const overrides = config.rateLimit ?? {};
  return {
    enabled: overrides.enabled ?? DEFAULT_RATE_LIMITS.enabled,
    readPerMinute: overrides.readPerMinute ?? DEFAULT_RATE_LIMITS.readPerMinute,
    writePerMinute: overrides.writePerMinute ?? DEFAULT_RATE_LIMITS.writePerMinute
  };
}

/** Signed-in callers are counted per user id, everyone else per client address. */
export function rateLimitIdentity(req: Request): string {
  const userId = (req.auth?.userId ?? req.header("x-user-id") ?? "").trim();
  if (userId.length > 0) {
    return `user:${userId}`;
  }

  return `ip:${req.ips[0] ?? req.ip ?? "unknown"}`;
}

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly buckets = new Map<string, RateLimitWindow>();
  private readonly capacity: number;

  constructor(capacity = 5_000) {
    this.capacity = Math.max(100, capacity);
  }

  hit(key: string, windowMs: number, nowMs: number): RateLimitWindow {
    let bucket = this.buckets.get(key);
    if (!bucket || bucket.resetAt <= nowMs) {
      if (!bucket) {
        this.makeRoom(nowMs);
      }
      bucket = { hits: 0, resetAt: nowMs + windowMs };
    }

    bucket.hits += 1;
    // Re-insert so iteration order tracks recency for eviction.
    this.buckets.delete(key);
    this.buckets.set(key, bucket);

    return { ...bucket };
  }

  get size(): number {
    return this.buckets.size;
  }

  private makeRoom(nowMs: number): void {
    if (this.buckets.size < this.capacity) {
      return;
    }

    for (const [key, bucket] of this.buckets) {
      if (bucket.resetAt <= nowMs) {
        this.buckets.delete(key);
      }
    }

    const keys = this.buckets.keys();
    while (this.buckets.size >= this.capacity) {
      const oldest = keys.next();
      if (oldest.done) {
        return;
      }
      this.buckets.delete(oldest.value);
    }
  }
}

function writeRateLimitHeaders(res: Response, limit: number, remaining: number, resetSeconds: number): void {
  res.setHeader("RateLimit-Limit", String(limit));
  res.setHeader("RateLimit-Remaining", String(remaining));
  res.setHeader("RateLimit-Reset", String(resetSeconds));
}

export function createRateLimiter(
  policy: RateLimitPolicy,
  store: RateLimitStore,
  options: RateLimiterOptions = {}
): RequestHandler {
  const windowMs = policy.windowMs ?? ONE_MINUTE_MS;
  const identify = options.identify ?? rateLimitIdentity;
  const now = options.now ?? Date.now;

  if (policy.limit <= 0) {
    return (_req, _res, next) => next();
  }

  return (req, res, next) => {
    const nowMs = now();
    const window = store.hit(`${policy.name}:${identify(req)}`, windowMs, nowMs);
    const resetSeconds = Math.max(1, Math.ceil((window.resetAt - nowMs) / 1000));

    writeRateLimitHeaders(res, policy.limit, Math.max(0, policy.limit - window.hits), resetSeconds);

    if (window.hits > policy.limit) {
      res.setHeader("Retry-After", String(resetSeconds));
      res.status(429).json({ error: "Too many requests" });
      return;
    }

    next();
  };
}
