// Per-client token-bucket rate limiting for the auth endpoints.
//
// Each client key gets a bucket that starts full (a burst of `capacity` is
// allowed after idle) and refills continuously at `capacity` tokens per
// window. Buckets live in a bounded cache: idle keys expire, and when the
// cache is full the least recently used key is dropped, so rotating source
// addresses can't grow memory without bound. A dropped key simply starts
// over with a full bucket.
//
// The key is whatever client address the ingress layer resolved. This module
// does not parse X-Forwarded-For chains; deciding which proxy to trust is the
// ingress layer's job.

import { getRateLimitEnv } from "./env";
import { RateLimitedError } from "./errors";
import { log } from "./log";

export const AUTH_REQUESTS_PER_MINUTE = 10;
export const MAX_TRACKED_CLIENTS = 10_000;
export const BUCKET_IDLE_MS = 2 * 60 * 1000;
const WINDOW_MS = 60 * 1000;

// ─── Token Bucket ───────────────────────────────────────

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly capacity: number,
    private readonly windowMs: number,
    now: number
  ) {
    this.tokens = capacity;
    this.lastRefill = now;
  }

  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.capacity) / this.windowMs);
    this.lastRefill = now;
  }

  tryConsume(now: number): boolean {
    this.refill(now);
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  /** Milliseconds until one whole token is available */
  msUntilToken(now: number): number {
    this.refill(now);
    if (this.tokens >= 1) return 0;
    return Math.ceil(((1 - this.tokens) * this.windowMs) / this.capacity);
  }

  available(now: number): number {
    this.refill(now);
    return Math.floor(this.tokens);
  }
}

// ─── Bounded Cache ──────────────────────────────────────

interface CacheEntry<V> {
  value: V;
  lastAccess: number;
}

/**
 * Map with a size cap and expire-after-access. Iteration order of the
 * underlying Map is access order (entries are re-inserted on every hit),
 * so the first entry is always the least recently used.
 */
export class BoundedCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly maxEntries: number,
    private readonly idleMs: number
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string, now: number): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    if (now - entry.lastAccess >= this.idleMs) return undefined;
    entry.lastAccess = now;
    this.entries.set(key, entry);
    return entry.value;
  }

  getOrCreate(key: string, now: number, create: () => V): V {
    const hit = this.get(key, now);
    if (hit !== undefined) return hit;

    this.evict(now);
    const value = create();
    this.entries.set(key, { value, lastAccess: now });
    return value;
  }

  private evict(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.lastAccess < this.idleMs) break;
      this.entries.delete(key);
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

// ─── Rate Limiter ───────────────────────────────────────

export interface RateLimiterOptions {
  capacity?: number;
  windowMs?: number;
  maxKeys?: number;
  idleMs?: number;
  now?: () => number;
}

export class RateLimiter {
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly buckets: BoundedCache<TokenBucket>;

  constructor(options: RateLimiterOptions = {}) {
    this.capacity = options.capacity ?? AUTH_REQUESTS_PER_MINUTE;
    this.windowMs = options.windowMs ?? WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.buckets = new BoundedCache(
      options.maxKeys ?? MAX_TRACKED_CLIENTS,
      options.idleMs ?? BUCKET_IDLE_MS
    );
  }

  get trackedKeys(): number {
    return this.buckets.size;
  }

  /** Spend one token for `key`. False when the bucket is empty. */
  tryConsume(key: string): boolean {
    const now = this.now();
    return this.bucket(key, now).tryConsume(now);
  }

  retryAfterSeconds(key: string): number {
    const now = this.now();
    return Math.max(1, Math.ceil(this.bucket(key, now).msUntilToken(now) / 1000));
  }

  private bucket(key: string, now: number): TokenBucket {
    return this.buckets.getOrCreate(key, now, () => new TokenBucket(this.capacity, this.windowMs, now));
  }
}

// ─── Request Guard ──────────────────────────────────────

/** Client address as resolved by the ingress layer, or "unknown" */
export function clientKey(req: Request, clientIpHeader: string): string {
  return req.headers.get(clientIpHeader)?.trim() || "unknown";
}

/**
 * Consume a token for the request's client or throw RateLimitedError.
 * Pre-flight (OPTIONS) requests pass through without consuming anything.
 */
export function guardRequest(limiter: RateLimiter, req: Request, clientIpHeader: string): void {
  if (req.method.toUpperCase() === "OPTIONS") return;

  const key = clientKey(req, clientIpHeader);
  if (limiter.tryConsume(key)) return;

  const retryAfterSeconds = limiter.retryAfterSeconds(key);
  log("warn", "rate_limited", {
    client: key,
    path: new URL(req.url).pathname,
    retryAfterSeconds,
  });
  throw new RateLimitedError(retryAfterSeconds);
}

declare global {
  var __habitlineAuthLimiter: RateLimiter | undefined;
}

export function getAuthRateLimiter(): RateLimiter {
  if (!globalThis.__habitlineAuthLimiter) {
    globalThis.__habitlineAuthLimiter = new RateLimiter({
      capacity: getRateLimitEnv().authPerMinute,
    });
  }
  return globalThis.__habitlineAuthLimiter;
}

/** Reset the process-wide auth limiter (tests) */
export function resetAuthRateLimiter(limiter?: RateLimiter): void {
  globalThis.__habitlineAuthLimiter = limiter;
}

/** Guard for /api/auth/register, /login and /refresh */
export function assertAuthRateLimit(req: Request): void {
  const env = getRateLimitEnv();
  if (!env.enabled) return;
  guardRequest(getAuthRateLimiter(), req, env.clientIpHeader);
}
