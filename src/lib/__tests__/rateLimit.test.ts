import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { RateLimitedError } from "../errors";
import {
  assertAuthRateLimit,
  BoundedCache,
  clientKey,
  guardRequest,
  RateLimiter,
  resetAuthRateLimiter,
  TokenBucket,
} from "../rateLimit";

// ─── Test Helpers ─────────────────────────────────────────

function loginRequest(ip: string | null, method = "POST"): Request {
  const headers: Record<string, string> = {};
  if (ip !== null) headers["x-real-ip"] = ip;
  return new Request("http://localhost/api/auth/login", { method, headers });
}

function manualClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  resetAuthRateLimiter();
});

// ─── TokenBucket ──────────────────────────────────────────

describe("TokenBucket", () => {
  it("starts full and refills continuously", () => {
    const bucket = new TokenBucket(10, 60_000, 0);
    expect(bucket.available(0)).toBe(10);
    for (let i = 0; i < 10; i++) bucket.tryConsume(0);
    expect(bucket.tryConsume(0)).toBe(false);
    expect(bucket.msUntilToken(0)).toBe(6000);
    expect(bucket.available(30_000)).toBe(5);
  });

  it("never holds more than its capacity", () => {
    const bucket = new TokenBucket(3, 60_000, 0);
    expect(bucket.available(10 * 60_000)).toBe(3);
  });
});

// ─── guardRequest ─────────────────────────────────────────

describe("guardRequest", () => {
  it("allows ten logins per minute per client and rejects the eleventh", () => {
    const limiter = new RateLimiter({ capacity: 10, now: () => 0 });
    const blocked = loginRequest("192.168.1.2");

    for (let i = 0; i < 5; i++) guardRequest(limiter, blocked, "x-real-ip");
    expect(() => guardRequest(limiter, loginRequest("192.168.1.3"), "x-real-ip")).not.toThrow();
    for (let i = 0; i < 5; i++) guardRequest(limiter, blocked, "x-real-ip");

    let error: unknown;
    try {
      guardRequest(limiter, blocked, "x-real-ip");
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ status: 429, code: "RATE_LIMITED", retryAfterSeconds: 6 });
  });

  it("logs the rejected client", () => {
    const limiter = new RateLimiter({ capacity: 1, now: () => 0 });
    guardRequest(limiter, loginRequest("10.0.0.9"), "x-real-ip");
    expect(() => guardRequest(limiter, loginRequest("10.0.0.9"), "x-real-ip")).toThrow(RateLimitedError);

    const warn = vi.mocked(console.warn);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      event: "rate_limited",
      client: "10.0.0.9",
      path: "/api/auth/login",
    });
  });

  it("admits one more request once a token has refilled", () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ capacity: 10, now: clock.now });
    const req = loginRequest("192.168.1.2");

    for (let i = 0; i < 10; i++) guardRequest(limiter, req, "x-real-ip");
    expect(() => guardRequest(limiter, req, "x-real-ip")).toThrow(RateLimitedError);

    clock.advance(6000);
    expect(() => guardRequest(limiter, req, "x-real-ip")).not.toThrow();
    expect(() => guardRequest(limiter, req, "x-real-ip")).toThrow(RateLimitedError);
  });

  it("lets pre-flight requests through without spending tokens", () => {
    const limiter = new RateLimiter({ capacity: 1, now: () => 0 });
    for (let i = 0; i < 5; i++) {
      guardRequest(limiter, loginRequest("192.168.1.2", "OPTIONS"), "x-real-ip");
    }
    expect(() => guardRequest(limiter, loginRequest("192.168.1.2"), "x-real-ip")).not.toThrow();
  });
});

describe("clientKey", () => {
  it("reads the configured header, trimmed", () => {
    expect(clientKey(loginRequest(" 192.168.1.2 "), "x-real-ip")).toBe("192.168.1.2");
  });

  it("falls back to a shared key when the header is absent", () => {
    expect(clientKey(loginRequest(null), "x-real-ip")).toBe("unknown");
  });
});

// ─── RateLimiter memory bounds ────────────────────────────

describe("RateLimiter", () => {
  it("never tracks more than maxKeys clients", () => {
    const limiter = new RateLimiter({ capacity: 1, maxKeys: 2, now: () => 0 });
    for (const ip of ["a", "b", "c", "d", "e"]) limiter.tryConsume(ip);
    expect(limiter.trackedKeys).toBe(2);
  });

  it("gives an idle client a fresh bucket", () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ capacity: 1, windowMs: 10 * 60_000, idleMs: 1000, now: clock.now });
    expect(limiter.tryConsume("a")).toBe(true);
    expect(limiter.tryConsume("a")).toBe(false);
    clock.advance(1000);
    expect(limiter.tryConsume("a")).toBe(true);
  });

  it("reports at least one second to wait", () => {
    const limiter = new RateLimiter({ capacity: 1000, now: () => 0 });
    for (let i = 0; i < 1000; i++) limiter.tryConsume("a");
    expect(limiter.retryAfterSeconds("a")).toBe(1);
  });
});

describe("BoundedCache", () => {
  it("expires entries idle for the full window", () => {
    const cache = new BoundedCache<number>(10, 1000);
    cache.getOrCreate("a", 0, () => 1);
    expect(cache.get("a", 999)).toBe(1);
    expect(cache.get("a", 1998)).toBe(1);
    expect(cache.get("a", 2998)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("drops idle entries before creating a new one", () => {
    const cache = new BoundedCache<number>(10, 100);
    cache.getOrCreate("a", 0, () => 1);
    cache.getOrCreate("b", 50, () => 2);
    cache.getOrCreate("c", 120, () => 3);
    expect(cache.size).toBe(2);
    expect(cache.get("b", 120)).toBe(2);
  });

  it("evicts the least recently used entry when full", () => {
    const cache = new BoundedCache<number>(2, 10_000);
    cache.getOrCreate("a", 0, () => 1);
    cache.getOrCreate("b", 1, () => 2);
    cache.get("a", 2);
    cache.getOrCreate("c", 3, () => 3);
    expect(cache.get("b", 4)).toBeUndefined();
    expect(cache.get("a", 4)).toBe(1);
    expect(cache.get("c", 4)).toBe(3);
  });
});

// ─── assertAuthRateLimit ──────────────────────────────────

describe("assertAuthRateLimit", () => {
  it("uses the process-wide limiter", () => {
    resetAuthRateLimiter(new RateLimiter({ capacity: 1, now: () => 0 }));
    expect(() => assertAuthRateLimit(loginRequest("192.168.1.2"))).not.toThrow();
    expect(() => assertAuthRateLimit(loginRequest("192.168.1.2"))).toThrow(RateLimitedError);
  });
});
