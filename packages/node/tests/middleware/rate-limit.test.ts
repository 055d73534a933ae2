/**
 * Tests for rate-limit middleware.
 *
 * Fixed window per client IP, counted before the session layer.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

const WINDOW_MS = 60_000;

function limited(): TestApp {
  return createTestApp({ rateLimit: { limit: 2, windowMs: WINDOW_MS } });
}

async function me(t: TestApp, headers: Record<string, string> = {}): Promise<Response> {
  return await t.app.request("/api/v1/auth/me", { headers });
}

describe("rateLimitMiddleware", () => {
  it("admits `limit` requests with rate-limit headers", async () => {
    const t = limited();

    const first = await me(t);
    expect(first.status).toBe(401);
    expect(first.headers.get("X-RateLimit-Limit")).toBe("2");
    expect(first.headers.get("X-RateLimit-Remaining")).toBe("1");

    const second = await me(t);
    expect(second.status).toBe(401);
    expect(second.headers.get("X-RateLimit-Remaining")).toBe("0");
  });

  it("returns 429 with Retry-After once the limit is exceeded", async () => {
    const t = limited();
    await me(t);
    await me(t);
    t.clock.advance(15_000);

    const res = await me(t);
    expect(res.status).toBe(429);
    expect(res.headers.get("Retry-After")).toBe("45");
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "RATE_LIMITED",
      message: "Rate limit exceeded. Retry after 45 seconds.",
    });
  });

  it("never reaches the session layer for a refused request", async () => {
    const t = limited();
    await me(t);
    await me(t);
    await me(t);

    expect(t.logs.filter((l) => l.msg === "Session rejected")).toHaveLength(2);
    expect(t.logs.filter((l) => l.msg === "Rate limit exceeded")).toHaveLength(1);
  });

  it("opens a new window after the old one expires", async () => {
    const t = limited();
    await me(t);
    await me(t);
    expect((await me(t)).status).toBe(429);

    t.clock.advance(WINDOW_MS);
    const res = await me(t);
    expect(res.status).toBe(401);
    expect(res.headers.get("X-RateLimit-Remaining")).toBe("1");
  });

  it("counts each client IP separately", async () => {
    const t = limited();
    const a = { "X-Forwarded-For": "203.0.113.10" };
    await me(t, a);
    await me(t, a);
    expect((await me(t, a)).status).toBe(429);

    const b = await me(t, { "X-Forwarded-For": "203.0.113.11" });
    expect(b.status).toBe(401);
  });

  it("does not limit health checks", async () => {
    const t = limited();
    for (let i = 0; i < 3; i++) {
      expect((await t.app.request("/health")).status).toBe(200);
    }
  });

  it("returns 500 when the counter store fails", async () => {
    const t = limited();
    t.counters.available = false;

    const res = await me(t);
    expect(res.status).toBe(500);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });

    const line = t.logs.find((l) => l.msg === "Rate limit store unavailable");
    expect(line?.level).toBe(50);
    expect(line?.["clientIp"]).toBe("198.51.100.7");
  });
});
