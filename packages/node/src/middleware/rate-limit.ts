/**
 * Rate limiting middleware: fixed window per client IP.
 *
 * Must run AFTER the real-IP middleware. Refused requests get 429 with
 * Retry-After and never reach the session layer. A counter-store
 * failure is a 500; requests are never admitted without a count.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { Admission, RateLimiter } from "@murmur/session";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function rateLimitMiddleware(
  limiter: RateLimiter,
  logger: Logger,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const clientIp = c.get("clientIp");

    let admission: Admission;
    try {
      admission = await limiter.admit(clientIp);
    } catch (err) {
      logger.error(
        { err, clientIp, requestId: c.get("requestId") },
        "Rate limit store unavailable",
      );
      return c.json(
        createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    if (!admission.allowed) {
      logger.warn(
        { clientIp, count: admission.count, retryAfterSeconds: admission.retryAfterSeconds },
        "Rate limit exceeded",
      );
      c.header("Retry-After", String(admission.retryAfterSeconds));
      return c.json(
        createErrorEnvelope(
          "RATE_LIMITED",
          `Rate limit exceeded. Retry after ${admission.retryAfterSeconds} seconds.`,
        ),
        429,
      );
    }

    c.header("X-RateLimit-Limit", String(admission.limit));
    c.header("X-RateLimit-Remaining", String(admission.remaining));
    await next();
  };
}
