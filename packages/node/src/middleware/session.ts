/**
 * Session middleware.
 *
 * Resolves the access/refresh cookie pair into a user. On the refresh
 * path both cookies are rewritten before the handler runs. Rejections
 * short-circuit with the resolver's status and code.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { SessionResolver } from "@murmur/session";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import {
  readSessionCookies,
  writeSessionCookies,
} from "../services/session-cookies.js";
import type { CookieSettings } from "../services/session-cookies.js";

export function sessionMiddleware(
  resolver: SessionResolver,
  cookies: CookieSettings,
  logger: Logger,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const outcome = await resolver.resolve(readSessionCookies(c));
    const requestId = c.get("requestId");

    if (outcome.kind === "rejected") {
      if (outcome.status === 500) {
        logger.error({ requestId, err: outcome.cause }, "Session lookup failed");
        return c.json(
          createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
          500,
        );
      }
      logger.warn(
        { requestId, clientIp: c.get("clientIp"), code: outcome.code },
        "Session rejected",
      );
      return c.json(createErrorEnvelope(outcome.code, outcome.message), outcome.status);
    }

    if (outcome.rotated !== undefined) {
      writeSessionCookies(c, outcome.rotated, cookies);
      logger.debug({ requestId, userId: outcome.user.id }, "Session tokens rotated");
    }

    c.set("user", outcome.user);
    await next();
  };
}
