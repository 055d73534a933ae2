/**
 * Structured request logging.
 *
 * One pino line per request, at a level chosen by response status:
 * info below 400, warn for 4xx, error for 5xx.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly clientIp?: string | undefined;
  readonly userId?: string | undefined;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      clientIp: c.get("clientIp"),
      userId: c.get("user")?.id,
    };

    const line = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) logger.error(entry, line);
    else if (entry.status >= 400) logger.warn(entry, line);
    else logger.info(entry, line);
  };
}
