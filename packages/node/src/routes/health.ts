/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe (pings the relational and counter stores)
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface HealthProbe {
  readonly name: string;
  /** Resolve when healthy; reject otherwise. The reason is logged, never returned. */
  check(): Promise<void>;
}

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(
  probes: readonly HealthProbe[],
  logger: Logger,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const results = await Promise.allSettled(probes.map((p) => p.check()));
    const subsystems: Record<string, SubsystemStatus> = {};
    let allReady = true;

    probes.forEach((probe, i) => {
      const result = results[i];
      if (result === undefined || result.status === "fulfilled") {
        subsystems[probe.name] = { status: "ok" };
        return;
      }
      allReady = false;
      subsystems[probe.name] = { status: "down", detail: "unreachable" };
      logger.warn({ subsystem: probe.name, err: result.reason }, "Readiness probe failed");
    });

    return c.json(
      {
        status: allReady ? "ready" : "not_ready",
        subsystems,
        timestamp: new Date().toISOString(),
      },
      allReady ? 200 : 503,
    );
  });

  return routes;
}
