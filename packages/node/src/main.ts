/**
 * Entry point.
 *
 * Loads config, connects Postgres and Redis, applies the schema,
 * starts the HTTP server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { Redis } from "ioredis";
import pg from "pg";
import pino from "pino";
import { loadConfig, tokenSecrets } from "./config.js";
import { createApp } from "./app.js";
import { BcryptHasher } from "./services/passwords.js";
import { PostgresStore } from "./services/postgres-store.js";
import { RedisCounterStore } from "./services/redis-counter-store.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.NODE_ENV !== "production" && config.JWT_ACCESS_SECRET === undefined) {
    logger.warn("Token secrets not configured, using development placeholders");
  }

  const pool = new pg.Pool({ connectionString: config.DATABASE_URL });
  pool.on("error", (err) => {
    logger.error({ err }, "Idle Postgres client error");
  });

  const redis = new Redis(config.REDIS_URL, { maxRetriesPerRequest: 1 });
  redis.on("error", (err: Error) => {
    logger.error({ err }, "Redis connection error");
  });

  const store = new PostgresStore(pool);
  await store.migrate();
  logger.info("Database schema applied");

  const { app } = createApp({
    store,
    counterStore: new RedisCounterStore(redis),
    secrets: tokenSecrets(config),
    passwords: new BcryptHasher(config.BCRYPT_ROUNDS),
    domain: config.DOMAIN,
    rateLimit: {
      limit: config.RATE_LIMIT_MAX,
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      rearm: config.RATE_LIMIT_REARM,
    },
    cookies: { secure: config.COOKIE_SECURE },
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    logger,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Murmur API started");

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await Promise.all([pool.end(), redis.quit()]);
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
