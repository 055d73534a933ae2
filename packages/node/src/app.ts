/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 *
 * Pipeline: request-id → request log → real-IP → rate limit (/api/*)
 * → deadline → session (per route) → handler.
 */

import { Hono } from "hono";
import { timeout } from "hono/timeout";
import pino from "pino";
import type { Logger } from "pino";
import {
  RateLimiter,
  SessionResolver,
  TokenService,
} from "@murmur/session";
import type {
  CounterStore,
  RateLimiterConfig,
  TokenSecrets,
} from "@murmur/session";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { realIpMiddleware } from "./middleware/real-ip.js";
import type { PeerAddress } from "./middleware/real-ip.js";
import { rateLimitMiddleware } from "./middleware/rate-limit.js";
import { sessionMiddleware } from "./middleware/session.js";
import { AccountService } from "./services/account-service.js";
import { ModerationService } from "./services/moderation-service.js";
import type { PasswordHasher } from "./services/passwords.js";
import type { Pingable, Store } from "./services/repositories.js";
import type { CookieSettings } from "./services/session-cookies.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAuthRoutes } from "./routes/auth.js";
import { createModerationRoutes } from "./routes/moderation.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Users, moderation and content repositories */
  readonly store: Store;
  /** Backing store for the per-IP counters */
  readonly counterStore: CounterStore & Pingable;
  readonly secrets: TokenSecrets;
  readonly passwords: PasswordHasher;
  /** Public origin for activation and reset links */
  readonly domain: string;
  readonly rateLimit: RateLimiterConfig;
  readonly cookies: CookieSettings;
  /** Per-request deadline. Default: 10000 */
  readonly requestTimeoutMs?: number | undefined;
  /** Default: a silent pino logger */
  readonly logger?: Logger | undefined;
  /** Socket peer lookup; defaults to @hono/node-server connection info */
  readonly peerAddress?: PeerAddress | undefined;
  /** Clock in epoch milliseconds. Default: Date.now */
  readonly now?: (() => number) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly tokens: TokenService;
  readonly resolver: SessionResolver;
  readonly limiter: RateLimiter;
  readonly accounts: AccountService;
  readonly moderation: ModerationService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const now = options.now ?? Date.now;
  const { store } = options;

  const tokens = new TokenService({ secrets: options.secrets, now });
  const resolver = new SessionResolver({ tokens, users: store, now });
  const limiter = new RateLimiter(options.counterStore, options.rateLimit);
  const accounts = new AccountService({
    users: store,
    tokens,
    resolver,
    passwords: options.passwords,
    domain: options.domain,
    now,
  });
  const moderation = new ModerationService({
    users: store,
    moderation: store,
    content: store,
    now,
  });
  const session = sessionMiddleware(resolver, options.cookies, logger);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));
  app.use("*", realIpMiddleware(options.peerAddress));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health Routes (no session, not rate limited) ───────────────
  app.route(
    "/",
    createHealthRoutes(
      [
        { name: "database", check: () => store.ping() },
        { name: "redis", check: () => options.counterStore.ping() },
      ],
      logger,
    ),
  );

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", rateLimitMiddleware(limiter, logger));
  app.use("/api/*", timeout(options.requestTimeoutMs ?? 10000));

  app.route(
    "/api/v1/auth",
    createAuthRoutes({ accounts, session, cookies: options.cookies, logger }),
  );
  app.route("/api/v1/action", createModerationRoutes({ moderation, session, logger }));

  return { app, tokens, resolver, limiter, accounts, moderation };
}
