/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { User } from "@murmur/types";

/**
 * Hono environment type for the Murmur app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Derived client address (set by real-IP middleware) */
    clientIp: string;

    /** Authenticated account (set by session middleware) */
    user: User;
  };
}

/**
 * Success body shape shared by all non-error responses.
 */
export interface ApiResponse<T> {
  readonly message: string;
  readonly data?: T;
}
