/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors (AccountError, ModerationError, RepositoryError,
 * ValidationError) carry a `code`; STATUS_MAP turns it into an HTTP
 * status. Anything unmapped is a 500 whose message is never exposed.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Request shape
  VALIDATION_ERROR: 400,

  // Account flows
  NOT_LOGGED_IN: 400,
  INVALID_CREDENTIALS: 401,
  INVALID_OR_EXPIRED_TOKEN: 401,
  ACCOUNT_NOT_ACTIVATED: 403,
  USER_ALREADY_EXISTS: 409,
  ALREADY_ACTIVE: 409,

  // Moderation
  NOT_FOUND: 404,
  INSUFFICIENT_PERMISSIONS: 403,
  MODERATOR_CANNOT_ACT_ON_PEER: 403,
  ADMIN_CANNOT_ACT_ON_ADMIN: 403,

  // Storage (a duplicate that escapes the account flows is still a conflict)
  DUPLICATE_USER: 409,
};

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function detailsOf(err: Error): Record<string, unknown> | undefined {
  return "issues" in err && Array.isArray(err.issues)
    ? { issues: err.issues }
    : undefined;
}

/**
 * Statuses raised by Hono itself: malformed JSON bodies and the
 * request deadline.
 */
const HTTP_EXCEPTION_MAP: Readonly<
  Record<number, { code: string; status: ContentfulStatusCode }>
> = {
  400: { code: "VALIDATION_ERROR", status: 400 },
  413: { code: "HTTP_ERROR", status: 413 },
  504: { code: "REQUEST_TIMEOUT", status: 504 },
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    const requestId = c.get("requestId");

    if (err instanceof HTTPException) {
      const mapped = HTTP_EXCEPTION_MAP[err.status];
      if (mapped !== undefined) {
        logger.warn({ requestId, status: mapped.status, code: mapped.code }, err.message);
        return c.json(createErrorEnvelope(mapped.code, err.message), mapped.status);
      }
    }

    const code = codeOf(err);
    const status = code === undefined ? undefined : STATUS_MAP[code];

    if (code === undefined || status === undefined) {
      logger.error({ requestId, err }, "Unhandled error");
      return c.json(
        createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    return c.json(createErrorEnvelope(code, err.message, detailsOf(err)), status);
  };
}
