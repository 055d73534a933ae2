/**
 * Domain errors raised by the account, moderation and storage services.
 *
 * Each carries a machine-readable `code`; the global error handler maps
 * codes to HTTP statuses through a single table.
 */

import type { DenyReason } from "@murmur/session";

// =============================================================================
// Account
// =============================================================================

export type AccountErrorCode =
  | "USER_ALREADY_EXISTS"
  | "INVALID_CREDENTIALS"
  | "ACCOUNT_NOT_ACTIVATED"
  | "NOT_LOGGED_IN"
  | "INVALID_OR_EXPIRED_TOKEN"
  | "ALREADY_ACTIVE";

export class AccountError extends Error {
  constructor(
    public readonly code: AccountErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AccountError";
  }
}

// =============================================================================
// Moderation
// =============================================================================

export type ModerationErrorCode = "NOT_FOUND" | DenyReason;

export class ModerationError extends Error {
  constructor(
    public readonly code: ModerationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ModerationError";
  }
}

// =============================================================================
// Storage
// =============================================================================

export type RepositoryErrorCode =
  | "DUPLICATE_USER"
  | "STORE_UNAVAILABLE"
  | "INVALID_ROW";

/**
 * Failure inside a repository. Only DUPLICATE_USER is expected; anything
 * else surfaces as a 500.
 */
export class RepositoryError extends Error {
  constructor(
    public readonly code: RepositoryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RepositoryError";
  }
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Request input rejected by a schema outside the validation middleware.
 */
export class ValidationError extends Error {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[],
  ) {
    super(message);
    this.name = "ValidationError";
  }
}
