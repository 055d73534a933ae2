/**
 * Session resolver.
 *
 * Turns the access/refresh cookie pair of one request into either an
 * authenticated user or a rejection:
 *
 *   access valid + user known          → authenticated, no rotation
 *   access invalid/absent/unknown user → refresh path
 *   refresh valid + user known         → authenticated, both tokens rotated
 *   anything else                      → rejected
 *
 * Account gates (banned, inactive, timed out) run last on whichever
 * path produced the user. Single pass; nothing is retried.
 */

import type { User } from "@murmur/types";
import { isTimedOut } from "@murmur/types";
import { TokenError } from "./tokens.js";
import type { TokenService } from "./tokens.js";

// =============================================================================
// Collaborators
// =============================================================================

export interface UserLookup {
  /**
   * Resolve a user by id.
   *
   * Resolves `undefined` when no such user exists and rejects on any
   * other store failure.
   */
  findById(id: string): Promise<User | undefined>;
}

export interface SessionCredentials {
  readonly accessToken?: string | undefined;
  readonly refreshToken?: string | undefined;
}

export interface TokenPair {
  readonly accessToken: string;
  readonly refreshToken: string;
}

// =============================================================================
// Outcomes
// =============================================================================

export type SessionRejectionCode =
  | "MISSING_AUTH_TOKENS"
  | "INVALID_REFRESH_TOKEN"
  | "USER_NOT_FOUND"
  | "ACCOUNT_BANNED"
  | "ACCOUNT_NOT_ACTIVE"
  | "ACCOUNT_TIMEOUT"
  | "INTERNAL_ERROR";

export interface SessionRejection {
  readonly kind: "rejected";
  readonly code: SessionRejectionCode;
  readonly status: 401 | 403 | 500;
  readonly message: string;
  readonly cause?: unknown;
}

export interface SessionAuthenticated {
  readonly kind: "authenticated";
  readonly user: User;
  readonly via: "access" | "refresh";
  /** Present only when the refresh path ran */
  readonly rotated?: TokenPair | undefined;
}

export type SessionOutcome = SessionAuthenticated | SessionRejection;

/**
 * Result of checking one cookie: the token class verified and the
 * subject looked up.
 */
export type CredentialCheck =
  | { readonly kind: "found"; readonly user: User }
  | { readonly kind: "absent" }
  | { readonly kind: "invalid"; readonly error: TokenError }
  | { readonly kind: "unknown-user"; readonly subject: string }
  | { readonly kind: "lookup-failed"; readonly cause: unknown };

const REJECTIONS: Readonly<
  Record<SessionRejectionCode, { status: 401 | 403 | 500; message: string }>
> = {
  MISSING_AUTH_TOKENS: { status: 401, message: "missing auth tokens" },
  INVALID_REFRESH_TOKEN: { status: 401, message: "invalid refresh token" },
  USER_NOT_FOUND: { status: 401, message: "user not found" },
  ACCOUNT_BANNED: { status: 403, message: "account banned" },
  ACCOUNT_NOT_ACTIVE: { status: 403, message: "account not active" },
  ACCOUNT_TIMEOUT: { status: 403, message: "account timeout" },
  INTERNAL_ERROR: { status: 500, message: "internal server error" },
};

export function sessionRejection(
  code: SessionRejectionCode,
  cause?: unknown,
): SessionRejection {
  const { status, message } = REJECTIONS[code];
  return cause === undefined
    ? { kind: "rejected", code, status, message }
    : { kind: "rejected", code, status, message, cause };
}

// =============================================================================
// Resolver
// =============================================================================

export interface SessionResolverOptions {
  readonly tokens: TokenService;
  readonly users: UserLookup;
  /** Clock in milliseconds, used for the timeout gate */
  readonly now?: (() => number) | undefined;
}

export class SessionResolver {
  private readonly _tokens: TokenService;
  private readonly _users: UserLookup;
  private readonly _now: () => number;

  constructor(options: SessionResolverOptions) {
    this._tokens = options.tokens;
    this._users = options.users;
    this._now = options.now ?? Date.now;
  }

  async resolve(credentials: SessionCredentials): Promise<SessionOutcome> {
    const access = await this.check("access", credentials.accessToken);

    if (access.kind === "lookup-failed") {
      return sessionRejection("INTERNAL_ERROR", access.cause);
    }
    if (access.kind === "found") {
      return this.gate({ kind: "authenticated", user: access.user, via: "access" });
    }

    const refresh = await this.check("refresh", credentials.refreshToken);
    switch (refresh.kind) {
      case "absent":
        return sessionRejection("MISSING_AUTH_TOKENS");
      case "invalid":
        return sessionRejection("INVALID_REFRESH_TOKEN", refresh.error);
      case "unknown-user":
        return sessionRejection("USER_NOT_FOUND");
      case "lookup-failed":
        return sessionRejection("INTERNAL_ERROR", refresh.cause);
      case "found":
        return this.gate({
          kind: "authenticated",
          user: refresh.user,
          via: "refresh",
          rotated: this.rotate(refresh.user.id),
        });
    }
  }

  /**
   * Verify one cookie as `cls` and look its subject up.
   */
  async check(
    cls: "access" | "refresh",
    token: string | undefined,
  ): Promise<CredentialCheck> {
    if (token === undefined || token === "") return { kind: "absent" };

    let subject: string;
    try {
      subject = this._tokens.verify(cls, token).subject;
    } catch (error) {
      if (error instanceof TokenError) return { kind: "invalid", error };
      throw error;
    }

    try {
      const user = await this._users.findById(subject);
      return user === undefined
        ? { kind: "unknown-user", subject }
        : { kind: "found", user };
    } catch (cause) {
      return { kind: "lookup-failed", cause };
    }
  }

  /**
   * Issue a fresh access/refresh pair for `subject`.
   */
  rotate(subject: string): TokenPair {
    return {
      accessToken: this._tokens.issue("access", subject),
      refreshToken: this._tokens.issue("refresh", subject),
    };
  }

  private gate(outcome: SessionAuthenticated): SessionOutcome {
    const rejection = accountGate(outcome.user, this._now());
    return rejection ?? outcome;
  }
}

/**
 * Account-status gates, in order: banned, inactive, timed out.
 */
export function accountGate(
  user: User,
  nowMs: number,
): SessionRejection | undefined {
  if (user.banned) return sessionRejection("ACCOUNT_BANNED");
  if (!user.isActive) return sessionRejection("ACCOUNT_NOT_ACTIVE");
  if (isTimedOut(user, nowMs)) return sessionRejection("ACCOUNT_TIMEOUT");
  return undefined;
}
