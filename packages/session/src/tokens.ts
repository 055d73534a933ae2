/**
 * Token service.
 *
 * Issues and verifies the four session token classes as compact
 * HS256 JWTs. Each class is signed with its own secret and carries
 * its own fixed lifetime:
 *
 * - access      30 min  (cookie)
 * - refresh      6 h    (cookie)
 * - reset       15 min  (password-reset link)
 * - activation  15 min  (account-activation link)
 *
 * Tokens are never stored for access/refresh; validity is signature
 * plus expiry.
 */

import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";

// =============================================================================
// Classes & Lifetimes
// =============================================================================

export type TokenClass = "access" | "refresh" | "reset" | "activation";

export const TOKEN_CLASSES: readonly TokenClass[] = [
  "access",
  "refresh",
  "reset",
  "activation",
];

export const TOKEN_TTL_SECONDS: Readonly<Record<TokenClass, number>> = {
  access: 30 * 60,
  refresh: 6 * 60 * 60,
  reset: 15 * 60,
  activation: 15 * 60,
};

export type TokenSecrets = Readonly<Record<TokenClass, string>>;

// =============================================================================
// Errors
// =============================================================================

export type TokenErrorCode = "MALFORMED" | "INVALID_SIGNATURE" | "EXPIRED";

export class TokenError extends Error {
  constructor(
    public readonly code: TokenErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TokenError";
  }
}

// =============================================================================
// Claims
// =============================================================================

export interface TokenClaims {
  readonly sub: string;
  /** Expiry, seconds since epoch */
  readonly exp: number;
  /** Issued-at, seconds since epoch */
  readonly iat: number;
  readonly jti: string;
  readonly cls: TokenClass;
}

export interface VerifiedToken {
  readonly subject: string;
  readonly expiresAt: number;
  readonly claims: TokenClaims;
}

const HEADER = Buffer.from(
  JSON.stringify({ alg: "HS256", typ: "JWT" }),
).toString("base64url");

// =============================================================================
// Service
// =============================================================================

export interface TokenServiceOptions {
  readonly secrets: TokenSecrets;
  /** Clock in milliseconds. Defaults to Date.now */
  readonly now?: (() => number) | undefined;
}

export class TokenService {
  private readonly _secrets: TokenSecrets;
  private readonly _now: () => number;

  constructor(options: TokenServiceOptions) {
    assertDistinctSecrets(options.secrets);
    this._secrets = options.secrets;
    this._now = options.now ?? Date.now;
  }

  /**
   * Issue a token of the given class for `subject`.
   */
  issue(cls: TokenClass, subject: string): string {
    const iat = Math.floor(this._now() / 1000);
    const claims: TokenClaims = {
      sub: subject,
      exp: iat + TOKEN_TTL_SECONDS[cls],
      iat,
      jti: randomUUID(),
      cls,
    };

    const payload = Buffer.from(JSON.stringify(claims)).toString("base64url");
    const signature = sign(`${HEADER}.${payload}`, this._secrets[cls]);

    return `${HEADER}.${payload}.${signature.toString("base64url")}`;
  }

  /**
   * Verify a token against the secret of `cls`.
   *
   * The signature is checked before the payload is trusted, so an
   * expired genuine token reports EXPIRED and a token of any other
   * class reports INVALID_SIGNATURE.
   *
   * @throws {TokenError}
   */
  verify(cls: TokenClass, token: string): VerifiedToken {
    const parts = token.split(".");
    const [headerB64, payloadB64, signatureB64] = parts;
    if (
      parts.length !== 3 ||
      headerB64 === undefined ||
      payloadB64 === undefined ||
      signatureB64 === undefined
    ) {
      throw new TokenError("MALFORMED", "Token must have three segments");
    }

    const header = decodeSegment(headerB64);
    if (header === undefined) {
      throw new TokenError("MALFORMED", "Token header is not valid JSON");
    }
    if (header["alg"] !== "HS256") {
      throw new TokenError(
        "INVALID_SIGNATURE",
        `Unexpected signing algorithm: ${String(header["alg"])}`,
      );
    }

    const expected = sign(`${headerB64}.${payloadB64}`, this._secrets[cls]);
    const actual = Buffer.from(signatureB64, "base64url");
    if (
      actual.length !== expected.length ||
      !timingSafeEqual(actual, expected)
    ) {
      throw new TokenError("INVALID_SIGNATURE", "Token signature mismatch");
    }

    const claims = parseClaims(decodeSegment(payloadB64));
    if (claims === undefined || claims.cls !== cls) {
      throw new TokenError("MALFORMED", "Token claims are incomplete");
    }

    if (claims.exp <= Math.floor(this._now() / 1000)) {
      throw new TokenError("EXPIRED", "Token has expired");
    }

    return { subject: claims.sub, expiresAt: claims.exp, claims };
  }

  ttlSeconds(cls: TokenClass): number {
    return TOKEN_TTL_SECONDS[cls];
  }
}

// =============================================================================
// Helpers
// =============================================================================

function sign(input: string, secret: string): Buffer {
  return createHmac("sha256", secret).update(input).digest();
}

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(
      Buffer.from(segment, "base64url").toString("utf-8"),
    );
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
      return undefined;
    }
    return value as Record<string, unknown>;
  } catch {
    return undefined;
  }
}

function isTokenClass(value: unknown): value is TokenClass {
  return TOKEN_CLASSES.some((cls) => cls === value);
}

function parseClaims(
  payload: Record<string, unknown> | undefined,
): TokenClaims | undefined {
  if (payload === undefined) return undefined;

  const { sub, exp, iat, jti, cls } = payload;
  if (
    typeof sub !== "string" ||
    sub === "" ||
    typeof exp !== "number" ||
    typeof iat !== "number" ||
    typeof jti !== "string" ||
    !isTokenClass(cls)
  ) {
    return undefined;
  }

  return { sub, exp, iat, jti, cls };
}

/**
 * A class's secret must never verify another class's token.
 */
function assertDistinctSecrets(secrets: TokenSecrets): void {
  const seen = new Map<string, TokenClass>();
  for (const cls of TOKEN_CLASSES) {
    const secret = secrets[cls];
    if (secret === "") {
      throw new Error(`Secret for '${cls}' tokens cannot be empty`);
    }
    const owner = seen.get(secret);
    if (owner !== undefined) {
      throw new Error(`'${cls}' tokens reuse the secret of '${owner}' tokens`);
    }
    seen.set(secret, cls);
  }
}
