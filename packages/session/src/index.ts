/**
 * Session authentication and authorization core.
 *
 * - Token service: signed, time-boxed tokens for four classes
 * - Session resolver: cookie pair → user, with refresh rotation
 * - Rate limiter: fixed-window admission per client IP
 * - Policy: role-hierarchy decisions for moderation actions
 */

export type {
  TokenClass,
  TokenSecrets,
  TokenErrorCode,
  TokenClaims,
  VerifiedToken,
  TokenServiceOptions,
} from "./tokens.js";
export { TOKEN_CLASSES, TOKEN_TTL_SECONDS, TokenError, TokenService } from "./tokens.js";

export type {
  UserLookup,
  SessionCredentials,
  TokenPair,
  SessionRejectionCode,
  SessionRejection,
  SessionAuthenticated,
  SessionOutcome,
  CredentialCheck,
  SessionResolverOptions,
} from "./resolver.js";
export { SessionResolver, accountGate, sessionRejection } from "./resolver.js";

export type {
  CounterHit,
  CounterHitOptions,
  CounterStore,
  RateLimiterConfig,
  Admission,
} from "./rate-limiter.js";
export { InMemoryCounterStore, RateLimiter, rateLimitKey } from "./rate-limiter.js";

export type { ModerationAction, DenyReason, Decision } from "./policy.js";
export { POLICY_RULES, decide } from "./policy.js";
