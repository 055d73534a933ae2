/**
 * Package public API.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, tokenSecrets, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { AccountService } from "./services/account-service.js";
export type {
  AccountServiceDeps,
  LoginOutcome,
  Registration,
} from "./services/account-service.js";
export { ModerationService } from "./services/moderation-service.js";
export type { ModerationServiceDeps } from "./services/moderation-service.js";
export {
  AccountError,
  ModerationError,
  RepositoryError,
  ValidationError,
} from "./services/errors.js";
export type {
  AccountErrorCode,
  ModerationErrorCode,
  RepositoryErrorCode,
  ValidationIssue,
} from "./services/errors.js";
export type {
  ContentRef,
  ContentRepository,
  ModerationRepository,
  NewUser,
  Pingable,
  Store,
  TimedOutPage,
  UserRepository,
} from "./services/repositories.js";
export { InMemoryStore } from "./services/in-memory-store.js";
export { PostgresStore } from "./services/postgres-store.js";
export { RedisCounterStore, HIT_SCRIPT } from "./services/redis-counter-store.js";
export type { RedisClientLike } from "./services/redis-counter-store.js";
export { BcryptHasher } from "./services/passwords.js";
export type { PasswordHasher } from "./services/passwords.js";
export {
  ACCESS_COOKIE,
  REFRESH_COOKIE,
} from "./services/session-cookies.js";
export type { CookieSettings } from "./services/session-cookies.js";

export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
