/**
 * Repository contracts.
 *
 * Route handlers and services depend only on these interfaces; the
 * Postgres store implements them for production and the in-memory
 * store for tests and local development.
 *
 * Lookups resolve `undefined` for a missing row and reject on any
 * other failure.
 */

import type { User } from "@murmur/types";
import type { UserLookup } from "@murmur/session";
import type { PageWindow } from "../types/pagination.js";

// =============================================================================
// Users
// =============================================================================

export interface NewUser {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
}

export interface UserRepository extends UserLookup {
  /** Find by username or email */
  findByIdentifier(identifier: string): Promise<User | undefined>;

  /**
   * Insert an inactive, level-1 user.
   *
   * @throws {RepositoryError} DUPLICATE_USER when the username or email is taken
   */
  create(input: NewUser): Promise<User>;

  setActivationToken(userId: string, token: string, expiry: string): Promise<void>;

  /** Mark active and clear the stored activation token */
  activate(userId: string): Promise<void>;

  setResetToken(userId: string, token: string, expiry: string): Promise<void>;

  /** Store a new hash and clear the stored reset token */
  updatePassword(userId: string, passwordHash: string): Promise<void>;
}

// =============================================================================
// Moderation
// =============================================================================

export interface TimedOutPage {
  readonly users: readonly User[];
  readonly total: number;
}

export interface ModerationRepository {
  /** Set or clear (`undefined`) the timeout of a user */
  setTimeout(userId: string, until: string | undefined): Promise<void>;

  /** Users whose timeout ends after `now`, soonest first */
  listTimedOut(now: string, window: PageWindow): Promise<TimedOutPage>;

  setActive(userId: string, active: boolean): Promise<void>;

  /** Ban, deactivate and delete the user's posts atomically */
  ban(userId: string): Promise<void>;

  unban(userId: string): Promise<void>;
}

// =============================================================================
// Content
// =============================================================================

export interface ContentRef {
  readonly id: string;
  readonly authorId: string;
}

export interface ContentRepository {
  findPost(postId: string): Promise<ContentRef | undefined>;
  findComment(commentId: string): Promise<ContentRef | undefined>;
  deletePost(postId: string): Promise<void>;
  deleteComment(commentId: string): Promise<void>;
}

// =============================================================================
// Health
// =============================================================================

export interface Pingable {
  /** Resolve when the backing store answers; reject otherwise */
  ping(): Promise<void>;
}

export type Store = UserRepository &
  ModerationRepository &
  ContentRepository &
  Pingable;
