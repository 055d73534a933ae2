/**
 * Identity Types
 *
 * A User is the subject of every session token and the target of every
 * moderation action. Role levels form a strict hierarchy:
 * 1 = normal user, 2 = moderator, 3 = admin.
 */

/**
 * Integer rank used for permission comparisons.
 */
export type RoleLevel = 1 | 2 | 3;

export const ROLE_LEVEL = {
  normal: 1,
  moderator: 2,
  admin: 3,
} as const satisfies Record<string, RoleLevel>;

export interface Role {
  readonly level: RoleLevel;

  /** Free-text label, e.g. "Moderator" */
  readonly description: string;
}

export const ROLE_DESCRIPTION: Readonly<Record<RoleLevel, string>> = {
  1: "Normal User",
  2: "Moderator",
  3: "Admin",
};

export function roleOf(level: RoleLevel): Role {
  return { level, description: ROLE_DESCRIPTION[level] };
}

/**
 * A platform account as held by the relational store.
 *
 * Timestamps are ISO 8601 strings. Token columns back the password-reset
 * and activation links; they are never serialized.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly banned: boolean;
  readonly isActive: boolean;

  /** Set while the account is timed out; in the past once it has lapsed */
  readonly timeoutUntil?: string | undefined;

  readonly createdAt: string;
  readonly updatedAt: string;

  readonly passwordResetToken?: string | undefined;
  readonly resetTokenExpiry?: string | undefined;
  readonly activationToken?: string | undefined;
  readonly activationTokenExpiry?: string | undefined;
}

/**
 * The response-safe projection of a User.
 */
export interface PublicUser {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly role: Role;
  readonly banned: boolean;
  readonly isActive: boolean;
  readonly timeoutUntil?: string | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function toPublicUser(user: User): PublicUser {
  const view: PublicUser = {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    banned: user.banned,
    isActive: user.isActive,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
  if (user.timeoutUntil !== undefined) {
    return { ...view, timeoutUntil: user.timeoutUntil };
  }
  return view;
}

/**
 * Whether the account is under an active timeout at `nowMs`.
 */
export function isTimedOut(user: User, nowMs: number): boolean {
  if (user.timeoutUntil === undefined) return false;
  return Date.parse(user.timeoutUntil) > nowMs;
}
