/**
 * Permission policy.
 *
 * A pure decision over (actor level, target level, action). The whole
 * role matrix lives in POLICY_RULES; callers resolve the target first
 * and call `decide` exactly once.
 */

import type { RoleLevel } from "@murmur/types";
import { ROLE_LEVEL } from "@murmur/types";

// =============================================================================
// Actions
// =============================================================================

export type ModerationAction =
  | "timeout"
  | "remove-timeout"
  | "list-timed-out"
  | "deactivate"
  | "activate"
  | "ban"
  | "unban"
  | "delete-comment"
  | "delete-post";

export type DenyReason =
  | "INSUFFICIENT_PERMISSIONS"
  | "MODERATOR_CANNOT_ACT_ON_PEER"
  | "ADMIN_CANNOT_ACT_ON_ADMIN";

export type Decision =
  | { readonly allow: true }
  | { readonly allow: false; readonly reason: DenyReason; readonly message: string };

interface PolicyRule {
  readonly minLevel: RoleLevel;
  /** A moderator may only act on normal users */
  readonly moderatorPeerGuard: boolean;
  /** An admin may not act on another admin */
  readonly adminPeerGuard: boolean;
  /** Verb phrase used in denial messages */
  readonly verb: string;
}

export const POLICY_RULES: Readonly<Record<ModerationAction, PolicyRule>> = {
  timeout: { minLevel: ROLE_LEVEL.moderator, moderatorPeerGuard: true, adminPeerGuard: true, verb: "timeout" },
  "remove-timeout": { minLevel: ROLE_LEVEL.moderator, moderatorPeerGuard: true, adminPeerGuard: true, verb: "remove timeout from" },
  "list-timed-out": { minLevel: ROLE_LEVEL.moderator, moderatorPeerGuard: false, adminPeerGuard: false, verb: "list timed-out users" },
  deactivate: { minLevel: ROLE_LEVEL.moderator, moderatorPeerGuard: true, adminPeerGuard: true, verb: "deactivate" },
  activate: { minLevel: ROLE_LEVEL.moderator, moderatorPeerGuard: true, adminPeerGuard: false, verb: "activate" },
  ban: { minLevel: ROLE_LEVEL.admin, moderatorPeerGuard: false, adminPeerGuard: true, verb: "ban" },
  unban: { minLevel: ROLE_LEVEL.admin, moderatorPeerGuard: false, adminPeerGuard: true, verb: "unban" },
  "delete-comment": { minLevel: ROLE_LEVEL.moderator, moderatorPeerGuard: false, adminPeerGuard: false, verb: "delete comments" },
  "delete-post": { minLevel: ROLE_LEVEL.admin, moderatorPeerGuard: false, adminPeerGuard: false, verb: "delete posts" },
};

const ALLOW: Decision = { allow: true };

// =============================================================================
// Decision
// =============================================================================

/**
 * Evaluate `action` by `actorLevel` against an optional target.
 *
 * Rules run in order: minimum level, moderator peer guard, admin peer
 * guard. Peer guards only apply when a target level is given.
 */
export function decide(
  actorLevel: RoleLevel,
  targetLevel: RoleLevel | undefined,
  action: ModerationAction,
): Decision {
  const rule = POLICY_RULES[action];

  if (actorLevel < rule.minLevel) {
    return deny("INSUFFICIENT_PERMISSIONS", "insufficient permissions");
  }

  if (targetLevel === undefined) return ALLOW;

  if (
    rule.moderatorPeerGuard &&
    actorLevel === ROLE_LEVEL.moderator &&
    targetLevel > ROLE_LEVEL.normal
  ) {
    return deny(
      "MODERATOR_CANNOT_ACT_ON_PEER",
      `moderator can only ${rule.verb} normal users`,
    );
  }

  if (
    rule.adminPeerGuard &&
    actorLevel === ROLE_LEVEL.admin &&
    targetLevel === ROLE_LEVEL.admin
  ) {
    return deny(
      "ADMIN_CANNOT_ACT_ON_ADMIN",
      `admin cannot ${rule.verb} another admin`,
    );
  }

  return ALLOW;
}

function deny(reason: DenyReason, message: string): Decision {
  return { allow: false, reason, message };
}
