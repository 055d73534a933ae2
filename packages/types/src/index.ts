/**
 * Shared identity types for the Murmur stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Policy lives in consuming packages, not here
 */

export type { RoleLevel, Role, User, PublicUser } from "./identity.js";
export {
  ROLE_LEVEL,
  ROLE_DESCRIPTION,
  roleOf,
  toPublicUser,
  isTimedOut,
} from "./identity.js";

export { isRoleLevel } from "./guards.js";
