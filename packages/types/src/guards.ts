/**
 * Runtime Type Guards
 *
 * Narrowing for values read back from the database, where a role level
 * arrives as a plain integer column.
 */

import type { RoleLevel } from "./identity.js";

const ROLE_LEVELS = new Set<unknown>([1, 2, 3]);

export function isRoleLevel(value: unknown): value is RoleLevel {
  return ROLE_LEVELS.has(value);
}
