/**
 * Runtime type guard tests for @murmur/types
 *
 * Validates the role-level guard and the identity projections.
 */
import { describe, it, expect } from "vitest";
import { isRoleLevel } from "../src/guards.js";
import { toPublicUser, isTimedOut, roleOf } from "../src/identity.js";
import type { User } from "../src/identity.js";

const baseUser: User = {
  id: "3f1c2a9e-8d4b-4c6f-9a1e-2b7d5c0e4f18",
  username: "river",
  email: "river@example.test",
  passwordHash: "$2a$10$placeholderplaceholderplaceholderpla",
  role: { level: 1, description: "Normal User" },
  banned: false,
  isActive: true,
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-01T00:00:00.000Z",
};

// =============================================================================
// Role guards
// =============================================================================

describe("isRoleLevel", () => {
  it("accepts the three levels", () => {
    expect(isRoleLevel(1)).toBe(true);
    expect(isRoleLevel(2)).toBe(true);
    expect(isRoleLevel(3)).toBe(true);
  });

  it("rejects out-of-range and non-numeric values", () => {
    expect(isRoleLevel(0)).toBe(false);
    expect(isRoleLevel(4)).toBe(false);
    expect(isRoleLevel("2")).toBe(false);
    expect(isRoleLevel(undefined)).toBe(false);
  });
});

// =============================================================================
// Projections
// =============================================================================

describe("toPublicUser", () => {
  it("drops the password hash and token columns", () => {
    const view = toPublicUser({
      ...baseUser,
      activationToken: "token",
      passwordResetToken: "token",
    });

    expect(view).toEqual({
      id: baseUser.id,
      username: "river",
      email: "river@example.test",
      role: { level: 1, description: "Normal User" },
      banned: false,
      isActive: true,
      createdAt: baseUser.createdAt,
      updatedAt: baseUser.updatedAt,
    });
  });

  it("keeps the timeout when present", () => {
    const view = toPublicUser({ ...baseUser, timeoutUntil: "2026-01-02T00:00:00.000Z" });
    expect(view.timeoutUntil).toBe("2026-01-02T00:00:00.000Z");
  });
});

describe("isTimedOut", () => {
  const now = Date.parse("2026-01-01T12:00:00.000Z");

  it("is false without a timeout", () => {
    expect(isTimedOut(baseUser, now)).toBe(false);
  });

  it("is true while the timeout is in the future", () => {
    expect(isTimedOut({ ...baseUser, timeoutUntil: "2026-01-01T13:00:00.000Z" }, now)).toBe(true);
  });

  it("is false once the timeout has lapsed", () => {
    expect(isTimedOut({ ...baseUser, timeoutUntil: "2026-01-01T11:00:00.000Z" }, now)).toBe(false);
  });
});

describe("roleOf", () => {
  it("pairs a level with its stored description", () => {
    expect(roleOf(1)).toEqual({ level: 1, description: "Normal User" });
    expect(roleOf(3)).toEqual({ level: 3, description: "Admin" });
  });
});
