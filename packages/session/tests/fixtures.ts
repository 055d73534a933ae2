/**
 * Shared fixtures for @murmur/session tests.
 */
import type { User } from "@murmur/types";
import type { TokenSecrets } from "../src/tokens.js";
import type { UserLookup } from "../src/resolver.js";

/** 2023-11-14T22:13:20.000Z, on a whole second */
export const T0 = 1_700_000_000_000;

export const SECRETS: TokenSecrets = {
  access: "test-access-secret",
  refresh: "test-refresh-secret",
  reset: "test-reset-secret",
  activation: "test-activation-secret",
};

/**
 * A settable clock shared by the services under test.
 */
export function createClock(start = T0): {
  now: () => number;
  set: (ms: number) => void;
  advance: (ms: number) => void;
} {
  let current = start;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: "0b6f7c1e-2d3a-4e5f-8a9b-1c2d3e4f5a6b",
    username: "wren",
    email: "wren@example.test",
    passwordHash: "not-a-real-hash",
    role: { level: 1, description: "Normal User" },
    banned: false,
    isActive: true,
    createdAt: "2023-11-01T00:00:00.000Z",
    updatedAt: "2023-11-01T00:00:00.000Z",
    ...overrides,
  };
}

/**
 * Map-backed lookup; `fail` makes every lookup reject.
 */
export class MapUserLookup implements UserLookup {
  readonly users = new Map<string, User>();
  fail: Error | undefined;
  calls = 0;

  constructor(users: readonly User[] = []) {
    for (const user of users) this.users.set(user.id, user);
  }

  findById(id: string): Promise<User | undefined> {
    this.calls++;
    if (this.fail !== undefined) return Promise.reject(this.fail);
    return Promise.resolve(this.users.get(id));
  }
}
