/**
 * Tests for AccountService, below the HTTP layer.
 */

import { describe, it, expect, vi } from "vitest";
import { SessionResolver, TokenService } from "@murmur/session";
import { AccountService } from "../../src/services/account-service.js";
import { AccountError } from "../../src/services/errors.js";
import { InMemoryStore } from "../../src/services/in-memory-store.js";
import type { PasswordHasher } from "../../src/services/passwords.js";
import { createClock, SECRETS, T0 } from "../setup.js";

/** Reversible stand-in so these tests skip bcrypt */
const plainHasher: PasswordHasher = {
  hash: (plain) => Promise.resolve(`hashed:${plain}`),
  verify: (plain, hash) => Promise.resolve(hash === `hashed:${plain}`),
};

function setup(domain = "https://murmur.test/") {
  const clock = createClock();
  const store = new InMemoryStore(clock.now);
  const tokens = new TokenService({ secrets: SECRETS, now: clock.now });
  const resolver = new SessionResolver({ tokens, users: store, now: clock.now });
  const accounts = new AccountService({
    users: store,
    tokens,
    resolver,
    passwords: plainHasher,
    domain,
    now: clock.now,
  });
  return { clock, store, tokens, accounts };
}

describe("AccountService", () => {
  it("builds links without a doubled slash", async () => {
    const { accounts } = setup("https://murmur.test//");

    const { activationLink } = await accounts.register({
      username: "marlow",
      email: "marlow@example.test",
      password: "placeholder-pass-1",
    });
    expect(activationLink.startsWith("https://murmur.test/api/v1/auth/activate?token=")).toBe(
      true,
    );
  });

  it("stores the activation expiry fifteen minutes out", async () => {
    const { accounts, store } = setup();

    const { user } = await accounts.register({
      username: "marlow",
      email: "marlow@example.test",
      password: "placeholder-pass-1",
    });
    expect((await store.findById(user.id))?.activationTokenExpiry).toBe(
      new Date(T0 + 15 * 60 * 1000).toISOString(),
    );
  });

  it("does not read credentials when the access cookie is valid", async () => {
    const { accounts, store, tokens } = setup();
    const user = store.seedUser({ username: "marlow", passwordHash: "hashed:pw" });
    const readCredentials = vi.fn();

    const outcome = await accounts.login(
      { accessToken: tokens.issue("access", user.id), refreshToken: undefined },
      readCredentials,
    );
    expect(outcome.step).toBe("access");
    expect(readCredentials).not.toHaveBeenCalled();
  });

  it("falls through an access token whose user no longer exists", async () => {
    const { accounts, store, tokens } = setup();
    const user = store.seedUser({ username: "marlow", passwordHash: "hashed:pw" });

    const outcome = await accounts.login(
      {
        accessToken: tokens.issue("access", "2b7e1c90-4f3d-4e6a-8b1c-9d0e1f2a3b4c"),
        refreshToken: undefined,
      },
      () => Promise.resolve({ identifier: "marlow", password: "pw" }),
    );
    expect(outcome.step).toBe("credentials");
    expect(outcome.user.id).toBe(user.id);
  });

  it("checks the password before the activation state", async () => {
    const { accounts, store } = setup();
    store.seedUser({ username: "marlow", passwordHash: "hashed:pw", isActive: false });

    const err = await accounts
      .login({ accessToken: undefined, refreshToken: undefined }, () =>
        Promise.resolve({ identifier: "marlow", password: "wrong" }),
      )
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AccountError);
    expect(err).toMatchObject({ code: "INVALID_CREDENTIALS" });
  });

  it("refuses a reset token that is not the stored one", async () => {
    const { accounts, store, tokens, clock } = setup();
    const user = store.seedUser({ username: "marlow", passwordHash: "hashed:pw" });
    await accounts.forgotPassword("marlow");
    clock.advance(1000);
    const stale = tokens.issue("reset", user.id);

    await expect(accounts.resetPassword(stale, "another-pass-2")).rejects.toMatchObject({
      code: "INVALID_OR_EXPIRED_TOKEN",
    });
  });
});
