/**
 * Tests for account routes: register, activation, login chain,
 * logout, password reset and /me.
 */

import { describe, it, expect } from "vitest";
import {
  createTestApp,
  cookieHeader,
  DOMAIN,
  jsonRequest,
  PASSWORD,
  seedUser,
  sessionCookie,
  setCookies,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

interface UserBody {
  message: string;
  data: { user: { id: string; username: string; isActive: boolean; passwordHash?: string } };
}

function tokenOf(link: string): string {
  const token = new URL(link).searchParams.get("token");
  if (token === null) throw new Error(`no token in ${link}`);
  return token;
}

async function register(t: TestApp, username = "marlow"): Promise<Response> {
  return t.app.request(
    jsonRequest("/api/v1/auth/register", "POST", {
      username,
      email: `${username}@example.test`,
      password: PASSWORD,
    }),
  );
}

async function login(
  t: TestApp,
  body?: unknown,
  headers?: Record<string, string>,
): Promise<Response> {
  return t.app.request(jsonRequest("/api/v1/auth/login", "POST", body, headers));
}

// =============================================================================
// Registration & activation
// =============================================================================

describe("POST /api/v1/auth/register", () => {
  it("creates an inactive user and returns an activation link", async () => {
    const t = createTestApp();

    const res = await register(t);
    expect(res.status).toBe(201);

    const body = (await res.json()) as {
      message: string;
      data: { user: UserBody["data"]["user"]; activationLink: string };
    };
    expect(body.message).toBe("User Registered Successfully");
    expect(body.data.user.username).toBe("marlow");
    expect(body.data.user.isActive).toBe(false);
    expect(body.data.user.passwordHash).toBeUndefined();
    expect(body.data.activationLink.startsWith(`${DOMAIN}/api/v1/auth/activate?token=`)).toBe(
      true,
    );

    const stored = await t.store.findById(body.data.user.id);
    expect(stored?.activationToken).toBe(tokenOf(body.data.activationLink));
  });

  it("returns 409 for a taken username", async () => {
    const t = createTestApp();
    await register(t);

    const res = await register(t);
    expect(res.status).toBe(409);

    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "USER_ALREADY_EXISTS",
      message: "user already exists",
    });
  });

  it("returns 400 with issues for an invalid body", async () => {
    const t = createTestApp();

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/register", "POST", {
        username: "ab",
        email: "not-an-email",
        password: PASSWORD,
      }),
    );
    expect(res.status).toBe(400);

    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.issues).toHaveLength(2);
  });
});

describe("GET /api/v1/auth/activate", () => {
  async function registeredLink(t: TestApp): Promise<string> {
    const res = await register(t);
    const body = (await res.json()) as { data: { activationLink: string } };
    return body.data.activationLink;
  }

  it("activates the account", async () => {
    const t = createTestApp();
    const link = await registeredLink(t);

    const res = await t.app.request(`/api/v1/auth/activate?token=${tokenOf(link)}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: "User Activated Successfully" });

    const user = await t.store.findByIdentifier("marlow");
    expect(user?.isActive).toBe(true);
    expect(user?.activationToken).toBeUndefined();
  });

  it("returns 409 when the account is already active", async () => {
    const t = createTestApp();
    const token = tokenOf(await registeredLink(t));
    await t.app.request(`/api/v1/auth/activate?token=${token}`);

    const res = await t.app.request(`/api/v1/auth/activate?token=${token}`);
    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("ALREADY_ACTIVE");
  });

  it("returns 401 once the link has expired", async () => {
    const t = createTestApp();
    const token = tokenOf(await registeredLink(t));
    t.clock.advance(16 * 60 * 1000);

    const res = await t.app.request(`/api/v1/auth/activate?token=${token}`);
    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INVALID_OR_EXPIRED_TOKEN",
      message: "invalid or expired token",
    });
  });

  it("rejects a token of another class", async () => {
    const t = createTestApp();
    const user = seedUser(t, "fen", 1, { isActive: false });

    const res = await t.app.request(
      `/api/v1/auth/activate?token=${t.tokens.issue("reset", user.id)}`,
    );
    expect(res.status).toBe(401);
  });

  it("returns 400 without a token", async () => {
    const t = createTestApp();
    const res = await t.app.request("/api/v1/auth/activate");
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /api/v1/auth/resend-activation-link", () => {
  it("issues a new link for an inactive account", async () => {
    const t = createTestApp();
    seedUser(t, "fen", 1, { isActive: false });

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/resend-activation-link", "POST", {
        identifier: "fen",
        password: PASSWORD,
      }),
    );
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: { activationLink: string } };
    const stored = await t.store.findByIdentifier("fen");
    expect(stored?.activationToken).toBe(tokenOf(body.data.activationLink));
  });

  it("returns 409 for an active account", async () => {
    const t = createTestApp();
    seedUser(t, "fen");

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/resend-activation-link", "POST", {
        identifier: "fen",
        password: PASSWORD,
      }),
    );
    expect(res.status).toBe(409);
  });

  it("returns 401 for a wrong password", async () => {
    const t = createTestApp();
    seedUser(t, "fen", 1, { isActive: false });

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/resend-activation-link", "POST", {
        identifier: "fen",
        password: "wrong-password",
      }),
    );
    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INVALID_CREDENTIALS");
  });
});

// =============================================================================
// Login chain
// =============================================================================

describe("POST /api/v1/auth/login", () => {
  it("logs in with credentials and sets both cookies", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");

    const res = await login(t, { identifier: "marlow", password: PASSWORD });
    expect(res.status).toBe(200);

    const body = (await res.json()) as UserBody;
    expect(body.message).toBe("Login Successful");
    expect(body.data.user.id).toBe(user.id);

    const cookies = setCookies(res);
    expect(t.tokens.verify("access", cookies["access_token"]?.value ?? "").subject).toBe(
      user.id,
    );
    expect(t.tokens.verify("refresh", cookies["refresh_token"]?.value ?? "").subject).toBe(
      user.id,
    );
    expect(cookies["access_token"]?.attributes).toBe("Max-Age=1800; Path=/; HttpOnly");
    expect(cookies["refresh_token"]?.attributes).toBe("Max-Age=21600; Path=/; HttpOnly");
  });

  it("accepts the email as identifier", async () => {
    const t = createTestApp();
    seedUser(t, "marlow");

    const res = await login(t, { identifier: "marlow@example.test", password: PASSWORD });
    expect(res.status).toBe(200);
  });

  it("returns 401 for a wrong password", async () => {
    const t = createTestApp();
    seedUser(t, "marlow");

    const res = await login(t, { identifier: "marlow", password: "wrong-password" });
    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INVALID_CREDENTIALS",
      message: "invalid credentials",
    });
  });

  it("returns 401 for an unknown user", async () => {
    const t = createTestApp();
    const res = await login(t, { identifier: "nobody", password: PASSWORD });
    expect(res.status).toBe(401);
  });

  it("returns 403 for an account that is not activated", async () => {
    const t = createTestApp();
    seedUser(t, "marlow", 1, { isActive: false });

    const res = await login(t, { identifier: "marlow", password: PASSWORD });
    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("ACCOUNT_NOT_ACTIVATED");
  });

  it("answers 'already logged in' for a valid access cookie without writing cookies", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");

    const res = await login(t, undefined, { Cookie: sessionCookie(t, user.id) });
    expect(res.status).toBe(200);
    expect(((await res.json()) as UserBody).message).toBe("User Already Logged In");
    expect(res.headers.getSetCookie()).toEqual([]);
  });

  it("rotates both cookies from a refresh cookie alone", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");
    const refresh = t.tokens.issue("refresh", user.id);

    const res = await login(t, undefined, {
      Cookie: cookieHeader({ refresh_token: refresh }),
    });
    expect(res.status).toBe(200);
    expect(((await res.json()) as UserBody).message).toBe("Login Successful");

    const cookies = setCookies(res);
    expect(t.tokens.verify("access", cookies["access_token"]?.value ?? "").subject).toBe(
      user.id,
    );
    expect(cookies["refresh_token"]?.value).not.toBe(refresh);
  });

  it("falls through an invalid refresh cookie to the credentials step", async () => {
    const t = createTestApp();
    seedUser(t, "marlow");

    const res = await login(
      t,
      { identifier: "marlow", password: PASSWORD },
      { Cookie: cookieHeader({ refresh_token: "garbage" }) },
    );
    expect(res.status).toBe(200);
    expect(((await res.json()) as UserBody).message).toBe("Login Successful");
  });

  it("returns 400 without cookies or a body", async () => {
    const t = createTestApp();

    const res = await login(t);
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
      details: { issues: [] },
    });
  });

  it("returns 500 when the user store is down", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");
    t.store.setAvailable(false);

    const res = await login(t, undefined, { Cookie: sessionCookie(t, user.id) });
    expect(res.status).toBe(500);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });
  });
});

// =============================================================================
// Logout & password reset
// =============================================================================

describe("POST /api/v1/auth/logout", () => {
  it("clears both cookies", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/logout", "POST", undefined, {
        Cookie: sessionCookie(t, user.id),
      }),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: "Logout Successful" });

    const cookies = setCookies(res);
    expect(cookies["access_token"]).toEqual({ value: "", attributes: "Max-Age=0; Path=/; HttpOnly" });
    expect(cookies["refresh_token"]).toEqual({ value: "", attributes: "Max-Age=0; Path=/; HttpOnly" });
  });

  it("returns 400 when a cookie is missing", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/logout", "POST", undefined, {
        Cookie: cookieHeader({ access_token: t.tokens.issue("access", user.id) }),
      }),
    );
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("NOT_LOGGED_IN");
  });
});

describe("password reset", () => {
  it("answers without a link for an unknown account", async () => {
    const t = createTestApp();

    const res = await t.app.request(
      jsonRequest("/api/v1/auth/forgot-password", "POST", { identifier: "nobody" }),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: "Password Reset Link Sent Successfully" });
  });

  it("resets the password through the emailed link", async () => {
    const t = createTestApp();
    seedUser(t, "marlow");

    const forgot = await t.app.request(
      jsonRequest("/api/v1/auth/forgot-password", "POST", { identifier: "marlow" }),
    );
    expect(forgot.status).toBe(200);
    expect(setCookies(forgot)["access_token"]?.value).toBe("");

    const { data } = (await forgot.json()) as { data: { link: string } };
    expect(data.link.startsWith(`${DOMAIN}/api/v1/auth/reset-password?token=`)).toBe(true);
    const token = tokenOf(data.link);

    const reset = await t.app.request(
      jsonRequest(`/api/v1/auth/reset-password?token=${token}`, "POST", {
        newPassword: "another-pass-2",
        confirmPassword: "another-pass-2",
      }),
    );
    expect(reset.status).toBe(200);
    expect(await reset.json()).toEqual({ message: "Password Reset Successfully" });

    const old = await login(t, { identifier: "marlow", password: PASSWORD });
    expect(old.status).toBe(401);
    const fresh = await login(t, { identifier: "marlow", password: "another-pass-2" });
    expect(fresh.status).toBe(200);

    // The stored token was consumed
    const reuse = await t.app.request(
      jsonRequest(`/api/v1/auth/reset-password?token=${token}`, "POST", {
        newPassword: "third-pass-33",
        confirmPassword: "third-pass-33",
      }),
    );
    expect(reuse.status).toBe(401);
  });

  it("returns 400 when the passwords differ", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");

    const res = await t.app.request(
      jsonRequest(
        `/api/v1/auth/reset-password?token=${t.tokens.issue("reset", user.id)}`,
        "POST",
        { newPassword: "another-pass-2", confirmPassword: "another-pass-3" },
      ),
    );
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.details?.issues).toEqual([
      { path: "confirmPassword", message: "passwords do not match" },
    ]);
  });
});

// =============================================================================
// /me
// =============================================================================

describe("GET /api/v1/auth/me", () => {
  it("returns the resolved user", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");

    const res = await t.app.request("/api/v1/auth/me", {
      headers: { Cookie: sessionCookie(t, user.id) },
    });
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: { id: string; username: string } };
    expect(body.data.id).toBe(user.id);
    expect(body.data.username).toBe("marlow");
  });

  it("returns 401 without cookies", async () => {
    const t = createTestApp();

    const res = await t.app.request("/api/v1/auth/me");
    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "MISSING_AUTH_TOKENS",
      message: "missing auth tokens",
    });
  });

  it("rotates cookies once the access token has expired", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");
    const cookie = sessionCookie(t, user.id);
    t.clock.advance(31 * 60 * 1000);

    const res = await t.app.request("/api/v1/auth/me", { headers: { Cookie: cookie } });
    expect(res.status).toBe(200);

    const cookies = setCookies(res);
    expect(t.tokens.verify("access", cookies["access_token"]?.value ?? "").subject).toBe(
      user.id,
    );
    expect(t.tokens.verify("refresh", cookies["refresh_token"]?.value ?? "").subject).toBe(
      user.id,
    );
  });

  it("returns 403 for a banned account", async () => {
    const t = createTestApp();
    const user = seedUser(t, "marlow");
    await t.store.ban(user.id);

    const res = await t.app.request("/api/v1/auth/me", {
      headers: { Cookie: sessionCookie(t, user.id) },
    });
    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("ACCOUNT_BANNED");
  });
});
