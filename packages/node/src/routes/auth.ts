/**
 * Account routes.
 *
 * POST /api/v1/auth/register                  Create an inactive account
 * POST /api/v1/auth/login                     access → refresh → credentials
 * POST /api/v1/auth/logout                    Clear both session cookies
 * POST /api/v1/auth/forgot-password           Issue a reset link
 * POST /api/v1/auth/reset-password?token=     Set a new password
 * GET  /api/v1/auth/activate?token=           Activate an account
 * POST /api/v1/auth/resend-activation-link    Issue a new activation link
 * GET  /api/v1/auth/me                        Current user (session required)
 */

import { Hono } from "hono";
import type { Context, MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import { toPublicUser } from "@murmur/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  CredentialsSchema,
  ForgotPasswordSchema,
  RegisterSchema,
  ResetPasswordSchema,
  TokenQuerySchema,
} from "../types/dto.js";
import type { CredentialsDto } from "../types/dto.js";
import {
  formatZodErrors,
  validateBody,
  validateQuery,
} from "../middleware/validate.js";
import { AccountError, ValidationError } from "../services/errors.js";
import type { AccountService } from "../services/account-service.js";
import {
  clearSessionCookies,
  readSessionCookies,
  writeSessionCookies,
} from "../services/session-cookies.js";
import type { CookieSettings } from "../services/session-cookies.js";

export interface AuthRouteDeps {
  readonly accounts: AccountService;
  /** Session middleware guarding /me */
  readonly session: MiddlewareHandler<AppEnv>;
  readonly cookies: CookieSettings;
  readonly logger: Logger;
}

export function createAuthRoutes(deps: AuthRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { accounts, cookies, logger } = deps;

  // POST /register
  routes.post("/register", validateBody(RegisterSchema), async (c) => {
    const body = c.req.valid("json");
    const { user, activationLink } = await accounts.register(body);

    logger.info({ requestId: c.get("requestId"), userId: user.id }, "User registered");
    return c.json(
      { message: "User Registered Successfully", data: { user, activationLink } },
      201,
    );
  });

  // POST /login
  routes.post("/login", async (c) => {
    const outcome = await accounts.login(readSessionCookies(c), () => readCredentials(c));

    if (outcome.step !== "access") {
      writeSessionCookies(c, outcome.issued, cookies);
    }
    logger.info(
      { requestId: c.get("requestId"), userId: outcome.user.id, step: outcome.step },
      "Login",
    );

    const message = outcome.step === "access" ? "User Already Logged In" : "Login Successful";
    return c.json({ message, data: { user: toPublicUser(outcome.user) } });
  });

  // POST /logout
  routes.post("/logout", (c) => {
    const { accessToken, refreshToken } = readSessionCookies(c);
    if (accessToken === undefined || refreshToken === undefined) {
      throw new AccountError("NOT_LOGGED_IN", "user not logged in");
    }
    clearSessionCookies(c, cookies);
    return c.json({ message: "Logout Successful" });
  });

  // POST /forgot-password
  routes.post("/forgot-password", validateBody(ForgotPasswordSchema), async (c) => {
    const { identifier } = c.req.valid("json");
    const link = await accounts.forgotPassword(identifier);
    const message = "Password Reset Link Sent Successfully";

    if (link === undefined) {
      return c.json({ message });
    }
    clearSessionCookies(c, cookies);
    return c.json({ message, data: { link } });
  });

  // POST /reset-password?token=
  routes.post(
    "/reset-password",
    validateQuery(TokenQuerySchema),
    validateBody(ResetPasswordSchema),
    async (c) => {
      const { token } = c.req.valid("query");
      const { newPassword } = c.req.valid("json");
      await accounts.resetPassword(token, newPassword);
      return c.json({ message: "Password Reset Successfully" });
    },
  );

  // GET /activate?token=
  routes.get("/activate", validateQuery(TokenQuerySchema), async (c) => {
    const { token } = c.req.valid("query");
    await accounts.activate(token);
    return c.json({ message: "User Activated Successfully" });
  });

  // POST /resend-activation-link
  routes.post("/resend-activation-link", validateBody(CredentialsSchema), async (c) => {
    const activationLink = await accounts.resendActivationLink(c.req.valid("json"));
    return c.json({
      message: "Activation Link Sent Successfully",
      data: { activationLink },
    });
  });

  // GET /me
  routes.get("/me", deps.session, (c) => {
    return c.json({ message: "Current User", data: toPublicUser(c.get("user")) });
  });

  return routes;
}

/**
 * Parse the login body on demand; only the credentials step needs it.
 */
async function readCredentials(c: Context<AppEnv>): Promise<CredentialsDto> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON in request body", []);
  }

  const result = CredentialsSchema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(
      "Request body validation failed",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}
