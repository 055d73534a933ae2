/**
 * Account flows: registration, login, password reset and activation.
 *
 * Login is a chain of three steps tried in order; the first that
 * produces a user wins:
 *
 *   1. try-access   valid access cookie, known user   → already logged in
 *   2. try-refresh  valid refresh cookie, known user  → rotate both cookies
 *   3. credentials  identifier + password              → issue both cookies
 *
 * An unknown subject in steps 1–2 falls through; lookup failures abort.
 */

import type { PublicUser, User } from "@murmur/types";
import { toPublicUser } from "@murmur/types";
import { TokenError } from "@murmur/session";
import type {
  CredentialCheck,
  SessionCredentials,
  SessionResolver,
  TokenClass,
  TokenPair,
  TokenService,
} from "@murmur/session";
import { AccountError, RepositoryError } from "./errors.js";
import type { PasswordHasher } from "./passwords.js";
import type { UserRepository } from "./repositories.js";
import type { CredentialsDto, RegisterDto } from "../types/dto.js";

// =============================================================================
// Outcomes
// =============================================================================

export type LoginOutcome =
  | { readonly step: "access"; readonly user: User }
  | { readonly step: "refresh"; readonly user: User; readonly issued: TokenPair }
  | { readonly step: "credentials"; readonly user: User; readonly issued: TokenPair };

export interface Registration {
  readonly user: PublicUser;
  readonly activationLink: string;
}

export interface AccountServiceDeps {
  readonly users: UserRepository;
  readonly tokens: TokenService;
  readonly resolver: SessionResolver;
  readonly passwords: PasswordHasher;
  /** Public origin for emailed links, e.g. https://murmur.example */
  readonly domain: string;
  readonly now?: (() => number) | undefined;
}

const LINK_PATHS = {
  activation: "/api/v1/auth/activate",
  reset: "/api/v1/auth/reset-password",
} as const;

// =============================================================================
// Service
// =============================================================================

export class AccountService {
  private readonly _users: UserRepository;
  private readonly _tokens: TokenService;
  private readonly _resolver: SessionResolver;
  private readonly _passwords: PasswordHasher;
  private readonly _domain: string;
  private readonly _now: () => number;

  constructor(deps: AccountServiceDeps) {
    this._users = deps.users;
    this._tokens = deps.tokens;
    this._resolver = deps.resolver;
    this._passwords = deps.passwords;
    this._domain = deps.domain.replace(/\/+$/, "");
    this._now = deps.now ?? Date.now;
  }

  // ─── Registration ────────────────────────────────────────────────

  async register(input: RegisterDto): Promise<Registration> {
    const passwordHash = await this._passwords.hash(input.password);

    let user: User;
    try {
      user = await this._users.create({
        username: input.username,
        email: input.email,
        passwordHash,
      });
    } catch (error) {
      if (error instanceof RepositoryError && error.code === "DUPLICATE_USER") {
        throw new AccountError("USER_ALREADY_EXISTS", "user already exists");
      }
      throw error;
    }

    const activationLink = await this.issueActivationLink(user.id);
    return { user: toPublicUser(user), activationLink };
  }

  async resendActivationLink(input: CredentialsDto): Promise<string> {
    const user = await this._users.findByIdentifier(input.identifier);
    if (user === undefined) throw invalidCredentials();
    if (user.isActive) {
      throw new AccountError("ALREADY_ACTIVE", "user already active");
    }
    if (!(await this._passwords.verify(input.password, user.passwordHash))) {
      throw invalidCredentials();
    }
    return this.issueActivationLink(user.id);
  }

  async activate(token: string): Promise<void> {
    const user = await this.userForLinkToken("activation", token);
    if (user.isActive) {
      throw new AccountError("ALREADY_ACTIVE", "user already active");
    }
    if (!this.matchesStored(token, user.activationToken, user.activationTokenExpiry)) {
      throw invalidLinkToken();
    }
    await this._users.activate(user.id);
  }

  // ─── Login ───────────────────────────────────────────────────────

  /**
   * Run the login chain. `readCredentials` is only called when both
   * cookie steps fall through, so a cookie-only login needs no body.
   */
  async login(
    cookies: SessionCredentials,
    readCredentials: () => Promise<CredentialsDto>,
  ): Promise<LoginOutcome> {
    const access = requireLookup(
      await this._resolver.check("access", cookies.accessToken),
    );
    if (access !== undefined) {
      assertActivated(access);
      return { step: "access", user: access };
    }

    const refresh = requireLookup(
      await this._resolver.check("refresh", cookies.refreshToken),
    );
    if (refresh !== undefined) {
      assertActivated(refresh);
      return { step: "refresh", user: refresh, issued: this._resolver.rotate(refresh.id) };
    }

    const { identifier, password } = await readCredentials();
    const user = await this._users.findByIdentifier(identifier);
    if (user === undefined) throw invalidCredentials();
    if (!(await this._passwords.verify(password, user.passwordHash))) {
      throw invalidCredentials();
    }
    assertActivated(user);

    return { step: "credentials", user, issued: this._resolver.rotate(user.id) };
  }

  // ─── Password reset ──────────────────────────────────────────────

  /**
   * Store a reset token for the account and return its link, or
   * `undefined` when no account matches.
   */
  async forgotPassword(identifier: string): Promise<string | undefined> {
    const user = await this._users.findByIdentifier(identifier);
    if (user === undefined) return undefined;

    const token = this._tokens.issue("reset", user.id);
    await this._users.setResetToken(user.id, token, this.expiry("reset"));
    return this.link("reset", token);
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    const user = await this.userForLinkToken("reset", token);
    if (!this.matchesStored(token, user.passwordResetToken, user.resetTokenExpiry)) {
      throw invalidLinkToken();
    }
    const passwordHash = await this._passwords.hash(newPassword);
    await this._users.updatePassword(user.id, passwordHash);
  }

  // ─── Internals ───────────────────────────────────────────────────

  private async issueActivationLink(userId: string): Promise<string> {
    const token = this._tokens.issue("activation", userId);
    await this._users.setActivationToken(userId, token, this.expiry("activation"));
    return this.link("activation", token);
  }

  private async userForLinkToken(
    cls: "reset" | "activation",
    token: string,
  ): Promise<User> {
    let subject: string;
    try {
      subject = this._tokens.verify(cls, token).subject;
    } catch (error) {
      if (error instanceof TokenError) throw invalidLinkToken();
      throw error;
    }

    const user = await this._users.findById(subject);
    if (user === undefined) throw invalidLinkToken();
    return user;
  }

  private matchesStored(
    token: string,
    stored: string | undefined,
    expiry: string | undefined,
  ): boolean {
    return (
      stored === token &&
      expiry !== undefined &&
      Date.parse(expiry) > this._now()
    );
  }

  private expiry(cls: TokenClass): string {
    return new Date(this._now() + this._tokens.ttlSeconds(cls) * 1000).toISOString();
  }

  private link(kind: keyof typeof LINK_PATHS, token: string): string {
    return `${this._domain}${LINK_PATHS[kind]}?token=${encodeURIComponent(token)}`;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * The user a cookie step produced, or `undefined` to fall through.
 */
function requireLookup(check: CredentialCheck): User | undefined {
  switch (check.kind) {
    case "found":
      return check.user;
    case "lookup-failed":
      throw new RepositoryError("STORE_UNAVAILABLE", "user lookup failed", {
        cause: check.cause,
      });
    default:
      return undefined;
  }
}

function assertActivated(user: User): void {
  if (!user.isActive) {
    throw new AccountError("ACCOUNT_NOT_ACTIVATED", "account not activated");
  }
}

function invalidCredentials(): AccountError {
  return new AccountError("INVALID_CREDENTIALS", "invalid credentials");
}

function invalidLinkToken(): AccountError {
  return new AccountError("INVALID_OR_EXPIRED_TOKEN", "invalid or expired token");
}
