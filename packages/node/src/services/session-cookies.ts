/**
 * Session cookie helpers.
 *
 * access_token / refresh_token: HTTP-only, path "/", max-age equal to
 * the token lifetime. Clearing writes an empty value with max-age 0.
 */

import type { Context } from "hono";
import { getCookie, setCookie } from "hono/cookie";
import { TOKEN_TTL_SECONDS } from "@murmur/session";
import type { SessionCredentials, TokenPair } from "@murmur/session";

export const ACCESS_COOKIE = "access_token";
export const REFRESH_COOKIE = "refresh_token";

export interface CookieSettings {
  /** Set the Secure attribute; disable only for plain-HTTP local development */
  readonly secure: boolean;
}

export function readSessionCookies(c: Context): SessionCredentials {
  return {
    accessToken: getCookie(c, ACCESS_COOKIE),
    refreshToken: getCookie(c, REFRESH_COOKIE),
  };
}

export function writeSessionCookies(
  c: Context,
  pair: TokenPair,
  settings: CookieSettings,
): void {
  setCookie(c, ACCESS_COOKIE, pair.accessToken, {
    path: "/",
    httpOnly: true,
    secure: settings.secure,
    maxAge: TOKEN_TTL_SECONDS.access,
  });
  setCookie(c, REFRESH_COOKIE, pair.refreshToken, {
    path: "/",
    httpOnly: true,
    secure: settings.secure,
    maxAge: TOKEN_TTL_SECONDS.refresh,
  });
}

export function clearSessionCookies(c: Context, settings: CookieSettings): void {
  for (const name of [ACCESS_COOKIE, REFRESH_COOKIE]) {
    setCookie(c, name, "", {
      path: "/",
      httpOnly: true,
      secure: settings.secure,
      maxAge: 0,
    });
  }
}
