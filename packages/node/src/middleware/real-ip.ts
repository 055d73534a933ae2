/**
 * Client IP derivation.
 *
 * Order: first X-Forwarded-For entry, X-Real-IP, the socket peer,
 * then "unknown". Runs before rate limiting, which keys on the result.
 */

import type { Context, MiddlewareHandler } from "hono";
import { getConnInfo } from "@hono/node-server/conninfo";
import type { AppEnv } from "../types/api-contract.js";

export type PeerAddress = (c: Context<AppEnv>) => string | undefined;

/**
 * Socket peer address as reported by @hono/node-server.
 */
export const nodePeerAddress: PeerAddress = (c) => getConnInfo(c).remote.address;

export function clientIpOf(c: Context<AppEnv>, peerAddress: PeerAddress): string {
  const forwarded = c.req.header("X-Forwarded-For");
  if (forwarded !== undefined) {
    const first = forwarded.split(",")[0]?.trim();
    if (first !== undefined && first !== "") return first;
  }

  const realIp = c.req.header("X-Real-IP")?.trim();
  if (realIp !== undefined && realIp !== "") return realIp;

  return peerAddress(c) ?? "unknown";
}

export function realIpMiddleware(
  peerAddress: PeerAddress = nodePeerAddress,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("clientIp", clientIpOf(c, peerAddress));
    await next();
  };
}
