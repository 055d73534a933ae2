/**
 * Redis-backed counter store for the rate limiter.
 *
 * One EVAL per hit: increment, set the window expiry when this hit
 * opened the window (or the key lost its TTL, or rearm is on), and read
 * the remaining TTL. The script runs atomically on the Redis server.
 */

import type { CounterHit, CounterHitOptions, CounterStore } from "@murmur/session";
import type { Pingable } from "./repositories.js";
import { RepositoryError } from "./errors.js";

/**
 * KEYS[1] counter key
 * ARGV[1] window in milliseconds
 * ARGV[2] "1" to push the expiry forward on every hit
 *
 * Returns { count, ttlMs }.
 */
export const HIT_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
local ttl = redis.call('PTTL', KEYS[1])
if count == 1 or ttl < 0 or ARGV[2] == '1' then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return { count, ttl }
`;

/**
 * The subset of an ioredis client this store needs.
 */
export interface RedisClientLike {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  ping(): Promise<string>;
}

export class RedisCounterStore implements CounterStore, Pingable {
  private readonly _client: RedisClientLike;

  constructor(client: RedisClientLike) {
    this._client = client;
  }

  async hit(
    key: string,
    windowMs: number,
    options?: CounterHitOptions,
  ): Promise<CounterHit> {
    const reply = await this._client.eval(
      HIT_SCRIPT,
      1,
      key,
      windowMs,
      options?.rearm === true ? "1" : "0",
    );
    return parseReply(reply);
  }

  async ping(): Promise<void> {
    await this._client.ping();
  }
}

function parseReply(reply: unknown): CounterHit {
  if (Array.isArray(reply) && reply.length === 2) {
    const [count, ttlMs]: unknown[] = reply;
    if (typeof count === "number" && typeof ttlMs === "number") {
      return { count, ttlMs };
    }
  }
  throw new RepositoryError(
    "INVALID_ROW",
    `unexpected rate-limit script reply: ${JSON.stringify(reply)}`,
  );
}
