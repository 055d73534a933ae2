/**
 * Fixed-window admission control per client IP.
 *
 * Each client gets a counter keyed `rl:ip:<ip>`. The first hit of a
 * window opens it with an absolute expiry; later hits only increment.
 * Once the count exceeds the limit, requests are refused until the
 * counter expires.
 */

// =============================================================================
// Counter Store
// =============================================================================

export interface CounterHit {
  /** Count after this hit */
  readonly count: number;
  /** Milliseconds until the window closes */
  readonly ttlMs: number;
}

export interface CounterHitOptions {
  /** Push the expiry forward on every hit instead of once per window */
  readonly rearm?: boolean | undefined;
}

/**
 * An atomic increment-and-read counter with per-key expiry.
 *
 * Implementations must perform the increment, the expiry decision and
 * the TTL read as one atomic step.
 */
export interface CounterStore {
  hit(
    key: string,
    windowMs: number,
    options?: CounterHitOptions,
  ): Promise<CounterHit>;
}

interface Counter {
  count: number;
  expiresAt: number;
}

/**
 * Single-process counter store.
 *
 * Used in tests and local development; production runs against Redis.
 */
export class InMemoryCounterStore implements CounterStore {
  private readonly _counters = new Map<string, Counter>();
  private readonly _now: () => number;
  private _nextSweepAt = 0;

  constructor(now: () => number = Date.now) {
    this._now = now;
  }

  hit(
    key: string,
    windowMs: number,
    options?: CounterHitOptions,
  ): Promise<CounterHit> {
    const now = this._now();
    if (now >= this._nextSweepAt) {
      this.sweep(now);
      this._nextSweepAt = now + windowMs;
    }
    let counter = this._counters.get(key);

    if (counter === undefined || counter.expiresAt <= now) {
      counter = { count: 0, expiresAt: now + windowMs };
      this._counters.set(key, counter);
    } else if (options?.rearm === true) {
      counter.expiresAt = now + windowMs;
    }

    counter.count += 1;
    return Promise.resolve({
      count: counter.count,
      ttlMs: counter.expiresAt - now,
    });
  }

  /** Drop every counter whose window has closed */
  sweep(now: number = this._now()): void {
    for (const [key, counter] of this._counters) {
      if (counter.expiresAt <= now) this._counters.delete(key);
    }
  }

  get size(): number {
    return this._counters.size;
  }

  clear(): void {
    this._counters.clear();
    this._nextSweepAt = 0;
  }
}

// =============================================================================
// Limiter
// =============================================================================

export interface RateLimiterConfig {
  /** Requests admitted per window */
  readonly limit: number;
  readonly windowMs: number;
  readonly rearm?: boolean | undefined;
}

export interface Admission {
  readonly allowed: boolean;
  readonly limit: number;
  readonly count: number;
  readonly remaining: number;
  /** Whole seconds until the window closes; 0 when admitted */
  readonly retryAfterSeconds: number;
}

export function rateLimitKey(clientIp: string): string {
  return `rl:ip:${clientIp}`;
}

export class RateLimiter {
  private readonly _store: CounterStore;
  private readonly _config: RateLimiterConfig;

  constructor(store: CounterStore, config: RateLimiterConfig) {
    if (!Number.isInteger(config.limit) || config.limit < 1) {
      throw new Error(`Rate limit must be a positive integer, got ${config.limit}`);
    }
    if (config.windowMs <= 0) {
      throw new Error(`Rate limit window must be positive, got ${config.windowMs}`);
    }
    this._store = store;
    this._config = config;
  }

  /**
   * Count one request from `clientIp` and decide whether to admit it.
   *
   * Store failures propagate; the caller must not admit on error.
   */
  async admit(clientIp: string): Promise<Admission> {
    const { limit, windowMs, rearm } = this._config;
    const { count, ttlMs } = await this._store.hit(
      rateLimitKey(clientIp),
      windowMs,
      { rearm },
    );

    if (count > limit) {
      return {
        allowed: false,
        limit,
        count,
        remaining: 0,
        retryAfterSeconds: Math.max(1, Math.ceil(ttlMs / 1000)),
      };
    }

    return {
      allowed: true,
      limit,
      count,
      remaining: limit - count,
      retryAfterSeconds: 0,
    };
  }

  get limit(): number {
    return this._config.limit;
  }
}
