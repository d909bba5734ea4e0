/**
 * Per-Provider Rate Limiting (Token Bucket)
 *
 * Each external provider gets its own bucket: `burst` tokens, refilled
 * at one token per `minIntervalMs`. Callers `acquire()` before every
 * request; acquisitions are served in call order, so concurrent batch
 * workers queue behind each other instead of racing for tokens.
 *
 * Limiters are never shared across providers.
 */

import type { ProviderKey, RateLimitConfig } from "../types";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RateLimiterClock {
  now?: () => number;
  sleep?: Sleep;
}

export interface RateLimiterStats {
  provider: ProviderKey;
  acquired: number;
  waited: number;
  totalWaitMs: number;
}

export class ProviderRateLimiter {
  readonly provider: ProviderKey;
  private readonly config: RateLimitConfig;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  private acquired = 0;
  private waited = 0;
  private totalWaitMs = 0;

  constructor(provider: ProviderKey, config: RateLimitConfig, clock: RateLimiterClock = {}) {
    this.provider = provider;
    this.config = { minIntervalMs: Math.max(0, config.minIntervalMs), burst: Math.max(1, config.burst) };
    this.now = clock.now ?? Date.now;
    this.sleep = clock.sleep ?? defaultSleep;
    this.tokens = this.config.burst;
    this.lastRefill = this.now();
  }

  /**
   * Resolves once the caller may issue one request.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  /**
   * Acquire, then run `fn`.
   */
  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }

  getStats(): RateLimiterStats {
    return {
      provider: this.provider,
      acquired: this.acquired,
      waited: this.waited,
      totalWaitMs: this.totalWaitMs,
    };
  }

  private async take(): Promise<void> {
    this.refill();

    if (this.tokens < 1) {
      const waitMs = Math.ceil((1 - this.tokens) * this.config.minIntervalMs);
      this.waited++;
      this.totalWaitMs += waitMs;
      await this.sleep(waitMs);
      this.refill();
    }

    this.tokens = Math.max(0, this.tokens - 1);
    this.acquired++;
  }

  private refill(): void {
    const now = this.now();
    if (this.config.minIntervalMs === 0) {
      this.tokens = this.config.burst;
    } else {
      const elapsed = Math.max(0, now - this.lastRefill);
      this.tokens = Math.min(this.config.burst, this.tokens + elapsed / this.config.minIntervalMs);
    }
    this.lastRefill = now;
  }
}

// ============================================================================
// Registry
// ============================================================================

export class RateLimiterRegistry {
  private readonly limiters = new Map<ProviderKey, ProviderRateLimiter>();

  constructor(
    private readonly configs: Record<ProviderKey, RateLimitConfig>,
    private readonly clock: RateLimiterClock = {}
  ) {}

  get(provider: ProviderKey): ProviderRateLimiter {
    let limiter = this.limiters.get(provider);
    if (!limiter) {
      limiter = new ProviderRateLimiter(provider, this.configs[provider], this.clock);
      this.limiters.set(provider, limiter);
    }
    return limiter;
  }

  getStats(): RateLimiterStats[] {
    return Array.from(this.limiters.values()).map((limiter) => limiter.getStats());
  }
}
