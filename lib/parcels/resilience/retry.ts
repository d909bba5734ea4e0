/**
 * Retry with Capped Exponential Backoff
 *
 * delay(n) = min(initialDelayMs * backoffMultiplier^(n-1), maxDelayMs)
 *
 * Retries are decided by the caller: a predicate sees each outcome
 * (value or thrown error) and says whether another attempt is worth it.
 * The resolver reports failures as values, so the batch runner retries
 * on `{ resolutionStatus: "ERROR", failure.retryable }` results rather
 * than on exceptions.
 */

import { toErrorMessage } from "../errors";
import type { RetryConfig } from "../types";
import { defaultSleep, type Sleep } from "./rate-limiter";

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface RetryAttempt {
  attemptNumber: number;
  delayMs: number;
  retryable: boolean;
  error?: string;
}

export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: unknown;

  constructor(attempts: readonly RetryAttempt[], lastError: unknown) {
    super(`Retry exhausted after ${attempts.length} attempts: ${toErrorMessage(lastError)}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export interface ExecuteOptions<T> {
  shouldRetry: (outcome: AttemptOutcome<T>) => boolean;
  onRetry?: (attempt: RetryAttempt) => void;
}

export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly sleep: Sleep;

  constructor(config: RetryConfig, options: { sleep?: Sleep } = {}) {
    this.config = { ...config, maxAttempts: Math.max(1, config.maxAttempts) };
    this.sleep = options.sleep ?? defaultSleep;
  }

  delayFor(attemptNumber: number): number {
    const exponential = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attemptNumber - 1);
    return Math.max(0, Math.min(exponential, this.config.maxDelayMs));
  }

  /**
   * Run `fn` until `shouldRetry` declines or attempts run out.
   *
   * Returns the last value. If the last attempt threw, throws
   * RetryExhaustedError carrying the attempt log.
   */
  async execute<T>(fn: (attemptNumber: number) => Promise<T>, options: ExecuteOptions<T>): Promise<RetryResult<T>> {
    const attempts: RetryAttempt[] = [];

    for (let attemptNumber = 1; ; attemptNumber++) {
      let outcome: AttemptOutcome<T>;
      try {
        outcome = { ok: true, value: await fn(attemptNumber) };
      } catch (error) {
        outcome = { ok: false, error };
      }

      const retryable = options.shouldRetry(outcome);
      const last = !retryable || attemptNumber >= this.config.maxAttempts;
      const attempt: RetryAttempt = {
        attemptNumber,
        delayMs: last ? 0 : this.delayFor(attemptNumber),
        retryable,
        ...(outcome.ok ? {} : { error: toErrorMessage(outcome.error) }),
      };
      attempts.push(attempt);

      if (last) {
        if (outcome.ok) {
          return { value: outcome.value, attempts: attemptNumber };
        }
        throw new RetryExhaustedError(attempts, outcome.error);
      }

      options.onRetry?.(attempt);
      await this.sleep(attempt.delayMs);
    }
  }
}
