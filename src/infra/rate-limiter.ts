/**
 * In-process request rate limiter for outbound model calls.
 *
 * A token bucket that refills at `requestsPerSecond`. Callers `acquire()`
 * a token before each request; when none is available the caller polls
 * every `checkEveryNSeconds` until one is. The bucket starts empty, so
 * the very first request waits roughly one refill interval as well.
 *
 * One limiter is created per graph build and shared by every node in that
 * graph. It only throttles callers within a single process.
 *
 * Usage:
 *
 *   const limiter = new InMemoryRateLimiter({ requestsPerSecond: 8.3 });
 *   await limiter.acquire();
 *   const reply = await model.invoke(messages);
 */

import { setTimeout as sleep } from "node:timers/promises";

export const DEFAULT_REQUESTS_PER_SECOND = 8.3;
export const DEFAULT_CHECK_EVERY_N_SECONDS = 0.1;
export const DEFAULT_MAX_BUCKET_SIZE = 1;

export interface RateLimiterOptions {
  /** Sustained request rate. */
  requestsPerSecond?: number;
  /** Polling interval while waiting for a token. */
  checkEveryNSeconds?: number;
  /** Upper bound on tokens that can accumulate while idle (burst size). */
  maxBucketSize?: number;
  /** Millisecond clock. Injected by tests. */
  now?: () => number;
  /** Delay function. Injected by tests. */
  sleep?: (milliseconds: number) => Promise<unknown>;
}

/** Anything that can gate a request. */
export interface RequestRateLimiter {
  acquire(): Promise<void>;
}

export class InMemoryRateLimiter implements RequestRateLimiter {
  readonly requestsPerSecond: number;
  readonly checkEveryNSeconds: number;
  readonly maxBucketSize: number;

  private availableTokens = 0;
  private lastRefill: number | null = null;
  private readonly now: () => number;
  private readonly sleep: (milliseconds: number) => Promise<unknown>;

  constructor(options: RateLimiterOptions = {}) {
    this.requestsPerSecond = options.requestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND;
    this.checkEveryNSeconds = options.checkEveryNSeconds ?? DEFAULT_CHECK_EVERY_N_SECONDS;
    this.maxBucketSize = options.maxBucketSize ?? DEFAULT_MAX_BUCKET_SIZE;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((milliseconds) => sleep(milliseconds));

    if (!(this.requestsPerSecond > 0)) {
      throw new RangeError(
        `requestsPerSecond must be positive (got ${this.requestsPerSecond})`,
      );
    }
    if (!(this.checkEveryNSeconds > 0)) {
      throw new RangeError(
        `checkEveryNSeconds must be positive (got ${this.checkEveryNSeconds})`,
      );
    }
    if (!(this.maxBucketSize >= 1)) {
      throw new RangeError(
        `maxBucketSize must be at least 1 (got ${this.maxBucketSize})`,
      );
    }
  }

  /**
   * Take one token if available.
   *
   * Tokens are only added once at least one whole token has accrued
   * since the last refill; fractional progress is kept by not moving
   * the refill timestamp.
   */
  tryAcquire(): boolean {
    const now = this.now();
    if (this.lastRefill === null) {
      this.lastRefill = now;
    }

    const elapsedSeconds = (now - this.lastRefill) / 1000;
    if (elapsedSeconds * this.requestsPerSecond >= 1) {
      this.availableTokens += elapsedSeconds * this.requestsPerSecond;
      this.lastRefill = now;
    }
    this.availableTokens = Math.min(this.availableTokens, this.maxBucketSize);

    if (this.availableTokens >= 1) {
      this.availableTokens -= 1;
      return true;
    }
    return false;
  }

  /** Wait until a token is available, then take it. */
  async acquire(): Promise<void> {
    while (!this.tryAcquire()) {
      await this.sleep(this.checkEveryNSeconds * 1000);
    }
  }
}
