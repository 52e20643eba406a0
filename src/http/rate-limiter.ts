/**
 * Token-bucket rate limiter.
 * One instance per external service; callers share it across concurrent fetches.
 *
 * Capacity equals the rate (requests/second), but never less than one token,
 * and the bucket starts full.
 * Tokens refill continuously in proportion to elapsed time.
 */

export interface RateLimiterOptions {
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Lower bound on a single wait, so float rounding cannot spin the loop. */
const MIN_WAIT_MS = 1;

export class RateLimiter {
  readonly rate: number;
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  // Acquisitions run one at a time, in call order
  private queue: Promise<void> = Promise.resolve();

  constructor(requestsPerSecond: number, options: RateLimiterOptions = {}) {
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`Rate must be positive, got ${requestsPerSecond}`);
    }
    this.rate = requestsPerSecond;
    this.capacity = Math.max(1, requestsPerSecond);
    this.tokens = this.capacity;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.lastRefill = this.now();
  }

  /**
   * Resolve once a token is available, consuming it.
   * Never rejects; a caller may wait arbitrarily long under contention.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    // A failed turn must not block later callers
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  /** Tokens currently in the bucket, after refill. */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.rate);
    this.lastRefill = now;
  }

  private async take(): Promise<void> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = ((1 - this.tokens) / this.rate) * 1000;
      await this.sleep(Math.max(MIN_WAIT_MS, Math.ceil(waitMs)));
    }
  }
}
