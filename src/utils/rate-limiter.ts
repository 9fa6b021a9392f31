import { setTimeout as sleep } from "node:timers/promises";

export interface RateLimiterOptions {
  /** Minimum spacing between granted requests; 0 disables limiting */
  minIntervalMs: number;
  /** Requests that may be granted back to back before spacing applies */
  burst?: number;
  /** Injectable clock (ms) */
  now?: () => number;
  /** Injectable delay */
  wait?: (ms: number) => Promise<unknown>;
}

/**
 * Token bucket that refills one token every `minIntervalMs`.
 * Callers `await acquire()` before each upstream request.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<unknown>;
  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.intervalMs = Math.max(0, options.minIntervalMs);
    this.capacity = Math.max(1, options.burst ?? 1);
    this.now = options.now ?? (() => performance.now());
    this.wait = options.wait ?? ((ms: number) => sleep(ms));
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  get enabled(): boolean {
    return this.intervalMs > 0;
  }

  /**
   * Resolve once a token is available. Concurrent callers are served in
   * call order.
   */
  acquire(): Promise<void> {
    if (!this.enabled) return Promise.resolve();
    const next = this.queue.then(() => this.take());
    this.queue = next;
    return next;
  }

  private async take(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      const elapsed = this.now() - this.lastRefill;
      await this.wait(Math.max(0, this.intervalMs - elapsed));
      this.refill();
      // the injected clock may not have moved; the wait itself paid for the token
      if (this.tokens < 1) {
        this.tokens = 1;
        this.lastRefill = this.now();
      }
    }
    this.tokens -= 1;
  }

  private refill(): void {
    const current = this.now();
    const earned = Math.floor((current - this.lastRefill) / this.intervalMs);
    if (earned <= 0) return;
    this.tokens += earned;
    if (this.tokens >= this.capacity) {
      // a full bucket keeps no partial interval as credit
      this.tokens = this.capacity;
      this.lastRefill = current;
    } else {
      this.lastRefill += earned * this.intervalMs;
    }
  }
}
