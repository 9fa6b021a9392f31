export type Clock = () => number;

/** Monotonic milliseconds */
export const systemClock: Clock = () => performance.now();

/**
 * Measures wall time in seconds from construction, with named laps.
 */
export class Stopwatch {
  private readonly startedAt: number;

  constructor(private readonly clock: Clock = systemClock) {
    this.startedAt = clock();
  }

  /** Seconds since construction */
  elapsed(): number {
    return (this.clock() - this.startedAt) / 1000;
  }

  /** Run `fn` and return its value with the seconds it took */
  async lap<T>(fn: () => Promise<T>): Promise<{ value: T; seconds: number }> {
    const start = this.clock();
    const value = await fn();
    return { value, seconds: (this.clock() - start) / 1000 };
  }
}
