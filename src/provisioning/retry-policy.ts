export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** What one attempt concluded: finished with a value, or not ready yet. */
export type AttemptVerdict<T> = { done: true; value: T } | { done: false; reason: string };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; lastReason: string };

export interface RetryPolicyOptions {
  maxAttempts: number;
  intervalMs: number;
  /** Injected by tests so no real time passes. */
  sleep?: Sleep;
}

/**
 * Bounded attempt loop shared by the health checker and the shutdown/start
 * waiters. Sleeps `intervalMs` between attempts, never after the last one.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly intervalMs: number;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    if (options.intervalMs < 0) {
      throw new RangeError(`intervalMs must not be negative, got ${options.intervalMs}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Policy covering `timeoutSeconds` with one attempt per poll interval, plus one at time zero. */
  static forTimeout(timeoutSeconds: number, pollIntervalSeconds: number, sleep?: Sleep): RetryPolicy {
    const maxAttempts = Math.floor(timeoutSeconds / pollIntervalSeconds) + 1;
    return new RetryPolicy({ maxAttempts, intervalMs: pollIntervalSeconds * 1000, sleep });
  }

  async run<T>(attempt: (n: number) => Promise<AttemptVerdict<T>>): Promise<RetryResult<T>> {
    let lastReason = "no attempt made";
    for (let n = 1; n <= this.maxAttempts; n++) {
      const verdict = await attempt(n);
      if (verdict.done) {
        return { ok: true, value: verdict.value, attempts: n };
      }
      lastReason = verdict.reason;
      if (n < this.maxAttempts) {
        await this.sleep(this.intervalMs);
      }
    }
    return { ok: false, attempts: this.maxAttempts, lastReason };
  }
}
