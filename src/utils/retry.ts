import { setTimeout as delay } from "node:timers/promises";

export type JitterFn = (delayMs: number) => number;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter?: JitterFn;
  sleep?: SleepFn;
}

export interface RetryHooks {
  signal?: AbortSignal;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Keeps half of the delay and randomizes the other half. */
export const equalJitter: JitterFn = (delayMs) => delayMs / 2 + Math.random() * (delayMs / 2);

export const noJitter: JitterFn = (delayMs) => delayMs;

const abortableSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class RetryPolicy {
  readonly maxAttempts: number;

  private readonly jitter: JitterFn;

  private readonly sleep: SleepFn;

  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer.");
    }
    this.maxAttempts = options.maxAttempts;
    this.jitter = options.jitter ?? equalJitter;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /** Backoff before retry number `attempt` (1 = first retry). */
  delayFor(attempt: number): number {
    const exponential = this.options.baseDelayMs * 2 ** Math.max(0, attempt - 1);
    const capped = Math.min(this.options.maxDelayMs, exponential);
    return Math.max(0, Math.round(this.jitter(capped)));
  }

  /**
   * Runs `operation` until it succeeds, throws a non-retryable error, or
   * `maxAttempts` is reached. The last error is rethrown unchanged.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    hooks: RetryHooks,
  ): Promise<T> {
    let attempt = 1;
    while (true) {
      hooks.signal?.throwIfAborted();
      try {
        return await operation(attempt);
      } catch (error) {
        if (hooks.signal?.aborted || attempt >= this.maxAttempts || !hooks.isRetryable(error)) {
          throw error;
        }
        const waitMs = this.delayFor(attempt);
        hooks.onRetry?.(error, attempt, waitMs);
        await this.sleep(waitMs, hooks.signal);
        attempt += 1;
      }
    }
  }
}
