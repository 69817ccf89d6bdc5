import { setTimeout as sleep } from "node:timers/promises";

export type RetryPolicyOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** 0..1, fraction of each delay that may be randomly shaved off */
  jitter?: number;
  random?: () => number;
};

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0.2));
    this.random = options.random ?? Math.random;
  }

  /** Attempts happen back to back. */
  static immediate(maxAttempts: number): RetryPolicy {
    return new RetryPolicy({ maxAttempts, baseDelayMs: 0, jitter: 0 });
  }

  /** Delay before retry number `attempt` (1 = the wait after the first failure). */
  delayFor(attempt: number): number {
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** Math.max(0, attempt - 1));
    return Math.round(exponential * (1 - this.jitter * this.random()));
  }
}

export type RetryOptions = {
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
};

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`gave up after ${attempts} attempt(s)`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Runs `fn` until it resolves, a non-retryable error is thrown, or the
 * policy's attempt budget is spent (then throws RetryExhaustedError).
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const { shouldRetry = () => true, onRetry, signal } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      if (!shouldRetry(err)) throw err;
      lastError = err;
      if (attempt === policy.maxAttempts) break;

      const delay = policy.delayFor(attempt);
      onRetry?.(err, attempt, delay);
      if (delay > 0) await sleep(delay, undefined, { signal });
    }
  }
  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
