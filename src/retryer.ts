import type { Clock } from "./clock";
import { systemClock } from "./clock";
import { MaxRetrialsError, WaitTimeoutError } from "./errors";

/**
 * Decides whether a result means "not there yet".
 *
 * - `whileAbsent`: retry while the function resolves `undefined`
 * - `whileFalse`: retry while the function resolves `false`
 * - `custom`: retry while `test(result)` is true
 */
export type RetryPredicate<T> =
  | { kind: "whileAbsent" }
  | { kind: "whileFalse" }
  | { kind: "custom"; test: (result: T) => boolean };

export const retryWhileAbsent = { kind: "whileAbsent" } as const;
export const retryWhileFalse = { kind: "whileFalse" } as const;

/** Milliseconds to sleep after the given (1-based) attempt */
export type SleepPolicy = (attempt: number) => number;

export function constantSleep(ms: number): SleepPolicy {
  return () => ms;
}

export interface ExponentialSleepOptions {
  initialMs: number;
  /** Default: 2 */
  multiplier?: number;
  maxMs: number;
  /** Upper bound of a random extra delay added to each sleep. Default: 0 */
  jitterMs?: number;
  random?: () => number;
}

/**
 * Sleep `initialMs * multiplier^(attempt - 1)`, capped at `maxMs`. Without
 * jitter the delay never decreases from one attempt to the next.
 */
export function exponentialSleep(
  options: ExponentialSleepOptions,
): SleepPolicy {
  const { initialMs, maxMs, jitterMs = 0, random = Math.random } = options;
  const multiplier = options.multiplier ?? 2;

  return (attempt) => {
    const base = Math.min(maxMs, initialMs * multiplier ** (attempt - 1));
    return jitterMs > 0 ? base + Math.floor(random() * jitterMs) : base;
  };
}

export interface RetryerOptions {
  /** Total budget across all attempts. Unlimited when omitted. */
  maxWaitMs?: number;
  /** Retries allowed after the first attempt. Unlimited when omitted. */
  maxRetrials?: number;
  clock?: Clock;
}

export interface RetryOnResultOptions<T> {
  shouldRetryIf: RetryPredicate<T>;
  /** Fixed sleep between attempts. Ignored when `sleepPolicy` is set. */
  sleepMs?: number;
  sleepPolicy?: SleepPolicy;
}

type AttemptFunction<T> = (attempt: number) => Promise<T>;

const DEFAULT_SLEEP_MS = 1000;

/**
 * Calls a function until its result satisfies the caller, the wait budget
 * runs out, or the function throws. Errors thrown by the function are never
 * retried.
 */
export class Retryer {
  private readonly maxWaitMs?: number;
  private readonly maxRetrials?: number;
  private readonly clock: Clock;

  constructor(options: RetryerOptions = {}) {
    this.maxWaitMs = options.maxWaitMs;
    this.maxRetrials = options.maxRetrials;
    this.clock = options.clock ?? systemClock;
  }

  retryOnResult<T>(
    fn: AttemptFunction<T | undefined>,
    options: RetryOnResultOptions<T | undefined> & {
      shouldRetryIf: { kind: "whileAbsent" };
    },
  ): Promise<T>;
  retryOnResult<T>(
    fn: AttemptFunction<T>,
    options: RetryOnResultOptions<T>,
  ): Promise<T>;
  async retryOnResult<T>(
    fn: AttemptFunction<T>,
    options: RetryOnResultOptions<T>,
  ): Promise<T> {
    const sleepPolicy =
      options.sleepPolicy ?? constantSleep(options.sleepMs ?? DEFAULT_SLEEP_MS);
    const startedAt = this.clock.now();

    for (let attempt = 1; ; attempt++) {
      const result = await fn(attempt);

      if (!shouldRetry(options.shouldRetryIf, result)) {
        return result;
      }

      if (this.maxRetrials !== undefined && attempt > this.maxRetrials) {
        throw new MaxRetrialsError(this.maxRetrials);
      }

      const sleepMs = sleepPolicy(attempt);
      const elapsedMs = this.clock.now() - startedAt;

      if (
        this.maxWaitMs !== undefined &&
        elapsedMs + sleepMs > this.maxWaitMs
      ) {
        throw new WaitTimeoutError(this.maxWaitMs);
      }

      await this.clock.sleep(sleepMs);
    }
  }
}

function shouldRetry<T>(predicate: RetryPredicate<T>, result: T): boolean {
  switch (predicate.kind) {
    case "whileAbsent":
      return result === undefined;
    case "whileFalse":
      return result === false;
    case "custom":
      return predicate.test(result);
  }
}
