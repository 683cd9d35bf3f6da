/**
 * ductwork/retry
 *
 * Re-run a failing primitive with backoff between attempts.
 *
 * @example
 * ```typescript
 * const resilientFetch = retry(fetchUser, {
 *   maxRetries: 2,
 *   backoffBase: "100ms",
 *   backoff: "exponential",
 *   retryOn: (error) => !isValidationError(error),
 * });
 * ```
 */

import { ConfigurationError, errorType } from "./errors";
import { MAX_TIMER_MS, resolveDuration, sleep, type DurationInput } from "./duration";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

// =============================================================================
// Types
// =============================================================================

export type BackoffStrategy = "fixed" | "linear" | "exponential";

export interface RetryStrategyOptions {
  /**
   * Additional attempts after the first one.
   * @default 3
   */
  maxRetries?: number;
  /**
   * Delay before the first retry; later delays grow from it per `backoff`.
   * @default 1000
   */
  backoffBase?: DurationInput;
  /** @default "exponential" */
  backoff?: BackoffStrategy;
  /**
   * Upper bound for any single delay, applied before jitter.
   * @default "30s"
   */
  maxDelay?: DurationInput;
  /**
   * Add a random 0-25% on top of each delay.
   * @default false
   */
  jitter?: boolean;
  /**
   * Return false to treat an error as terminal. `attempt` is the 1-based
   * number of the attempt that failed.
   */
  retryOn?: (error: unknown, attempt: number) => boolean;
}

/**
 * Resolved retry configuration.
 */
export interface RetryStrategy {
  readonly maxRetries: number;
  /** Delay in ms after the given failed attempt (1-based) */
  delayFor(attempt: number): number;
  shouldRetry(error: unknown, attempt: number): boolean;
}

export interface RetryOptions {
  name?: string;
  /**
   * Append `{ primitive, attempts, success, errorType? }` to
   * `context.state["retryStatistics"]` after every call.
   */
  trackStats?: boolean;
}

export interface RetryStatistic {
  primitive: string;
  attempts: number;
  success: boolean;
  errorType?: string;
}

// =============================================================================
// Strategy
// =============================================================================

/**
 * Build a `RetryStrategy`, validating every option.
 *
 * @throws ConfigurationError for a negative or fractional `maxRetries`, or a delay that is
 * unparseable, negative or longer than a timer can wait
 */
export function createRetryStrategy(options: RetryStrategyOptions = {}): RetryStrategy {
  const maxRetries = options.maxRetries ?? 3;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ConfigurationError({
      primitive: "retry",
      reason: `maxRetries must be a non-negative integer, got ${maxRetries}`,
    });
  }

  const base = resolveDuration("retry", "backoffBase", options.backoffBase ?? 1000, { max: MAX_TIMER_MS });
  const maxDelay = resolveDuration("retry", "maxDelay", options.maxDelay ?? "30s", { max: MAX_TIMER_MS });
  const backoff = options.backoff ?? "exponential";
  const retryOn = options.retryOn;

  return {
    maxRetries,

    delayFor(attempt) {
      let delay: number;
      switch (backoff) {
        case "fixed":
          delay = base;
          break;
        case "linear":
          delay = base * attempt;
          break;
        case "exponential":
          delay = base * Math.pow(2, attempt - 1);
          break;
      }

      delay = Math.min(delay, maxDelay);

      if (options.jitter) {
        delay = delay + delay * 0.25 * Math.random();
      }

      return Math.min(Math.floor(delay), MAX_TIMER_MS);
    },

    shouldRetry: (error, attempt) => (retryOn ? retryOn(error, attempt) : true),
  };
}

function isRetryStrategy(value: RetryStrategy | RetryStrategyOptions): value is RetryStrategy {
  return "delayFor" in value && typeof value.delayFor === "function";
}

// =============================================================================
// retry()
// =============================================================================

/**
 * Wrap a primitive so failures are retried up to `maxRetries` more times.
 *
 * Attempts run one after another with the strategy's delay in between. When
 * attempts run out, or `retryOn` marks an error terminal, the last error is
 * re-thrown exactly as the inner primitive threw it.
 *
 * @example
 * ```typescript
 * const strategy = createRetryStrategy({ maxRetries: 2, backoffBase: 50, backoff: "fixed" });
 * const flaky = retry(callPartner, strategy, { trackStats: true });
 * ```
 */
export function retry<I, O>(
  inner: Primitive<I, O>,
  strategy: RetryStrategy | RetryStrategyOptions = {},
  options: RetryOptions = {}
): KindedPrimitive<I, O, "retry"> {
  const resolved = isRetryStrategy(strategy) ? strategy : createRetryStrategy(strategy);
  const maxAttempts = resolved.maxRetries + 1;
  const source = { kind: "retry", name: options.name ?? `retry(${inner.name})` };

  return definePrimitive({
    kind: "retry",
    name: source.name,
    checkpoints: true,
    execute: async (input: I, context): Promise<O> => {
      const record = (attempts: number, failure?: { error: unknown }) => {
        if (!options.trackStats) return;
        const statistic: RetryStatistic = failure
          ? { primitive: inner.name, attempts, success: false, errorType: errorType(failure.error) }
          : { primitive: inner.name, attempts, success: true };
        context.state.append("retryStatistics", statistic);
      };

      for (let attempt = 1; ; attempt++) {
        try {
          const output = await inner.execute(input, context);
          record(attempt);
          return output;
        } catch (error) {
          if (attempt >= maxAttempts) {
            context.emit({
              ...eventBase(context, source),
              type: "retry_exhausted",
              attempts: attempt,
              error,
            });
            record(attempt, { error });
            throw error;
          }

          if (!resolved.shouldRetry(error, attempt)) {
            context.emit({
              ...eventBase(context, source),
              type: "retry_aborted",
              attempt,
              error,
            });
            record(attempt, { error });
            throw error;
          }

          const delayMs = resolved.delayFor(attempt);
          context.emit({
            ...eventBase(context, source),
            type: "retry_attempt",
            attempt,
            maxAttempts,
            delayMs,
            error,
          });
          await sleep(delayMs);
        }
      }
    },
  });
}
