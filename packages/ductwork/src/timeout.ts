/**
 * ductwork/timeout
 *
 * Race a primitive against a deadline.
 *
 * Promises cannot be cancelled, so the inner call keeps running after the
 * deadline wins. Its eventual result is dropped; a late rejection is
 * reported as a `timeout_orphan_error` event.
 *
 * @example
 * ```typescript
 * const quick = withTimeout(searchIndex, { ms: "250ms", fallback: emptyResults, track: true });
 * ```
 */

import { TimeoutError } from "./errors";
import { MAX_TIMER_MS, resolveDuration, type DurationInput } from "./duration";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

// =============================================================================
// Types
// =============================================================================

export interface TimeoutOptions<I, O> {
  /** Deadline for the inner call */
  ms: DurationInput;
  /** Executed with the same input and context when the deadline wins */
  fallback?: Primitive<I, O>;
  /**
   * Append `{ primitive, ms, hadFallback, ts }` to `state["timeoutHistory"]`
   * and increment `state["timeoutCount"]` on every timeout. When off, neither
   * key is written.
   */
  track?: boolean;
  name?: string;
}

export interface TimeoutRecord {
  primitive: string;
  ms: number;
  hadFallback: boolean;
  ts: number;
}

export interface TimeoutStats {
  /** Inner call finished before the deadline */
  successes: number;
  /** Inner call rejected before the deadline */
  failures: number;
  timeouts: number;
  /** `timeouts / (successes + failures + timeouts)`, 0 before the first call */
  timeoutRate: number;
}

export type TimeoutPrimitive<I, O> = KindedPrimitive<I, O, "timeout"> & {
  readonly ms: number;
  getStats(): TimeoutStats;
};

const TIMED_OUT: unique symbol = Symbol("timed-out");

// =============================================================================
// withTimeout()
// =============================================================================

/**
 * Fail, or switch to `fallback`, when `inner` does not settle within `ms`.
 *
 * @throws ConfigurationError when `ms` is not a positive duration a timer can wait for
 */
export function withTimeout<I, O>(
  inner: Primitive<I, O>,
  options: TimeoutOptions<I, O>
): TimeoutPrimitive<I, O> {
  const ms = resolveDuration("timeout", "ms", options.ms, { positive: true, max: MAX_TIMER_MS });

  const { fallback, track = false } = options;
  const source = { kind: "timeout", name: options.name ?? `timeout(${inner.name})` };
  const stats = { successes: 0, failures: 0, timeouts: 0 };

  const primitive = definePrimitive({
    kind: "timeout",
    name: source.name,
    checkpoints: true,
    execute: async (input: I, context): Promise<O> => {
      const operation = inner.execute(input, context);

      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
        timeoutId = setTimeout(() => resolve(TIMED_OUT), ms);
      });

      let winner: Awaited<O> | typeof TIMED_OUT;
      try {
        winner = await Promise.race([operation, deadline]);
      } catch (error) {
        stats.failures++;
        throw error;
      } finally {
        clearTimeout(timeoutId);
      }

      if (winner !== TIMED_OUT) {
        stats.successes++;
        return winner;
      }

      stats.timeouts++;
      void operation.catch((error: unknown) => {
        context.emit({
          ...eventBase(context, source),
          type: "timeout_orphan_error",
          ms,
          error,
        });
      });

      const hadFallback = fallback !== undefined;
      context.emit({ ...eventBase(context, source), type: "timeout", ms, hadFallback });
      if (track) {
        const record: TimeoutRecord = {
          primitive: inner.name,
          ms,
          hadFallback,
          ts: context.now(),
        };
        context.state.append("timeoutHistory", record);
        context.state.increment("timeoutCount");
      }

      if (!fallback) {
        throw new TimeoutError({ ms, primitive: inner.name });
      }
      context.checkpoint("timeout.fallback.start");
      return fallback.execute(input, context);
    },
  });

  return {
    ...primitive,
    ms,
    getStats() {
      const total = stats.successes + stats.failures + stats.timeouts;
      return { ...stats, timeoutRate: total === 0 ? 0 : stats.timeouts / total };
    },
  };
}
