/**
 * ductwork/circuit-breaker
 *
 * Stop calling a primitive that keeps failing, then try it again after a
 * cooldown.
 *
 * States:
 * - CLOSED: calls pass through; consecutive failures are counted
 * - OPEN: calls are rejected with `CircuitOpenError` without reaching the inner primitive
 * - HALF_OPEN: up to `halfOpenMaxCalls` trial calls pass through
 *
 * Flow:
 * CLOSED → (failures >= threshold) → OPEN
 * OPEN → (resetTimeout elapsed) → HALF_OPEN
 * HALF_OPEN → (trial success) → CLOSED
 * HALF_OPEN → (trial failure) → OPEN
 *
 * @example
 * ```typescript
 * const payments = circuitBreaker(chargeCard, {
 *   failureThreshold: 5,
 *   resetTimeout: "30s",
 * });
 * ```
 */

import type { Context } from "./context";
import { CircuitOpenError, ConfigurationError } from "./errors";
import { resolveDuration, type DurationInput } from "./duration";
import type { CircuitState } from "./events";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

// =============================================================================
// Types
// =============================================================================

export interface CircuitBreakerOptions {
  /**
   * Consecutive failures that open the circuit.
   * @default 5
   */
  failureThreshold?: number;
  /**
   * How long the circuit stays OPEN before letting trials through.
   * @default "60s"
   */
  resetTimeout?: DurationInput;
  /**
   * Concurrent trial calls allowed while HALF_OPEN.
   * @default 1
   */
  halfOpenMaxCalls?: number;
  /** @default Date.now */
  clock?: () => number;
  name?: string;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  /** Consecutive failures counted while CLOSED */
  consecutiveFailures: number;
  successes: number;
  failures: number;
  /** Calls rejected without reaching the inner primitive */
  rejections: number;
  /** Times the circuit went from CLOSED or HALF_OPEN to OPEN */
  trips: number;
}

export type CircuitBreakerPrimitive<I, O> = KindedPrimitive<I, O, "circuit_breaker"> & {
  getState(): CircuitState;
  getStats(): CircuitBreakerStats;
  /** Force the circuit CLOSED and clear the failure count */
  reset(): void;
};

function positiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError({
      primitive: "circuit_breaker",
      reason: `${field} must be a positive integer, got ${value}`,
    });
  }
  return value;
}

// =============================================================================
// circuitBreaker()
// =============================================================================

/**
 * Guard a primitive with a circuit breaker.
 *
 * Breaker state lives in the returned primitive and is shared by every caller
 * and context that uses it.
 *
 * @throws ConfigurationError for a non-positive threshold or trial count
 */
export function circuitBreaker<I, O>(
  inner: Primitive<I, O>,
  options: CircuitBreakerOptions = {}
): CircuitBreakerPrimitive<I, O> {
  const failureThreshold = positiveInteger("failureThreshold", options.failureThreshold ?? 5);
  const halfOpenMaxCalls = positiveInteger("halfOpenMaxCalls", options.halfOpenMaxCalls ?? 1);
  const resetTimeout = resolveDuration("circuit_breaker", "resetTimeout", options.resetTimeout ?? "60s");

  const clock = options.clock ?? Date.now;
  const source = { kind: "circuit_breaker", name: options.name ?? `circuit(${inner.name})` };

  let state: CircuitState = "CLOSED";
  let openedAt = 0;
  let consecutiveFailures = 0;
  let trialsInFlight = 0;
  const counters = { successes: 0, failures: 0, rejections: 0, trips: 0 };

  const transition = (to: CircuitState, context?: Context) => {
    if (state === to) return;
    const from = state;
    state = to;
    if (to === "OPEN") {
      openedAt = clock();
      counters.trips++;
    }
    if (to === "CLOSED") consecutiveFailures = 0;
    context?.emit({ ...eventBase(context, source), type: "circuit_state_change", from, to });
  };

  // OPEN becomes HALF_OPEN lazily, on the first look after the cooldown
  const refresh = (context?: Context): CircuitState => {
    if (state === "OPEN" && clock() >= openedAt + resetTimeout) {
      transition("HALF_OPEN", context);
    }
    return state;
  };

  const primitive = definePrimitive({
    kind: "circuit_breaker",
    name: source.name,
    checkpoints: true,
    execute: async (input: I, context): Promise<O> => {
      const current = refresh(context);

      if (current === "OPEN") {
        counters.rejections++;
        throw new CircuitOpenError({
          circuit: source.name,
          retryAfterMs: Math.max(0, openedAt + resetTimeout - clock()),
        });
      }
      if (current === "HALF_OPEN" && trialsInFlight >= halfOpenMaxCalls) {
        counters.rejections++;
        throw new CircuitOpenError({ circuit: source.name, retryAfterMs: 0 });
      }

      const isTrial = current === "HALF_OPEN";
      if (isTrial) trialsInFlight++;

      try {
        const output = await inner.execute(input, context);
        counters.successes++;
        if (isTrial) {
          transition("CLOSED", context);
        } else if (state === "CLOSED") {
          consecutiveFailures = 0;
        }
        return output;
      } catch (error) {
        counters.failures++;
        if (isTrial) {
          transition("OPEN", context);
        } else if (state === "CLOSED") {
          consecutiveFailures++;
          if (consecutiveFailures >= failureThreshold) transition("OPEN", context);
        }
        throw error;
      } finally {
        if (isTrial) trialsInFlight = Math.max(0, trialsInFlight - 1);
      }
    },
  });

  return {
    ...primitive,

    getState: () => refresh(),

    getStats: () => ({ state: refresh(), consecutiveFailures, ...counters }),

    reset() {
      state = "CLOSED";
      openedAt = 0;
      consecutiveFailures = 0;
      trialsInFlight = 0;
    },
  };
}
