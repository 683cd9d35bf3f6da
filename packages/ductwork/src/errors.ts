/**
 * ductwork/errors
 *
 * Errors raised by the primitive runtime itself. Everything else a pipeline
 * throws comes from the primitives it wraps and travels through untouched.
 *
 * @example
 * ```typescript
 * try {
 *   await pipeline.execute(input, ctx);
 * } catch (error) {
 *   if (isTimeoutError(error)) {
 *     console.error(`${error.primitive} timed out after ${error.ms}ms`);
 *   }
 * }
 * ```
 */

import { TaggedError, isTaggedError } from "./tagged-error";

// =============================================================================
// ConfigurationError
// =============================================================================

/**
 * Thrown while building a primitive graph when options are invalid,
 * e.g. an empty `sequential([])` or a negative retry count.
 *
 * @example
 * ```typescript
 * const error = new ConfigurationError({ primitive: "sequential", reason: "requires at least one stage" });
 * console.log(error.message); // "ConfigurationError: sequential requires at least one stage"
 * ```
 */
export class ConfigurationError extends TaggedError("ConfigurationError") {
  /** Kind of primitive being configured */
  readonly primitive: string;
  /** What was wrong with the configuration */
  readonly reason: string;

  constructor(props: { primitive: string; reason: string }) {
    super(`ConfigurationError: ${props.primitive} ${props.reason}`);
    this.primitive = props.primitive;
    this.reason = props.reason;
  }
}

// =============================================================================
// TimeoutError
// =============================================================================

/**
 * Thrown by `withTimeout()` when the deadline wins and no fallback is configured.
 *
 * @example
 * ```typescript
 * const error = new TimeoutError({ primitive: "fetchUser", ms: 100 });
 * console.log(error.message); // "TimeoutError: fetchUser timed out after 100ms"
 * ```
 */
export class TimeoutError extends TaggedError("TimeoutError") {
  /** Configured deadline in milliseconds */
  readonly ms: number;
  /** Name of the wrapped primitive */
  readonly primitive?: string;

  constructor(props: { ms: number; primitive?: string }) {
    super(
      props.primitive
        ? `TimeoutError: ${props.primitive} timed out after ${props.ms}ms`
        : `TimeoutError: Operation timed out after ${props.ms}ms`
    );
    this.ms = props.ms;
    this.primitive = props.primitive;
  }
}

// =============================================================================
// CircuitOpenError
// =============================================================================

/**
 * Thrown by `circuitBreaker()` while the circuit rejects calls.
 *
 * @example
 * ```typescript
 * const error = new CircuitOpenError({ circuit: "payments", retryAfterMs: 30000 });
 * console.log(error.message); // "CircuitOpenError: Circuit payments is OPEN, retry after 30s"
 * ```
 */
export class CircuitOpenError extends TaggedError("CircuitOpenError") {
  /** Name of the circuit */
  readonly circuit: string;
  /** Time until the circuit lets a trial through */
  readonly retryAfterMs: number;

  constructor(props: { circuit: string; retryAfterMs: number }) {
    super(
      `CircuitOpenError: Circuit ${props.circuit} is OPEN` +
        (props.retryAfterMs > 0
          ? `, retry after ${Math.ceil(props.retryAfterMs / 1000)}s`
          : "")
    );
    this.circuit = props.circuit;
    this.retryAfterMs = props.retryAfterMs;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/** Union of every error the runtime raises on its own. */
export type DuctworkError = ConfigurationError | TimeoutError | CircuitOpenError;

export const isConfigurationError = (e: unknown): e is ConfigurationError =>
  e instanceof ConfigurationError;

export const isTimeoutError = (e: unknown): e is TimeoutError =>
  e instanceof TimeoutError;

export const isCircuitOpenError = (e: unknown): e is CircuitOpenError =>
  e instanceof CircuitOpenError;

export const isDuctworkError = (e: unknown): e is DuctworkError =>
  isConfigurationError(e) || isTimeoutError(e) || isCircuitOpenError(e);

/**
 * Best-effort name of an error for events and statistics: the `_tag` of a
 * tagged error, the class name of an `Error`, otherwise `typeof`.
 */
export function errorType(error: unknown): string {
  if (isTaggedError(error)) return error._tag;
  if (error instanceof Error) return error.constructor.name;
  return typeof error;
}

/**
 * Message of an error for log lines.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
