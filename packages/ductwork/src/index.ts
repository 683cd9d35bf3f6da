/**
 * ductwork
 *
 * Composable workflow primitives: small async units glued together with
 * sequential and parallel composition, hardened by recovery decorators, and
 * sharing one execution context per request.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createContext, lambda, sequential, retry, withTimeout, fallback } from 'ductwork';
 *
 * const pipeline = sequential([
 *   lambda(parseOrder),
 *   retry(withTimeout(reserveStock, { ms: "2s" }), { maxRetries: 2, backoffBase: "100ms" }),
 *   fallback(chargeCard, queueForManualReview),
 * ]);
 *
 * const ctx = createContext({ workflowId: "checkout" });
 * const receipt = await pipeline.execute(rawOrder, ctx);
 * ```
 *
 * ## Entry Points
 *
 * - `ductwork` - context, primitives, composition, decorators, errors, events, logger
 * - `ductwork/otel` - OpenTelemetry instrumentation
 * - `ductwork/testing` - mock primitives, event recorder, test clock
 */

// =============================================================================
// Context
// =============================================================================
export {
  type Checkpoint,
  type Context,
  type ContextIdentity,
  type ContextState,
  type CreateContextOptions,
  type TraceAttributes,
  createContext,
  createContextState,
} from "./context";

// =============================================================================
// Primitives and Composition
// =============================================================================
export {
  type AnyPrimitive,
  type InputOf,
  type KindedPrimitive,
  type LambdaOptions,
  type OutputOf,
  type Primitive,
  type PrimitiveDefinition,
  definePrimitive,
  eventBase,
  lambda,
} from "./primitive";

export {
  type CompositionOptions,
  type ParallelPrimitive,
  type SequentialPrimitive,
  andThen,
  isParallel,
  isSequential,
  or,
  parallel,
  sequential,
} from "./composition";

// =============================================================================
// Decorators
// =============================================================================
export {
  type BackoffStrategy,
  type RetryOptions,
  type RetryStatistic,
  type RetryStrategy,
  type RetryStrategyOptions,
  createRetryStrategy,
  retry,
} from "./retry";

export {
  type TimeoutOptions,
  type TimeoutPrimitive,
  type TimeoutRecord,
  type TimeoutStats,
  withTimeout,
} from "./timeout";

export {
  type FallbackOptions,
  type FallbackPrimitive,
  type FallbackStatistic,
  fallback,
} from "./fallback";

export {
  type CacheEntry,
  type CacheOptions,
  type CachePrimitive,
  type CacheStats,
  cached,
} from "./cache";

export {
  type SagaOptions,
  type SagaPrimitive,
  type SagaStatistic,
  saga,
} from "./saga";

export {
  type CircuitBreakerOptions,
  type CircuitBreakerPrimitive,
  type CircuitBreakerStats,
  circuitBreaker,
} from "./circuit-breaker";

export {
  type ConditionalOptions,
  type RouteSelection,
  type RouterOptions,
  type RouterPrimitive,
  conditional,
  router,
} from "./router";

// =============================================================================
// Errors and Results
// =============================================================================
export {
  type DuctworkError,
  CircuitOpenError,
  ConfigurationError,
  TimeoutError,
  errorMessage,
  errorType,
  isCircuitOpenError,
  isConfigurationError,
  isDuctworkError,
  isTimeoutError,
} from "./errors";

export { type Tagged, TaggedError, isTaggedError } from "./tagged-error";

export {
  type AsyncResult,
  type Err,
  type Ok,
  type Result,
  err,
  executeResult,
  isErr,
  isOk,
  ok,
} from "./result";

// =============================================================================
// Durations, Events and Logging
// =============================================================================
export {
  type Duration,
  type DurationBounds,
  type DurationInput,
  MAX_TIMER_MS,
  millis,
  minutes,
  parse as parseDuration,
  resolveDuration,
  seconds,
  toMillis,
} from "./duration";

export {
  type CircuitState,
  type EventBase,
  type EventHandler,
  type PrimitiveEvent,
  type PrimitiveEventType,
  type RouteReason,
} from "./events";

export {
  type EventLoggerOptions,
  type LogContext,
  type LogLevel,
  type LogSink,
  EVENT_LEVELS,
  createEventLogger,
  eventLogContext,
} from "./logger";
