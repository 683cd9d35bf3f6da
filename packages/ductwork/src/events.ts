/**
 * ductwork/events
 *
 * Unified event stream for primitive execution. Every primitive reports what
 * it does through `context.emit()`; loggers, tracers and tests subscribe to
 * the same stream.
 *
 * @example
 * ```typescript
 * const ctx = createContext({
 *   workflowId: "checkout",
 *   onEvent: (event) => {
 *     if (event.type === "retry_attempt") {
 *       metrics.increment("retries", { primitive: event.primitive });
 *     }
 *   },
 * });
 * ```
 */

// =============================================================================
// Event Types
// =============================================================================

/**
 * Fields present on every event.
 */
export type EventBase = {
  /** Name of the primitive that emitted the event */
  primitive: string;
  /** Kind of the primitive ("retry", "sequential", ...) */
  kind: string;
  /** Wall-clock time of the event in ms since epoch */
  ts: number;
  workflowId?: string;
  correlationId: string;
};

/**
 * Circuit breaker states.
 */
export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

/**
 * Why a router picked the route it executed.
 */
export type RouteReason = "selected" | "unknown_route" | "selector_error";

export type PrimitiveEvent =
  // Lifecycle
  | (EventBase & { type: "primitive_start" })
  | (EventBase & { type: "primitive_success"; durationMs: number })
  | (EventBase & { type: "primitive_error"; durationMs: number; error: unknown })
  | (EventBase & { type: "checkpoint"; name: string })
  // Retry
  | (EventBase & {
      type: "retry_attempt";
      attempt: number;
      maxAttempts: number;
      delayMs: number;
      error: unknown;
    })
  | (EventBase & { type: "retry_exhausted"; attempts: number; error: unknown })
  | (EventBase & { type: "retry_aborted"; attempt: number; error: unknown })
  // Timeout
  | (EventBase & { type: "timeout"; ms: number; hadFallback: boolean })
  | (EventBase & { type: "timeout_orphan_error"; ms: number; error: unknown })
  // Fallback
  | (EventBase & { type: "fallback_triggered"; error: unknown })
  | (EventBase & { type: "fallback_failed"; error: unknown; primaryError: unknown })
  // Cache
  | (EventBase & { type: "cache_hit"; key: string })
  | (EventBase & { type: "cache_miss"; key: string })
  | (EventBase & { type: "cache_evict"; key: string })
  // Saga
  | (EventBase & { type: "saga_compensation_start"; error: unknown })
  | (EventBase & { type: "saga_compensation_success"; durationMs: number })
  | (EventBase & {
      type: "saga_compensation_failed";
      durationMs: number;
      error: unknown;
      forwardError: unknown;
    })
  // Circuit breaker
  | (EventBase & { type: "circuit_state_change"; from: CircuitState; to: CircuitState })
  // Router
  | (EventBase & {
      type: "route_selected";
      route: string;
      reason: RouteReason;
      /** What the selector threw, for reason "selector_error" */
      error?: unknown;
    });

export type PrimitiveEventType = PrimitiveEvent["type"];

/**
 * Receives every event emitted on a context.
 */
export type EventHandler = (event: PrimitiveEvent) => void;
