/**
 * ductwork/logger
 *
 * Turns the primitive event stream into log lines.
 *
 * @example
 * ```typescript
 * const ctx = createContext({ onEvent: createEventLogger({ level: "info" }) });
 * ```
 */

import { errorMessage, errorType } from "./errors";
import type { EventHandler, PrimitiveEvent, PrimitiveEventType } from "./events";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type LogSink = (level: LogLevel, message: string, context: LogContext) => void;

export interface EventLoggerOptions {
  /**
   * Minimum level written.
   * @default "info"
   */
  level?: LogLevel;
  /** Where lines go. Defaults to stderr. */
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Severity of every event type */
export const EVENT_LEVELS: Record<PrimitiveEventType, LogLevel> = {
  primitive_start: "debug",
  primitive_success: "debug",
  primitive_error: "warn",
  checkpoint: "debug",
  retry_attempt: "info",
  retry_exhausted: "error",
  retry_aborted: "warn",
  timeout: "warn",
  timeout_orphan_error: "warn",
  fallback_triggered: "info",
  fallback_failed: "error",
  cache_hit: "debug",
  cache_miss: "debug",
  cache_evict: "debug",
  saga_compensation_start: "info",
  saga_compensation_success: "info",
  saga_compensation_failed: "error",
  circuit_state_change: "info",
  route_selected: "debug",
};

// Callers may print machine-readable output on stdout, so everything goes to stderr
const stderrSink: LogSink = (level, message, context) => {
  const logger = level === "warn" ? console.warn : console.error;
  if (Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

/**
 * Flatten an event's payload into a log context. Error values become their
 * type and message.
 */
export function eventLogContext(event: PrimitiveEvent): LogContext {
  const context: LogContext = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === "type" || key === "primitive" || key === "kind" || value === undefined) continue;
    if (key === "error" || key === "primaryError" || key === "forwardError") {
      context[key] = errorMessage(value);
      context[`${key}Type`] = errorType(value);
      continue;
    }
    context[key] = value;
  }
  return context;
}

/**
 * Create an event handler that logs events at or above `level`.
 *
 * Lines read `[<kind>] <primitive> <type>`.
 */
export function createEventLogger(options: EventLoggerOptions = {}): EventHandler {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? stderrSink;

  return (event) => {
    const level = EVENT_LEVELS[event.type];
    if (LEVEL_ORDER[level] < threshold) return;
    sink(level, `[${event.kind}] ${event.primitive} ${event.type}`, eventLogContext(event));
  };
}
