/**
 * ductwork/duration
 *
 * Durations for deadlines, TTLs and backoff windows.
 *
 * @example
 * ```typescript
 * toMillis(250);          // 250
 * toMillis("5s");         // 5000
 * toMillis(seconds(0.1)); // 100
 * ```
 */

import { ConfigurationError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/** Duration object with tagged type for type safety */
export type Duration = { readonly _tag: "Duration"; readonly millis: number };

/**
 * Anything accepted where a duration is expected: milliseconds as a number,
 * a shorthand string ("100ms", "5s", "2m", "1h", "1d") or a `Duration`.
 */
export type DurationInput = number | string | Duration;

// =============================================================================
// Constructors
// =============================================================================

export const millis = (ms: number): Duration => ({ _tag: "Duration", millis: ms });

export const seconds = (s: number): Duration => millis(s * 1000);

export const minutes = (m: number): Duration => millis(m * 60_000);

// =============================================================================
// Parsing
// =============================================================================

const UNIT_MILLIS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/**
 * Parse a duration string like "100ms", "5s", "2m", "1h", "1d".
 * Returns undefined when the string does not match.
 */
export function parse(input: string): Duration | undefined {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) return undefined;
  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  return millis(value * (UNIT_MILLIS[unit] ?? 1));
}

/**
 * Convert a `DurationInput` to milliseconds.
 *
 * @throws Error when given an unparseable string
 */
export function toMillis(duration: DurationInput): number {
  if (typeof duration === "number") return duration;
  if (typeof duration === "string") {
    const parsed = parse(duration);
    if (!parsed) {
      throw new Error(`Invalid duration string: ${duration}`);
    }
    return parsed.millis;
  }
  return duration.millis;
}

/**
 * Largest delay `setTimeout` honours. Anything longer fires after about 1ms.
 */
export const MAX_TIMER_MS = 2_147_483_647;

export interface DurationBounds {
  /** Reject zero as well as negative durations */
  positive?: boolean;
  /** Upper bound in milliseconds */
  max?: number;
}

/**
 * Convert a primitive option to milliseconds, raising `ConfigurationError`
 * for an unparseable string or a value outside `bounds`.
 *
 * @example
 * ```typescript
 * resolveDuration("timeout", "ms", "2s", { positive: true, max: MAX_TIMER_MS }); // 2000
 * resolveDuration("cache", "ttl", "soon"); // throws ConfigurationError
 * ```
 */
export function resolveDuration(
  primitive: string,
  field: string,
  input: DurationInput,
  bounds: DurationBounds = {}
): number {
  const ms = typeof input === "string" ? parse(input)?.millis : toMillis(input);
  if (ms === undefined) {
    throw new ConfigurationError({ primitive, reason: `${field} is not a valid duration: "${String(input)}"` });
  }
  if (!Number.isFinite(ms) || ms < 0 || (bounds.positive && ms === 0)) {
    throw new ConfigurationError({
      primitive,
      reason: `${field} must be a ${bounds.positive ? "positive" : "non-negative"} duration, got ${ms}`,
    });
  }
  if (bounds.max !== undefined && ms > bounds.max) {
    throw new ConfigurationError({ primitive, reason: `${field} must be at most ${bounds.max}ms, got ${ms}` });
  }
  return ms;
}

// =============================================================================
// Timers
// =============================================================================

/**
 * Resolve after `ms` milliseconds.
 * @internal
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_MS)));
}
