/**
 * ductwork/fallback
 *
 * Try a primary primitive, switch to a secondary one on any failure.
 *
 * @example
 * ```typescript
 * const price = fallback(livePricing, cachedPricing, { trackStats: true });
 * ```
 */

import { errorType } from "./errors";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

export interface FallbackOptions {
  name?: string;
  /** Append a `FallbackStatistic` to `state["fallbackStatistics"]` after every call */
  trackStats?: boolean;
}

export interface FallbackStatistic {
  primitive: string;
  /** Which side produced the outcome */
  used: "primary" | "secondary";
  success: boolean;
  primaryErrorType?: string;
}

export type FallbackPrimitive<I, O> = KindedPrimitive<I, O, "fallback"> & {
  readonly primary: Primitive<I, O>;
  readonly secondary: Primitive<I, O>;
};

/**
 * Run `primary`; if it rejects for any reason, run `secondary` with the same
 * input and context.
 *
 * When both fail the caller sees the secondary's error. The primary's error
 * is still available on the `fallback_failed` event.
 */
export function fallback<I, O>(
  primary: Primitive<I, O>,
  secondary: Primitive<I, O>,
  options: FallbackOptions = {}
): FallbackPrimitive<I, O> {
  const source = {
    kind: "fallback",
    name: options.name ?? `fallback(${primary.name}, ${secondary.name})`,
  };

  const primitive = definePrimitive({
    kind: "fallback",
    name: source.name,
    checkpoints: true,
    execute: async (input: I, context): Promise<O> => {
      const record = (statistic: Omit<FallbackStatistic, "primitive">) => {
        if (options.trackStats) {
          context.state.append("fallbackStatistics", { primitive: primary.name, ...statistic });
        }
      };

      let primaryError: unknown;
      try {
        const output = await primary.execute(input, context);
        record({ used: "primary", success: true });
        return output;
      } catch (error) {
        primaryError = error;
      }

      context.emit({ ...eventBase(context, source), type: "fallback_triggered", error: primaryError });
      context.checkpoint("fallback.secondary.start");

      try {
        const output = await secondary.execute(input, context);
        record({ used: "secondary", success: true, primaryErrorType: errorType(primaryError) });
        return output;
      } catch (error) {
        context.emit({
          ...eventBase(context, source),
          type: "fallback_failed",
          error,
          primaryError,
        });
        record({ used: "secondary", success: false, primaryErrorType: errorType(primaryError) });
        throw error;
      }
    },
  });

  return { ...primitive, primary, secondary };
}
