/**
 * ductwork/router
 *
 * Pick one of several primitives per call.
 *
 * @example
 * ```typescript
 * const answer = router(
 *   { fast: smallModel, premium: largeModel },
 *   {
 *     select: (prompt: string) => (prompt.length > 400 ? "premium" : "fast"),
 *     defaultRoute: "fast",
 *   }
 * );
 *
 * const normalized = conditional((text: string) => text.includes("\r"), stripCarriageReturns);
 * ```
 */

import type { Context } from "./context";
import { ConfigurationError } from "./errors";
import type { RouteReason } from "./events";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

// =============================================================================
// router()
// =============================================================================

export interface RouterOptions<I, R extends string> {
  /** Name of the route to run for this call */
  select: (input: I, context: Context) => string | Promise<string>;
  /** Used when `select` throws or names a route that does not exist */
  defaultRoute: R;
  /** Append `{ primitive, route, reason }` to `state["routerSelections"]` */
  trackStats?: boolean;
  name?: string;
}

export interface RouteSelection {
  primitive: string;
  route: string;
  reason: RouteReason;
}

export type RouterPrimitive<I, O, R extends string> = KindedPrimitive<I, O, "router"> & {
  readonly routes: Readonly<Record<R, Primitive<I, O>>>;
};

/**
 * Run the route chosen by `select`.
 *
 * A throwing selector or an unknown route name falls back to `defaultRoute`.
 * Errors from the chosen route propagate unchanged.
 *
 * @throws ConfigurationError when `routes` is empty or lacks `defaultRoute`
 */
export function router<I, O, R extends string>(
  routes: Record<R, Primitive<I, O>>,
  options: RouterOptions<I, R>
): RouterPrimitive<I, O, R> {
  const table = new Map<string, Primitive<I, O>>(Object.entries<Primitive<I, O>>(routes));
  if (table.size === 0) {
    throw new ConfigurationError({ primitive: "router", reason: "requires at least one route" });
  }
  const fallbackRoute = table.get(options.defaultRoute);
  if (!fallbackRoute) {
    throw new ConfigurationError({
      primitive: "router",
      reason: `defaultRoute "${options.defaultRoute}" is not one of: ${[...table.keys()].join(", ")}`,
    });
  }

  const source = { kind: "router", name: options.name ?? "router" };

  const choose = async (
    input: I,
    context: Context
  ): Promise<{ route: string; reason: RouteReason; target: Primitive<I, O>; error?: unknown }> => {
    let selected: string;
    try {
      selected = await options.select(input, context);
    } catch (error) {
      return { route: options.defaultRoute, reason: "selector_error", target: fallbackRoute, error };
    }
    const target = table.get(selected);
    if (!target) {
      return { route: options.defaultRoute, reason: "unknown_route", target: fallbackRoute };
    }
    return { route: selected, reason: "selected", target };
  };

  const primitive = definePrimitive({
    kind: "router",
    name: source.name,
    execute: async (input: I, context): Promise<O> => {
      const { route, reason, target, error } = await choose(input, context);
      context.emit({ ...eventBase(context, source), type: "route_selected", route, reason, error });
      if (options.trackStats) {
        const selection: RouteSelection = { primitive: source.name, route, reason };
        context.state.append("routerSelections", selection);
      }
      return target.execute(input, context);
    },
  });

  return { ...primitive, routes };
}

// =============================================================================
// conditional()
// =============================================================================

export interface ConditionalOptions {
  name?: string;
}

/**
 * Run `whenTrue` if `predicate` holds, otherwise `whenFalse`. Without
 * `whenFalse` the input is returned unchanged.
 */
export function conditional<I, O>(
  predicate: (input: I, context: Context) => boolean | Promise<boolean>,
  whenTrue: Primitive<I, O>,
  whenFalse: Primitive<I, O>,
  options?: ConditionalOptions
): KindedPrimitive<I, O, "conditional">;
export function conditional<I, O>(
  predicate: (input: I, context: Context) => boolean | Promise<boolean>,
  whenTrue: Primitive<I, O>,
  whenFalse?: undefined,
  options?: ConditionalOptions
): KindedPrimitive<I, O | I, "conditional">;
export function conditional<I, O>(
  predicate: (input: I, context: Context) => boolean | Promise<boolean>,
  whenTrue: Primitive<I, O>,
  whenFalse?: Primitive<I, O>,
  options: ConditionalOptions = {}
): KindedPrimitive<I, O | I, "conditional"> {
  const source = { kind: "conditional", name: options.name ?? `conditional(${whenTrue.name})` };

  return definePrimitive({
    kind: "conditional",
    name: source.name,
    execute: async (input: I, context): Promise<O | I> => {
      const matched = await predicate(input, context);
      context.emit({
        ...eventBase(context, source),
        type: "route_selected",
        route: matched ? "true" : "false",
        reason: "selected",
      });
      if (matched) return whenTrue.execute(input, context);
      return whenFalse ? whenFalse.execute(input, context) : input;
    },
  });
}
