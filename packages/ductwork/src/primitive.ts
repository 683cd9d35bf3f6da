/**
 * ductwork/primitive
 *
 * The one capability every unit of work exposes: `execute(input, context)`.
 * Leaves, compositions and decorators are all plain objects satisfying
 * `Primitive`; there is no base class to extend.
 *
 * @example
 * ```typescript
 * const fetchUser = definePrimitive({
 *   kind: "http",
 *   name: "fetchUser",
 *   execute: async (id: string, ctx) => {
 *     ctx.checkpoint("user.requested");
 *     return api.get(`/users/${id}`);
 *   },
 * });
 *
 * const normalize = lambda((user: User) => ({ ...user, email: user.email.toLowerCase() }));
 * ```
 */

import type { Context } from "./context";
import type { EventBase } from "./events";

// =============================================================================
// Types
// =============================================================================

/**
 * An executable unit: takes an input and the shared context, resolves to an
 * output or rejects with whatever went wrong.
 */
export interface Primitive<I, O> {
  /** Variant name ("lambda", "sequential", "retry", ...) */
  readonly kind: string;
  /** Human-readable name used in events, checkpoints and spans */
  readonly name: string;
  execute(input: I, context: Context): Promise<O>;
}

/**
 * A primitive of unknown shape, for heterogeneous collections.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyPrimitive = Primitive<any, any>;

/** Extract the input type of a primitive */
export type InputOf<P> = P extends Primitive<infer I, unknown> ? I : never;

/** Extract the output type of a primitive */
export type OutputOf<P> = P extends Primitive<never, infer O> ? O : never;

/**
 * Definition passed to `definePrimitive()`.
 */
export interface PrimitiveDefinition<I, O, K extends string = string> {
  kind: K;
  name: string;
  execute: (input: I, context: Context) => O | Promise<O>;
  /**
   * Record `<kind>.start` and `<kind>.end` checkpoints around each call.
   * @default false
   */
  checkpoints?: boolean;
}

/**
 * A primitive whose kind is known at the type level.
 */
export type KindedPrimitive<I, O, K extends string> = Primitive<I, O> & {
  readonly kind: K;
};

// =============================================================================
// Construction
// =============================================================================

/**
 * Common fields for an event emitted by `source` on `context`.
 */
export function eventBase(
  context: Context,
  source: { readonly name: string; readonly kind: string }
): EventBase {
  return {
    primitive: source.name,
    kind: source.kind,
    ts: context.now(),
    workflowId: context.workflowId,
    correlationId: context.correlationId,
  };
}

/**
 * Build a primitive from a plain execute function.
 *
 * The returned primitive emits `primitive_start` before the call and
 * `primitive_success` or `primitive_error` after it. Errors are re-thrown
 * unchanged.
 */
export function definePrimitive<I, O, K extends string = string>(
  definition: PrimitiveDefinition<I, O, K>
): KindedPrimitive<I, O, K> {
  const { kind, name } = definition;
  const source = { kind, name };

  return {
    kind,
    name,
    async execute(input: I, context: Context): Promise<O> {
      const startedAt = context.now();
      context.emit({ ...eventBase(context, source), type: "primitive_start" });
      if (definition.checkpoints) context.checkpoint(`${kind}.start`);

      try {
        const output = await definition.execute(input, context);
        context.emit({
          ...eventBase(context, source),
          type: "primitive_success",
          durationMs: context.now() - startedAt,
        });
        return output;
      } catch (error) {
        context.emit({
          ...eventBase(context, source),
          type: "primitive_error",
          durationMs: context.now() - startedAt,
          error,
        });
        throw error;
      } finally {
        if (definition.checkpoints) context.checkpoint(`${kind}.end`);
      }
    },
  };
}

/**
 * Options for `lambda()`.
 */
export interface LambdaOptions {
  /** Defaults to the function's own name, or "lambda" */
  name?: string;
}

/**
 * Wrap a sync or async function as a primitive.
 *
 * @example
 * ```typescript
 * const double = lambda((n: number) => n * 2, { name: "double" });
 * await double.execute(21, ctx); // 42
 * ```
 */
export function lambda<I, O>(
  fn: (input: I, context: Context) => O | Promise<O>,
  options: LambdaOptions = {}
): KindedPrimitive<I, O, "lambda"> {
  return definePrimitive({
    kind: "lambda",
    name: options.name ?? (fn.name || "lambda"),
    execute: fn,
  });
}
