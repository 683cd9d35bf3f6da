/**
 * ductwork/composition
 *
 * Sequential and parallel composition. Both produce ordinary primitives, so
 * compositions nest inside decorators and vice versa.
 *
 * @example
 * ```typescript
 * const pipeline = sequential([parse, validate, persist], { name: "ingest" });
 * const lookups = parallel([fromCache, fromReplica, fromPrimary]);
 *
 * // Operators flatten nested compositions of the same kind
 * const longer = andThen(pipeline, notify); // sequential([parse, validate, persist, notify])
 * ```
 */

import { ConfigurationError } from "./errors";
import {
  definePrimitive,
  type AnyPrimitive,
  type Primitive,
} from "./primitive";

// =============================================================================
// Types
// =============================================================================

export interface CompositionOptions {
  name?: string;
}

/**
 * Runs its stages in order, feeding each output to the next stage.
 */
export interface SequentialPrimitive<I, O> extends Primitive<I, O> {
  readonly kind: "sequential";
  readonly stages: readonly AnyPrimitive[];
}

/**
 * Runs every branch concurrently on the same input and collects the outputs
 * in declaration order.
 */
export interface ParallelPrimitive<I, O> extends Primitive<I, O[]> {
  readonly kind: "parallel";
  readonly branches: readonly Primitive<I, O>[];
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSequential(
  primitive: AnyPrimitive
): primitive is SequentialPrimitive<unknown, unknown> {
  return (
    primitive.kind === "sequential" &&
    "stages" in primitive &&
    Array.isArray(primitive.stages)
  );
}

export function isParallel(
  primitive: AnyPrimitive
): primitive is ParallelPrimitive<unknown, unknown> {
  return (
    primitive.kind === "parallel" &&
    "branches" in primitive &&
    Array.isArray(primitive.branches)
  );
}

// =============================================================================
// sequential()
// =============================================================================

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createSequential(stages: readonly AnyPrimitive[], name: string): SequentialPrimitive<any, any> {
  if (stages.length === 0) {
    throw new ConfigurationError({ primitive: "sequential", reason: "requires at least one stage" });
  }
  const frozen = Object.freeze([...stages]);

  return {
    ...definePrimitive({
      kind: "sequential",
      name,
      execute: async (input: unknown, context) => {
        let current = input;
        for (const stage of frozen) {
          current = await stage.execute(current, context);
        }
        return current;
      },
    }),
    stages: frozen,
  };
}

/**
 * Chain primitives so each stage receives the previous stage's output.
 *
 * All stages share the caller's context. The first failure rejects the whole
 * chain unchanged and later stages never run.
 *
 * @throws ConfigurationError when `stages` is empty
 */
export function sequential<I, A>(
  stages: readonly [Primitive<I, A>],
  options?: CompositionOptions
): SequentialPrimitive<I, A>;
export function sequential<I, A, B>(
  stages: readonly [Primitive<I, A>, Primitive<A, B>],
  options?: CompositionOptions
): SequentialPrimitive<I, B>;
export function sequential<I, A, B, C>(
  stages: readonly [Primitive<I, A>, Primitive<A, B>, Primitive<B, C>],
  options?: CompositionOptions
): SequentialPrimitive<I, C>;
export function sequential<I, A, B, C, D>(
  stages: readonly [Primitive<I, A>, Primitive<A, B>, Primitive<B, C>, Primitive<C, D>],
  options?: CompositionOptions
): SequentialPrimitive<I, D>;
export function sequential<I, A, B, C, D, E>(
  stages: readonly [
    Primitive<I, A>,
    Primitive<A, B>,
    Primitive<B, C>,
    Primitive<C, D>,
    Primitive<D, E>,
  ],
  options?: CompositionOptions
): SequentialPrimitive<I, E>;
export function sequential<I, A, B, C, D, E, F>(
  stages: readonly [
    Primitive<I, A>,
    Primitive<A, B>,
    Primitive<B, C>,
    Primitive<C, D>,
    Primitive<D, E>,
    Primitive<E, F>,
  ],
  options?: CompositionOptions
): SequentialPrimitive<I, F>;
export function sequential<T>(
  stages: readonly Primitive<T, T>[],
  options?: CompositionOptions
): SequentialPrimitive<T, T>;
export function sequential(
  stages: readonly AnyPrimitive[],
  options: CompositionOptions = {}
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
): SequentialPrimitive<any, any> {
  return createSequential(stages, options.name ?? "sequential");
}

// =============================================================================
// parallel()
// =============================================================================

function createParallel<I, O>(
  branches: readonly Primitive<I, O>[],
  name: string
): ParallelPrimitive<I, O> {
  if (branches.length === 0) {
    throw new ConfigurationError({ primitive: "parallel", reason: "requires at least one branch" });
  }
  const frozen = Object.freeze([...branches]);

  return {
    ...definePrimitive({
      kind: "parallel",
      name,
      execute: (input: I, context) => {
        const outputs: O[] = [];
        // Slots are filled by index, so completion order does not matter.
        // Promise.all rejects with the first failure.
        const pending = frozen.map((branch, index) =>
          branch.execute(input, context).then((output) => {
            outputs[index] = output;
          })
        );
        return Promise.all(pending).then(() => outputs);
      },
    }),
    branches: frozen,
  };
}

/**
 * Run every branch concurrently with the same input and context.
 *
 * Outputs come back in declaration order regardless of completion order.
 * If any branch rejects, the whole call rejects with the first failure and
 * no partial results are returned.
 *
 * @throws ConfigurationError when `branches` is empty
 */
export function parallel<I, O>(
  branches: readonly Primitive<I, O>[],
  options: CompositionOptions = {}
): ParallelPrimitive<I, O> {
  return createParallel(branches, options.name ?? "parallel");
}

// =============================================================================
// Operators
// =============================================================================

/**
 * Sequential composition of two primitives. A sequential operand contributes
 * its stages instead of nesting, so `andThen(andThen(a, b), c)` has the
 * stages `[a, b, c]`.
 */
export function andThen<I, M, O>(
  first: Primitive<I, M>,
  second: Primitive<M, O>,
  options: CompositionOptions = {}
): SequentialPrimitive<I, O> {
  const stages = [
    ...(isSequential(first) ? first.stages : [first]),
    ...(isSequential(second) ? second.stages : [second]),
  ];
  return createSequential(stages, options.name ?? `${first.name} -> ${second.name}`);
}

/**
 * Parallel composition of two primitives. A parallel operand contributes its
 * branches instead of nesting, so `or(or(a, b), c)` has the branches
 * `[a, b, c]`.
 */
export function or<I, O>(
  first: ParallelPrimitive<I, O>,
  second: ParallelPrimitive<I, O>,
  options?: CompositionOptions
): ParallelPrimitive<I, O>;
export function or<I, O>(
  first: ParallelPrimitive<I, O>,
  second: Primitive<I, O>,
  options?: CompositionOptions
): ParallelPrimitive<I, O>;
export function or<I, O>(
  first: Primitive<I, O>,
  second: ParallelPrimitive<I, O>,
  options?: CompositionOptions
): ParallelPrimitive<I, O>;
export function or<I, O>(
  first: Primitive<I, O>,
  second: Primitive<I, O>,
  options?: CompositionOptions
): ParallelPrimitive<I, O>;
export function or(
  first: AnyPrimitive,
  second: AnyPrimitive,
  options: CompositionOptions = {}
): ParallelPrimitive<unknown, unknown> {
  const branches: AnyPrimitive[] = [
    ...(isParallel(first) ? first.branches : [first]),
    ...(isParallel(second) ? second.branches : [second]),
  ];
  return createParallel(branches, options.name ?? `${first.name} | ${second.name}`);
}
