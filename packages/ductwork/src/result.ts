/**
 * ductwork/result
 *
 * Result values for callers that prefer to branch on outcomes instead of
 * catching rejections.
 *
 * @example
 * ```typescript
 * const result = await executeResult(pipeline, input, ctx);
 * if (isOk(result)) {
 *   render(result.value);
 * } else {
 *   report(result.error);
 * }
 * ```
 */

import type { Context } from "./context";
import type { Primitive } from "./primitive";

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { ok: false; error: E };

export type Result<T, E = unknown> = Ok<T> | Err<E>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown> = Promise<Result<T, E>>;

// =============================================================================
// Constructors and Guards
// =============================================================================

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Execution
// =============================================================================

/**
 * Execute a primitive and capture the outcome as a Result.
 * The error is whatever the primitive rejected with, unchanged.
 */
export async function executeResult<I, O>(
  primitive: Primitive<I, O>,
  input: I,
  context: Context
): AsyncResult<O, unknown> {
  try {
    return ok(await primitive.execute(input, context));
  } catch (error) {
    return err(error);
  }
}
