/**
 * ductwork/tagged-error
 *
 * Base factory for errors that carry a literal `_tag` discriminant.
 *
 * @example
 * ```typescript
 * class QuotaError extends TaggedError("QuotaError") {
 *   constructor(readonly limit: number) {
 *     super(`QuotaError: limit of ${limit} reached`);
 *   }
 * }
 *
 * const error = new QuotaError(10);
 * error._tag; // "QuotaError"
 * error.name; // "QuotaError"
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Shape shared by every tagged error.
 */
export interface Tagged<Tag extends string = string> {
  readonly _tag: Tag;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an `Error` subclass whose instances carry `_tag` and `name` equal to `tag`.
 *
 * Extend the returned class and pass the final message to `super()`.
 */
export function TaggedError<Tag extends string>(tag: Tag) {
  return class extends Error implements Tagged<Tag> {
    readonly _tag: Tag = tag;

    constructor(message: string, options?: { cause?: unknown }) {
      super(message, options);
      this.name = tag;
    }
  };
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Check whether a value is an `Error` carrying a string `_tag`.
 */
export function isTaggedError(value: unknown): value is Error & Tagged {
  return (
    value instanceof Error &&
    "_tag" in value &&
    typeof value._tag === "string"
  );
}

