/**
 * ductwork/context
 *
 * The execution context threaded through every `execute()` call.
 *
 * One context is shared by reference across a whole call tree, concurrent
 * `parallel()` branches included. Identity fields are copy-on-write through
 * `with()`; state, tags, metadata and checkpoints are shared containers that
 * every holder sees mutate in place.
 *
 * @example
 * ```typescript
 * const ctx = createContext({ workflowId: "checkout", sessionId: "s-1" });
 *
 * ctx.state.set("cart", cart);
 * ctx.setTag("tenant", "acme");
 * ctx.checkpoint("cart.loaded");
 *
 * await pipeline.execute(order, ctx);
 * console.log(ctx.elapsed(), ctx.checkpoints);
 * ```
 */

import { randomUUID } from "node:crypto";
import type { EventHandler, PrimitiveEvent } from "./events";

// =============================================================================
// Types
// =============================================================================

/**
 * A named, timestamped marker recorded during execution.
 */
export interface Checkpoint {
  readonly name: string;
  readonly ts: number;
}

/**
 * Identifiers carried by a context. Replaced copy-on-write via `with()`.
 */
export interface ContextIdentity {
  readonly workflowId?: string;
  readonly correlationId: string;
  /** Correlation ID of the context that caused this one */
  readonly causationId?: string;
  readonly traceId?: string;
  readonly spanId?: string;
  readonly parentSpanId?: string;
  readonly sessionId?: string;
  readonly actorId?: string;
}

/**
 * Flat attribute map handed to tracers and metric exporters.
 */
export type TraceAttributes = Record<string, string | number>;

/**
 * Shared key/value store.
 *
 * Node runs one call stack at a time, so every method here completes without
 * interleaving. Use `update()`, `increment()` or `append()` for
 * read-modify-write from concurrent branches; a `get()` followed by a `set()`
 * across an `await` can lose writes made in between.
 */
export interface ContextState {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  has(key: string): boolean;
  delete(key: string): boolean;
  /** Replace a value with `fn(current)` in one step */
  update(key: string, fn: (current: unknown) => unknown): unknown;
  /** Add `by` to a numeric counter (missing or non-numeric counts as 0) */
  increment(key: string, by?: number): number;
  /** Append to a list (missing or non-array starts a new list); returns the new length */
  append(key: string, item: unknown): number;
  keys(): string[];
  /** Shallow copy of the current contents */
  snapshot(): Record<string, unknown>;
  readonly size: number;
}

/**
 * Execution context passed to every primitive.
 */
export interface Context extends ContextIdentity {
  /** Start of the execution in ms since epoch */
  readonly startedAt: number;
  readonly state: ContextState;
  readonly tags: ReadonlyMap<string, string>;
  readonly metadata: Map<string, unknown>;
  /** Append-only, in recording order */
  readonly checkpoints: readonly Checkpoint[];

  setTag(key: string, value: string): void;
  checkpoint(name: string): void;
  /** Milliseconds since `startedAt` */
  elapsed(): number;
  /** Current time according to the context clock */
  now(): number;
  exportTraceAttributes(): TraceAttributes;

  /** Deliver an event to every handler; a handler that throws is reported on stderr */
  emit(event: PrimitiveEvent): void;
  /** Register an event handler; returns a function that removes it */
  subscribe(handler: EventHandler): () => void;

  /** New context with identity fields replaced, sharing everything else */
  with(patch: Partial<ContextIdentity>): Context;
  /** Context for a nested workflow, with its own copies of state, tags and checkpoints */
  child(): Context;
}

/**
 * Options for `createContext()`.
 */
export interface CreateContextOptions extends Partial<ContextIdentity> {
  state?: Record<string, unknown>;
  tags?: Record<string, string>;
  metadata?: Record<string, unknown>;
  onEvent?: EventHandler;
  /**
   * Clock used for checkpoints, event timestamps, elapsed time and cache
   * expiry. `circuitBreaker` takes its own `clock` option instead.
   * @default Date.now
   */
  clock?: () => number;
}

// =============================================================================
// State
// =============================================================================

/**
 * Create a standalone `ContextState`.
 */
export function createContextState(
  initial: Record<string, unknown> = {}
): ContextState {
  const store = new Map<string, unknown>(Object.entries(initial));

  return {
    get: (key) => store.get(key),
    set: (key, value) => {
      store.set(key, value);
    },
    has: (key) => store.has(key),
    delete: (key) => store.delete(key),
    update(key, fn) {
      const next = fn(store.get(key));
      store.set(key, next);
      return next;
    },
    increment(key, by = 1) {
      const current = store.get(key);
      const next = (typeof current === "number" ? current : 0) + by;
      store.set(key, next);
      return next;
    },
    append(key, item) {
      const current = store.get(key);
      const next: unknown[] = Array.isArray(current) ? [...current, item] : [item];
      store.set(key, next);
      return next.length;
    },
    keys: () => [...store.keys()],
    snapshot: () => Object.fromEntries(store),
    get size() {
      return store.size;
    },
  };
}

// =============================================================================
// Context
// =============================================================================

/**
 * Containers shared between a context and every copy made by `with()`.
 * @internal
 */
interface SharedContainers {
  startedAt: number;
  state: ContextState;
  tags: Map<string, string>;
  metadata: Map<string, unknown>;
  checkpoints: Checkpoint[];
  handlers: Set<EventHandler>;
  clock: () => number;
}

function buildContext(identity: ContextIdentity, shared: SharedContainers): Context {
  const context: Context = {
    ...identity,
    startedAt: shared.startedAt,
    state: shared.state,
    tags: shared.tags,
    metadata: shared.metadata,
    checkpoints: shared.checkpoints,

    setTag(key, value) {
      shared.tags.set(key, value);
    },

    checkpoint(name) {
      const ts = shared.clock();
      shared.checkpoints.push({ name, ts });
      context.emit({
        type: "checkpoint",
        name,
        primitive: "context",
        kind: "context",
        ts,
        workflowId: identity.workflowId,
        correlationId: identity.correlationId,
      });
    },

    elapsed: () => shared.clock() - shared.startedAt,

    now: () => shared.clock(),

    exportTraceAttributes() {
      const attributes: TraceAttributes = {
        "workflow.id": identity.workflowId ?? "unknown",
        "workflow.session_id": identity.sessionId ?? "unknown",
        "workflow.actor_id": identity.actorId ?? "unknown",
        "workflow.correlation_id": identity.correlationId,
        "workflow.elapsed_ms": shared.clock() - shared.startedAt,
      };
      if (identity.causationId) attributes["workflow.causation_id"] = identity.causationId;
      if (identity.traceId) attributes["trace.id"] = identity.traceId;
      if (identity.spanId) attributes["span.id"] = identity.spanId;
      if (identity.parentSpanId) attributes["span.parent_id"] = identity.parentSpanId;
      for (const [key, value] of shared.tags) {
        attributes[`tag.${key}`] = value;
      }
      return attributes;
    },

    emit(event) {
      for (const handler of shared.handlers) {
        // A failing handler must not change the outcome of the primitive emitting
        try {
          handler(event);
        } catch (e) {
          console.error("ductwork: event handler threw an error:", e);
        }
      }
    },

    subscribe(handler) {
      shared.handlers.add(handler);
      return () => {
        shared.handlers.delete(handler);
      };
    },

    with(patch) {
      return buildContext({ ...identity, ...patch }, shared);
    },

    child() {
      return buildContext(
        {
          workflowId: identity.workflowId,
          correlationId: identity.correlationId,
          causationId: identity.correlationId,
          traceId: identity.traceId,
          parentSpanId: identity.spanId,
          sessionId: identity.sessionId,
          actorId: identity.actorId,
        },
        {
          startedAt: shared.clock(),
          state: createContextState(shared.state.snapshot()),
          tags: new Map(shared.tags),
          metadata: new Map(shared.metadata),
          checkpoints: [],
          handlers: shared.handlers,
          clock: shared.clock,
        }
      );
    },
  };

  return context;
}

/**
 * Create a context for one top-level request.
 *
 * @example
 * ```typescript
 * const ctx = createContext({
 *   workflowId: "ingest",
 *   tags: { source: "webhook" },
 *   onEvent: createEventLogger({ level: "info" }),
 * });
 * ```
 */
export function createContext(options: CreateContextOptions = {}): Context {
  const clock = options.clock ?? Date.now;
  const handlers = new Set<EventHandler>();
  if (options.onEvent) handlers.add(options.onEvent);

  return buildContext(
    {
      workflowId: options.workflowId,
      correlationId: options.correlationId ?? randomUUID(),
      causationId: options.causationId,
      traceId: options.traceId,
      spanId: options.spanId,
      parentSpanId: options.parentSpanId,
      sessionId: options.sessionId,
      actorId: options.actorId,
    },
    {
      startedAt: clock(),
      state: createContextState(options.state),
      tags: new Map(Object.entries(options.tags ?? {})),
      metadata: new Map(Object.entries(options.metadata ?? {})),
      checkpoints: [],
      handlers,
      clock,
    }
  );
}
