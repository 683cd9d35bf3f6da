/**
 * ductwork/cache
 *
 * Memoize a primitive's output by a key derived from input and context.
 *
 * Entries are honoured only while `now < expiresAt`. Expired entries are
 * dropped when a read finds them, by `prune()`, or by being overwritten.
 * With `maxSize` set, the least recently used entry is evicted first.
 *
 * @example
 * ```typescript
 * const profile = cached(fetchProfile, {
 *   key: (userId, ctx) => `${ctx.tags.get("tenant")}:${userId}`,
 *   ttl: "5m",
 *   maxSize: 1000,
 * });
 *
 * await profile.execute("u-1", ctx); // miss, calls fetchProfile
 * await profile.execute("u-1", ctx); // hit
 * profile.getStats(); // { hits: 1, misses: 1, evictions: 0, size: 1 }
 * ```
 */

import type { Context } from "./context";
import { ConfigurationError } from "./errors";
import { resolveDuration, type DurationInput } from "./duration";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

// =============================================================================
// Types
// =============================================================================

/**
 * Cache entry with metadata.
 */
export interface CacheEntry<T> {
  value: T;
  /** Absolute expiry in ms since epoch */
  expiresAt: number;
}

/**
 * Cache options.
 */
export interface CacheOptions<I> {
  /** Derive the cache key for a call */
  key: (input: I, context: Context) => string;
  /**
   * Time-to-live for cached values.
   * Accepts milliseconds, a Duration or string shorthand like "5m", "1h", "30s".
   */
  ttl: DurationInput;
  /**
   * Maximum cache size. When exceeded, the least recently used entry is evicted.
   * @default Infinity
   */
  maxSize?: number;
  /** Increment `state["cacheHits"]` / `state["cacheMisses"]` on every call */
  trackStats?: boolean;
  name?: string;
}

/**
 * Cache statistics.
 */
export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

export type CachePrimitive<I, O> = KindedPrimitive<I, O, "cache"> & {
  getStats(): CacheStats;
  /** Drop every entry and reset the counters */
  clear(): void;
  /** Drop one entry; returns whether it existed */
  invalidate(key: string): boolean;
  /**
   * Drop expired entries; returns how many were removed. `now` defaults to
   * the clock of the context that last stored an entry.
   */
  prune(now?: number): number;
};

// =============================================================================
// cached()
// =============================================================================

/**
 * Wrap a primitive with a TTL cache.
 *
 * Rejections are never cached. Concurrent misses for the same key share one
 * inner call.
 *
 * @throws ConfigurationError for a negative `ttl` or a `maxSize` below 1
 */
export function cached<I, O>(
  inner: Primitive<I, O>,
  options: CacheOptions<I>
): CachePrimitive<I, O> {
  const ttl = resolveDuration("cache", "ttl", options.ttl);
  const maxSize = options.maxSize ?? Infinity;
  if (!(maxSize >= 1) || (maxSize !== Infinity && !Number.isInteger(maxSize))) {
    throw new ConfigurationError({
      primitive: "cache",
      reason: `maxSize must be a positive integer, got ${maxSize}`,
    });
  }

  const source = { kind: "cache", name: options.name ?? `cache(${inner.name})` };
  // Map iteration order doubles as recency order: oldest first
  const entries = new Map<string, CacheEntry<O>>();
  const inflight = new Map<string, Promise<O>>();
  const stats = { hits: 0, misses: 0, evictions: 0 };
  // Entries are stamped with context time, so pruning reads the same clock
  let clock: () => number = Date.now;

  const store = (key: string, value: O, context: Context) => {
    clock = context.now;
    entries.delete(key);
    entries.set(key, { value, expiresAt: context.now() + ttl });

    while (entries.size > maxSize) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
      stats.evictions++;
      context.emit({ ...eventBase(context, source), type: "cache_evict", key: oldest.value });
    }
  };

  const primitive = definePrimitive({
    kind: "cache",
    name: source.name,
    checkpoints: true,
    execute: async (input: I, context): Promise<O> => {
      const key = options.key(input, context);
      const entry = entries.get(key);

      if (entry && context.now() < entry.expiresAt) {
        entries.delete(key);
        entries.set(key, entry);
        stats.hits++;
        if (options.trackStats) context.state.increment("cacheHits");
        context.emit({ ...eventBase(context, source), type: "cache_hit", key });
        return entry.value;
      }

      if (entry) entries.delete(key);
      stats.misses++;
      if (options.trackStats) context.state.increment("cacheMisses");
      context.emit({ ...eventBase(context, source), type: "cache_miss", key });

      const existing = inflight.get(key);
      if (existing) return existing;

      // A call dropped from `inflight` by clear() or invalidate() must not repopulate
      const pending: Promise<O> = inner
        .execute(input, context)
        .then((value) => {
          if (inflight.get(key) === pending) store(key, value, context);
          return value;
        })
        .finally(() => {
          if (inflight.get(key) === pending) inflight.delete(key);
        });
      inflight.set(key, pending);
      return pending;
    },
  });

  return {
    ...primitive,

    getStats: () => ({ ...stats, size: entries.size }),

    clear() {
      entries.clear();
      inflight.clear();
      stats.hits = 0;
      stats.misses = 0;
      stats.evictions = 0;
    },

    invalidate(key) {
      inflight.delete(key);
      return entries.delete(key);
    },

    prune(now = clock()) {
      let removed = 0;
      for (const [key, entry] of entries) {
        if (now >= entry.expiresAt) {
          entries.delete(key);
          removed++;
        }
      }
      return removed;
    },
  };
}
