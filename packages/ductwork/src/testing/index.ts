/**
 * ductwork/testing
 *
 * Deterministic doubles for testing primitive graphs: scripted mock
 * primitives, an event recorder and a manual clock.
 */

import type { Context } from "../context";
import { sleep } from "../duration";
import type { PrimitiveEvent, PrimitiveEventType } from "../events";
import type { Primitive } from "../primitive";

// =============================================================================
// Mock Primitive
// =============================================================================

/**
 * A recorded call to a mock primitive.
 */
export interface MockInvocation<I> {
  input: I;
  context: Context;
  /** Clock time when the call started */
  startedAt: number;
}

type Outcome<I, O> =
  | { type: "value"; value: O }
  | { type: "compute"; fn: (input: I, context: Context) => O | Promise<O> }
  | { type: "throw"; error: unknown };

export interface MockPrimitiveOptions {
  /** @default "mock" */
  name?: string;
  /** @default "mock" */
  kind?: string;
  /** Delay every call by this many ms before settling */
  delayMs?: number;
}

/**
 * A primitive whose behaviour is scripted per test.
 */
export interface MockPrimitive<I, O> extends Primitive<I, O> {
  /** Default outcome: resolve with `value` */
  returns(value: O): MockPrimitive<I, O>;
  /** Default outcome: compute the output from the input */
  implementation(fn: (input: I, context: Context) => O | Promise<O>): MockPrimitive<I, O>;
  /** Default outcome: reject with `error` */
  throws(error: unknown): MockPrimitive<I, O>;
  /** Next call only: resolve with `value` */
  returnsOnce(value: O): MockPrimitive<I, O>;
  /** Next call only: reject with `error` */
  throwsOnce(error: unknown): MockPrimitive<I, O>;
  /** Delay every later call by `ms` */
  delay(ms: number): MockPrimitive<I, O>;
  getCalls(): MockInvocation<I>[];
  getCallCount(): number;
  /** Forget calls and scripted outcomes */
  reset(): void;
}

/**
 * Create a mock primitive.
 *
 * Queued `*Once` outcomes are used first, then the default outcome. A call
 * with neither rejects.
 *
 * @example
 * ```typescript
 * const flaky = createMockPrimitive<string, string>({ name: "flaky" })
 *   .throwsOnce(new Error("boom"))
 *   .returns("ok");
 *
 * await retry(flaky, { maxRetries: 1, backoffBase: 0 }).execute("in", ctx); // "ok"
 * flaky.getCallCount(); // 2
 * ```
 */
export function createMockPrimitive<I = unknown, O = unknown>(
  options: MockPrimitiveOptions = {}
): MockPrimitive<I, O> {
  let defaultOutcome: Outcome<I, O> | undefined;
  const queue: Outcome<I, O>[] = [];
  const calls: MockInvocation<I>[] = [];
  let delayMs = options.delayMs ?? 0;

  const mock: MockPrimitive<I, O> = {
    kind: options.kind ?? "mock",
    name: options.name ?? "mock",

    async execute(input: I, context: Context): Promise<O> {
      calls.push({ input, context, startedAt: context.now() });
      const outcome = queue.shift() ?? defaultOutcome;

      if (delayMs > 0) await sleep(delayMs);

      if (!outcome) {
        throw new Error(`Mock primitive "${mock.name}" called without configured outcome`);
      }
      switch (outcome.type) {
        case "value":
          return outcome.value;
        case "compute":
          return outcome.fn(input, context);
        case "throw":
          throw outcome.error;
      }
    },

    returns(value) {
      defaultOutcome = { type: "value", value };
      return mock;
    },

    implementation(fn) {
      defaultOutcome = { type: "compute", fn };
      return mock;
    },

    throws(error) {
      defaultOutcome = { type: "throw", error };
      return mock;
    },

    returnsOnce(value) {
      queue.push({ type: "value", value });
      return mock;
    },

    throwsOnce(error) {
      queue.push({ type: "throw", error });
      return mock;
    },

    delay(ms) {
      delayMs = ms;
      return mock;
    },

    getCalls: () => [...calls],

    getCallCount: () => calls.length,

    reset() {
      defaultOutcome = undefined;
      queue.length = 0;
      calls.length = 0;
      delayMs = options.delayMs ?? 0;
    },
  };

  return mock;
}

// =============================================================================
// Event Recording
// =============================================================================

export interface RecordingHandler {
  /** Pass this to `createContext({ onEvent })` or `context.subscribe()` */
  handler: (event: PrimitiveEvent) => void;
  events: PrimitiveEvent[];
  /** Event types in emission order */
  types(): PrimitiveEventType[];
  /** Events of one type, narrowed */
  ofType<T extends PrimitiveEventType>(type: T): Extract<PrimitiveEvent, { type: T }>[];
  clear(): void;
}

/**
 * Collect every event emitted on a context.
 */
export function createRecordingHandler(): RecordingHandler {
  const events: PrimitiveEvent[] = [];

  const isType =
    <T extends PrimitiveEventType>(type: T) =>
    (event: PrimitiveEvent): event is Extract<PrimitiveEvent, { type: T }> =>
      event.type === type;

  return {
    handler: (event) => {
      events.push(event);
    },
    events,
    types: () => events.map((event) => event.type),
    ofType<T extends PrimitiveEventType>(type: T) {
      return events.filter(isType(type));
    },
    clear() {
      events.length = 0;
    },
  };
}

// =============================================================================
// Clock
// =============================================================================

/**
 * Manual clock for `createContext({ clock })` and `circuitBreaker({ clock })`.
 */
export function createTestClock(startTime = 0): {
  now: () => number;
  advance: (ms: number) => void;
  set: (time: number) => void;
  reset: () => void;
} {
  let currentTime = startTime;

  return {
    now: () => currentTime,
    advance: (ms: number) => {
      currentTime += ms;
    },
    set: (time: number) => {
      currentTime = time;
    },
    reset: () => {
      currentTime = startTime;
    },
  };
}
