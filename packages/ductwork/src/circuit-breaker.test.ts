import { describe, it, expect } from "vitest";
import { circuitBreaker } from "./circuit-breaker";
import { createContext } from "./context";
import { CircuitOpenError, ConfigurationError } from "./errors";
import { createMockPrimitive, createRecordingHandler, createTestClock } from "./testing";

const failure = new Error("payment gateway down");

describe("circuitBreaker", () => {
  it("should open after consecutive failures and reject without calling the inner primitive", async () => {
    const clock = createTestClock(0);
    const ctx = createContext({ clock: clock.now });
    const inner = createMockPrimitive<string, string>({ name: "charge" }).throws(failure);
    const breaker = circuitBreaker(inner, { failureThreshold: 2, resetTimeout: "1s", clock: clock.now, name: "payments" });

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    expect(breaker.getState()).toBe("CLOSED");
    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    expect(breaker.getState()).toBe("OPEN");

    const outcome = await breaker.execute("in", ctx).catch((error: unknown) => error);

    expect(outcome).toBeInstanceOf(CircuitOpenError);
    expect(outcome).toMatchObject({ circuit: "payments", retryAfterMs: 1000 });
    expect(outcome).toHaveProperty("message", "CircuitOpenError: Circuit payments is OPEN, retry after 1s");
    expect(inner.getCallCount()).toBe(2);
  });

  it("should reset the failure count after a success", async () => {
    const clock = createTestClock(0);
    const inner = createMockPrimitive<string, string>({ name: "charge" })
      .throwsOnce(failure)
      .returnsOnce("ok")
      .throwsOnce(failure)
      .returns("ok");
    const breaker = circuitBreaker(inner, { failureThreshold: 2, clock: clock.now });
    const ctx = createContext();

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    await breaker.execute("in", ctx);
    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);

    expect(breaker.getState()).toBe("CLOSED");
    expect(breaker.getStats().consecutiveFailures).toBe(1);
  });

  it("should close again after a successful trial", async () => {
    const clock = createTestClock(0);
    const inner = createMockPrimitive<string, string>({ name: "charge" }).throwsOnce(failure).returns("ok");
    const breaker = circuitBreaker(inner, { failureThreshold: 1, resetTimeout: 1000, clock: clock.now });
    const ctx = createContext();

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    clock.advance(999);
    expect(breaker.getState()).toBe("OPEN");
    clock.advance(1);
    expect(breaker.getState()).toBe("HALF_OPEN");

    await expect(breaker.execute("in", ctx)).resolves.toBe("ok");
    expect(breaker.getState()).toBe("CLOSED");
  });

  it("should reopen when the trial fails", async () => {
    const clock = createTestClock(0);
    const inner = createMockPrimitive<string, string>({ name: "charge" }).throws(failure);
    const breaker = circuitBreaker(inner, { failureThreshold: 1, resetTimeout: 1000, clock: clock.now });
    const ctx = createContext();

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    clock.advance(1000);
    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);

    expect(breaker.getState()).toBe("OPEN");
    expect(breaker.getStats()).toEqual({
      state: "OPEN",
      consecutiveFailures: 1,
      successes: 0,
      failures: 2,
      rejections: 0,
      trips: 2,
    });
  });

  it("should limit concurrent trials while half-open", async () => {
    const clock = createTestClock(0);
    const inner = createMockPrimitive<string, string>({ name: "charge" })
      .throwsOnce(failure)
      .delay(5)
      .returns("ok");
    const breaker = circuitBreaker(inner, { failureThreshold: 1, resetTimeout: 1000, clock: clock.now });
    const ctx = createContext();

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    clock.advance(1000);

    const trial = breaker.execute("in", ctx);
    const rejected = await breaker.execute("in", ctx).catch((error: unknown) => error);

    expect(rejected).toBeInstanceOf(CircuitOpenError);
    expect(rejected).toMatchObject({ retryAfterMs: 0 });
    await expect(trial).resolves.toBe("ok");
    expect(inner.getCallCount()).toBe(2);
  });

  it("should emit state changes", async () => {
    const clock = createTestClock(0);
    const recorder = createRecordingHandler();
    const ctx = createContext({ onEvent: recorder.handler });
    const inner = createMockPrimitive<string, string>({ name: "charge" }).throwsOnce(failure).returns("ok");
    const breaker = circuitBreaker(inner, { failureThreshold: 1, resetTimeout: 1000, clock: clock.now });

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    clock.advance(1000);
    await breaker.execute("in", ctx);

    expect(recorder.ofType("circuit_state_change").map((e) => `${e.from}->${e.to}`)).toEqual([
      "CLOSED->OPEN",
      "OPEN->HALF_OPEN",
      "HALF_OPEN->CLOSED",
    ]);
    expect(recorder.ofType("circuit_state_change")[0].primitive).toBe("circuit(charge)");
  });

  it("should close on reset", async () => {
    const clock = createTestClock(0);
    const inner = createMockPrimitive<string, string>({ name: "charge" }).throwsOnce(failure).returns("ok");
    const breaker = circuitBreaker(inner, { failureThreshold: 1, clock: clock.now });
    const ctx = createContext();

    await expect(breaker.execute("in", ctx)).rejects.toBe(failure);
    breaker.reset();

    expect(breaker.getState()).toBe("CLOSED");
    await expect(breaker.execute("in", ctx)).resolves.toBe("ok");
  });

  it("should reject invalid configuration", () => {
    const inner = createMockPrimitive<string, string>({ name: "charge" });

    expect(() => circuitBreaker(inner, { failureThreshold: 0 })).toThrow(ConfigurationError);
    expect(() => circuitBreaker(inner, { halfOpenMaxCalls: 1.5 })).toThrow(ConfigurationError);
    expect(() => circuitBreaker(inner, { resetTimeout: -1 })).toThrow(ConfigurationError);
    expect(() => circuitBreaker(inner, { resetTimeout: "later" })).toThrow(ConfigurationError);
  });
});
