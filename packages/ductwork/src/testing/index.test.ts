import { describe, it, expect, vi, afterEach } from "vitest";
import { createContext } from "../context";
import { createMockPrimitive, createRecordingHandler, createTestClock } from "./index";

afterEach(() => {
  vi.useRealTimers();
});

describe("createMockPrimitive", () => {
  it("should use queued outcomes before the default", async () => {
    const ctx = createContext();
    const error = new Error("first call fails");
    const mock = createMockPrimitive<string, string>({ name: "lookup" })
      .throwsOnce(error)
      .returnsOnce("second")
      .returns("default");

    await expect(mock.execute("a", ctx)).rejects.toBe(error);
    await expect(mock.execute("b", ctx)).resolves.toBe("second");
    await expect(mock.execute("c", ctx)).resolves.toBe("default");
    await expect(mock.execute("d", ctx)).resolves.toBe("default");
  });

  it("should compute outputs from the input and context", async () => {
    const ctx = createContext({ tags: { tenant: "acme" } });
    const mock = createMockPrimitive<string, string>().implementation(
      (input, context) => `${String(context.tags.get("tenant"))}/${input}`
    );

    await expect(mock.execute("u-1", ctx)).resolves.toBe("acme/u-1");
  });

  it("should reject when nothing is scripted", async () => {
    const mock = createMockPrimitive<string, string>({ name: "lookup" });

    await expect(mock.execute("a", createContext())).rejects.toThrow(
      'Mock primitive "lookup" called without configured outcome'
    );
  });

  it("should record calls with their start time", async () => {
    const clock = createTestClock(42);
    const ctx = createContext({ clock: clock.now });
    const mock = createMockPrimitive<string, string>().returns("ok");

    await mock.execute("a", ctx);

    expect(mock.getCallCount()).toBe(1);
    expect(mock.getCalls()).toEqual([{ input: "a", context: ctx, startedAt: 42 }]);
  });

  it("should delay settling", async () => {
    vi.useFakeTimers();
    const mock = createMockPrimitive<string, string>({ delayMs: 50 }).returns("late");
    let settled = false;

    const result = mock.execute("a", createContext()).then((value) => {
      settled = true;
      return value;
    });
    await vi.advanceTimersByTimeAsync(49);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await expect(result).resolves.toBe("late");
  });

  it("should forget calls and outcomes on reset", async () => {
    const mock = createMockPrimitive<string, string>().returns("ok");
    await mock.execute("a", createContext());

    mock.reset();

    expect(mock.getCallCount()).toBe(0);
    await expect(mock.execute("a", createContext())).rejects.toThrow("called without configured outcome");
  });

  it("should default its name and kind", () => {
    const mock = createMockPrimitive();
    expect(mock.name).toBe("mock");
    expect(mock.kind).toBe("mock");
  });
});

describe("createRecordingHandler", () => {
  it("should collect events and filter them by type", () => {
    const recorder = createRecordingHandler();
    const ctx = createContext({ onEvent: recorder.handler });

    ctx.checkpoint("a");
    ctx.checkpoint("b");

    expect(recorder.types()).toEqual(["checkpoint", "checkpoint"]);
    expect(recorder.ofType("checkpoint").map((e) => e.name)).toEqual(["a", "b"]);
    expect(recorder.ofType("cache_hit")).toEqual([]);

    recorder.clear();
    expect(recorder.events).toEqual([]);
  });
});

describe("createTestClock", () => {
  it("should advance, set and reset time", () => {
    const clock = createTestClock(100);

    clock.advance(50);
    expect(clock.now()).toBe(150);

    clock.set(1000);
    expect(clock.now()).toBe(1000);

    clock.reset();
    expect(clock.now()).toBe(100);
  });
});
