import { describe, it, expect } from "vitest";
import { createContext } from "./context";
import { definePrimitive, lambda } from "./primitive";
import { createRecordingHandler, createTestClock } from "./testing";

describe("Primitives", () => {
  describe("lambda", () => {
    it("should wrap a sync function", async () => {
      const double = lambda((n: number) => n * 2, { name: "double" });

      expect(double.kind).toBe("lambda");
      expect(double.name).toBe("double");
      await expect(double.execute(21, createContext())).resolves.toBe(42);
    });

    it("should wrap an async function and pass the context", async () => {
      const ctx = createContext({ tags: { tenant: "acme" } });
      const greet = lambda(async (name: string, context) => `${context.tags.get("tenant")}:${name}`);

      await expect(greet.execute("ada", ctx)).resolves.toBe("acme:ada");
    });

    it("should take its name from the function", () => {
      function normalize(text: string) {
        return text.trim();
      }
      expect(lambda(normalize).name).toBe("normalize");
      expect(lambda((text: string) => text).name).toBe("lambda");
    });

    it("should turn a sync throw into a rejection with the same error", async () => {
      const error = new RangeError("out of range");
      const explode = lambda((): number => {
        throw error;
      });

      await expect(explode.execute(undefined, createContext())).rejects.toBe(error);
    });
  });

  describe("definePrimitive", () => {
    it("should emit start and success events with duration", async () => {
      const clock = createTestClock(100);
      const recorder = createRecordingHandler();
      const ctx = createContext({ correlationId: "corr-1", clock: clock.now, onEvent: recorder.handler });

      const slow = definePrimitive({
        kind: "http",
        name: "fetchUser",
        execute: (id: string) => {
          clock.advance(30);
          return { id };
        },
      });

      await expect(slow.execute("u-1", ctx)).resolves.toEqual({ id: "u-1" });
      expect(recorder.events).toEqual([
        {
          type: "primitive_start",
          primitive: "fetchUser",
          kind: "http",
          ts: 100,
          workflowId: undefined,
          correlationId: "corr-1",
        },
        {
          type: "primitive_success",
          primitive: "fetchUser",
          kind: "http",
          ts: 130,
          workflowId: undefined,
          correlationId: "corr-1",
          durationMs: 30,
        },
      ]);
    });

    it("should emit an error event and rethrow the original error", async () => {
      const recorder = createRecordingHandler();
      const ctx = createContext({ onEvent: recorder.handler });
      const error = new Error("boom");

      const failing = definePrimitive({
        kind: "http",
        name: "failing",
        execute: async () => {
          throw error;
        },
      });

      await expect(failing.execute(undefined, ctx)).rejects.toBe(error);
      const [errorEvent] = recorder.ofType("primitive_error");
      expect(errorEvent.error).toBe(error);
      expect(recorder.types()).toEqual(["primitive_start", "primitive_error"]);
    });

    it("should record kind checkpoints when asked to", async () => {
      const ctx = createContext();
      const noisy = definePrimitive({
        kind: "custom",
        name: "noisy",
        checkpoints: true,
        execute: (n: number) => n,
      });

      await noisy.execute(1, ctx);

      expect(ctx.checkpoints.map((c) => c.name)).toEqual(["custom.start", "custom.end"]);
    });

    it("should record the end checkpoint when the call fails", async () => {
      const ctx = createContext();
      const failing = definePrimitive({
        kind: "custom",
        name: "failing",
        checkpoints: true,
        execute: (): number => {
          throw new Error("nope");
        },
      });

      await expect(failing.execute(undefined, ctx)).rejects.toThrow("nope");
      expect(ctx.checkpoints.map((c) => c.name)).toEqual(["custom.start", "custom.end"]);
    });
  });
});
