import { describe, it, expect } from "vitest";
import { createContext } from "./context";
import { lambda } from "./primitive";
import { err, executeResult, isErr, isOk, ok } from "./result";

describe("result", () => {
  it("should build and narrow results", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err("nope")).toEqual({ ok: false, error: "nope" });
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(err("nope"))).toBe(true);
  });

  describe("executeResult", () => {
    it("should capture a successful output", async () => {
      const result = await executeResult(lambda((n: number) => n + 1), 1, createContext());
      expect(result).toEqual({ ok: true, value: 2 });
    });

    it("should capture the rejection unchanged", async () => {
      const error = new Error("boom");
      const failing = lambda((): number => {
        throw error;
      });

      const result = await executeResult(failing, undefined, createContext());

      expect(isErr(result)).toBe(true);
      if (isErr(result)) expect(result.error).toBe(error);
    });
  });
});
