/**
 * Tests for result.ts - Result primitives
 */
import { describe, it, expect } from "vitest";
import {
  andThen,
  err,
  from,
  isErr,
  isOk,
  map,
  mapError,
  match,
  ok,
  unwrapOr,
  type Result,
} from "./result";

// Declared return type keeps both branches, as a caller's Result would.
const readMinutes = (text: string): Result<number, string> =>
  text === "" ? err("nope", { cause: "why" }) : ok(Number(text));

describe("Result", () => {
  describe("ok() / err()", () => {
    it("creates an Ok", () => {
      expect(ok(84)).toEqual({ ok: true, value: 84 });
    });

    it("creates an Err without a cause key by default", () => {
      const failed = err("MALFORMED");
      expect(failed).toEqual({ ok: false, error: "MALFORMED" });
      expect("cause" in failed).toBe(false);
    });

    it("keeps a provided cause", () => {
      const cause = new Error("boom");
      expect(err("UNEXPECTED", { cause })).toEqual({
        ok: false,
        error: "UNEXPECTED",
        cause,
      });
    });
  });

  describe("isOk() / isErr()", () => {
    it("narrows both branches", () => {
      const good: Result<number, string> = ok(1);
      const bad: Result<number, string> = err("nope");
      expect(isOk(good)).toBe(true);
      expect(isErr(good)).toBe(false);
      expect(isOk(bad)).toBe(false);
      expect(isErr(bad)).toBe(true);
    });
  });

  describe("map()", () => {
    it("transforms an Ok value", () => {
      expect(map(ok(2), (n) => n * 60)).toEqual({ ok: true, value: 120 });
    });

    it("returns the same Err", () => {
      const failed = readMinutes("");
      expect(map(failed, (n) => n * 60)).toBe(failed);
    });

    it("returns the same Err when given an Err directly", () => {
      const failed = err("nope");
      expect(map(failed, (n: number) => n * 60)).toBe(failed);
    });
  });

  describe("mapError()", () => {
    it("transforms the error and carries the cause", () => {
      const failed: Result<number, string> = err("nope", { cause: "why" });
      expect(mapError(failed, (e) => e.toUpperCase())).toEqual({
        ok: false,
        error: "NOPE",
        cause: "why",
      });
    });

    it("returns the same Ok", () => {
      const good = readMinutes("2");
      expect(mapError(good, (e) => e.length)).toBe(good);
    });
  });

  describe("andThen()", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? ok(n / 2) : err("odd");

    it("chains on Ok", () => {
      expect(andThen(ok(8), half)).toEqual({ ok: true, value: 4 });
      expect(andThen(ok(3), half)).toEqual({ ok: false, error: "odd" });
    });

    it("skips the function on Err", () => {
      const failed: Result<number, string> = err("first");
      expect(andThen(failed, half)).toBe(failed);
    });
  });

  describe("match()", () => {
    it("calls the handler for each branch", () => {
      const handlers = {
        ok: (n: number) => `value ${n}`,
        err: (e: string, cause?: unknown) => `error ${e} ${String(cause)}`,
      };
      expect(match(ok(3), handlers)).toBe("value 3");
      expect(match(err("bad", { cause: "x" }), handlers)).toBe("error bad x");
    });
  });

  describe("unwrapOr()", () => {
    it("falls back on Err", () => {
      expect(unwrapOr(ok(5), 0)).toBe(5);
      expect(unwrapOr(err("bad"), 0)).toBe(0);
    });
  });

  describe("from()", () => {
    it("wraps a return value", () => {
      expect(from(() => 42, () => "failed")).toEqual({ ok: true, value: 42 });
    });

    it("maps a thrown value and keeps it as the cause", () => {
      const thrown = new Error("boom");
      const result = from(
        () => {
          throw thrown;
        },
        (cause) => (cause instanceof Error ? cause.message : "unknown")
      );
      expect(result).toEqual({ ok: false, error: "boom", cause: thrown });
    });
  });
});
