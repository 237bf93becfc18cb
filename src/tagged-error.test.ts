/**
 * Tests for tagged-error.ts - TaggedError factory
 */
import { describe, it, expect } from "vitest";
import { TaggedError, isTaggedError } from "./tagged-error";

class NotADuration extends TaggedError("NotADuration")<{ input: string }> {}

class BadNumeral extends TaggedError("BadNumeral", {
  message: (p: { numeral: string }) => `Bad numeral ${p.numeral}`,
}) {}

class Cancelled extends TaggedError("Cancelled")<{ reason?: string }> {}

describe("TaggedError", () => {
  it("sets the tag, name and props", () => {
    const error = new NotADuration({ input: "soon" });
    expect(error._tag).toBe("NotADuration");
    expect(error.name).toBe("NotADuration");
    expect(error.input).toBe("soon");
    expect(error.message).toBe("NotADuration");
  });

  it("builds the message from props", () => {
    const error = new BadNumeral({ numeral: "1.2.3" });
    expect(error.message).toBe("Bad numeral 1.2.3");
    expect(error.numeral).toBe("1.2.3");
  });

  it("allows omitting props when all are optional", () => {
    const error = new Cancelled();
    expect(error._tag).toBe("Cancelled");
    expect(error.reason).toBeUndefined();
  });

  it("exposes the cause option as Error.cause", () => {
    const cause = new Error("root");
    const error = new NotADuration({ input: "x" }, { cause });
    expect(error.cause).toBe(cause);
    expect(new NotADuration({ input: "x" }).cause).toBeUndefined();
  });

  it("produces real Error instances of the declared class", () => {
    const error = new BadNumeral({ numeral: "." });
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(BadNumeral);
    expect(error).not.toBeInstanceOf(NotADuration);
  });

  describe("isTaggedError()", () => {
    it("accepts TaggedError instances", () => {
      expect(isTaggedError(new Cancelled())).toBe(true);
    });

    it("rejects look-alikes and plain errors", () => {
      expect(isTaggedError({ _tag: "Cancelled" })).toBe(false);
      expect(isTaggedError(new Error("plain"))).toBe(false);
      expect(isTaggedError(undefined)).toBe(false);
    });
  });
});
