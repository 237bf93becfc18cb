/**
 * Tests for grammar.ts - fields, units and time formats
 */
import { describe, it, expect } from "vitest";
import {
  FIELD_NAMES,
  MULTIPLIERS,
  SIGN_PATTERN,
  TIME_FORMATS,
  UNIT_SUFFIXES,
} from "./grammar";

describe("grammar", () => {
  describe("fields", () => {
    it("lists fields from largest to smallest", () => {
      expect(FIELD_NAMES).toEqual(["weeks", "days", "hours", "mins", "secs", "millis"]);
    });

    it("maps each field to its seconds", () => {
      expect(MULTIPLIERS).toEqual({
        weeks: 604800,
        days: 86400,
        hours: 3600,
        mins: 60,
        secs: 1,
        millis: 0.001,
      });
    });

    it("is frozen", () => {
      expect(Object.isFrozen(FIELD_NAMES)).toBe(true);
      expect(Object.isFrozen(MULTIPLIERS)).toBe(true);
      expect(Object.isFrozen(UNIT_SUFFIXES)).toBe(true);
      expect(Object.isFrozen(TIME_FORMATS)).toBe(true);
    });

    it("freezes every unit spelling list and format record", () => {
      for (const field of FIELD_NAMES) {
        expect(Object.isFrozen(UNIT_SUFFIXES[field])).toBe(true);
      }
      for (const format of TIME_FORMATS) {
        expect(Object.isFrozen(format)).toBe(true);
        expect(Object.isFrozen(format.fields)).toBe(true);
      }
    });
  });

  describe("TIME_FORMATS", () => {
    it("is tried in a fixed order", () => {
      expect(TIME_FORMATS.map((format) => format.name)).toEqual([
        "compound",
        "minute-clock",
        "hour-clock",
        "day-clock",
        "second-clock",
      ]);
    });

    it("only captures known fields", () => {
      for (const format of TIME_FORMATS) {
        for (const field of format.fields) {
          expect(MULTIPLIERS[field]).toBeGreaterThan(0);
        }
      }
    });

    it("compiles case-insensitive regexes without global state", () => {
      for (const format of TIME_FORMATS) {
        expect(format.regex.flags).toBe("i");
      }
    });

    it("matches every unit spelling in the compound format", () => {
      const [compound] = TIME_FORMATS;
      const spellings: Array<[string, string]> = [
        ["2w", "weeks"],
        ["2 wk", "weeks"],
        ["2 wks", "weeks"],
        ["2 week", "weeks"],
        ["2 weeks", "weeks"],
        ["2d", "days"],
        ["2 dy", "days"],
        ["2 dys", "days"],
        ["2 day", "days"],
        ["2 days", "days"],
        ["2h", "hours"],
        ["2 hr", "hours"],
        ["2 hrs", "hours"],
        ["2 hour", "hours"],
        ["2 hours", "hours"],
        ["2m", "mins"],
        ["2 min", "mins"],
        ["2 mins", "mins"],
        ["2 minute", "mins"],
        ["2 minutes", "mins"],
        ["2s", "secs"],
        ["2 sec", "secs"],
        ["2 secs", "secs"],
        ["2 second", "secs"],
        ["2 seconds", "secs"],
        ["2ms", "millis"],
        ["2 msec", "millis"],
        ["2 msecs", "millis"],
        ["2 millis", "millis"],
        ["2 millisecond", "millis"],
        ["2 milliseconds", "millis"],
      ];
      for (const [text, field] of spellings) {
        expect(compound?.regex.exec(text)?.groups?.[field]).toBe("2");
      }
    });

    it("anchors every format at both ends", () => {
      for (const format of TIME_FORMATS) {
        expect(format.regex.test("1:24 later")).toBe(false);
      }
    });
  });

  describe("SIGN_PATTERN", () => {
    it("captures the sign and the rest", () => {
      expect(SIGN_PATTERN.exec("- 1m")?.groups).toEqual({ sign: "-", unsigned: "1m" });
      expect(SIGN_PATTERN.exec("1m")?.groups).toEqual({ sign: undefined, unsigned: "1m" });
    });
  });
});
