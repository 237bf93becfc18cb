import { describe, expect, it } from "vitest";
import { Timespan, parse, parseResult, ok, err, map } from "./index";

describe("root named exports", () => {
  it("keeps named exports aligned with Timespan namespace", () => {
    expect(parse("1:24")).toBe(Timespan.parse("1:24"));
    expect(parseResult("1m24s")).toEqual(Timespan.parseResult("1m24s"));

    expect(ok(1)).toEqual(Timespan.ok(1));
    expect(err("E")).toEqual(Timespan.err("E"));

    const mapped = map(ok(2), (n) => n * 60);
    const mappedViaNamespace = Timespan.map(Timespan.ok(2), (n) => n * 60);
    expect(mapped).toEqual(mappedViaNamespace);
  });
});
