import { afterEach, describe, expect, it, vi } from "vitest";
import { enrich, parseLine, parseStaticTags, systemClock, toEpochNanoseconds } from "../src";

describe("enrich", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("appends static tags and the capture time", () => {
    const record = parseLine("plant,pin=A15 moisture=140,temperature=27.4");
    const line = enrich(record, new Map([["location", "foo"]]), 1700000000123000000n);
    expect(line).toBe("plant,pin=A15,location=foo moisture=140,temperature=27.4 1700000000123000000");
  });

  it("lets the device tag win over a static tag", () => {
    const record = parseLine("plant,pin=A15 moisture=1");
    const line = enrich(record, new Map([["pin", "B2"]]), 5n);
    expect(line).toBe("plant,pin=A15 moisture=1 5");
  });

  it("leaves the parsed record untouched", () => {
    const record = parseLine("plant,pin=A15 moisture=1");
    enrich(record, new Map([["location", "foo"]]), 5n);
    expect([...record.tags.keys()]).toEqual(["pin"]);
    expect(record.timestamp).toBeUndefined();
  });
});

describe("clock", () => {
  it("reads nanoseconds from the wall clock", () => {
    vi.spyOn(Date, "now").mockReturnValue(1_700_000_000_123);
    expect(systemClock()).toBe(1700000000123000000n);
  });

  it("converts dates", () => {
    expect(toEpochNanoseconds(new Date("1970-01-01T01:00:00Z"))).toBe(3600000000000n);
  });
});

describe("parseStaticTags", () => {
  it("keeps configuration order", () => {
    expect([...parseStaticTags("location=foo,room=kitchen")]).toEqual([
      ["location", "foo"],
      ["room", "kitchen"]
    ]);
  });

  it("returns nothing for an empty string", () => {
    expect(parseStaticTags("  ").size).toBe(0);
  });

  it("honours escapes", () => {
    expect(parseStaticTags("name=back\\,yard").get("name")).toBe("back,yard");
  });

  it("rejects duplicates and bare keys", () => {
    expect(() => parseStaticTags("a=1,a=2")).toThrow("duplicate static tag 'a'");
    expect(() => parseStaticTags("broken")).toThrow("tag without value");
  });
});
