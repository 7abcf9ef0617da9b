import { describe, expect, it } from "vitest";
import { ParseError, parseLine, safeParseLine } from "../src";

describe("parseLine", () => {
  it("parses measurement, tags and fields", () => {
    const record = parseLine("plant,pin=A15 moisture=140,temperature=27.4");
    expect(record.measurement).toBe("plant");
    expect([...record.tags]).toEqual([["pin", "A15"]]);
    expect([...record.fields]).toEqual([
      ["moisture", { type: "float", value: 140 }],
      ["temperature", { type: "float", value: 27.4 }]
    ]);
    expect(record.timestamp).toBeUndefined();
  });

  it("reads every field type", () => {
    const record = parseLine('m i=-42i,u=7u,s="hello \\"x\\" \\\\ there",b=T,f=false,e=1.5e3');
    expect(record.fields.get("i")).toEqual({ type: "integer", value: -42n });
    expect(record.fields.get("u")).toEqual({ type: "unsigned", value: 7n });
    expect(record.fields.get("s")).toEqual({ type: "string", value: 'hello "x" \\ there' });
    expect(record.fields.get("b")).toEqual({ type: "boolean", value: true });
    expect(record.fields.get("f")).toEqual({ type: "boolean", value: false });
    expect(record.fields.get("e")).toEqual({ type: "float", value: 1500 });
  });

  it("unescapes names", () => {
    const record = parseLine("my\\ meas,tag\\ key=va\\,lue f\\=k=1");
    expect(record.measurement).toBe("my meas");
    expect(record.tags.get("tag key")).toBe("va,lue");
    expect(record.fields.get("f=k")).toEqual({ type: "float", value: 1 });
  });

  it("ignores a trailing carriage return", () => {
    const record = parseLine("plant moisture=1\r");
    expect(record.fields.get("moisture")).toEqual({ type: "float", value: 1 });
  });

  it("decodes raw bytes", () => {
    const record = parseLine(new TextEncoder().encode("plant,room=küche moisture=3i"));
    expect(record.tags.get("room")).toBe("küche");
    expect(record.fields.get("moisture")).toEqual({ type: "integer", value: 3n });
  });

  it("accepts a timestamp only when allowed", () => {
    const record = parseLine("m f=1i 1700000000000000000", { timestamps: "allow" });
    expect(record.timestamp).toBe(1700000000000000000n);
    expect(() => parseLine("m f=1i 1700000000000000000")).toThrow(ParseError);
  });

  it.each([
    ["", "empty line"],
    ["   ", "empty line"],
    ["plant", "missing field section"],
    ["plant,pin=A15", "missing field section"],
    ["plant  moisture=1", "missing field section"],
    ["plant moisture=1 1700000000000000000", "timestamp segment not accepted"],
    ["plant moisture=1 12 13", "unexpected content after field section"],
    ["plant,pin=A1,pin=A2 moisture=1", "duplicate tag key 'pin'"],
    ["plant moisture=1,moisture=2", "duplicate field key 'moisture'"],
    ["plant moisture=abc", "unparseable field value 'abc'"],
    ["plant moisture=12x", "unparseable field value '12x'"],
    ["plant moisture=1e999", "unparseable field value '1e999'"],
    ['plant note="open', "unterminated string field"],
    ["plant,pin moisture=1", "tag without value"],
    ["plant,pin=a=b moisture=1", "unescaped '=' in tag value"],
    [",pin=A15 moisture=1", "missing measurement"],
    ["plant moisture", "field without value"],
    ["plant moisture=", "empty field value"],
    ["plant =1", "empty field key"],
    ["plant big=9223372036854775808i", "integer out of range '9223372036854775808i'"]
  ])("rejects %j", (line, reason) => {
    const result = safeParseLine(line);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("malformed");
      expect(result.error.reason).toBe(reason);
    }
  });

  it("rejects invalid UTF-8", () => {
    const result = safeParseLine(new Uint8Array([0x70, 0xff, 0x20]));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe("invalid UTF-8");
    }
  });
});
