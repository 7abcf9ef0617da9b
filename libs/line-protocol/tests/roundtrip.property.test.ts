import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { enrich, escapeKey, formatLine, parseLine, safeParseLine, type FieldValue, type MetricRecord } from "../src";

const NAME_CHARS = [..."abcXYZ0129_-.:/, =éü"];
const STRING_CHARS = [...NAME_CHARS, "\"", "\\", "🚀"];

const nameArb = fc.stringOf(fc.constantFrom(...NAME_CHARS), { minLength: 1, maxLength: 8 });

const fieldValueArb: fc.Arbitrary<FieldValue> = fc.oneof(
  fc
    .double({ noNaN: true, noDefaultInfinity: true })
    .filter((value) => !Object.is(value, -0))
    .map((value) => ({ type: "float" as const, value })),
  fc.bigInt({ min: -(2n ** 63n), max: 2n ** 63n - 1n }).map((value) => ({ type: "integer" as const, value })),
  fc.bigInt({ min: 0n, max: 2n ** 64n - 1n }).map((value) => ({ type: "unsigned" as const, value })),
  fc.stringOf(fc.constantFrom(...STRING_CHARS), { maxLength: 12 }).map((value) => ({ type: "string" as const, value })),
  fc.boolean().map((value) => ({ type: "boolean" as const, value }))
);

const recordArb: fc.Arbitrary<MetricRecord> = fc
  .record({
    measurement: nameArb,
    tags: fc.uniqueArray(fc.tuple(nameArb, nameArb), { selector: ([key]) => key, maxLength: 4 }),
    fields: fc.uniqueArray(fc.tuple(nameArb, fieldValueArb), { selector: ([key]) => key, minLength: 1, maxLength: 4 })
  })
  .map(({ measurement, tags, fields }) => ({ measurement, tags: new Map(tags), fields: new Map(fields) }));

const staticTagsArb = fc
  .uniqueArray(fc.tuple(nameArb, nameArb), { selector: ([key]) => key, maxLength: 3 })
  .map((entries) => new Map(entries));

describe("line protocol round trip", () => {
  it("parses back what it formats", () => {
    fc.assert(
      fc.property(recordArb, (record) => {
        expect(parseLine(formatLine(record))).toEqual(record);
      }),
      { numRuns: 300 }
    );
  });

  it("keeps fields and tags through enrichment", () => {
    fc.assert(
      fc.property(recordArb, staticTagsArb, fc.bigInt({ min: 0n, max: 2n ** 62n }), (record, staticTags, now) => {
        const line = enrich(parseLine(formatLine(record)), staticTags, now);
        const stored = parseLine(line, { timestamps: "allow" });

        const added = [...staticTags].filter(([key]) => !record.tags.has(key));
        expect(stored.measurement).toBe(record.measurement);
        expect(stored.fields).toEqual(record.fields);
        expect([...stored.tags]).toEqual([...record.tags, ...added]);
        expect(stored.timestamp).toBe(now);
      }),
      { numRuns: 300 }
    );
  });

  it("rejects a repeated field key", () => {
    fc.assert(
      fc.property(recordArb, (record) => {
        const [firstKey] = [...record.fields.keys()];
        const result = safeParseLine(`${formatLine(record)},${escapeKey(firstKey ?? "")}=1i`);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.reason).toBe(`duplicate field key '${firstKey ?? ""}'`);
        }
      })
    );
  });
});
