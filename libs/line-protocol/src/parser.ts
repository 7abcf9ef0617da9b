import { ParseError } from "./errors";
import { indexOfUnescaped, splitUnescaped, unescapeKey, unescapeMeasurement } from "./escape";
import type { FieldValue, MetricRecord, ParseOptions } from "./types";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const INTEGER_PATTERN = /^-?\d+i$/;
const UNSIGNED_PATTERN = /^\d+u$/;
const FLOAT_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;
const TIMESTAMP_PATTERN = /^-?\d+$/;
const TRUE_WORDS = new Set(["t", "T", "true", "True", "TRUE"]);
const FALSE_WORDS = new Set(["f", "F", "false", "False", "FALSE"]);

const utf8 = new TextDecoder("utf-8", { fatal: true });

export type SafeParseResult =
  | { success: true; record: MetricRecord }
  | { success: false; error: ParseError };

/**
 * Parses one line of `measurement[,tag=val...] field=val[,field=val...]`.
 *
 * The trailing line break must already be stripped; surrounding whitespace is
 * ignored. Throws {@link ParseError} for anything that is not well-formed.
 */
export function parseLine(raw: string | Uint8Array, options: ParseOptions = {}): MetricRecord {
  const line = decode(raw).trim();
  if (line.length === 0) {
    throw new ParseError("empty line");
  }

  const seriesEnd = indexOfUnescaped(line, " ");
  if (seriesEnd === -1) {
    throw new ParseError("missing field section", line);
  }
  const { measurement, tags } = parseSeries(line.slice(0, seriesEnd), line);
  const { fields, end } = parseFields(line, seriesEnd + 1);

  const record: MetricRecord = { measurement, tags, fields };
  if (end < line.length) {
    const stamp = line.slice(end + 1);
    if (!TIMESTAMP_PATTERN.test(stamp)) {
      throw new ParseError("unexpected content after field section", line);
    }
    if (options.timestamps !== "allow") {
      throw new ParseError("timestamp segment not accepted", line);
    }
    record.timestamp = BigInt(stamp);
  }
  return record;
}

export function safeParseLine(raw: string | Uint8Array, options?: ParseOptions): SafeParseResult {
  try {
    return { success: true, record: parseLine(raw, options) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

export function parseTagPair(part: string, line?: string): [string, string] {
  const eq = indexOfUnescaped(part, "=");
  if (eq === -1) {
    throw new ParseError("tag without value", line);
  }
  const rawValue = part.slice(eq + 1);
  if (indexOfUnescaped(rawValue, "=") !== -1) {
    throw new ParseError("unescaped '=' in tag value", line);
  }
  const key = unescapeKey(part.slice(0, eq));
  const value = unescapeKey(rawValue);
  if (key.length === 0 || value.length === 0) {
    throw new ParseError("empty tag key or value", line);
  }
  return [key, value];
}

function decode(raw: string | Uint8Array): string {
  if (typeof raw === "string") return raw;
  try {
    return utf8.decode(raw);
  } catch {
    throw new ParseError("invalid UTF-8");
  }
}

function parseSeries(series: string, line: string): Pick<MetricRecord, "measurement" | "tags"> {
  const [head = "", ...pairs] = splitUnescaped(series, ",");
  const measurement = unescapeMeasurement(head);
  if (measurement.length === 0) {
    throw new ParseError("missing measurement", line);
  }
  const tags = new Map<string, string>();
  for (const pair of pairs) {
    const [key, value] = parseTagPair(pair, line);
    if (tags.has(key)) {
      throw new ParseError(`duplicate tag key '${key}'`, line);
    }
    tags.set(key, value);
  }
  return { measurement, tags };
}

function parseFields(line: string, start: number): { fields: Map<string, FieldValue>; end: number } {
  const fields = new Map<string, FieldValue>();
  let i = start;
  if (i >= line.length || line[i] === " ") {
    throw new ParseError("missing field section", line);
  }

  for (;;) {
    const keyStart = i;
    while (i < line.length) {
      const ch = line[i];
      if (ch === "\\") {
        i += 2;
        continue;
      }
      if (ch === "=" || ch === "," || ch === " ") break;
      i += 1;
    }
    if (line[i] !== "=") {
      throw new ParseError("field without value", line);
    }
    const key = unescapeKey(line.slice(keyStart, i));
    if (key.length === 0) {
      throw new ParseError("empty field key", line);
    }
    i += 1;

    let value: FieldValue;
    if (line[i] === "\"") {
      const read = readString(line, i + 1);
      value = { type: "string", value: read.value };
      i = read.end;
    } else {
      const valueStart = i;
      while (i < line.length && line[i] !== "," && line[i] !== " ") {
        i += 1;
      }
      value = parseBareValue(line.slice(valueStart, i), line);
    }

    if (fields.has(key)) {
      throw new ParseError(`duplicate field key '${key}'`, line);
    }
    fields.set(key, value);

    if (i >= line.length || line[i] === " ") {
      return { fields, end: i };
    }
    if (line[i] !== ",") {
      throw new ParseError("unexpected character after field value", line);
    }
    i += 1;
  }
}

function readString(line: string, start: number): { value: string; end: number } {
  let value = "";
  let i = start;
  while (i < line.length) {
    const ch = line[i];
    const next = line[i + 1];
    if (ch === "\\" && (next === "\"" || next === "\\")) {
      value += next;
      i += 2;
      continue;
    }
    if (ch === "\"") {
      return { value, end: i + 1 };
    }
    value += ch;
    i += 1;
  }
  throw new ParseError("unterminated string field", line);
}

function parseBareValue(text: string, line: string): FieldValue {
  if (text.length === 0) {
    throw new ParseError("empty field value", line);
  }
  if (INTEGER_PATTERN.test(text)) {
    const value = BigInt(text.slice(0, -1));
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new ParseError(`integer out of range '${text}'`, line);
    }
    return { type: "integer", value };
  }
  if (UNSIGNED_PATTERN.test(text)) {
    const value = BigInt(text.slice(0, -1));
    if (value > UINT64_MAX) {
      throw new ParseError(`unsigned integer out of range '${text}'`, line);
    }
    return { type: "unsigned", value };
  }
  if (TRUE_WORDS.has(text)) return { type: "boolean", value: true };
  if (FALSE_WORDS.has(text)) return { type: "boolean", value: false };
  if (FLOAT_PATTERN.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value)) {
      return { type: "float", value };
    }
  }
  throw new ParseError(`unparseable field value '${text}'`, line);
}
