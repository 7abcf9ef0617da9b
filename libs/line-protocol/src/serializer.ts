import { ParseError } from "./errors";
import { escapeKey, escapeMeasurement, quoteString } from "./escape";
import type { FieldValue, MetricRecord } from "./types";

export function formatLine(record: MetricRecord): string {
  if (record.measurement.length === 0) {
    throw new ParseError("measurement is required");
  }
  if (record.fields.size === 0) {
    throw new ParseError("at least one field is required");
  }

  let line = escapeMeasurement(record.measurement);
  for (const [key, value] of record.tags) {
    if (key.length === 0 || value.length === 0) {
      throw new ParseError("empty tag key or value");
    }
    line += `,${escapeKey(key)}=${escapeKey(value)}`;
  }

  const fields: string[] = [];
  for (const [key, value] of record.fields) {
    if (key.length === 0) {
      throw new ParseError("empty field key");
    }
    fields.push(`${escapeKey(key)}=${formatFieldValue(value)}`);
  }
  line += ` ${fields.join(",")}`;

  if (record.timestamp !== undefined) {
    line += ` ${record.timestamp.toString()}`;
  }
  if (line.includes("\n")) {
    throw new ParseError("line break inside a line", line);
  }
  return line;
}

export function formatFieldValue(field: FieldValue): string {
  switch (field.type) {
    case "float":
      if (!Number.isFinite(field.value)) {
        throw new ParseError(`non-finite float ${String(field.value)}`);
      }
      return String(field.value);
    case "integer":
      return `${field.value.toString()}i`;
    case "unsigned":
      return `${field.value.toString()}u`;
    case "string":
      return quoteString(field.value);
    case "boolean":
      return field.value ? "true" : "false";
  }
}
