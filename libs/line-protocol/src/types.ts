export type FieldValue =
  | { type: "float"; value: number }
  | { type: "integer"; value: bigint }
  | { type: "unsigned"; value: bigint }
  | { type: "string"; value: string }
  | { type: "boolean"; value: boolean };

export type FieldType = FieldValue["type"];

export interface MetricRecord {
  measurement: string;
  /** Insertion-ordered; the order is kept on serialization. */
  tags: Map<string, string>;
  fields: Map<string, FieldValue>;
  /** Nanoseconds since the Unix epoch. */
  timestamp?: bigint;
}

export type StaticTags = ReadonlyMap<string, string>;

export type Clock = () => bigint;

export interface ParseOptions {
  /**
   * Devices have no clock, so a trailing timestamp segment is rejected unless
   * explicitly allowed (e.g. when re-reading enriched lines).
   */
  timestamps?: "reject" | "allow";
}
