export type { Clock, FieldType, FieldValue, MetricRecord, ParseOptions, StaticTags } from "./types";
export type { SafeParseResult } from "./parser";
export type { ParseErrorKind } from "./errors";

export { ParseError } from "./errors";
export { parseLine, safeParseLine } from "./parser";
export { formatFieldValue, formatLine } from "./serializer";
export { enrich, mergeTags, systemClock, toEpochNanoseconds } from "./enricher";
export { parseStaticTags } from "./static-tags";
export { escapeKey, escapeMeasurement, quoteString } from "./escape";
