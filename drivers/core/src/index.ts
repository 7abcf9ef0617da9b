export type {
  LineSource,
  LineSourceFactory,
  RawLine,
  SourceConfig,
  SourceMetrics,
  SourceStatus
} from "./types";
export type { SourceErrorKind } from "./errors";
export { SourceError, isSourceError } from "./errors";
