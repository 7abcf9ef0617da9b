/**
 * A line as read from a device, without its delimiter. Byte sources hand over
 * the undecoded bytes so that decoding errors surface in the parser.
 */
export type RawLine = string | Uint8Array;

export interface SourceConfig {
  connection: Record<string, unknown>;
}

export interface SourceMetrics {
  linesReceived: number;
  linesDiscarded: number;
  opens: number;
  lastError?: string;
  lastLineAt?: string;
}

export interface SourceStatus {
  state: "CLOSED" | "OPENING" | "OPEN" | "DISCONNECTED";
  metrics: SourceMetrics;
}

export interface LineSource {
  open(): Promise<void>;
  /**
   * Next complete line. Resolves null once the source is closed or exhausted,
   * rejects with a SourceError on device trouble.
   */
  readLine(): Promise<RawLine | null>;
  close(): Promise<void>;
  getStatus?(): SourceStatus;
}

export type LineSourceFactory = (cfg: SourceConfig) => LineSource;
