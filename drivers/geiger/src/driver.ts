import type { LineSource, RawLine, SourceConfig, SourceStatus } from "@sensorlog/driver-core";
import { SerialLineSource, type SerialPortFactory } from "@sensorlog/driver-serial-line";
import { GeigerSourceConfigSchema, type GeigerSourceConfig } from "./config";

type StatusReportingSource = LineSource & Required<Pick<LineSource, "getStatus">>;

const MS_PER_MINUTE = 60_000;
const COUNT_PATTERN = /^\d+$/;

export interface GeigerSourceOptions {
  /** Epoch milliseconds */
  clock?: () => number;
  /** Source of raw counter lines; a serial port at `path` by default */
  inner?: StatusReportingSource;
  createPort?: SerialPortFactory;
}

function decode(raw: RawLine): string {
  return typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
}

/**
 * Geiger counter on a serial port. The device reports a moving one-minute
 * count every few seconds; only the first report of each wall-clock minute is
 * passed on, as `geiger count_per_minute=N`, so that the stored values sum to
 * the real count. Lines that are not a count are passed on untouched and get
 * rejected by the parser downstream.
 */
export class GeigerLineSource implements LineSource {
  private readonly config: GeigerSourceConfig;
  private readonly clock: () => number;
  private readonly inner: StatusReportingSource;
  private lastMinute = 0;
  private skipped = 0;

  constructor(cfg: SourceConfig, options: GeigerSourceOptions = {}) {
    this.config = GeigerSourceConfigSchema.parse({ ...(cfg.connection ?? {}) });
    this.clock = options.clock ?? Date.now;

    const { path, baudRate, maxLineLength, readTimeoutMs } = this.config;
    this.inner =
      options.inner ??
      new SerialLineSource(
        { connection: { path, baudRate, maxLineLength, readTimeoutMs, discardFirstLine: true } },
        { createPort: options.createPort }
      );
  }

  async open(): Promise<void> {
    await this.inner.open();
    this.lastMinute = this.minute();
  }

  async readLine(): Promise<RawLine | null> {
    for (;;) {
      const raw = await this.inner.readLine();
      if (raw === null) {
        return null;
      }

      const text = decode(raw).trim();
      if (!COUNT_PATTERN.test(text)) {
        return raw;
      }

      const minute = this.minute();
      if (minute === this.lastMinute) {
        this.skipped += 1;
        continue;
      }
      this.lastMinute = minute;
      return `${this.config.measurement} count_per_minute=${BigInt(text).toString()}`;
    }
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  getStatus(): SourceStatus {
    const status = this.inner.getStatus();
    return {
      state: status.state,
      metrics: { ...status.metrics, linesDiscarded: status.metrics.linesDiscarded + this.skipped }
    };
  }

  private minute(): number {
    return Math.floor(this.clock() / MS_PER_MINUTE);
  }
}
