import { SerialPort } from "serialport";
import {
  SourceError,
  type LineSource,
  type SourceConfig,
  type SourceMetrics,
  type SourceStatus
} from "@sensorlog/driver-core";
import { BoundedDelimiterParser } from "./bounded-delimiter-parser";
import { SerialLineSourceConfigSchema, type SerialLineSourceConfig } from "./config";

/**
 * The part of a serialport stream the source relies on. Satisfied by both
 * `SerialPort` and `SerialPortMock`.
 */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback?: (err: Error | null) => void): void;
  close(callback?: (err: Error | null) => void): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: "close" | "error", listener: (...args: unknown[]) => void): unknown;
}

export interface SerialPortOptions {
  path: string;
  baudRate: number;
  autoOpen: false;
}

export type SerialPortFactory = (options: SerialPortOptions) => SerialPortHandle;

type Delivery = { line: Uint8Array } | { error: SourceError };

const CR = 0x0d;

function errorMessage(value: unknown, fallback: string): string {
  return value instanceof Error ? value.message : fallback;
}

export class SerialLineSource implements LineSource {
  private readonly config: SerialLineSourceConfig;
  private readonly createPort: SerialPortFactory;
  private port?: SerialPortHandle;
  private state: SourceStatus["state"] = "CLOSED";
  private readonly buffered: Delivery[] = [];
  private reader?: (delivery: Delivery | null) => void;
  private readTimer?: NodeJS.Timeout;
  private awaitingFirstLine = false;
  private readonly metrics: SourceMetrics = { linesReceived: 0, linesDiscarded: 0, opens: 0 };

  constructor(cfg: SourceConfig, options: { createPort?: SerialPortFactory } = {}) {
    this.config = SerialLineSourceConfigSchema.parse({
      ...(cfg.connection ?? {})
    });
    this.createPort = options.createPort ?? ((portOptions) => new SerialPort(portOptions));
  }

  async open(): Promise<void> {
    if (this.state === "OPEN" || this.state === "OPENING") {
      return;
    }

    this.state = "OPENING";
    this.buffered.length = 0;
    this.awaitingFirstLine = this.config.discardFirstLine;

    const { path, baudRate, delimiter, maxLineLength } = this.config;
    const port = this.createPort({ path, baudRate, autoOpen: false });
    this.port = port;

    const parser = port.pipe(
      new BoundedDelimiterParser({
        delimiter,
        // room for the carriage return stripped in onLine
        maxLength: maxLineLength + 1,
        onOverflow: () => this.onOverflow(port)
      })
    );
    parser.on("data", (chunk: Buffer) => this.onLine(port, chunk));
    port.on("error", (err) => this.onDisconnect(port, errorMessage(err, "serial port error")));
    port.on("close", (err) => this.onDisconnect(port, errorMessage(err, "serial port closed")));

    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      });
    } catch (error) {
      this.port = undefined;
      this.state = "DISCONNECTED";
      const message = errorMessage(error, String(error));
      this.metrics.lastError = message;
      throw new SourceError("open_failed", `Cannot open ${path}: ${message}`, { cause: error });
    }

    if (this.state !== "OPENING") {
      // closed while opening
      await this.closePort(port);
      return;
    }
    this.state = "OPEN";
    this.metrics.opens += 1;
  }

  async readLine(): Promise<Uint8Array | null> {
    const next = this.buffered.shift();
    if (next) {
      return this.unwrap(next);
    }
    if (this.state !== "OPEN") {
      return null;
    }
    if (this.reader) {
      throw new Error("readLine is already pending");
    }

    const delivery = await new Promise<Delivery | null>((resolve) => {
      this.reader = resolve;
      const timeoutMs = this.config.readTimeoutMs;
      if (timeoutMs > 0) {
        this.readTimer = setTimeout(() => {
          this.deliver({ error: new SourceError("timeout", `No line received within ${timeoutMs}ms`) });
        }, timeoutMs);
      }
    });
    return delivery ? this.unwrap(delivery) : null;
  }

  async close(): Promise<void> {
    this.state = "CLOSED";
    this.buffered.length = 0;
    this.settleReader(null);

    const port = this.port;
    this.port = undefined;
    if (port) {
      await this.closePort(port);
    }
  }

  getStatus(): SourceStatus {
    return { state: this.state, metrics: { ...this.metrics } };
  }

  private onLine(port: SerialPortHandle, chunk: Buffer): void {
    if (port !== this.port) return;

    const line = chunk.length > 0 && chunk[chunk.length - 1] === CR ? chunk.subarray(0, -1) : chunk;
    this.metrics.linesReceived += 1;
    this.metrics.lastLineAt = new Date().toISOString();

    if (this.awaitingFirstLine) {
      this.awaitingFirstLine = false;
      this.metrics.linesDiscarded += 1;
      return;
    }
    if (line.length === 0) {
      return;
    }
    if (line.length > this.config.maxLineLength) {
      this.rejectOversized();
      return;
    }
    this.deliver({ line });
  }

  private onOverflow(port: SerialPortHandle): void {
    if (port !== this.port) return;

    this.metrics.linesReceived += 1;
    if (this.awaitingFirstLine) {
      this.awaitingFirstLine = false;
      this.metrics.linesDiscarded += 1;
      return;
    }
    this.rejectOversized();
  }

  private rejectOversized(): void {
    this.metrics.linesDiscarded += 1;
    this.deliver({
      error: new SourceError("overflow", `Line exceeds limit of ${this.config.maxLineLength} bytes`)
    });
  }

  private onDisconnect(port: SerialPortHandle, message: string): void {
    if (port !== this.port || this.state !== "OPEN") return;
    this.state = "DISCONNECTED";
    this.deliver({ error: new SourceError("disconnected", `${this.config.path}: ${message}`) });
  }

  private deliver(delivery: Delivery): void {
    if (this.reader) {
      this.settleReader(delivery);
    } else {
      this.buffered.push(delivery);
    }
  }

  private settleReader(delivery: Delivery | null): void {
    clearTimeout(this.readTimer);
    this.readTimer = undefined;
    const reader = this.reader;
    this.reader = undefined;
    reader?.(delivery);
  }

  private unwrap(delivery: Delivery): Uint8Array {
    if ("error" in delivery) {
      this.metrics.lastError = delivery.error.message;
      throw delivery.error;
    }
    return delivery.line;
  }

  private closePort(port: SerialPortHandle): Promise<void> {
    if (!port.isOpen) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          this.metrics.lastError = err.message;
          reject(new SourceError("disconnected", `Error closing ${this.config.path}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}
