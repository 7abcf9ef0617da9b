import type { LineSource, SourceConfig, SourceStatus } from "@sensorlog/driver-core";

type Rng = () => number;

function createRng(seed: number | undefined): Rng {
  let state = (seed ?? Date.now()) >>> 0;
  if (state === 0) state = 0x1abcdef;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0xffffffff;
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * In-process source. Replays `connection.lines` when given, otherwise emits a
 * `plant` reading every `sampleIntervalMs` from a seeded generator.
 */
export class FakeLineSource implements LineSource {
  private readonly lines?: string[];
  private readonly loop: boolean;
  private readonly sampleIntervalMs: number;
  private readonly count?: number;
  private readonly pin: string;
  private readonly seed?: number;
  private rng: Rng;
  private emitted = 0;
  private state: SourceStatus["state"] = "CLOSED";
  private opens = 0;
  private lastLineAt?: string;
  private wake?: () => void;

  constructor(cfg: SourceConfig) {
    const { connection } = cfg;
    this.lines = Array.isArray(connection.lines)
      ? connection.lines.filter((line): line is string => typeof line === "string")
      : undefined;
    this.loop = typeof connection.loop === "boolean" ? connection.loop : this.lines === undefined;
    this.sampleIntervalMs = optionalNumber(connection.sampleIntervalMs) ?? (this.lines ? 0 : 1000);
    this.count = optionalNumber(connection.count);
    this.pin = typeof connection.pin === "string" ? connection.pin : "A15";
    this.seed = optionalNumber(connection.seed);
    this.rng = createRng(this.seed);
  }

  async open(): Promise<void> {
    this.state = "OPEN";
    this.opens += 1;
    this.emitted = 0;
    this.rng = createRng(this.seed);
  }

  async readLine(): Promise<string | null> {
    if (this.state !== "OPEN" || this.exhausted()) {
      return null;
    }

    if (this.sampleIntervalMs > 0) {
      await this.sleep(this.sampleIntervalMs);
      if (this.state !== "OPEN") {
        return null;
      }
    }

    const line = this.lines ? this.lines[this.emitted % this.lines.length] : this.reading();
    this.emitted += 1;
    this.lastLineAt = new Date().toISOString();
    return line ?? null;
  }

  async close(): Promise<void> {
    this.state = "CLOSED";
    this.wake?.();
  }

  getStatus(): SourceStatus {
    return {
      state: this.state,
      metrics: {
        linesReceived: this.emitted,
        linesDiscarded: 0,
        opens: this.opens,
        lastLineAt: this.lastLineAt
      }
    };
  }

  private exhausted(): boolean {
    if (this.lines) {
      return this.lines.length === 0 || (!this.loop && this.emitted >= this.lines.length);
    }
    return this.count !== undefined && this.emitted >= this.count;
  }

  private reading(): string {
    const drift = Math.sin(this.emitted / 30);
    const moisture = Math.round(clamp(400 + drift * 120 + (this.rng() - 0.5) * 20, 0, 1023));
    const temperature = clamp(22 + drift * 3 + (this.rng() - 0.5), -40, 85);
    return `plant,pin=${this.pin} moisture=${moisture},temperature=${temperature.toFixed(1)}`;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}
