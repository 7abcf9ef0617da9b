import { SourceError, type LineSource, type RawLine } from "@sensorlog/driver-core";
import { QueueError, type DurableQueue, type QueueEntry } from "@sensorlog/durable-queue";
import type { DeliveryClient } from "../src/core/influx-writer";

export type Step = RawLine | SourceError;

/**
 * Line source that plays back a script. With `endless`, reads block after the
 * script until the source is closed. The first `failOpens` opens are refused.
 */
export class ScriptedSource implements LineSource {
  opens = 0;
  closes = 0;
  reads = 0;
  private isOpen = false;
  private pending?: (line: RawLine | null) => void;

  constructor(
    private readonly steps: Step[],
    private readonly options: { endless?: boolean; failOpens?: number } = {}
  ) {}

  async open(): Promise<void> {
    this.opens += 1;
    if (this.opens <= (this.options.failOpens ?? 0)) {
      throw new SourceError("open_failed", "cannot open /dev/ttyTEST: No such file or directory");
    }
    this.isOpen = true;
  }

  async readLine(): Promise<RawLine | null> {
    if (!this.isOpen) return null;
    this.reads += 1;
    const step = this.steps.shift();
    if (step === undefined) {
      if (!this.options.endless) return null;
      return new Promise<RawLine | null>((resolve) => {
        this.pending = resolve;
      });
    }
    if (step instanceof SourceError) {
      if (step.kind !== "overflow") this.isOpen = false;
      throw step;
    }
    return step;
  }

  async close(): Promise<void> {
    this.closes += 1;
    this.isOpen = false;
    this.pending?.(null);
    this.pending = undefined;
  }
}

/**
 * Delivery client that records batches; `fail` decides per call whether to throw.
 */
export class RecordingClient implements DeliveryClient {
  calls = 0;
  readonly batches: string[][] = [];

  constructor(
    private readonly fail: (call: number) => Error | undefined = () => undefined,
    private readonly delayMs = 0
  ) {}

  async deliver(lines: string[]): Promise<void> {
    this.calls += 1;
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    const error = this.fail(this.calls);
    if (error) throw error;
    this.batches.push([...lines]);
  }

  get delivered(): string[] {
    return this.batches.flat();
  }
}

/**
 * Queue whose appends (or reads) fail as if the disk had gone bad.
 */
export class BrokenDiskQueue implements DurableQueue {
  constructor(
    private readonly inner: DurableQueue,
    private readonly broken: "enqueue" | "peekBatch" = "enqueue"
  ) {}

  enqueue(line: string): Promise<number> {
    if (this.broken === "enqueue") {
      return Promise.reject(new QueueError("unavailable", "enqueue failed: disk I/O error"));
    }
    return this.inner.enqueue(line);
  }

  peekBatch(maxCount: number): Promise<QueueEntry[]> {
    if (this.broken === "peekBatch") {
      return Promise.reject(new QueueError("unavailable", "peekBatch failed: disk I/O error"));
    }
    return this.inner.peekBatch(maxCount);
  }

  acknowledge(handle: number): Promise<void> {
    return this.inner.acknowledge(handle);
  }

  size(): Promise<number> {
    return this.inner.size();
  }

  waitForEntries(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return this.inner.waitForEntries(timeoutMs, signal);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
