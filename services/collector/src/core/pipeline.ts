import { setTimeout as sleep } from "node:timers/promises";
import type { BaseLogger } from "pino";
import { isSourceError, type LineSource, type RawLine, type SourceStatus } from "@sensorlog/driver-core";
import { isQueueError, type DurableQueue, type QueueEntry } from "@sensorlog/durable-queue";
import { enrich, safeParseLine, systemClock, type Clock, type StaticTags } from "@sensorlog/line-protocol";
import { Backoff } from "./backoff";
import { isDeliveryError, type DeliveryClient } from "./influx-writer";
import type { CollectorMetrics } from "./metrics";

export type PipelineOutcome = "stopped" | "source_ended" | "queue_unavailable" | "source_unavailable";

export type IngestState = "idle" | "opening" | "reading" | "reconnecting" | "ended" | "halted" | "stopped";
export type DrainState = "idle" | "waiting" | "delivering" | "backoff" | "finished" | "halted" | "stopped";

export interface PipelineOptions {
  batchSize: number;
  /** Longest wait for new entries before the queue is polled again */
  idleMs: number;
  /** Source reconnect delays */
  minBackoffMs: number;
  maxBackoffMs: number;
  /**
   * Consecutive failed connections before giving up; 0 never gives up. A
   * connection fails when it cannot be opened or drops before its first line.
   */
  maxReconnectAttempts: number;
  /** Delay before retrying a batch whose delivery failed */
  deliveryMinBackoffMs: number;
  deliveryMaxBackoffMs: number;
  /** Statuses whose rejected batches are acknowledged instead of kept */
  dropOnStatus: number[];
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  batchSize: 100,
  idleMs: 1000,
  minBackoffMs: 1000,
  maxBackoffMs: 60_000,
  maxReconnectAttempts: 0,
  deliveryMinBackoffMs: 1000,
  deliveryMaxBackoffMs: 60_000,
  dropOnStatus: []
};

export interface PipelineCounters {
  linesReceived: number;
  linesRejected: number;
  entriesEnqueued: number;
  entriesDelivered: number;
  entriesDropped: number;
  batchesRejected: number;
  deliveryFailures: number;
  reconnects: number;
}

export interface PipelineStatus {
  running: boolean;
  outcome?: PipelineOutcome;
  ingest: { state: IngestState; lastError?: string; lastLineAt?: string };
  drain: { state: DrainState; lastError?: string; lastDeliveredAt?: string };
  counters: PipelineCounters;
  source?: SourceStatus;
}

export interface PipelineDeps {
  source: LineSource;
  queue: DurableQueue;
  client: DeliveryClient;
  staticTags: StaticTags;
  logger: BaseLogger;
  clock?: Clock;
  metrics?: CollectorMetrics;
  options?: Partial<PipelineOptions>;
}

type IngestResult = "stopped" | "source_ended" | "queue_unavailable" | "source_unavailable";
type DrainResult = "stopped" | "finished" | "queue_unavailable";
type ReadResult = "closed" | "ended" | "queue_unavailable" | { failed: unknown };

function display(raw: RawLine): string {
  return typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads lines from the source into the durable queue and, concurrently,
 * delivers queued lines to the database. The loops share only the queue.
 */
export class CollectorPipeline {
  private readonly options: PipelineOptions;
  private readonly clock: Clock;
  private readonly controller = new AbortController();
  private ingestState: IngestState = "idle";
  private drainState: DrainState = "idle";
  private ingesting = false;
  private stopRequested = false;
  private haltReason?: "queue_unavailable";
  private completion?: Promise<PipelineOutcome>;
  private outcome?: PipelineOutcome;
  private ingestError?: string;
  private drainError?: string;
  private lastLineAt?: string;
  private lastDeliveredAt?: string;
  private readonly counters: PipelineCounters = {
    linesReceived: 0,
    linesRejected: 0,
    entriesEnqueued: 0,
    entriesDelivered: 0,
    entriesDropped: 0,
    batchesRejected: 0,
    deliveryFailures: 0,
    reconnects: 0
  };

  constructor(private readonly deps: PipelineDeps) {
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...deps.options };
    this.clock = deps.clock ?? systemClock;
  }

  get running(): boolean {
    return this.completion !== undefined && this.outcome === undefined;
  }

  get ingestionRunning(): boolean {
    return this.ingesting;
  }

  /**
   * Start both loops. Resolves once both have ended.
   */
  start(): Promise<PipelineOutcome> {
    if (!this.completion) {
      this.deps.logger.info({ options: this.options }, "Pipeline starting");
      this.ingesting = true;
      this.completion = this.run();
    }
    return this.completion;
  }

  /**
   * Interrupt both loops at their next suspension point. The enqueue and the
   * HTTP request in progress are allowed to finish.
   */
  async stop(): Promise<PipelineOutcome> {
    if (!this.completion) {
      return "stopped";
    }
    if (!this.stopRequested && this.outcome === undefined) {
      this.stopRequested = true;
      this.deps.logger.info("Pipeline stopping");
      await this.interrupt();
    }
    return this.completion;
  }

  getStatus(): PipelineStatus {
    return {
      running: this.running,
      outcome: this.outcome,
      ingest: { state: this.ingestState, lastError: this.ingestError, lastLineAt: this.lastLineAt },
      drain: { state: this.drainState, lastError: this.drainError, lastDeliveredAt: this.lastDeliveredAt },
      counters: { ...this.counters },
      source: this.deps.source.getStatus?.()
    };
  }

  private async run(): Promise<PipelineOutcome> {
    const [ingest, drain] = await Promise.allSettled([this.guard(this.ingest()), this.guard(this.drain())]);

    if (ingest.status === "rejected") throw ingest.reason;
    if (drain.status === "rejected") throw drain.reason;

    let outcome: PipelineOutcome;
    if (this.haltReason) {
      outcome = this.haltReason;
    } else if (ingest.value === "source_unavailable") {
      outcome = "source_unavailable";
    } else if (this.stopRequested) {
      outcome = "stopped";
    } else {
      outcome = ingest.value;
    }

    this.outcome = outcome;
    this.deps.logger.info({ outcome, counters: this.counters }, "Pipeline finished");
    return outcome;
  }

  /**
   * An unexpected error in one loop brings the other one down too.
   */
  private async guard<T>(loop: Promise<T>): Promise<T> {
    try {
      return await loop;
    } catch (error) {
      this.deps.logger.error({ err: error }, "Pipeline loop failed");
      await this.interrupt();
      throw error;
    }
  }

  /**
   * Record why a loop gave up. The other loop keeps running: the drain loop
   * still flushes what was persisted, ingestion still persists new lines.
   */
  private halt(loop: "ingest" | "drain", error: unknown): void {
    this.deps.logger.error({ err: error, loop }, "Durable queue unavailable, halting loop");
    this.haltReason = "queue_unavailable";
  }

  private async interrupt(): Promise<void> {
    this.controller.abort();
    await this.closeSource();
  }

  private async closeSource(): Promise<void> {
    try {
      await this.deps.source.close();
    } catch (error) {
      this.deps.logger.warn({ err: error }, "Error closing source");
    }
  }

  private get interrupted(): boolean {
    return this.controller.signal.aborted;
  }

  // Ingestion: open -> read -> parse -> enqueue -> read

  private async ingest(): Promise<IngestResult> {
    try {
      return await this.ingestLoop();
    } finally {
      this.ingesting = false;
    }
  }

  private async ingestLoop(): Promise<IngestResult> {
    const { source, logger } = this.deps;
    const { minBackoffMs, maxBackoffMs } = this.options;
    const backoff = new Backoff(minBackoffMs, maxBackoffMs);
    let failures = 0;

    while (!this.interrupted) {
      this.ingestState = "opening";
      try {
        await source.open();
      } catch (error) {
        failures += 1;
        this.ingestError = message(error);
        if (this.givingUp(failures, error)) {
          return "source_unavailable";
        }
        const delayMs = backoff.next();
        logger.warn({ err: error, attempt: failures, delayMs }, "Cannot open source, retrying");
        this.ingestState = "reconnecting";
        await this.pause(delayMs);
        continue;
      }

      if (this.interrupted) break;
      this.ingestState = "reading";
      logger.info("Source open");

      const received = this.counters.linesReceived;
      const result = await this.readLines();
      if (this.counters.linesReceived > received) {
        failures = 0;
        backoff.reset();
      }

      if (result === "closed") {
        break;
      }
      if (result === "queue_unavailable") {
        this.ingestState = "halted";
        await this.closeSource();
        return "queue_unavailable";
      }
      if (result === "ended") {
        logger.info("Source exhausted");
        this.ingestState = "ended";
        await this.closeSource();
        return "source_ended";
      }

      this.ingestError = message(result.failed);
      await this.closeSource();
      if (this.counters.linesReceived === received) {
        failures += 1;
        if (this.givingUp(failures, result.failed)) {
          return "source_unavailable";
        }
      }
      this.counters.reconnects += 1;
      const delayMs = backoff.next();
      logger.warn({ err: result.failed, delayMs }, "Source failed, reopening");
      this.ingestState = "reconnecting";
      await this.pause(delayMs);
    }

    this.ingestState = "stopped";
    return "stopped";
  }

  private givingUp(failures: number, error: unknown): boolean {
    const { maxReconnectAttempts } = this.options;
    if (maxReconnectAttempts === 0 || failures < maxReconnectAttempts) {
      return false;
    }
    this.deps.logger.error({ err: error, attempts: failures }, "Source unavailable, giving up");
    this.ingestState = "halted";
    return true;
  }

  private async readLines(): Promise<ReadResult> {
    const { source, logger, metrics } = this.deps;

    for (;;) {
      if (this.interrupted) return "closed";

      let raw: RawLine | null;
      try {
        raw = await source.readLine();
      } catch (error) {
        if (isSourceError(error) && error.kind === "overflow") {
          this.counters.linesRejected += 1;
          metrics?.linesRejected.inc();
          logger.warn({ reason: error.message }, "Dropped oversized line");
          continue;
        }
        if (this.interrupted) return "closed";
        return { failed: error };
      }

      if (raw === null) {
        return this.interrupted ? "closed" : "ended";
      }

      const accepted = await this.accept(raw);
      if (!accepted) {
        return "queue_unavailable";
      }
    }
  }

  /**
   * Parse, enrich and enqueue one line. Returns false when the queue failed.
   */
  private async accept(raw: RawLine): Promise<boolean> {
    const { queue, logger, metrics, staticTags } = this.deps;

    this.counters.linesReceived += 1;
    metrics?.linesReceived.inc();
    this.lastLineAt = new Date().toISOString();

    const parsed = safeParseLine(raw);
    if (!parsed.success) {
      this.counters.linesRejected += 1;
      metrics?.linesRejected.inc();
      logger.warn({ line: display(raw), reason: parsed.error.reason }, "Dropped unparseable line");
      return true;
    }

    const line = enrich(parsed.record, staticTags, this.clock());
    logger.debug({ line }, "Line received");

    try {
      await queue.enqueue(line);
    } catch (error) {
      if (!isQueueError(error)) throw error;
      this.ingestError = error.message;
      if (!(this.interrupted && error.kind === "closed")) {
        this.halt("ingest", error);
      }
      return false;
    }

    this.counters.entriesEnqueued += 1;
    metrics?.entriesEnqueued.inc();
    metrics?.queueDepth.inc();
    return true;
  }

  // Drain: wait -> fetch -> deliver -> acknowledge -> fetch

  private async drain(): Promise<DrainResult> {
    try {
      const result = await this.drainLoop();
      this.drainState = result === "queue_unavailable" ? "halted" : result;
      return result;
    } catch (error) {
      this.drainError = message(error);
      throw error;
    }
  }

  private async drainLoop(): Promise<DrainResult> {
    const { queue, client, logger, metrics } = this.deps;
    const { batchSize, idleMs, deliveryMinBackoffMs, deliveryMaxBackoffMs, dropOnStatus } = this.options;
    const backoff = new Backoff(deliveryMinBackoffMs, deliveryMaxBackoffMs);
    const signal = this.controller.signal;

    try {
      metrics?.queueDepth.set(await queue.size());
    } catch (error) {
      return this.drainQueueFailure(error);
    }

    while (!this.interrupted) {
      let batch: QueueEntry[];
      try {
        batch = await queue.peekBatch(batchSize);
      } catch (error) {
        return this.drainQueueFailure(error);
      }

      if (batch.length === 0) {
        if (!this.ingesting) {
          logger.info("Queue drained after ingestion ended");
          return "finished";
        }
        this.drainState = "waiting";
        try {
          await queue.waitForEntries(idleMs, signal);
        } catch (error) {
          return this.drainQueueFailure(error);
        }
        continue;
      }

      this.drainState = "delivering";
      const endTimer = metrics?.deliveryDuration.startTimer();
      try {
        await client.deliver(
          batch.map((entry) => entry.line),
          signal
        );
      } catch (error) {
        if (!isDeliveryError(error)) throw error;
        this.drainError = error.message;

        if (error.kind === "aborted") {
          return "stopped";
        }
        if (error.kind === "rejected") {
          this.counters.batchesRejected += 1;
          metrics?.batchesRejected.inc();
          if (error.status !== undefined && dropOnStatus.includes(error.status)) {
            logger.warn(
              { status: error.status, body: error.body, entries: batch.length },
              "Write rejected, dropping batch"
            );
            const dropped = await this.acknowledge(batch);
            if (dropped !== true) return dropped;
            this.counters.entriesDropped += batch.length;
            metrics?.entriesDropped.inc(batch.length);
            continue;
          }
          logger.error(
            { status: error.status, body: error.body, entries: batch.length },
            "Write rejected, keeping batch queued"
          );
        } else {
          logger.error({ err: error, entries: batch.length }, "Delivery failed, keeping batch queued");
        }

        this.counters.deliveryFailures += 1;
        this.drainState = "backoff";
        await this.pause(backoff.next());
        continue;
      }

      endTimer?.();
      backoff.reset();
      const acknowledged = await this.acknowledge(batch);
      if (acknowledged !== true) return acknowledged;

      this.counters.entriesDelivered += batch.length;
      metrics?.entriesDelivered.inc(batch.length);
      this.lastDeliveredAt = new Date().toISOString();
      this.drainError = undefined;
    }

    return "stopped";
  }

  private async acknowledge(batch: QueueEntry[]): Promise<true | DrainResult> {
    for (const entry of batch) {
      try {
        await this.deps.queue.acknowledge(entry.handle);
      } catch (error) {
        return this.drainQueueFailure(error);
      }
      this.deps.metrics?.queueDepth.dec();
    }
    return true;
  }

  private async drainQueueFailure(error: unknown): Promise<DrainResult> {
    if (!isQueueError(error)) throw error;
    this.drainError = error.message;
    if (this.interrupted && error.kind === "closed") {
      return "stopped";
    }
    this.halt("drain", error);
    return "queue_unavailable";
  }

  private async pause(ms: number): Promise<void> {
    try {
      await sleep(ms, undefined, { signal: this.controller.signal });
    } catch (error) {
      if (!this.interrupted) throw error;
    }
  }
}
