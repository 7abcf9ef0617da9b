import {
  createCounter,
  createGauge,
  createHistogram,
  DEFAULT_PREFIX,
  type Counter,
  type Gauge,
  type Histogram,
  type Registry
} from "@sensorlog/metrics";

export interface CollectorMetrics {
  linesReceived: Counter;
  linesRejected: Counter;
  entriesEnqueued: Counter;
  entriesDelivered: Counter;
  entriesDropped: Counter;
  deliveryRetries: Counter;
  batchesRejected: Counter;
  queueDepth: Gauge;
  deliveryDuration: Histogram;
}

export function createCollectorMetrics(registry?: Registry): CollectorMetrics {
  const name = (suffix: string) => `${DEFAULT_PREFIX}_${suffix}`;
  return {
    linesReceived: createCounter({
      name: name("lines_received_total"),
      help: "Lines read from the source",
      registry
    }),
    linesRejected: createCounter({
      name: name("lines_rejected_total"),
      help: "Lines dropped because they could not be parsed or were too long",
      registry
    }),
    entriesEnqueued: createCounter({
      name: name("entries_enqueued_total"),
      help: "Enriched lines committed to the durable queue",
      registry
    }),
    entriesDelivered: createCounter({
      name: name("entries_delivered_total"),
      help: "Queued lines written to the database and acknowledged",
      registry
    }),
    entriesDropped: createCounter({
      name: name("entries_dropped_total"),
      help: "Queued lines acknowledged without delivery after a rejected write",
      registry
    }),
    deliveryRetries: createCounter({
      name: name("delivery_retries_total"),
      help: "Write attempts retried after a transient failure",
      registry
    }),
    batchesRejected: createCounter({
      name: name("batches_rejected_total"),
      help: "Write batches rejected by the database",
      registry
    }),
    queueDepth: createGauge({
      name: name("queue_depth"),
      help: "Entries waiting in the durable queue",
      registry
    }),
    deliveryDuration: createHistogram({
      name: name("delivery_duration_seconds"),
      help: "Time spent delivering one batch, retries included",
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 30, 120],
      registry
    })
  };
}
