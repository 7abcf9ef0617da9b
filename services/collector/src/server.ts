import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { LineSource } from "@sensorlog/driver-core";
import { openSqliteQueue, type SqliteDurableQueue } from "@sensorlog/durable-queue";
import {
  createDatabaseChecker,
  createHttpChecker,
  registerHealthChecks,
  type DependencyChecker,
  type HealthCheckResult
} from "@sensorlog/health";
import type { Clock } from "@sensorlog/line-protocol";
import { initializeMetrics, Registry } from "@sensorlog/metrics";
import type { CollectorConfig } from "./config";
import { InfluxWriter, type DeliveryClient } from "./core/influx-writer";
import { createCollectorMetrics } from "./core/metrics";
import { CollectorPipeline } from "./core/pipeline";
import { loadSource } from "./drivers";
import { registerMetricsRoute } from "./routes/metrics";
import { registerStatusRoute } from "./routes/status";

declare module "fastify" {
  interface FastifyInstance {
    pipeline: CollectorPipeline;
  }
}

const SERVICE_NAME = "collector";

interface BuildServerOptions {
  config: CollectorConfig;
  logger?: FastifyServerOptions["logger"];
  queue?: SqliteDurableQueue;
  source?: LineSource;
  client?: DeliveryClient;
  registry?: Registry;
  clock?: Clock;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });
  const registry = options.registry ?? new Registry();
  const metrics = createCollectorMetrics(registry);
  const source = options.source ?? loadSource(config.source.kind)({ connection: config.source.connection });

  const queue =
    options.queue ??
    (await openSqliteQueue({
      path: config.queue.path,
      walAutocheckpoint: config.queue.walAutocheckpoint,
      logger: app.log.child({ component: "queue" })
    }));

  const writer = new InfluxWriter(config.influx, {
    retry: config.retry,
    logger: app.log.child({ component: "influx-writer" }),
    onRetry: () => metrics.deliveryRetries.inc()
  });
  const client = options.client ?? writer;

  const pipeline = new CollectorPipeline({
    source,
    queue,
    client,
    staticTags: config.staticTags,
    clock: options.clock,
    logger: app.log.child({ component: "pipeline" }),
    metrics,
    options: {
      batchSize: config.delivery.batchSize,
      idleMs: config.delivery.idleMs,
      dropOnStatus: config.delivery.dropOnStatus,
      minBackoffMs: config.source.minBackoffMs,
      maxBackoffMs: config.source.maxBackoffMs,
      maxReconnectAttempts: config.source.maxReconnectAttempts,
      deliveryMinBackoffMs: config.retry.minBackoffMs,
      deliveryMaxBackoffMs: config.retry.maxBackoffMs
    }
  });
  app.decorate("pipeline", pipeline);

  const ingestion: DependencyChecker = async (): Promise<HealthCheckResult> => {
    const status = pipeline.getStatus();
    return pipeline.ingestionRunning
      ? { status: "healthy", message: status.ingest.state }
      : { status: "unhealthy", message: status.ingest.lastError ?? `ingestion ${status.ingest.state}` };
  };
  const delivery: DependencyChecker = async (): Promise<HealthCheckResult> => {
    const { drain } = pipeline.getStatus();
    return drain.state === "halted"
      ? { status: "unhealthy", message: drain.lastError ?? "delivery halted" }
      : { status: "healthy", message: drain.state };
  };
  const dependencies: Record<string, DependencyChecker> = {
    queue: createDatabaseChecker(queue.database),
    ingestion,
    delivery
  };
  if (client === writer) {
    dependencies.influx = createHttpChecker(writer.pingUrl, { timeout: config.influx.timeoutMs });
  }

  initializeMetrics({ serviceName: SERVICE_NAME, registry }).instrument(app);
  registerHealthChecks(app, {
    serviceName: SERVICE_NAME,
    dependencies,
    criticalDependencies: ["queue", "ingestion", "delivery"]
  });
  registerStatusRoute(app, { pipeline, queue });
  registerMetricsRoute(app, registry);

  app.addHook("onClose", async () => {
    try {
      await pipeline.stop();
    } catch (err) {
      app.log.error(err, "collector: pipeline ended with an error");
    }
    await queue.close().catch((error: unknown) => {
      app.log.error(error, "collector: failed to close durable queue");
    });
  });

  return app;
}
