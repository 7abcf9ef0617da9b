import type { FastifyInstance } from "fastify";
import { isQueueError, type DurableQueue } from "@sensorlog/durable-queue";
import type { CollectorPipeline } from "../core/pipeline";

interface StatusDeps {
  pipeline: CollectorPipeline;
  queue: DurableQueue;
}

export function registerStatusRoute(app: FastifyInstance, deps: StatusDeps): void {
  const { pipeline, queue } = deps;

  app.get("/status", async () => {
    let queueDepth: number | null = null;
    let queueError: string | undefined;
    try {
      queueDepth = await queue.size();
    } catch (error) {
      if (!isQueueError(error)) throw error;
      queueError = error.message;
    }
    return { ...pipeline.getStatus(), queue: { depth: queueDepth, error: queueError } };
  });
}
