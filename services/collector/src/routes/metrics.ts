import type { FastifyInstance } from "fastify";
import { metricsHandler, type Registry } from "@sensorlog/metrics";

export function registerMetricsRoute(app: FastifyInstance, registry: Registry): void {
  app.get("/metrics", async (_request, reply) => {
    reply.header("content-type", registry.contentType);
    return metricsHandler(registry);
  });
}
