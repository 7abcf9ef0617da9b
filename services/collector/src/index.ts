import { fileURLToPath } from "node:url";
import pino from "pino";
import { setupGracefulShutdown } from "@sensorlog/health";
import { isQueueError } from "@sensorlog/durable-queue";
import { ConfigError, loadConfig, type CollectorConfig } from "./config";
import { ExitCode, exitCodeFor } from "./exit-codes";
import { buildServer } from "./server";

async function main(): Promise<void> {
  // configuration errors are reported before Fastify's logger exists
  const bootstrap = pino({ name: "sensorlog-collector" });

  let config: CollectorConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      bootstrap.fatal({ issues: error.issues }, "Invalid configuration");
      process.exit(ExitCode.InvalidConfig);
    }
    throw error;
  }

  let server: Awaited<ReturnType<typeof buildServer>>;
  try {
    server = await buildServer({ config });
  } catch (error) {
    if (isQueueError(error)) {
      bootstrap.fatal({ err: error }, "Durable queue unavailable");
      process.exit(ExitCode.QueueUnavailable);
    }
    throw error;
  }

  const shutdown = setupGracefulShutdown(server, {
    timeout: config.shutdownTimeoutMs,
    logger: server.log
  });

  const { host, port } = config.server;
  await server.listen({ port, host });
  server.log.info(`collector listening on ${host}:${String(port)}`);

  void server.pipeline.start().then(
    (outcome) => shutdown(`pipeline ${outcome}`, exitCodeFor(outcome)),
    (error: unknown) => {
      server.log.error({ err: error }, "collector: pipeline failed");
      return shutdown("pipeline failed", ExitCode.Failure);
    }
  );
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`collector failed: ${message}\n`);
    process.exit(ExitCode.Failure);
  });
}
