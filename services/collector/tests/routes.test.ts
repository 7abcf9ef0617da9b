import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openSqliteQueue } from "@sensorlog/durable-queue";
import { loadConfig } from "../src/config";
import { buildServer } from "../src/server";
import { RecordingClient, ScriptedSource } from "./helpers";

describe("collector routes", () => {
  let app: FastifyInstance;
  let source: ScriptedSource;
  let client: RecordingClient;
  let closed: boolean;

  const delivered = () => app.pipeline.getStatus().counters.entriesDelivered;

  beforeEach(async () => {
    source = new ScriptedSource(["plant,pin=A15 moisture=140"], { endless: true });
    client = new RecordingClient();
    app = await buildServer({
      config: loadConfig({ INFLUX_DATABASE: "plants", SOURCE_KIND: "fake", STATIC_TAGS: "location=foo" }),
      logger: false,
      queue: await openSqliteQueue({ path: ":memory:" }),
      source,
      client,
      clock: () => 7n
    });
    closed = false;
  });

  afterEach(async () => {
    if (!closed) await app.close();
  });

  it("answers liveness", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "healthy", service: "collector" });
  });

  it("is not ready until ingestion runs", async () => {
    const before = await app.inject({ method: "GET", url: "/ready" });
    expect(before.statusCode).toBe(503);
    expect(before.json().checks.ingestion).toEqual({ status: "unhealthy", message: "ingestion idle" });

    void app.pipeline.start();
    await vi.waitFor(() => expect(client.delivered).toHaveLength(1));

    const after = await app.inject({ method: "GET", url: "/ready" });
    expect(after.statusCode).toBe(200);
    expect(after.json().checks.queue.status).toBe("healthy");
    expect(after.json().checks.ingestion).toEqual({ status: "healthy", message: "reading" });
    expect(after.json().checks.delivery.status).toBe("healthy");
  });

  it("reports pipeline status and queue depth", async () => {
    void app.pipeline.start();
    await vi.waitFor(() => expect(delivered()).toBe(1));
    expect(client.delivered).toEqual(["plant,pin=A15,location=foo moisture=140 7"]);

    const res = await app.inject({ method: "GET", url: "/status" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.running).toBe(true);
    expect(body.queue).toEqual({ depth: 0 });
    expect(body.counters).toMatchObject({ linesReceived: 1, entriesEnqueued: 1, entriesDelivered: 1 });
  });

  it("exposes collector metrics", async () => {
    void app.pipeline.start();
    await vi.waitFor(() => expect(delivered()).toBe(1));

    const res = await app.inject({ method: "GET", url: "/metrics" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.body).toContain("sensorlog_lines_received_total 1");
    expect(res.body).toContain("sensorlog_entries_delivered_total 1");
  });

  it("stops the pipeline on close", async () => {
    const done = app.pipeline.start();
    await vi.waitFor(() => expect(app.pipeline.getStatus().ingest.state).toBe("reading"));

    await app.close();
    closed = true;

    expect(await done).toBe("stopped");
    expect(source.closes).toBeGreaterThanOrEqual(1);
  });
});
