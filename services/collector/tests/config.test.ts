import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config";

const base = { INFLUX_DATABASE: "plants", SERIAL_DEVICE: "/dev/ttyUSB0" };

function issuesOf(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base);

    expect(config.source).toEqual({
      kind: "serial",
      connection: {
        path: "/dev/ttyUSB0",
        baudRate: 9600,
        maxLineLength: 1024,
        readTimeoutMs: 0,
        discardFirstLine: true
      },
      minBackoffMs: 1000,
      maxBackoffMs: 60_000,
      maxReconnectAttempts: 0
    });
    expect(config.influx).toEqual({
      baseUrl: "http://localhost:8086",
      api: "v1",
      database: "plants",
      org: undefined,
      token: undefined,
      username: undefined,
      password: undefined,
      timeoutMs: 10_000
    });
    expect(config.retry).toEqual({ minBackoffMs: 1000, maxBackoffMs: 60_000, maxAttempts: 0 });
    expect(config.delivery).toEqual({ batchSize: 100, idleMs: 1000, dropOnStatus: [] });
    expect(config.queue).toEqual({ path: "./data/queue.db", walAutocheckpoint: 10 });
    expect(config.server).toEqual({ host: "0.0.0.0", port: 4010 });
    expect(config.logLevel).toBe("info");
    expect(config.shutdownTimeoutMs).toBe(10_000);
    expect(config.staticTags.size).toBe(0);
  });

  it("reads overrides and treats empty values as unset", () => {
    const config = loadConfig({
      ...base,
      SERIAL_BAUD_RATE: "115200",
      SERIAL_DISCARD_FIRST_LINE: "false",
      SERIAL_READ_TIMEOUT_MS: "",
      INFLUX_HOST: "db.local:8087",
      INFLUX_TLS: "1",
      DELIVERY_DROP_ON_STATUS: "400, 413",
      COLLECTOR_PORT: "0",
      STATIC_TAGS: "location=foo,room=lab"
    });

    expect(config.source.connection).toMatchObject({ baudRate: 115200, discardFirstLine: false, readTimeoutMs: 0 });
    expect(config.influx.baseUrl).toBe("https://db.local:8087");
    expect(config.delivery.dropOnStatus).toEqual([400, 413]);
    expect(config.server.port).toBe(0);
    expect([...config.staticTags]).toEqual([
      ["location", "foo"],
      ["room", "lab"]
    ]);
  });

  it("builds a fake source without a serial device", () => {
    const config = loadConfig({ INFLUX_DATABASE: "plants", SOURCE_KIND: "fake", FAKE_SEED: "7" });

    expect(config.source.kind).toBe("fake");
    expect(config.source.connection).toEqual({ seed: 7, sampleIntervalMs: 1000 });
  });

  it("builds a geiger source on the serial device", () => {
    const config = loadConfig({ ...base, SOURCE_KIND: "geiger" });

    expect(config.source.kind).toBe("geiger");
    expect(config.source.connection).toEqual({
      path: "/dev/ttyUSB0",
      baudRate: 9600,
      maxLineLength: 10,
      readTimeoutMs: 0,
      measurement: "geiger"
    });
  });

  it("requires a serial device for the geiger source", () => {
    expect(issuesOf({ INFLUX_DATABASE: "plants", SOURCE_KIND: "geiger" })).toEqual([
      "SERIAL_DEVICE: Required when SOURCE_KIND is geiger"
    ]);
  });

  it("requires the database name", () => {
    expect(issuesOf({ SERIAL_DEVICE: "/dev/ttyUSB0" })).toEqual(["INFLUX_DATABASE: Required"]);
  });

  it("requires a serial device for the serial source", () => {
    expect(issuesOf({ INFLUX_DATABASE: "plants" })).toEqual([
      "SERIAL_DEVICE: Required when SOURCE_KIND is serial"
    ]);
  });

  it("requires org and token for the v2 API", () => {
    expect(issuesOf({ ...base, INFLUX_API: "v2" })).toEqual([
      "INFLUX_ORG: Required when INFLUX_API is v2",
      "INFLUX_TOKEN: Required when INFLUX_API is v2"
    ]);
  });

  it("rejects inverted backoff bounds", () => {
    expect(issuesOf({ ...base, DELIVERY_MIN_BACKOFF_MS: "5000", DELIVERY_MAX_BACKOFF_MS: "1000" })).toEqual([
      "DELIVERY_MIN_BACKOFF_MS: Must not exceed DELIVERY_MAX_BACKOFF_MS"
    ]);
  });

  it("rejects malformed static tags and status lists", () => {
    expect(issuesOf({ ...base, STATIC_TAGS: "location=a,location=b", DELIVERY_DROP_ON_STATUS: "abc" })).toEqual([
      `STATIC_TAGS: duplicate static tag 'location': "location=a,location=b"`,
      "DELIVERY_DROP_ON_STATUS: 'abc' is not an HTTP status code"
    ]);
  });

  it("rejects non-numeric values", () => {
    const issues = issuesOf({ ...base, SERIAL_BAUD_RATE: "fast" });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^SERIAL_BAUD_RATE: /);
  });

  it("formats every issue into the error message", () => {
    expect(() => loadConfig({})).toThrow(/Invalid configuration:\n {2}- INFLUX_DATABASE: Required/);
  });
});
