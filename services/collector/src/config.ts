import { z } from "zod";
import { ParseError, parseStaticTags, type StaticTags } from "@sensorlog/line-protocol";
import type { InfluxWriterConfig, RetryPolicy } from "./core/influx-writer";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const int = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  SOURCE_KIND: z.enum(["serial", "geiger", "fake"]).default("serial"),
  SERIAL_DEVICE: z.string().optional(),
  SERIAL_BAUD_RATE: int(9600, 1),
  SERIAL_MAX_LINE_LENGTH: int(1024, 1),
  SERIAL_READ_TIMEOUT_MS: int(0),
  SERIAL_DISCARD_FIRST_LINE: flag(true),
  SERIAL_MIN_BACKOFF_MS: int(1000, 1),
  SERIAL_MAX_BACKOFF_MS: int(60_000, 1),
  SERIAL_MAX_RECONNECT_ATTEMPTS: int(0),
  GEIGER_MAX_LINE_LENGTH: int(10, 1),
  GEIGER_MEASUREMENT: z.string().min(1).default("geiger"),
  FAKE_SEED: z.coerce.number().int().optional(),
  FAKE_SAMPLE_INTERVAL_MS: int(1000),
  STATIC_TAGS: z.string().default(""),
  INFLUX_HOST: z.string().min(1).default("localhost:8086"),
  INFLUX_TLS: flag(false),
  INFLUX_API: z.enum(["v1", "v2"]).default("v1"),
  INFLUX_DATABASE: z.string().min(1),
  INFLUX_ORG: z.string().min(1).optional(),
  INFLUX_TOKEN: z.string().min(1).optional(),
  INFLUX_USERNAME: z.string().min(1).optional(),
  INFLUX_PASSWORD: z.string().optional(),
  INFLUX_TIMEOUT_MS: int(10_000, 1),
  QUEUE_PATH: z.string().min(1).default("./data/queue.db"),
  QUEUE_WAL_AUTOCHECKPOINT: int(10),
  DELIVERY_BATCH_SIZE: int(100, 1),
  DELIVERY_MIN_BACKOFF_MS: int(1000, 1),
  DELIVERY_MAX_BACKOFF_MS: int(60_000, 1),
  DELIVERY_MAX_ATTEMPTS: int(0),
  DELIVERY_DROP_ON_STATUS: z.string().default(""),
  DRAIN_IDLE_MS: int(1000, 1),
  COLLECTOR_HOST: z.string().min(1).default("0.0.0.0"),
  COLLECTOR_PORT: int(4010, 0, 65_535),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SHUTDOWN_TIMEOUT_MS: int(10_000, 1)
});

type Env = z.infer<typeof EnvSchema>;

export interface SourceSettings {
  kind: Env["SOURCE_KIND"];
  connection: Record<string, unknown>;
  minBackoffMs: number;
  maxBackoffMs: number;
  maxReconnectAttempts: number;
}

export interface CollectorConfig {
  source: SourceSettings;
  staticTags: StaticTags;
  influx: InfluxWriterConfig;
  retry: RetryPolicy;
  delivery: {
    batchSize: number;
    idleMs: number;
    dropOnStatus: number[];
  };
  queue: {
    path: string;
    walAutocheckpoint: number;
  };
  server: {
    host: string;
    port: number;
  };
  logLevel: (typeof LOG_LEVELS)[number];
  shutdownTimeoutMs: number;
}

export class ConfigError extends Error {
  readonly kind = "invalid";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

function parseStatusList(text: string, ctx: z.RefinementCtx): number[] {
  const statuses: number[] = [];
  for (const part of text.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const status = Number(trimmed);
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DELIVERY_DROP_ON_STATUS"],
        message: `'${trimmed}' is not an HTTP status code`
      });
      continue;
    }
    statuses.push(status);
  }
  return statuses;
}

function sourceConnection(env: Env): Record<string, unknown> {
  switch (env.SOURCE_KIND) {
    case "serial":
      return {
        path: env.SERIAL_DEVICE,
        baudRate: env.SERIAL_BAUD_RATE,
        maxLineLength: env.SERIAL_MAX_LINE_LENGTH,
        readTimeoutMs: env.SERIAL_READ_TIMEOUT_MS,
        discardFirstLine: env.SERIAL_DISCARD_FIRST_LINE
      };
    case "geiger":
      // the counter's own line limit applies unless one is configured
      return {
        path: env.SERIAL_DEVICE,
        baudRate: env.SERIAL_BAUD_RATE,
        maxLineLength: env.GEIGER_MAX_LINE_LENGTH,
        readTimeoutMs: env.SERIAL_READ_TIMEOUT_MS,
        measurement: env.GEIGER_MEASUREMENT
      };
    case "fake":
      return { seed: env.FAKE_SEED, sampleIntervalMs: env.FAKE_SAMPLE_INTERVAL_MS };
  }
}

function toConfig(env: Env, ctx: z.RefinementCtx): CollectorConfig {
  if (env.SOURCE_KIND !== "fake" && !env.SERIAL_DEVICE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["SERIAL_DEVICE"],
      message: `Required when SOURCE_KIND is ${env.SOURCE_KIND}`
    });
  }
  if (env.INFLUX_API === "v2") {
    for (const key of ["INFLUX_ORG", "INFLUX_TOKEN"] as const) {
      if (!env[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "Required when INFLUX_API is v2" });
      }
    }
  }
  for (const [min, max] of [
    ["SERIAL_MIN_BACKOFF_MS", "SERIAL_MAX_BACKOFF_MS"],
    ["DELIVERY_MIN_BACKOFF_MS", "DELIVERY_MAX_BACKOFF_MS"]
  ] as const) {
    if (env[min] > env[max]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [min], message: `Must not exceed ${max}` });
    }
  }

  let staticTags: StaticTags = new Map();
  try {
    staticTags = parseStaticTags(env.STATIC_TAGS);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["STATIC_TAGS"], message: error.message });
  }

  const connection = sourceConnection(env);

  return {
    source: {
      kind: env.SOURCE_KIND,
      connection,
      minBackoffMs: env.SERIAL_MIN_BACKOFF_MS,
      maxBackoffMs: env.SERIAL_MAX_BACKOFF_MS,
      maxReconnectAttempts: env.SERIAL_MAX_RECONNECT_ATTEMPTS
    },
    staticTags,
    influx: {
      baseUrl: `${env.INFLUX_TLS ? "https" : "http"}://${env.INFLUX_HOST}`,
      api: env.INFLUX_API,
      database: env.INFLUX_DATABASE,
      org: env.INFLUX_ORG,
      token: env.INFLUX_TOKEN,
      username: env.INFLUX_USERNAME,
      password: env.INFLUX_PASSWORD,
      timeoutMs: env.INFLUX_TIMEOUT_MS
    },
    retry: {
      minBackoffMs: env.DELIVERY_MIN_BACKOFF_MS,
      maxBackoffMs: env.DELIVERY_MAX_BACKOFF_MS,
      maxAttempts: env.DELIVERY_MAX_ATTEMPTS
    },
    delivery: {
      batchSize: env.DELIVERY_BATCH_SIZE,
      idleMs: env.DRAIN_IDLE_MS,
      dropOnStatus: parseStatusList(env.DELIVERY_DROP_ON_STATUS, ctx)
    },
    queue: {
      path: env.QUEUE_PATH,
      walAutocheckpoint: env.QUEUE_WAL_AUTOCHECKPOINT
    },
    server: {
      host: env.COLLECTOR_HOST,
      port: env.COLLECTOR_PORT
    },
    logLevel: env.LOG_LEVEL,
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS
  };
}

export const CollectorConfigSchema = EnvSchema.transform(toConfig);

/**
 * Read the collector configuration from environment variables. Empty values
 * count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = CollectorConfigSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
