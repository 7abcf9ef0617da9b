import { setTimeout as sleep } from "node:timers/promises";
import type { BaseLogger } from "pino";
import { Backoff } from "./backoff";

export type InfluxApi = "v1" | "v2";

export interface InfluxWriterConfig {
  /** Scheme, host and port, e.g. `http://localhost:8086` */
  baseUrl: string;
  api: InfluxApi;
  /** v1 database, or v2 bucket */
  database: string;
  org?: string;
  token?: string;
  username?: string;
  password?: string;
  /** Per-request timeout */
  timeoutMs: number;
}

export interface RetryPolicy {
  minBackoffMs: number;
  maxBackoffMs: number;
  /** 0 retries without limit */
  maxAttempts: number;
}

export interface RetryState {
  attempt: number;
  /** Epoch milliseconds of the next attempt */
  nextRetryAt?: number;
}

export type DeliveryErrorKind = "transient" | "rejected" | "aborted";

export class DeliveryError extends Error {
  readonly kind: DeliveryErrorKind;
  readonly status?: number;
  readonly body?: string;
  readonly attempts: number;

  constructor(
    kind: DeliveryErrorKind,
    message: string,
    details: { status?: number; body?: string; attempts: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "DeliveryError";
    this.kind = kind;
    this.status = details.status;
    this.body = details.body;
    this.attempts = details.attempts;
  }
}

export function isDeliveryError(error: unknown): error is DeliveryError {
  return error instanceof DeliveryError;
}

/**
 * Sends a batch of line-protocol lines to the database.
 */
export interface DeliveryClient {
  deliver(lines: string[], signal?: AbortSignal): Promise<void>;
}

export type AttemptResult =
  | { outcome: "success" }
  | { outcome: "transient"; reason: string; status?: number }
  | { outcome: "rejected"; status: number; body: string };

export function classifyStatus(status: number): AttemptResult["outcome"] {
  if (status >= 200 && status < 300) return "success";
  if (status >= 500 || status === 429) return "transient";
  return "rejected";
}

export interface InfluxWriterOptions {
  retry: RetryPolicy;
  logger?: BaseLogger;
  onRetry?: (state: RetryState, reason: string) => void;
}

export class InfluxWriter implements DeliveryClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: InfluxWriterConfig,
    private readonly options: InfluxWriterOptions
  ) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
  }

  get writeUrl(): string {
    const { api, database, org, username, password } = this.config;
    if (api === "v2") {
      const params = new URLSearchParams({ org: org ?? "", bucket: database, precision: "ns" });
      return `${this.baseUrl}/api/v2/write?${params.toString()}`;
    }
    const params = new URLSearchParams({ db: database, precision: "ns" });
    if (username) {
      params.set("u", username);
      params.set("p", password ?? "");
    }
    return `${this.baseUrl}/write?${params.toString()}`;
  }

  get pingUrl(): string {
    return `${this.baseUrl}/ping`;
  }

  async deliver(lines: string[], signal?: AbortSignal): Promise<void> {
    if (lines.length === 0) return;

    const body = `${lines.join("\n")}\n`;
    const { minBackoffMs, maxBackoffMs, maxAttempts } = this.options.retry;
    const backoff = new Backoff(minBackoffMs, maxBackoffMs);
    const state: RetryState = { attempt: 0 };

    for (;;) {
      if (signal?.aborted) {
        throw new DeliveryError("aborted", "Delivery aborted", { attempts: state.attempt });
      }

      state.attempt += 1;
      const result = await this.attempt(body);

      if (result.outcome === "success") {
        return;
      }
      if (result.outcome === "rejected") {
        throw new DeliveryError("rejected", `Write rejected with HTTP ${result.status}`, {
          status: result.status,
          body: result.body,
          attempts: state.attempt
        });
      }
      if (maxAttempts > 0 && state.attempt >= maxAttempts) {
        throw new DeliveryError("transient", `Write failed after ${state.attempt} attempts: ${result.reason}`, {
          status: result.status,
          attempts: state.attempt
        });
      }

      const delayMs = backoff.next();
      state.nextRetryAt = Date.now() + delayMs;
      this.options.logger?.warn(
        { attempt: state.attempt, delayMs, reason: result.reason, lines: lines.length },
        "Delivery failed, retrying"
      );
      this.options.onRetry?.({ ...state }, result.reason);

      try {
        await sleep(delayMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          throw new DeliveryError("aborted", "Delivery aborted during backoff", {
            attempts: state.attempt,
            cause: error
          });
        }
        throw error;
      }
    }
  }

  /**
   * One POST of the batch. Network failures and timeouts are transient.
   */
  async attempt(body: string): Promise<AttemptResult> {
    let status: number;
    let text: string;
    try {
      const response = await fetch(this.writeUrl, {
        method: "POST",
        headers: this.headers(),
        body,
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        return { outcome: "transient", reason: `Request timed out after ${this.config.timeoutMs}ms` };
      }
      const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : "";
      const message = error instanceof Error ? error.message : String(error);
      return { outcome: "transient", reason: `${message}${cause}` };
    }

    const outcome = classifyStatus(status);
    if (outcome === "success") {
      return { outcome };
    }
    if (outcome === "transient") {
      return { outcome, status, reason: `HTTP ${status}: ${text}` };
    }
    return { outcome, status, body: text };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "text/plain; charset=utf-8" };
    if (this.config.api === "v2" && this.config.token) {
      headers.authorization = `Token ${this.config.token}`;
    }
    return headers;
  }
}
