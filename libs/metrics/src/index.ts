/**
 * @sensorlog/metrics
 *
 * Prometheus instrumentation shared by the sensorlog workspaces: HTTP RED
 * metrics for Fastify, default process metrics and small metric factories.
 */

import { register, collectDefaultMetrics, Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

export { Counter, Histogram, Gauge, Registry, register };

export const DEFAULT_PREFIX = 'sensorlog';

/**
 * MetricsConfig - Configuration for metrics instrumentation
 */
export interface MetricsConfig {
  /** Service name (used as label) */
  serviceName: string;
  /** Whether to collect default Node.js process metrics */
  collectDefaultMetrics?: boolean;
  /** Custom registry (optional, defaults to global registry) */
  registry?: Registry;
  /** Prefix for all metric names, without trailing underscore */
  prefix?: string;
}

interface MetricOptions {
  name: string;
  help: string;
  labelNames?: string[];
  registry?: Registry;
}

/**
 * HTTP request count, duration and in-flight gauge per route
 */
export class HttpMetrics {
  private requestsTotal: Counter;
  private requestDuration: Histogram;
  private requestsInProgress: Gauge;

  constructor(private readonly config: MetricsConfig) {
    const registry = config.registry ?? register;
    const prefix = config.prefix ?? DEFAULT_PREFIX;

    this.requestsTotal = new Counter({
      name: `${prefix}_http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['service', 'method', 'route', 'status_code'],
      registers: [registry],
    });

    this.requestDuration = new Histogram({
      name: `${prefix}_http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['service', 'method', 'route', 'status_code'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [registry],
    });

    this.requestsInProgress = new Gauge({
      name: `${prefix}_http_requests_in_progress`,
      help: 'Number of HTTP requests currently being processed',
      labelNames: ['service', 'method', 'route'],
      registers: [registry],
    });
  }

  /**
   * Register request/response hooks on a Fastify instance
   */
  instrument(app: FastifyInstance): void {
    app.addHook('onRequest', async (request) => {
      this.requestsInProgress.inc(this.labels(request));
    });

    app.addHook('onResponse', async (request, reply) => {
      this.record(request, reply);
    });
  }

  private record(request: FastifyRequest, reply: FastifyReply): void {
    const labels = this.labels(request);
    const statusCode = reply.statusCode.toString();

    this.requestsInProgress.dec(labels);
    this.requestsTotal.inc({ ...labels, status_code: statusCode });
    this.requestDuration.observe({ ...labels, status_code: statusCode }, reply.elapsedTime / 1000);
  }

  private labels(request: FastifyRequest): { service: string; method: string; route: string } {
    return {
      service: this.config.serviceName,
      method: request.method,
      route: request.routeOptions.url ?? request.url,
    };
  }
}

/**
 * Initialize metrics for a service
 */
export function initializeMetrics(config: MetricsConfig): HttpMetrics {
  const registry = config.registry ?? register;

  // memory, CPU, event loop, GC
  if (config.collectDefaultMetrics !== false) {
    collectDefaultMetrics({
      register: registry,
      prefix: `${config.prefix ?? DEFAULT_PREFIX}_`,
      labels: { service: config.serviceName },
    });
  }

  return new HttpMetrics(config);
}

/**
 * Body of the /metrics endpoint
 */
export async function metricsHandler(registry: Registry = register): Promise<string> {
  return registry.metrics();
}

export function createCounter(opts: MetricOptions): Counter {
  return new Counter({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    registers: [opts.registry ?? register],
  });
}

export function createGauge(opts: MetricOptions): Gauge {
  return new Gauge({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    registers: [opts.registry ?? register],
  });
}

export function createHistogram(opts: MetricOptions & { buckets?: number[] }): Histogram {
  return new Histogram({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    buckets: opts.buckets ?? [0.001, 0.01, 0.1, 1, 10],
    registers: [opts.registry ?? register],
  });
}
