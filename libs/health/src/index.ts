import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Database, LogFn } from '@sensorlog/database';

/**
 * Health check result for a single dependency
 */
export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  message?: string;
  latency?: number;
}

/**
 * Overall health status response
 */
export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: Record<string, HealthCheckResult>;
}

/**
 * Dependency checker function type
 */
export type DependencyChecker = () => Promise<HealthCheckResult>;

/**
 * Health check options
 */
export interface HealthCheckOptions {
  serviceName: string;
  dependencies?: Record<string, DependencyChecker>;
  /** Dependencies whose failure makes the service unhealthy rather than degraded */
  criticalDependencies?: string[];
  includeSystemMetrics?: boolean;
}

/**
 * Graceful shutdown options
 */
export interface GracefulShutdownOptions {
  timeout?: number; // Timeout in milliseconds (default: 10000)
  signals?: NodeJS.Signals[]; // Signals to listen for (default: SIGTERM, SIGINT)
  logger?: {
    info: LogFn;
    error: LogFn;
  };
  /** Exit code used after a signal-triggered shutdown closes cleanly */
  exitCode?: () => number;
  exit?: (code: number) => void;
}

/**
 * Close the app and exit with the given code
 */
export type ShutdownFn = (reason: string, exitCode?: number) => Promise<void>;

/**
 * Database health checker
 */
export function createDatabaseChecker(db: Database | (() => Database)): DependencyChecker {
  return async (): Promise<HealthCheckResult> => {
    const database = typeof db === 'function' ? db() : db;
    const result = await database.healthCheck();

    if (!result.healthy) {
      return {
        status: 'unhealthy',
        message: result.error ?? 'Database health check failed',
        latency: result.latency,
      };
    }

    return { status: 'healthy', latency: result.latency };
  };
}

/**
 * HTTP upstream service health checker
 */
export function createHttpChecker(
  url: string,
  options?: { timeout?: number; headers?: Record<string, string> }
): DependencyChecker {
  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    const timeout = options?.timeout ?? 5000;

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: options?.headers,
        signal: AbortSignal.timeout(timeout),
      });

      if (!response.ok) {
        return {
          status: 'unhealthy',
          message: `HTTP ${response.status}: ${response.statusText}`,
          latency: Date.now() - startTime,
        };
      }

      return {
        status: 'healthy',
        latency: Date.now() - startTime,
      };
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'TimeoutError' || error.name === 'AbortError') {
          return {
            status: 'unhealthy',
            message: `Request timeout after ${timeout}ms`,
            latency: Date.now() - startTime,
          };
        }
        return {
          status: 'unhealthy',
          message: error.message,
          latency: Date.now() - startTime,
        };
      }
      return {
        status: 'unhealthy',
        message: 'HTTP health check failed',
        latency: Date.now() - startTime,
      };
    }
  };
}

function getSystemMetrics(): Record<string, HealthCheckResult> {
  const memUsage = process.memoryUsage();

  return {
    memory: {
      status: 'healthy',
      message: `RSS: ${Math.round(memUsage.rss / 1024 / 1024)}MB, Heap: ${Math.round(memUsage.heapUsed / 1024 / 1024)}MB`,
    },
  };
}

/**
 * Execute all health checks
 */
async function executeHealthChecks(
  dependencies: Record<string, DependencyChecker>,
  includeSystemMetrics: boolean
): Promise<Record<string, HealthCheckResult>> {
  const checks: Record<string, HealthCheckResult> = {};

  const results = await Promise.all(
    Object.entries(dependencies).map(async ([name, checker]) => {
      try {
        return [name, await checker()] as const;
      } catch (error) {
        const result: HealthCheckResult = {
          status: 'unhealthy',
          message: error instanceof Error ? error.message : 'Health check failed',
        };
        return [name, result] as const;
      }
    })
  );

  for (const [name, result] of results) {
    checks[name] = result;
  }

  if (includeSystemMetrics) {
    Object.assign(checks, getSystemMetrics());
  }

  return checks;
}

/**
 * Determine overall health status from individual checks
 */
export function determineOverallStatus(
  checks: Record<string, HealthCheckResult>,
  criticalDependencies: string[]
): 'healthy' | 'degraded' | 'unhealthy' {
  const unhealthy = Object.entries(checks).filter(([, check]) => check.status === 'unhealthy');

  if (unhealthy.length === 0) {
    return 'healthy';
  }

  return unhealthy.some(([name]) => criticalDependencies.includes(name)) ? 'unhealthy' : 'degraded';
}

/**
 * Register health check endpoints on Fastify instance
 *
 * /health - Liveness check (always returns 200 if service is running)
 * /ready - Readiness check (checks dependencies)
 */
export function registerHealthChecks(app: FastifyInstance, options: HealthCheckOptions): void {
  const {
    serviceName,
    dependencies = {},
    criticalDependencies = ['database'],
    includeSystemMetrics = true,
  } = options;
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.status(200).send({
      status: 'healthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
      uptime: (Date.now() - startTime) / 1000,
    });
  });

  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    const checks = await executeHealthChecks(dependencies, includeSystemMetrics);
    const overallStatus = determineOverallStatus(checks, criticalDependencies);

    const response: HealthStatus = {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: (Date.now() - startTime) / 1000,
      checks,
    };

    // 200 for healthy/degraded, 503 for unhealthy
    reply.status(overallStatus === 'unhealthy' ? 503 : 200).send(response);
  });
}

/**
 * Setup graceful shutdown handlers. Returns the shutdown function so the
 * service can also trigger it itself.
 */
export function setupGracefulShutdown(
  app: FastifyInstance,
  options: GracefulShutdownOptions = {}
): ShutdownFn {
  const {
    timeout = 10000,
    signals = ['SIGTERM', 'SIGINT'],
    logger = app.log,
    exitCode = () => 0,
    exit = (code: number) => process.exit(code),
  } = options;

  let isShuttingDown = false;

  const shutdown: ShutdownFn = async (reason, code) => {
    if (isShuttingDown) {
      logger.info({ reason }, 'Shutdown already in progress, ignoring');
      return;
    }

    isShuttingDown = true;
    logger.info({ reason }, 'Starting graceful shutdown');

    const shutdownTimeout = setTimeout(() => {
      logger.error({ timeout }, 'Graceful shutdown timed out, forcing exit');
      exit(1);
    }, timeout);

    try {
      await app.close();
      logger.info('Server closed successfully');
      clearTimeout(shutdownTimeout);
      exit(code ?? exitCode());
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      clearTimeout(shutdownTimeout);
      exit(1);
    }
  };

  for (const signal of signals) {
    process.once(signal, () => void shutdown(signal));
  }

  return shutdown;
}
