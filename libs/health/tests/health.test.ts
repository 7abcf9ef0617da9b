import { describe, it, expect, afterEach, vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { SQLiteAdapter } from '@sensorlog/database';
import {
  createDatabaseChecker,
  createHttpChecker,
  determineOverallStatus,
  registerHealthChecks,
  setupGracefulShutdown,
  type HealthCheckResult,
} from '../src';

const healthy = async (): Promise<HealthCheckResult> => ({ status: 'healthy' });
const unhealthy = async (): Promise<HealthCheckResult> => ({ status: 'unhealthy', message: 'down' });

describe('registerHealthChecks', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('reports liveness with the service name', async () => {
    app = Fastify({ logger: false });
    registerHealthChecks(app, { serviceName: 'collector' });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'healthy', service: 'collector' });
  });

  it('returns 503 when a critical dependency is unhealthy', async () => {
    app = Fastify({ logger: false });
    registerHealthChecks(app, {
      serviceName: 'collector',
      dependencies: { queue: unhealthy, influx: healthy },
      criticalDependencies: ['queue'],
      includeSystemMetrics: false,
    });

    const res = await app.inject({ method: 'GET', url: '/ready' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({
      status: 'unhealthy',
      checks: { queue: { status: 'unhealthy', message: 'down' }, influx: { status: 'healthy' } },
    });
  });

  it('reports degraded with 200 when only a non-critical dependency fails', async () => {
    app = Fastify({ logger: false });
    registerHealthChecks(app, {
      serviceName: 'collector',
      dependencies: {
        queue: healthy,
        influx: async () => {
          throw new Error('no route to host');
        },
      },
      criticalDependencies: ['queue'],
      includeSystemMetrics: false,
    });

    const res = await app.inject({ method: 'GET', url: '/ready' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'degraded',
      checks: { influx: { status: 'unhealthy', message: 'no route to host' } },
    });
  });
});

describe('determineOverallStatus', () => {
  it('is healthy when every check passes', () => {
    expect(determineOverallStatus({ a: { status: 'healthy' } }, ['a'])).toBe('healthy');
  });
});

describe('createDatabaseChecker', () => {
  it('follows the database connection state', async () => {
    const db = new SQLiteAdapter({ path: ':memory:' });
    const check = createDatabaseChecker(db);

    expect((await check()).status).toBe('healthy');

    await db.close();
    const result = await check();
    expect(result.status).toBe('unhealthy');
    expect(result.message).toBeDefined();
  });
});

describe('createHttpChecker', () => {
  let upstream: FastifyInstance;

  afterEach(async () => {
    await upstream.close();
  });

  it('reports healthy for a 2xx response and unhealthy otherwise', async () => {
    upstream = Fastify({ logger: false });
    upstream.get('/ping', async (_request, reply) => reply.status(204).send());
    upstream.get('/broken', async (_request, reply) => reply.status(500).send());
    const address = await upstream.listen({ host: '127.0.0.1', port: 0 });

    expect((await createHttpChecker(`${address}/ping`)()).status).toBe('healthy');

    const broken = await createHttpChecker(`${address}/broken`)();
    expect(broken.status).toBe('unhealthy');
    expect(broken.message).toBe('HTTP 500: Internal Server Error');
  });
});

describe('setupGracefulShutdown', () => {
  it('closes the app once and exits with the requested code', async () => {
    const app = Fastify({ logger: false });
    const onClose = vi.fn();
    app.addHook('onClose', async () => {
      onClose();
    });
    const exit = vi.fn();

    const shutdown = setupGracefulShutdown(app, { signals: [], exit, exitCode: () => 0 });
    await shutdown('source ended', 3);
    await shutdown('again');

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(3);
  });
});
