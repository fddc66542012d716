import Fastify, { type FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createApp, type ProbeApplication } from '../../src/bootstrap/app.js';
import { loadConfig, resetConfig } from '../../src/bootstrap/config.js';
import { createProcSetup } from '../../src/bootstrap/procs.js';
import type { TaskQueueAppOptions } from '../../src/broker/taskQueueApp.js';
import { registerInfoRoutes } from '../../src/http/routes/infoRoute.js';
import { createProbeMetrics } from '../../src/telemetry/metrics.js';
import {
  binding,
  declareChannel,
  fakeApp,
  fakeInspector,
  probeEnv,
  silentLogger,
  task,
  testConfig
} from '../helpers/fakes.js';

describe('autoscale info routes', () => {
  const instances: FastifyInstance[] = [];

  afterEach(async () => {
    await Promise.all(instances.splice(0).map((instance) => instance.close()));
    resetConfig();
  });

  const buildServer = (verifyToken: (token: string) => boolean) => {
    const config = testConfig({ BROKER_URL: 'amqp://broker.test//' });
    const setup = createProcSetup(
      [
        { name: 'worker', queues: ['celery'], inspectStatuses: ['active'] },
        { name: 'priority', queues: ['priority', 'missing'], inspectStatuses: [] }
      ],
      {
        config,
        logger: silentLogger,
        createApp: (options: TaskQueueAppOptions) =>
          fakeApp(
            declareChannel({ celery: 3, priority: 2 }),
            fakeInspector({
              activeQueues: { 'worker@a': [binding('celery', 'celery', 'celery')] },
              active: { 'worker@a': [task('celery', 'celery')] }
            }),
            options.brokerUrl
          )
      }
    );

    const server = Fastify();
    instances.push(server);
    registerInfoRoutes(server, { verifyToken, collectQuantities: () => setup.registry.collect() });
    return server;
  };

  it('answers the liveness probe', async () => {
    const server = buildServer(() => false);

    const response = await server.inject({ method: 'GET', url: '/autoscale/test' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('lists the quantity of every proc', async () => {
    const verifyToken = vi.fn((token: string) => token === 'test-secret');
    const server = buildServer(verifyToken);

    const response = await server.inject({ method: 'GET', url: '/autoscale/test-secret/info' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([
      { name: 'worker', quantity: 4 },
      { name: 'priority', quantity: 2 }
    ]);
    expect(verifyToken).toHaveBeenCalledWith('test-secret');
  });

  it('hides the endpoint behind the token', async () => {
    const server = buildServer((token) => token === 'test-secret');

    const response = await server.inject({ method: 'GET', url: '/autoscale/wrong-token/info' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'not_found' });
  });
});

describe('createApp', () => {
  const apps: ProbeApplication[] = [];

  afterEach(async () => {
    await Promise.all(apps.splice(0).map((app) => app.http.instance.close()));
    resetConfig();
  });

  const build = (config = testConfig()) => {
    const app = createApp({
      config,
      logger: silentLogger,
      metrics: createProbeMetrics({ collectDefaults: false }),
      definitions: [{ name: 'worker', queues: ['celery'], inspectStatuses: [] }],
      createTaskQueueApp: (options) => fakeApp(declareChannel({ celery: 1 }), fakeInspector(), options.brokerUrl)
    });
    apps.push(app);
    return app;
  };

  it('rejects a token that does not match', async () => {
    const app = build();

    const response = await app.http.instance.inject({ method: 'GET', url: '/autoscale/test-secreT/info' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'not_found' });
  });

  it('fails the info request until procs are loaded', async () => {
    const app = build();

    const response = await app.http.instance.inject({ method: 'GET', url: '/autoscale/test-secret/info' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ status: 'error', message: 'Internal Server Error' });
    await expect(app.collectQuantities()).rejects.toThrow('procs are not loaded; start the application first');
  });

  it('accepts any token in development when none is configured', async () => {
    const app = build(loadConfig(probeEnv({ BROKER_URL: 'amqp://broker.test//' })));

    const response = await app.http.instance.inject({ method: 'GET', url: '/autoscale/anything/info' });

    // Past the token check; procs are not loaded yet.
    expect(response.statusCode).toBe(500);
  });

  it('serves health and metrics', async () => {
    const app = build();

    const health = await app.http.instance.inject({ method: 'GET', url: '/healthz' });
    const metrics = await app.http.instance.inject({ method: 'GET', url: '/metrics' });

    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ status: 'ok' });
    expect(metrics.statusCode).toBe(200);
    expect(metrics.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
    expect(metrics.body).toContain('# HELP autoscale_probe_proc_quantity');
  });

  it('answers unknown paths like a rejected token', async () => {
    const app = build();

    const response = await app.http.instance.inject({ method: 'GET', url: '/autoscale' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'not_found' });
  });

  it('reports not running before start', () => {
    expect(build().isRunning()).toBe(false);
  });
});
