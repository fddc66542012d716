import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { getConfig, type ProbeConfig } from '../bootstrap/config.js';
import { serializeError } from '../errors.js';
import { getLogger } from '../telemetry/logger.js';
import { createProbeMetrics, serializeProbeMetrics, type ProbeMetrics } from '../telemetry/metrics.js';

export interface HttpServerOptions {
  config?: ProbeConfig;
  logger?: Logger;
  metrics?: ProbeMetrics;
}

export interface HttpServer {
  readonly instance: FastifyInstance;
  readonly metrics: ProbeMetrics;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  isStarted: () => boolean;
}

const observeRequests = (app: FastifyInstance): void => {
  app.addHook('onRequest', async (request, reply) => {
    void reply.header('X-Request-Id', request.id);
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.debug(
      {
        method: request.method,
        route: request.routeOptions.url,
        statusCode: reply.statusCode,
        durationMs: reply.elapsedTime
      },
      'request completed'
    );
  });
};

const handleFailures = (app: FastifyInstance): void => {
  app.setNotFoundHandler((_request, reply) => {
    void reply.status(404).send({ error: 'not_found' });
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: serializeError(error) }, 'request failed');
    } else {
      request.log.debug({ err: serializeError(error), statusCode }, 'request rejected');
    }

    if (reply.sent) {
      return;
    }
    void reply
      .status(statusCode)
      .send({ status: 'error', message: statusCode >= 500 ? 'Internal Server Error' : error.message });
  });
};

const registerOperationalRoutes = (app: FastifyInstance, metrics: ProbeMetrics): void => {
  app.get('/healthz', () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  app.get('/metrics', async (_request, reply) => {
    const body = await serializeProbeMetrics(metrics);
    return reply.type(metrics.registry.contentType).send(body);
  });
};

/**
 * fastify instance carrying the operational routes. Feature routes are
 * registered by the caller on `instance` before `start`.
 */
export const createHttpServer = (options: HttpServerOptions = {}): HttpServer => {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? getLogger();
  const metrics = options.metrics ?? createProbeMetrics({ defaultLabels: { service: 'autoscale-probe' } });

  const app: FastifyInstance = Fastify({
    logger: logger.child({ component: 'http' }) as unknown as FastifyBaseLogger,
    disableRequestLogging: true,
    trustProxy: true
  });

  observeRequests(app);
  handleFailures(app);
  registerOperationalRoutes(app, metrics);

  let listening = false;

  return {
    instance: app,
    metrics,
    start: async () => {
      if (listening) {
        return;
      }
      const address = await app.listen({ port: config.http.port, host: '0.0.0.0' });
      listening = true;
      logger.info({ address }, 'http server listening');
    },
    stop: async () => {
      if (!listening) {
        return;
      }
      await app.close();
      listening = false;
      logger.info('http server stopped');
    },
    isStarted: () => listening
  };
};
