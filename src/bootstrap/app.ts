import { timingSafeEqual } from 'node:crypto';
import type { Logger } from 'pino';
import { ProbeError } from '../errors.js';
import { createHttpServer, type HttpServer } from '../http/server.js';
import { registerInfoRoutes } from '../http/routes/infoRoute.js';
import type { ProcQuantity } from '../procs/proc.js';
import { getLogger } from '../telemetry/logger.js';
import { createProbeMetrics, type ProbeMetrics } from '../telemetry/metrics.js';
import { loadConfig, type ProbeConfig } from './config.js';
import { createProcSetup, type ProcSetup, type ProcSetupOptions } from './procs.js';
import { loadProcDefinitions, type ProcDefinition } from './procsFile.js';

export interface AppBootstrapOptions {
  config?: ProbeConfig;
  configOverrides?: Record<string, string | undefined>;
  logger?: Logger;
  metrics?: ProbeMetrics;
  definitions?: readonly ProcDefinition[];
  createTaskQueueApp?: ProcSetupOptions['createApp'];
}

export interface ProbeApplication {
  readonly config: ProbeConfig;
  readonly logger: Logger;
  readonly metrics: ProbeMetrics;
  readonly http: HttpServer;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  isRunning: () => boolean;
  collectQuantities: () => Promise<ProcQuantity[]>;
}

export const createApp = (options: AppBootstrapOptions = {}): ProbeApplication => {
  const config = options.config ?? loadConfig(options.configOverrides ?? {});
  const logger = options.logger ?? getLogger();
  const metrics = options.metrics ?? createProbeMetrics({ defaultLabels: { service: 'autoscale-probe' } });

  let setup: ProcSetup | null = null;

  const collectQuantities = async (): Promise<ProcQuantity[]> => {
    if (!setup) {
      throw new ProbeError('procs are not loaded; start the application first');
    }
    return setup.registry.collect();
  };

  const expectedToken = config.auth.token ? Buffer.from(config.auth.token, 'utf8') : null;
  const verifyToken = (token: string): boolean => {
    if (!expectedToken) {
      return config.env === 'development';
    }

    const presented = Buffer.from(token, 'utf8');
    if (presented.length !== expectedToken.length) {
      return false;
    }

    return timingSafeEqual(presented, expectedToken);
  };

  const http = createHttpServer({ config, logger, metrics });
  registerInfoRoutes(http.instance, { verifyToken, collectQuantities });

  let started = false;

  return {
    config,
    logger,
    metrics,
    http,
    collectQuantities,
    start: async (): Promise<void> => {
      if (started) {
        return;
      }

      const definitions = options.definitions ?? (await loadProcDefinitions(config.procs.path));
      setup = createProcSetup(definitions, {
        config,
        logger,
        metrics,
        createApp: options.createTaskQueueApp
      });
      logger.info(
        { procs: setup.registry.list().map((proc) => proc.name), brokers: setup.apps.map((app) => app.label) },
        'procs loaded'
      );

      await http.start();
      started = true;
      logger.info('autoscale probe started');
    },
    stop: async (): Promise<void> => {
      if (!started && !setup) {
        return;
      }

      await http.stop();
      const closing = setup;
      setup = null;
      await closing?.close();

      started = false;
      logger.info('autoscale probe stopped');
    },
    isRunning: (): boolean => started && http.isStarted()
  };
};
