import type { Logger } from 'pino';
import { createTaskQueueApp, type TaskQueueApp } from '../broker/taskQueueApp.js';
import { TaskQueueProc } from '../procs/taskQueueProc.js';
import { ProcRegistry } from '../procs/registry.js';
import { getProcLogger } from '../telemetry/logger.js';
import { recordMissingQueue, type ProbeMetrics } from '../telemetry/metrics.js';
import type { ProbeConfig } from './config.js';
import type { ProcDefinition } from './procsFile.js';

export interface ProcSetupOptions {
  config: ProbeConfig;
  logger: Logger;
  metrics?: ProbeMetrics;
  createApp?: typeof createTaskQueueApp;
}

export interface ProcSetup {
  registry: ProcRegistry;
  apps: readonly TaskQueueApp[];
  close: () => Promise<void>;
}

/**
 * Builds the proc registry from declarations. Procs on the same broker URL
 * share one application handle, and so one inspector per cycle.
 */
export const createProcSetup = (
  definitions: readonly ProcDefinition[],
  options: ProcSetupOptions
): ProcSetup => {
  const { config, logger, metrics } = options;
  const createApp = options.createApp ?? createTaskQueueApp;
  const apps = new Map<string, TaskQueueApp>();

  const appFor = (brokerUrl: string): TaskQueueApp => {
    const existing = apps.get(brokerUrl);
    if (existing) {
      return existing;
    }
    const app = createApp({
      brokerUrl,
      logger,
      inspectTimeoutMs: config.inspection.timeoutMs,
      redisKeyPrefix: config.broker.redisKeyPrefix,
      pidboxNamespace: config.broker.pidboxNamespace
    });
    apps.set(brokerUrl, app);
    return app;
  };

  const procs = definitions.map((definition) => {
    const app = appFor(definition.brokerUrl ?? config.broker.url);
    const procLogger = getProcLogger(logger, { proc: definition.name, broker: app.label });
    let inspectStatuses = definition.inspectStatuses;
    if (inspectStatuses.length > 0 && !app.supportsInspection) {
      procLogger.warn(
        { inspectStatuses },
        'broker does not support worker inspection; counting broker messages only'
      );
      inspectStatuses = [];
    }

    return new TaskQueueProc({
      name: definition.name,
      queues: definition.queues,
      app,
      inspectStatuses,
      logger: procLogger,
      onMissingQueue: metrics ? (queue) => recordMissingQueue(metrics, queue) : undefined
    });
  });

  const registry = new ProcRegistry(procs, {
    logger: logger.child({ component: 'procs' }),
    metrics
  });

  const close = async (): Promise<void> => {
    await Promise.all([...apps.values()].map((app) => app.close()));
  };

  return {
    registry,
    apps: [...apps.values()],
    close
  };
};
