import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig, resetConfig } from '../../src/bootstrap/config.js';
import { buildLoggerOptions, getLogger, getProcLogger, resetLogger } from '../../src/telemetry/logger.js';
import { probeEnv } from '../helpers/fakes.js';

describe('logger', () => {
  afterEach(() => {
    resetLogger();
    resetConfig();
  });

  it('builds the root logger from the loaded config', () => {
    loadConfig(probeEnv({ LOG_LEVEL: 'warn', AUTOSCALE_PROBE_PRETTY_LOGS: 'false' }));

    const logger = getLogger();

    expect(logger.level).toBe('warn');
    expect(getLogger()).toBe(logger);
  });

  it('builds a new logger after a reset', () => {
    loadConfig(probeEnv({ LOG_LEVEL: 'error', AUTOSCALE_PROBE_PRETTY_LOGS: 'false' }));
    const first = getLogger();

    resetLogger();
    loadConfig(probeEnv({ LOG_LEVEL: 'debug', AUTOSCALE_PROBE_PRETTY_LOGS: 'false' }));
    const second = getLogger();

    expect(second).not.toBe(first);
    expect(second.level).toBe('debug');
  });

  it('tags proc loggers with the proc and broker', () => {
    loadConfig(probeEnv({ AUTOSCALE_PROBE_PRETTY_LOGS: 'false' }));

    const procLogger = getProcLogger(getLogger(), { proc: 'worker', broker: 'amqp://broker.test//' });

    expect(procLogger.bindings()).toMatchObject({
      component: 'procs',
      proc: 'worker',
      broker: 'amqp://broker.test//'
    });
  });
});

describe('buildLoggerOptions', () => {
  afterEach(() => {
    resetConfig();
  });

  it('adds the pretty transport only when enabled', () => {
    const plain = buildLoggerOptions(loadConfig(probeEnv({ AUTOSCALE_PROBE_PRETTY_LOGS: 'false' })));
    const pretty = buildLoggerOptions(loadConfig(probeEnv({ AUTOSCALE_PROBE_PRETTY_LOGS: 'true' })));

    expect(plain.transport).toBeUndefined();
    expect(pretty.transport).toMatchObject({ target: 'pino-pretty' });
  });

  it('tags every line with the service and environment', () => {
    const options = buildLoggerOptions(
      loadConfig(probeEnv({ NODE_ENV: 'production', AUTOSCALE_PROBE_TOKEN: 'test-secret' }))
    );

    expect(options.base).toEqual({ service: 'autoscale-probe', environment: 'production' });
    expect(options.level).toBe('info');
  });
});
