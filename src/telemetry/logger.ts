import pino, { type Logger, type LoggerOptions } from 'pino';
import { getConfig, type ProbeConfig } from '../bootstrap/config.js';

// Broker URLs embed credentials; tokens appear in the info route path.
const REDACTED_PATHS = [
  'brokerUrl',
  'config.broker.url',
  'config.auth.token',
  'params.token',
  'req.headers.authorization',
  'headers.authorization',
  'credentials',
  '*.password',
  '*.token'
];

export const buildLoggerOptions = (config: ProbeConfig): LoggerOptions => {
  const options: LoggerOptions = {
    level: config.logging.level,
    base: { service: 'autoscale-probe', environment: config.env },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
  };

  if (!config.logging.pretty) {
    return options;
  }

  return {
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:HH:MM:ss.l'
      }
    }
  };
};

let rootLogger: Logger | null = null;

export const getLogger = (): Logger => {
  if (!rootLogger) {
    rootLogger = pino(buildLoggerOptions(getConfig()));
  }
  return rootLogger;
};

export const resetLogger = (): void => {
  rootLogger = null;
};

export interface ProcLogContext {
  proc: string;
  broker: string;
}

export const getProcLogger = (logger: Logger, { proc, broker }: ProcLogContext): Logger =>
  logger.child({ component: 'procs', proc, broker });
