import { z } from 'zod';
import { ConfigValidationError, extractIssuesFromZodError } from '../errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

interface TokenSettings {
  NODE_ENV: string;
  AUTOSCALE_PROBE_TOKEN?: string;
}

const requireTokenOutsideDevelopment = (env: TokenSettings, context: z.RefinementCtx): void => {
  if (env.NODE_ENV === 'development' || (env.AUTOSCALE_PROBE_TOKEN ?? '').trim().length > 0) {
    return;
  }
  context.addIssue({
    code: z.ZodIssueCode.custom,
    path: ['AUTOSCALE_PROBE_TOKEN'],
    message: 'AUTOSCALE_PROBE_TOKEN is required when NODE_ENV is not development'
  });
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  AUTOSCALE_PROBE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  AUTOSCALE_PROBE_PRETTY_LOGS: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
  AUTOSCALE_PROBE_TOKEN: z.string().optional(),
  BROKER_URL: z.string({ required_error: 'BROKER_URL is required' }).min(1, 'BROKER_URL is required'),
  AUTOSCALE_PROBE_PORT: z.coerce
    .number({ invalid_type_error: 'AUTOSCALE_PROBE_PORT must be a number' })
    .int()
    .min(0)
    .max(65535)
    .default(8080),
  AUTOSCALE_PROBE_PROCS_PATH: z.string().min(1).default('autoscale-procs.yaml'),
  AUTOSCALE_PROBE_INSPECT_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: 'AUTOSCALE_PROBE_INSPECT_TIMEOUT_MS must be a number' })
    .int()
    .min(100)
    .default(1_000),
  AUTOSCALE_PROBE_REDIS_KEY_PREFIX: z.string().default(''),
  AUTOSCALE_PROBE_PIDBOX_NAMESPACE: z.string().min(1).default('celery')
}).superRefine(requireTokenOutsideDevelopment);

const configSchema = envSchema.transform((env) => {
  const token = env.AUTOSCALE_PROBE_TOKEN?.trim();
  const level: LogLevel = env.AUTOSCALE_PROBE_LOG_LEVEL ?? env.LOG_LEVEL ?? 'info';
  const pretty = env.AUTOSCALE_PROBE_PRETTY_LOGS ?? env.NODE_ENV === 'development';

  return {
    env: env.NODE_ENV,
    logging: {
      level,
      pretty
    },
    broker: {
      url: env.BROKER_URL,
      redisKeyPrefix: env.AUTOSCALE_PROBE_REDIS_KEY_PREFIX,
      pidboxNamespace: env.AUTOSCALE_PROBE_PIDBOX_NAMESPACE
    },
    inspection: {
      timeoutMs: env.AUTOSCALE_PROBE_INSPECT_TIMEOUT_MS
    },
    procs: {
      path: env.AUTOSCALE_PROBE_PROCS_PATH
    },
    http: {
      port: env.AUTOSCALE_PROBE_PORT
    },
    auth: {
      token: token && token.length > 0 ? token : null
    }
  } as const;
});

export type ProbeConfig = z.infer<typeof configSchema>;

let cachedConfig: ProbeConfig | null = null;

// Later sources win; an explicit `undefined` override unsets the variable.
const readEnvironment = (overrides: Record<string, string | undefined>): Record<string, string> => {
  const environment: Record<string, string> = {};
  for (const source of [process.env, overrides]) {
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) {
        delete environment[key];
      } else {
        environment[key] = value;
      }
    }
  }
  return environment;
};

export const loadConfig = (overrides: Record<string, string | undefined> = {}): ProbeConfig => {
  const result = configSchema.safeParse(readEnvironment(overrides));
  if (!result.success) {
    throw new ConfigValidationError(extractIssuesFromZodError(result.error), { cause: result.error });
  }
  cachedConfig = Object.freeze(result.data);
  return cachedConfig;
};

export const getConfig = (): ProbeConfig => cachedConfig ?? loadConfig();

export const resetConfig = (): void => {
  cachedConfig = null;
};
