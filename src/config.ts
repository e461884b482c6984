import dotenv from 'dotenv';
import { z } from 'zod';
import { handleValidationError } from './utils/errors';
import { cronExpressionSchema } from './utils/validation';

dotenv.config();

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const boolFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  LOG_FILE_PATH: z.string().default('logs/app.log'),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: intFromEnv(5432, 1),
  DB_NAME: z.string().default('notifier'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_SSL: boolFromEnv(false),
  DB_POOL_MAX: intFromEnv(20, 1),
  DB_IDLE_TIMEOUT: intFromEnv(30000),
  DB_CONNECTION_TIMEOUT: intFromEnv(2000),

  QUEUE_POLL_INTERVAL_MS: intFromEnv(10000, 100),
  QUEUE_BATCH_SIZE: intFromEnv(10, 1),
  QUEUE_DEFAULT_PRIORITY: intFromEnv(1, 1),
  QUEUE_DEFAULT_MAX_RETRIES: intFromEnv(3),
  QUEUE_DEFAULT_RETRY_DELAY_MS: intFromEnv(300000, 1),
  QUEUE_RETENTION_DAYS: intFromEnv(7, 1),

  DISPATCH_TIMEOUT_MS: intFromEnv(30000, 1),
  DISPATCH_MAX_CONCURRENCY: intFromEnv(16, 1),

  METRICS_ENABLED: boolFromEnv(true),
  METRICS_NAMESPACE: z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, {
      message: 'Metrics namespace must be a valid Prometheus identifier',
    })
    .default('notifier'),
  METRICS_RETENTION_DAYS: intFromEnv(30, 1),

  CLEANUP_CRON: cronExpressionSchema.default('0 3 * * *'),
  TEMPLATES_SEED_DEFAULTS: boolFromEnv(true),
});

export interface DatabaseSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export interface QueueSettings {
  pollIntervalMs: number;
  batchSize: number;
  defaultPriority: number;
  defaultMaxRetries: number;
  defaultRetryDelayMs: number;
  retentionDays: number;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  logFilePath: string;
  database: DatabaseSettings;
  queue: QueueSettings;
  dispatch: {
    timeoutMs: number;
    maxConcurrency: number;
  };
  metrics: {
    enabled: boolean;
    namespace: string;
    retentionDays: number;
  };
  cleanupCron: string;
  seedDefaultTemplates: boolean;
}

/**
 * Parses environment variables into a typed configuration object.
 * Throws a ValidationError that lists every invalid key.
 */
export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
): Readonly<AppConfig> => {
  // Empty strings count as "not set" so that defaults apply
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw handleValidationError(result.error, 'Invalid configuration');
  }

  const e = result.data;

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    logFilePath: e.LOG_FILE_PATH,
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      ssl: e.DB_SSL,
      max: e.DB_POOL_MAX,
      idleTimeoutMillis: e.DB_IDLE_TIMEOUT,
      connectionTimeoutMillis: e.DB_CONNECTION_TIMEOUT,
    },
    queue: {
      pollIntervalMs: e.QUEUE_POLL_INTERVAL_MS,
      batchSize: e.QUEUE_BATCH_SIZE,
      defaultPriority: e.QUEUE_DEFAULT_PRIORITY,
      defaultMaxRetries: e.QUEUE_DEFAULT_MAX_RETRIES,
      defaultRetryDelayMs: e.QUEUE_DEFAULT_RETRY_DELAY_MS,
      retentionDays: e.QUEUE_RETENTION_DAYS,
    },
    dispatch: {
      timeoutMs: e.DISPATCH_TIMEOUT_MS,
      maxConcurrency: e.DISPATCH_MAX_CONCURRENCY,
    },
    metrics: {
      enabled: e.METRICS_ENABLED,
      namespace: e.METRICS_NAMESPACE,
      retentionDays: e.METRICS_RETENTION_DAYS,
    },
    cleanupCron: e.CLEANUP_CRON,
    seedDefaultTemplates: e.TEMPLATES_SEED_DEFAULTS,
  });
};

export default loadConfig;
