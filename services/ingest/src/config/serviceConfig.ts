import { z } from 'zod';
import {
  backoffConfigToOptions,
  booleanVar,
  integerVar,
  loadEnvConfig,
  resolveRetryBackoffConfig,
  stringVar,
  urlVar,
  type BackoffOptions,
  type EnvSource
} from '@marketlake/shared';

import type { S3ConnectionConfig } from '../storage/objectStore';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type ServiceConfig = Readonly<{
  host: string;
  port: number;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  thetaBaseUrl: string;
  earningsBaseUrl: string;
  httpTimeoutMs: number;
  fetchMaxAttempts: number;
  backoff: BackoffOptions;
  maxWorkers: number;
  readiness: Readonly<{ symbol: string; timeoutMs: number }>;
  s3: Readonly<S3ConnectionConfig>;
  jobRetentionMs: number;
}>;

const ingestEnvSchema = z
  .object({
    MARKETLAKE_HOST: stringVar({ defaultValue: '127.0.0.1' }),
    MARKETLAKE_PORT: integerVar({ defaultValue: 4300, min: 0, max: 65_535 }),
    MARKETLAKE_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true }),
    MARKETLAKE_METRICS_ENABLED: booleanVar({ defaultValue: true }),
    MARKETLAKE_THETA_BASE_URL: urlVar({ defaultValue: 'http://127.0.0.1:25510/v2' }),
    MARKETLAKE_EARNINGS_BASE_URL: urlVar({ defaultValue: 'https://api.nasdaq.com' }),
    MARKETLAKE_HTTP_TIMEOUT_MS: integerVar({ defaultValue: 60_000, min: 1 }),
    MARKETLAKE_FETCH_MAX_ATTEMPTS: integerVar({ defaultValue: 3, min: 1 }),
    MARKETLAKE_MAX_WORKERS: integerVar({ defaultValue: 2, min: 1 }),
    MARKETLAKE_READINESS_SYMBOL: stringVar({ defaultValue: 'AAPL', pattern: /^[A-Za-z0-9.]+$/ }),
    MARKETLAKE_READINESS_TIMEOUT_MS: integerVar({ defaultValue: 5_000, min: 1 }),
    MARKETLAKE_S3_ENDPOINT: urlVar({ defaultValue: 'http://127.0.0.1:9000' }),
    MARKETLAKE_S3_REGION: stringVar({ defaultValue: 'us-east-1' }),
    MARKETLAKE_S3_BUCKET: stringVar({ defaultValue: 'marketlake-data', pattern: /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/ }),
    MARKETLAKE_S3_ACCESS_KEY_ID: stringVar(),
    MARKETLAKE_S3_SECRET_ACCESS_KEY: stringVar(),
    MARKETLAKE_S3_FORCE_PATH_STYLE: booleanVar({ defaultValue: true }),
    MARKETLAKE_JOB_RETENTION_MS: integerVar({ defaultValue: 86_400_000, min: 0 })
  })
  .passthrough()
  .superRefine((env, ctx) => {
    if (!LOG_LEVELS.some((level) => level === env.MARKETLAKE_LOG_LEVEL)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MARKETLAKE_LOG_LEVEL'],
        message: `MARKETLAKE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`
      });
    }
    if (Boolean(env.MARKETLAKE_S3_ACCESS_KEY_ID) !== Boolean(env.MARKETLAKE_S3_SECRET_ACCESS_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MARKETLAKE_S3_SECRET_ACCESS_KEY'],
        message: 'S3 credentials need both MARKETLAKE_S3_ACCESS_KEY_ID and MARKETLAKE_S3_SECRET_ACCESS_KEY'
      });
    }
  });

function toLogLevel(value: string): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export function loadServiceConfig(options: { env?: EnvSource } = {}): ServiceConfig {
  const source = options.env ?? process.env;
  const env = loadEnvConfig(ingestEnvSchema, { env: source, context: 'ingest' });
  const backoff = resolveRetryBackoffConfig(
    { baseMs: 500, factor: 2, maxMs: 10_000, jitterRatio: 0.2 },
    { prefix: 'MARKETLAKE_FETCH_BACKOFF', env: source }
  );

  return Object.freeze({
    host: env.MARKETLAKE_HOST,
    port: env.MARKETLAKE_PORT,
    logLevel: toLogLevel(env.MARKETLAKE_LOG_LEVEL),
    metricsEnabled: env.MARKETLAKE_METRICS_ENABLED,
    thetaBaseUrl: env.MARKETLAKE_THETA_BASE_URL,
    earningsBaseUrl: env.MARKETLAKE_EARNINGS_BASE_URL,
    httpTimeoutMs: env.MARKETLAKE_HTTP_TIMEOUT_MS,
    fetchMaxAttempts: env.MARKETLAKE_FETCH_MAX_ATTEMPTS,
    backoff: backoffConfigToOptions(backoff),
    maxWorkers: env.MARKETLAKE_MAX_WORKERS,
    readiness: Object.freeze({
      symbol: env.MARKETLAKE_READINESS_SYMBOL.toUpperCase(),
      timeoutMs: env.MARKETLAKE_READINESS_TIMEOUT_MS
    }),
    s3: Object.freeze({
      endpoint: env.MARKETLAKE_S3_ENDPOINT,
      region: env.MARKETLAKE_S3_REGION,
      bucket: env.MARKETLAKE_S3_BUCKET,
      accessKeyId: env.MARKETLAKE_S3_ACCESS_KEY_ID ?? null,
      secretAccessKey: env.MARKETLAKE_S3_SECRET_ACCESS_KEY ?? null,
      forcePathStyle: env.MARKETLAKE_S3_FORCE_PATH_STYLE
    }),
    jobRetentionMs: env.MARKETLAKE_JOB_RETENTION_MS
  });
}
