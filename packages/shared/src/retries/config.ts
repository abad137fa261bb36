import type { BackoffOptions } from './backoff';
import type { EnvSource } from '../envConfig';

const DEFAULT_JITTER_RATIO = 0.2;

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return Number.NaN;
    }
    return Number(trimmed);
  }
  return Number.NaN;
}

export function normalizePositiveNumber(value: unknown, fallback: number, minimum = 1): number {
  const parsed = toNumber(value);
  if (!Number.isFinite(parsed) || parsed < minimum) {
    return fallback;
  }
  return parsed;
}

export function normalizeRatio(value: unknown, fallback: number, min = 0, max = 1): number {
  const parsed = toNumber(value);
  const candidate = Number.isFinite(parsed) ? parsed : fallback;
  return Math.min(Math.max(candidate, min), max);
}

export type RetryBackoffDefaults = {
  baseMs: number;
  factor: number;
  maxMs: number;
  jitterRatio?: number;
};

export type RetryBackoffConfig = Readonly<{
  baseMs: number;
  factor: number;
  maxMs: number;
  jitterRatio: number;
}>;

const KEY_SUFFIX: Record<keyof RetryBackoffConfig, string> = {
  baseMs: 'BASE_MS',
  factor: 'FACTOR',
  maxMs: 'MAX_MS',
  jitterRatio: 'JITTER_RATIO'
};

/**
 * Reads `${prefix}_BASE_MS`, `${prefix}_FACTOR`, `${prefix}_MAX_MS` and
 * `${prefix}_JITTER_RATIO`. Unusable values fall back to the defaults.
 */
export function resolveRetryBackoffConfig(
  defaults: RetryBackoffDefaults,
  options: { prefix: string; env?: EnvSource }
): RetryBackoffConfig {
  const env = options.env ?? process.env;
  const read = (key: keyof RetryBackoffConfig) => env[`${options.prefix}_${KEY_SUFFIX[key]}`];

  const baseMs = normalizePositiveNumber(read('baseMs'), defaults.baseMs);
  const factor = normalizePositiveNumber(read('factor'), defaults.factor);
  const maxMs = Math.max(baseMs, normalizePositiveNumber(read('maxMs'), defaults.maxMs));
  const jitterRatio = normalizeRatio(read('jitterRatio'), defaults.jitterRatio ?? DEFAULT_JITTER_RATIO);

  return Object.freeze({ baseMs, factor, maxMs, jitterRatio });
}

export function backoffConfigToOptions(config: RetryBackoffConfig): BackoffOptions {
  return {
    baseMs: config.baseMs,
    factor: config.factor,
    maxMs: config.maxMs,
    jitterRatio: config.jitterRatio
  } satisfies BackoffOptions;
}
