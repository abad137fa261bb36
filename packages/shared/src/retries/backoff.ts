import { setTimeout as delay } from 'node:timers/promises';

export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 500,
  factor: 2,
  maxMs: 10_000,
  jitterRatio: 0.2
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));

  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random
  } = options;

  const rawDelay = baseMs * Math.pow(factor, normalizedAttempt - 1);
  const cappedDelay = clamp(rawDelay, baseMs, maxMs);

  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const randomFn = typeof random === 'function' ? random : Math.random;
  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (randomFn() * 2 - 1) * jitterSpan;
  const jittered = clamp(cappedDelay + jitter, baseMs, maxMs);

  return Math.round(jittered);
}

export type RetryAttemptInfo = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryWithBackoffOptions = {
  maxAttempts: number;
  backoff?: BackoffOptions;
  /** Only errors accepted here are retried; anything else is rethrown at once. */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
};

export class RetriesExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${reason}`);
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Runs `operation` until it resolves, a non-retryable error is thrown, or
 * `maxAttempts` is reached. The attempt number passed to `operation` starts
 * at 1.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryWithBackoffOptions
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!options.shouldRetry(error)) {
        throw error;
      }
      lastError = error;
      if (attempt < maxAttempts) {
        const delayMs = computeExponentialBackoff(attempt, options.backoff);
        options.onRetry?.({ attempt, delayMs, error });
        await sleep(delayMs);
      }
    }
  }

  throw new RetriesExhaustedError(maxAttempts, lastError);
}
