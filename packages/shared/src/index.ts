export {
  EnvConfigError,
  booleanVar,
  integerVar,
  loadEnvConfig,
  stringVar,
  urlVar
} from './envConfig';
export type { EnvSource, LoadEnvConfigOptions, NumericVarOptions, StringVarOptions } from './envConfig';
export {
  RetriesExhaustedError,
  computeExponentialBackoff,
  retryWithBackoff
} from './retries/backoff';
export type { BackoffOptions, RetryAttemptInfo, RetryWithBackoffOptions } from './retries/backoff';
export {
  backoffConfigToOptions,
  normalizePositiveNumber,
  normalizeRatio,
  resolveRetryBackoffConfig
} from './retries/config';
export type { RetryBackoffConfig, RetryBackoffDefaults } from './retries/config';
