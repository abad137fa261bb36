import assert from 'node:assert/strict';
import { test } from 'node:test';
import { EnvConfigError } from '@marketlake/shared';

import { loadServiceConfig } from '../src/config/serviceConfig';

test('defaults apply to an empty environment', () => {
  const config = loadServiceConfig({ env: {} });

  assert.deepEqual(config, {
    host: '127.0.0.1',
    port: 4300,
    logLevel: 'info',
    metricsEnabled: true,
    thetaBaseUrl: 'http://127.0.0.1:25510/v2',
    earningsBaseUrl: 'https://api.nasdaq.com',
    httpTimeoutMs: 60_000,
    fetchMaxAttempts: 3,
    backoff: { baseMs: 500, factor: 2, maxMs: 10_000, jitterRatio: 0.2 },
    maxWorkers: 2,
    readiness: { symbol: 'AAPL', timeoutMs: 5_000 },
    s3: {
      endpoint: 'http://127.0.0.1:9000',
      region: 'us-east-1',
      bucket: 'marketlake-data',
      accessKeyId: null,
      secretAccessKey: null,
      forcePathStyle: true
    },
    jobRetentionMs: 86_400_000
  });
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.s3));
});

test('environment variables override the defaults', () => {
  const config = loadServiceConfig({
    env: {
      MARKETLAKE_PORT: '8080',
      MARKETLAKE_LOG_LEVEL: 'DEBUG',
      MARKETLAKE_METRICS_ENABLED: 'off',
      MARKETLAKE_THETA_BASE_URL: 'http://terminal:25510/v2/',
      MARKETLAKE_MAX_WORKERS: '8',
      MARKETLAKE_READINESS_SYMBOL: 'spy',
      MARKETLAKE_S3_ACCESS_KEY_ID: 'test-access',
      MARKETLAKE_S3_SECRET_ACCESS_KEY: 'test-secret',
      MARKETLAKE_FETCH_BACKOFF_BASE_MS: '100',
      MARKETLAKE_FETCH_BACKOFF_FACTOR: '3',
      MARKETLAKE_FETCH_BACKOFF_MAX_MS: '50',
      MARKETLAKE_FETCH_BACKOFF_JITTER_RATIO: '0'
    }
  });

  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.metricsEnabled, false);
  assert.equal(config.thetaBaseUrl, 'http://terminal:25510/v2');
  assert.equal(config.maxWorkers, 8);
  assert.equal(config.readiness.symbol, 'SPY');
  assert.equal(config.s3.accessKeyId, 'test-access');
  assert.equal(config.s3.secretAccessKey, 'test-secret');
  assert.deepEqual(config.backoff, { baseMs: 100, factor: 3, maxMs: 100, jitterRatio: 0 });
});

function issuesOf(env: Record<string, string>): string[] {
  try {
    loadServiceConfig({ env });
  } catch (error) {
    assert.ok(error instanceof EnvConfigError);
    assert.ok(error.message.startsWith('[ingest] Invalid environment configuration\n'));
    return error.issues;
  }
  assert.fail('expected loadServiceConfig to throw');
}

test('every invalid variable is reported', () => {
  assert.deepEqual(issuesOf({ MARKETLAKE_PORT: 'abc', MARKETLAKE_MAX_WORKERS: '0' }), [
    'MARKETLAKE_PORT: Expected MARKETLAKE_PORT to be an integer',
    'MARKETLAKE_MAX_WORKERS: MARKETLAKE_MAX_WORKERS must be >= 1'
  ]);
  assert.deepEqual(issuesOf({ MARKETLAKE_S3_BUCKET: 'Bad_Bucket' }), [
    'MARKETLAKE_S3_BUCKET: MARKETLAKE_S3_BUCKET does not match expected pattern'
  ]);
  assert.deepEqual(issuesOf({ MARKETLAKE_S3_ENDPOINT: 'ftp://storage' }), [
    'MARKETLAKE_S3_ENDPOINT: MARKETLAKE_S3_ENDPOINT must use http or https'
  ]);
});

test('log levels and credential pairs are checked together', () => {
  assert.deepEqual(issuesOf({ MARKETLAKE_LOG_LEVEL: 'loud' }), [
    'MARKETLAKE_LOG_LEVEL: MARKETLAKE_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent'
  ]);
  assert.deepEqual(issuesOf({ MARKETLAKE_S3_ACCESS_KEY_ID: 'test-access' }), [
    'MARKETLAKE_S3_SECRET_ACCESS_KEY: S3 credentials need both MARKETLAKE_S3_ACCESS_KEY_ID and MARKETLAKE_S3_SECRET_ACCESS_KEY'
  ]);
});
