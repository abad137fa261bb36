import type { Logger } from 'pino';

import type { ServiceConfig } from './config/serviceConfig';
import { FanoutDispatcher } from './dispatch/dispatcher';
import { WorkerPool } from './dispatch/workerPool';
import { JobTracker } from './jobs/tracker';
import { createLogger } from './logger';
import { createMetrics, type IngestMetrics } from './metrics';
import { HttpProviderClient } from './provider/httpProvider';
import { ReadinessProbe } from './provider/readiness';
import type { ProviderClient, ReadinessCheck } from './provider/types';
import { RetrievalScanner } from './retrieval/scanner';
import { createS3Client, S3ObjectStore, type ObjectStore } from './storage/objectStore';

export interface IngestRuntime {
  config: ServiceConfig;
  logger: Logger;
  metrics: IngestMetrics;
  tracker: JobTracker;
  pool: WorkerPool;
  provider: ProviderClient;
  store: ObjectStore;
  readiness: ReadinessCheck;
  dispatcher: FanoutDispatcher;
  scanner: RetrievalScanner;
  /** Starts the periodic pruning of finished submissions. */
  startMaintenance(intervalMs?: number): void;
  close(): void;
}

/** Collaborators tests swap for in-process fakes. */
export interface RuntimeOverrides {
  logger?: Logger;
  provider?: ProviderClient;
  store?: ObjectStore;
  readiness?: ReadinessCheck;
  now?: () => number;
}

const DEFAULT_MAINTENANCE_INTERVAL_MS = 60_000;

export function createRuntime(config: ServiceConfig, overrides: RuntimeOverrides = {}): IngestRuntime {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const metrics = createMetrics();
  const now = overrides.now ?? Date.now;

  const tracker = new JobTracker({ now });
  const pool = new WorkerPool({
    maxWorkers: config.maxWorkers,
    onQueueDepth: (depth) => {
      metrics.poolQueueDepth.set(depth);
    }
  });

  const provider =
    overrides.provider ??
    new HttpProviderClient({
      timeoutMs: config.httpTimeoutMs,
      maxAttempts: config.fetchMaxAttempts,
      backoff: config.backoff,
      logger: logger.child({ component: 'provider' })
    });

  const store =
    overrides.store ??
    new S3ObjectStore({
      client: createS3Client(config.s3),
      bucket: config.s3.bucket,
      logger: logger.child({ component: 'object-store' })
    });

  const readiness =
    overrides.readiness ??
    new ReadinessProbe({
      thetaBaseUrl: config.thetaBaseUrl,
      symbol: config.readiness.symbol,
      timeoutMs: config.readiness.timeoutMs,
      logger: logger.child({ component: 'readiness' })
    });

  const dispatcher = new FanoutDispatcher({
    tracker,
    pool,
    provider,
    store,
    readiness,
    endpoints: { thetaBaseUrl: config.thetaBaseUrl, earningsBaseUrl: config.earningsBaseUrl },
    logger: logger.child({ component: 'dispatcher' }),
    metrics,
    now
  });

  const scanner = new RetrievalScanner({ store, logger: logger.child({ component: 'retrieval' }) });

  let maintenance: NodeJS.Timeout | null = null;

  return {
    config,
    logger,
    metrics,
    tracker,
    pool,
    provider,
    store,
    readiness,
    dispatcher,
    scanner,
    startMaintenance(intervalMs = DEFAULT_MAINTENANCE_INTERVAL_MS) {
      if (maintenance) {
        return;
      }
      maintenance = setInterval(() => {
        const removed = dispatcher.pruneFinished(config.jobRetentionMs);
        if (removed > 0) {
          logger.debug({ removed }, 'Pruned finished submissions');
        }
      }, intervalMs);
      maintenance.unref();
    },
    close() {
      if (maintenance) {
        clearInterval(maintenance);
        maintenance = null;
      }
    }
  };
}
