import { Counter, Gauge, Registry } from 'prom-client';

export interface IngestMetrics {
  register: Registry;
  subRequests: Counter<'kind' | 'outcome'>;
  jobsFinished: Counter<'kind' | 'outcome'>;
  rowsCommitted: Counter<'kind'>;
  partitionsSkipped: Counter<'kind'>;
  poolQueueDepth: Gauge;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): IngestMetrics => {
  const register = new Registry();

  const subRequests = new Counter({
    name: 'marketlake_sub_requests_total',
    help: 'Sub-requests processed, by dataset kind and outcome',
    registers: [register],
    labelNames: ['kind', 'outcome'] as const
  });

  const jobsFinished = new Counter({
    name: 'marketlake_jobs_finished_total',
    help: 'Partition jobs that reached a terminal state, by dataset kind and outcome',
    registers: [register],
    labelNames: ['kind', 'outcome'] as const
  });

  const rowsCommitted = new Counter({
    name: 'marketlake_rows_committed_total',
    help: 'Rows written to the object store',
    registers: [register],
    labelNames: ['kind'] as const
  });

  const partitionsSkipped = new Counter({
    name: 'marketlake_partitions_skipped_total',
    help: 'Partitions not fetched because they already exist',
    registers: [register],
    labelNames: ['kind'] as const
  });

  const poolQueueDepth = new Gauge({
    name: 'marketlake_worker_pool_queue_depth',
    help: 'Sub-requests waiting for a free worker',
    registers: [register]
  });

  const readinessGauge = new Gauge({
    name: 'marketlake_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    subRequests,
    jobsFinished,
    rowsCommitted,
    partitionsSkipped,
    poolQueueDepth,
    readinessGauge
  };
};
