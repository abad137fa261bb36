import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';

import {
  PermanentFetchError,
  ProviderNotReadyError,
  SchemaMismatchError,
  SubmissionNotFoundError
} from '../errors';
import { encodePartition, PARTITION_CONTENT_TYPE } from '../datasets/codec';
import { endpointOf, type DatasetKind } from '../datasets/kinds';
import type { CanonicalTable } from '../datasets/table';
import type { Job, JobSnapshot, JobState, JobTracker, CompletionResult } from '../jobs/tracker';
import type { IngestMetrics } from '../metrics';
import { normalize } from '../normalizers/router';
import type { ProviderClient, RawPayload, ReadinessCheck } from '../provider/types';
import {
  expandRequest,
  isStandardInterval,
  type ExpansionEndpoints,
  type PartitionPlan,
  type SubRequest
} from '../requests/expansion';
import { describeRequest, parseLogicalRequest, type LogicalRequest } from '../requests/logicalRequest';
import type { ObjectStore } from '../storage/objectStore';
import type { WorkerPool } from './workerPool';

export type SubmitMode = 'async' | 'sync';

export interface CommitOutcome {
  committed: boolean;
  rowCount: number;
  commitError: string | null;
}

export interface PartitionJobSummary extends JobSnapshot {
  commit: CommitOutcome | null;
}

export interface SubmissionSnapshot {
  id: string;
  request: LogicalRequest;
  state: JobState;
  completedParts: number;
  totalParts: number;
  rowCount: number;
  failedSlotCount: number;
  jobs: PartitionJobSummary[];
  skipped: string[];
  createdAt: string;
  finishedAt: string | null;
  error: string | null;
}

export interface Submission {
  readonly id: string;
  readonly request: LogicalRequest;
  readonly jobs: readonly Job[];
  readonly skipped: readonly string[];
  /** Settles once every job is terminal and every finalized job's commit has run. */
  readonly done: Promise<SubmissionSnapshot>;
}

interface SubmissionRecord {
  readonly id: string;
  readonly request: LogicalRequest;
  readonly jobs: readonly Job[];
  readonly skipped: readonly string[];
  readonly createdAt: number;
  finishedAt: number | null;
  error: string | null;
}

export type PayloadNormalizer = (payload: RawPayload, kind: DatasetKind) => CanonicalTable;

export interface FanoutDispatcherOptions {
  tracker: JobTracker;
  pool: WorkerPool;
  provider: ProviderClient;
  store: ObjectStore;
  readiness: ReadinessCheck;
  endpoints: ExpansionEndpoints;
  logger: BaseLogger;
  metrics: IngestMetrics;
  normalizer?: PayloadNormalizer;
  now?: () => number;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FanoutDispatcher {
  private readonly tracker: JobTracker;
  private readonly pool: WorkerPool;
  private readonly provider: ProviderClient;
  private readonly store: ObjectStore;
  private readonly readiness: ReadinessCheck;
  private readonly endpoints: ExpansionEndpoints;
  private readonly logger: BaseLogger;
  private readonly metrics: IngestMetrics;
  private readonly normalizer: PayloadNormalizer;
  private readonly now: () => number;
  private readonly submissions = new Map<string, SubmissionRecord>();
  private readonly commits = new Map<string, CommitOutcome>();

  constructor(options: FanoutDispatcherOptions) {
    this.tracker = options.tracker;
    this.pool = options.pool;
    this.provider = options.provider;
    this.store = options.store;
    this.readiness = options.readiness;
    this.endpoints = options.endpoints;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.normalizer = options.normalizer ?? normalize;
    this.now = options.now ?? Date.now;
  }

  /**
   * Validates and expands `input`, then schedules one job per partition that
   * must be written. Input errors are thrown before any I/O; per-sub-request
   * failures are recorded on the jobs instead.
   */
  async submit(input: unknown, options: { mode: SubmitMode } = { mode: 'async' }): Promise<Submission> {
    const request = parseLogicalRequest(input);
    const plans = expandRequest(request, this.endpoints);

    if (request.kind !== 'earnings' && endpointOf(request.kind) === 'quote' && !isStandardInterval(request.interval)) {
      this.logger.warn(
        { interval: request.interval, request: describeRequest(request) },
        'Non-standard interval requested; the provider may serve it slowly'
      );
    }

    const ready = await this.readiness.isReady();
    this.metrics.readinessGauge.set({ component: 'provider' }, ready ? 1 : 0);
    if (!ready) {
      throw new ProviderNotReadyError();
    }

    const { pending, skipped } = await this.partitionsToWrite(request, plans);
    const jobs = pending.map((plan) =>
      this.tracker.create({ key: plan.key, kind: plan.kind, totalParts: plan.subRequests.length })
    );

    const record: SubmissionRecord = {
      id: randomUUID(),
      request,
      jobs,
      skipped,
      createdAt: this.now(),
      finishedAt: null,
      error: null
    };
    this.submissions.set(record.id, record);

    this.logger.info(
      {
        submissionId: record.id,
        request: describeRequest(request),
        partitions: jobs.length,
        skipped: skipped.length,
        subRequests: pending.reduce((total, plan) => total + plan.subRequests.length, 0)
      },
      'Submission scheduled'
    );

    const chains = pending.flatMap((plan, index) => {
      const job = jobs[index];
      return job ? plan.subRequests.map((subRequest) => this.schedule(job, subRequest)) : [];
    });

    const done = Promise.allSettled(chains).then((results) => {
      record.finishedAt = this.now();
      const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (failure) {
        record.error = messageOf(failure.reason);
        throw failure.reason;
      }
      return this.snapshotOf(record);
    });
    done.catch((error: unknown) => {
      this.logger.error({ submissionId: record.id, err: error }, 'Submission failed');
    });

    const submission: Submission = {
      id: record.id,
      request,
      jobs,
      skipped,
      done
    };

    if (options.mode === 'sync') {
      await done;
    }
    return submission;
  }

  poll(submissionId: string): SubmissionSnapshot {
    return this.snapshotOf(this.requireSubmission(submissionId));
  }

  /** Aborts every open job of the submission; in-flight fetches drain and are dropped. */
  cancel(submissionId: string): SubmissionSnapshot {
    const record = this.requireSubmission(submissionId);
    let aborted = 0;
    for (const job of record.jobs) {
      if (this.tracker.get(job.id) && this.tracker.abort(job)) {
        aborted += 1;
        this.metrics.jobsFinished.inc({ kind: job.kind, outcome: 'aborted' });
      }
    }
    this.logger.info({ submissionId, aborted }, 'Submission cancelled');
    return this.snapshotOf(record);
  }

  list(): SubmissionSnapshot[] {
    return Array.from(this.submissions.values(), (record) => this.snapshotOf(record));
  }

  /** Forgets settled submissions (and their jobs) older than `maxAgeMs`. */
  pruneFinished(maxAgeMs: number, now = this.now()): number {
    let removed = 0;
    for (const [id, record] of this.submissions) {
      if (record.finishedAt !== null && now - record.finishedAt >= maxAgeMs) {
        this.submissions.delete(id);
        for (const job of record.jobs) {
          this.commits.delete(job.id);
          this.tracker.forget(job);
        }
        removed += 1;
      }
    }
    return removed;
  }

  private async partitionsToWrite(
    request: LogicalRequest,
    plans: PartitionPlan[]
  ): Promise<{ pending: PartitionPlan[]; skipped: string[] }> {
    if (request.forceRefresh) {
      return { pending: plans, skipped: [] };
    }
    const existing = await Promise.all(plans.map((plan) => this.store.exists(plan.key)));
    const pending: PartitionPlan[] = [];
    const skipped: string[] = [];
    plans.forEach((plan, index) => {
      if (existing[index]) {
        skipped.push(plan.key);
        this.metrics.partitionsSkipped.inc({ kind: plan.kind });
        this.logger.info({ key: plan.key }, 'Partition already exists; skipping');
      } else {
        pending.push(plan);
      }
    });
    return { pending, skipped };
  }

  private schedule(job: Job, subRequest: SubRequest): Promise<void> {
    return this.pool.run(() => this.process(job, subRequest)).then((result) => {
      if (result && result.status === 'recorded' && result.finalize) {
        return this.commit(job);
      }
      return undefined;
    });
  }

  private async process(job: Job, subRequest: SubRequest): Promise<CompletionResult | null> {
    if (!this.tracker.get(job.id) || !this.tracker.isOpen(job)) {
      this.metrics.subRequests.inc({ kind: job.kind, outcome: 'dropped' });
      return null;
    }

    let table: CanonicalTable;
    let noData = false;
    try {
      const payload = await this.provider.fetch(subRequest);
      noData = payload.noData;
      table = this.normalizer(payload, subRequest.kind);
    } catch (error) {
      return this.fail(job, subRequest, error);
    }

    try {
      const result = this.tracker.recordCompletion(job, subRequest.slot, table);
      const outcome = result.status === 'dropped' ? 'dropped' : noData ? 'no_data' : 'success';
      this.metrics.subRequests.inc({ kind: job.kind, outcome });
      return result;
    } catch (error) {
      if (error instanceof SchemaMismatchError) {
        return this.fail(job, subRequest, error);
      }
      throw error;
    }
  }

  private fail(job: Job, subRequest: SubRequest, error: unknown): CompletionResult {
    const reason =
      error instanceof PermanentFetchError
        ? error.reason
        : error instanceof SchemaMismatchError
          ? 'schema_mismatch'
          : 'unexpected';
    const log = { jobId: job.id, key: job.key, slot: subRequest.slot, url: subRequest.url, reason };
    if (reason === 'unexpected') {
      this.logger.error({ ...log, err: error }, 'Sub-request failed unexpectedly');
    } else {
      this.logger.warn({ ...log, err: messageOf(error) }, 'Sub-request failed');
    }

    const result = this.tracker.recordFailure(job, subRequest.slot, {
      subRequestId: subRequest.id,
      url: subRequest.url,
      reason,
      message: messageOf(error)
    });
    this.metrics.subRequests.inc({ kind: job.kind, outcome: result.status === 'dropped' ? 'dropped' : 'failed' });
    return result;
  }

  private async commit(job: Job): Promise<void> {
    const table = this.tracker.assemble(job);
    const { failedSlots } = this.tracker.snapshot(job);
    try {
      await this.store.put(job.key, encodePartition(table), PARTITION_CONTENT_TYPE);
      this.commits.set(job.id, { committed: true, rowCount: table.rowCount, commitError: null });
      this.metrics.rowsCommitted.inc({ kind: job.kind }, table.rowCount);
      this.metrics.jobsFinished.inc({ kind: job.kind, outcome: 'committed' });
      this.logger.info(
        { jobId: job.id, key: job.key, rowCount: table.rowCount, failedSlots: failedSlots.length },
        'Partition committed'
      );
    } catch (error) {
      this.commits.set(job.id, { committed: false, rowCount: table.rowCount, commitError: messageOf(error) });
      this.metrics.jobsFinished.inc({ kind: job.kind, outcome: 'commit_failed' });
      this.logger.error({ jobId: job.id, key: job.key, err: error }, 'Failed to commit partition');
    }
  }

  private requireSubmission(submissionId: string): SubmissionRecord {
    const record = this.submissions.get(submissionId);
    if (!record) {
      throw new SubmissionNotFoundError(submissionId);
    }
    return record;
  }

  private jobSummary(job: Job): PartitionJobSummary {
    return { ...this.tracker.snapshot(job), commit: this.commits.get(job.id) ?? null };
  }

  private snapshotOf(record: SubmissionRecord): SubmissionSnapshot {
    const jobs = record.jobs.map((job) => this.jobSummary(job));
    const state: JobState = jobs.some((job) => job.state === 'open')
      ? 'open'
      : jobs.some((job) => job.state === 'aborted')
        ? 'aborted'
        : 'finalized';

    return {
      id: record.id,
      request: record.request,
      state,
      completedParts: jobs.reduce((total, job) => total + job.completedParts, 0),
      totalParts: jobs.reduce((total, job) => total + job.totalParts, 0),
      rowCount: jobs.reduce((total, job) => total + (job.commit?.committed ? job.commit.rowCount : 0), 0),
      failedSlotCount: jobs.reduce((total, job) => total + job.failedSlots.length, 0),
      jobs,
      skipped: [...record.skipped],
      createdAt: new Date(record.createdAt).toISOString(),
      finishedAt: record.finishedAt === null ? null : new Date(record.finishedAt).toISOString(),
      error: record.error
    };
  }
}
