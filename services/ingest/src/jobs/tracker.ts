import { randomUUID } from 'node:crypto';

import { InvalidJobError, JobAlreadyFinalizedError } from '../errors';
import type { DatasetKind } from '../datasets/kinds';
import { assertSchema, concatTables, emptyTable, type CanonicalTable } from '../datasets/table';

export type JobState = 'open' | 'finalized' | 'aborted';

/** Caller-held reference to a tracked job. Carries no mutable state. */
export interface Job {
  readonly id: string;
  readonly key: string;
  readonly kind: DatasetKind;
  readonly totalParts: number;
}

export interface SlotFailure {
  subRequestId?: string;
  url?: string;
  reason: string;
  message: string;
}

export interface FailedSlot {
  readonly slot: number;
  readonly subRequestId: string | null;
  readonly url: string | null;
  readonly reason: string;
  readonly message: string;
}

export type CompletionResult = { status: 'recorded'; finalize: boolean } | { status: 'dropped' };

export interface JobSnapshot {
  id: string;
  key: string;
  kind: DatasetKind;
  state: JobState;
  completedParts: number;
  totalParts: number;
  failedSlots: FailedSlot[];
  createdAt: string;
  finishedAt: string | null;
}

export interface CreateJobInput {
  key: string;
  kind: DatasetKind;
  totalParts: number;
}

interface JobRecord {
  readonly job: Job;
  readonly slots: (CanonicalTable | null)[];
  readonly failedSlots: FailedSlot[];
  completedParts: number;
  state: JobState;
  readonly createdAt: number;
  finishedAt: number | null;
}

export interface JobTrackerOptions {
  now?: () => number;
}

/**
 * Owns the mutable state of every live job. Each mutating method runs to
 * completion without awaiting, so on the event loop the fill, increment and
 * compare-to-total sequence is atomic with respect to every other caller.
 */
export class JobTracker {
  private readonly records = new Map<string, JobRecord>();
  private readonly now: () => number;

  constructor(options: JobTrackerOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  create(input: CreateJobInput): Job {
    if (!Number.isInteger(input.totalParts) || input.totalParts < 1) {
      throw new InvalidJobError(`totalParts must be an integer >= 1, received ${input.totalParts}`);
    }
    const job: Job = Object.freeze({
      id: randomUUID(),
      key: input.key,
      kind: input.kind,
      totalParts: input.totalParts
    });
    this.records.set(job.id, {
      job,
      slots: Array.from({ length: input.totalParts }, () => null),
      failedSlots: [],
      completedParts: 0,
      state: 'open',
      createdAt: this.now(),
      finishedAt: null
    });
    return job;
  }

  get(id: string): Job | undefined {
    return this.records.get(id)?.job;
  }

  list(): Job[] {
    return Array.from(this.records.values(), (record) => record.job);
  }

  /**
   * Fills `slot` with `table`. Exactly one call per job ever returns
   * `finalize: true`; completions on an aborted job are dropped.
   */
  recordCompletion(job: Job, slot: number, table: CanonicalTable): CompletionResult {
    const record = this.require(job);
    if (record.state === 'aborted') {
      return { status: 'dropped' };
    }
    if (record.state === 'finalized') {
      throw new JobAlreadyFinalizedError(job.id);
    }
    this.assertFillable(record, slot);
    assertSchema(job.kind, table.schema, { jobId: job.id, slot });
    return this.fill(record, slot, table);
  }

  /** Fills `slot` with an empty table and records why it failed. */
  recordFailure(job: Job, slot: number, failure: SlotFailure): CompletionResult {
    const record = this.require(job);
    if (record.state === 'aborted') {
      return { status: 'dropped' };
    }
    if (record.state === 'finalized') {
      throw new JobAlreadyFinalizedError(job.id);
    }
    this.assertFillable(record, slot);
    record.failedSlots.push(
      Object.freeze({
        slot,
        subRequestId: failure.subRequestId ?? null,
        url: failure.url ?? null,
        reason: failure.reason,
        message: failure.message
      })
    );
    return this.fill(record, slot, emptyTable(job.kind));
  }

  snapshot(job: Job): JobSnapshot {
    const record = this.require(job);
    return {
      id: job.id,
      key: job.key,
      kind: job.kind,
      state: record.state,
      completedParts: record.completedParts,
      totalParts: job.totalParts,
      failedSlots: [...record.failedSlots].sort((left, right) => left.slot - right.slot),
      createdAt: new Date(record.createdAt).toISOString(),
      finishedAt: record.finishedAt === null ? null : new Date(record.finishedAt).toISOString()
    };
  }

  isOpen(job: Job): boolean {
    return this.require(job).state === 'open';
  }

  /** Moves an open job to `aborted`; false when it was already terminal. */
  abort(job: Job): boolean {
    const record = this.require(job);
    if (record.state !== 'open') {
      return false;
    }
    record.state = 'aborted';
    record.finishedAt = this.now();
    return true;
  }

  /** Slot-ordered concatenation of a finalized job's tables. */
  assemble(job: Job): CanonicalTable {
    const record = this.require(job);
    if (record.state !== 'finalized') {
      throw new InvalidJobError(`Job ${job.id} is ${record.state}; only finalized jobs can be assembled`);
    }
    const tables = record.slots.map((table, slot) => {
      if (!table) {
        throw new InvalidJobError(`Job ${job.id} finalized with slot ${slot} empty`);
      }
      return table;
    });
    return concatTables(job.kind, tables);
  }

  /** Drops a terminal job's record; open jobs stay tracked. */
  forget(job: Job): boolean {
    const record = this.records.get(job.id);
    if (!record || record.finishedAt === null) {
      return false;
    }
    this.records.delete(job.id);
    return true;
  }

  private require(job: Job): JobRecord {
    const record = this.records.get(job.id);
    if (!record || record.job !== job) {
      throw new InvalidJobError(`Job ${job.id} is not tracked`);
    }
    return record;
  }

  private assertFillable(record: JobRecord, slot: number): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= record.job.totalParts) {
      throw new InvalidJobError(`Slot ${slot} is out of range for job ${record.job.id} (${record.job.totalParts} parts)`);
    }
    if (record.slots[slot] !== null) {
      throw new InvalidJobError(`Slot ${slot} of job ${record.job.id} was already filled`);
    }
  }

  private fill(record: JobRecord, slot: number, table: CanonicalTable): CompletionResult {
    record.slots[slot] = table;
    record.completedParts += 1;
    if (record.completedParts === record.job.totalParts) {
      record.state = 'finalized';
      record.finishedAt = this.now();
      return { status: 'recorded', finalize: true };
    }
    return { status: 'recorded', finalize: false };
  }
}
