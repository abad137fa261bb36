import type { BaseLogger } from 'pino';

import { MissingPartitionError } from '../errors';
import { decodePartition } from '../datasets/codec';
import type { DatasetKind } from '../datasets/kinds';
import { concatTables, emptyTable, type CanonicalTable } from '../datasets/table';
import {
  keysFor,
  matchesPattern,
  patternPrefix,
  resolveRange,
  wildcardPattern,
  type PartitionAddress
} from '../partitions/keys';
import { addressOf, parseLogicalRequest, type LogicalRequest } from '../requests/logicalRequest';
import type { ObjectStore } from '../storage/objectStore';

export type MissingPolicy = 'fail' | 'skip';

export interface ScanOptions {
  onMissing: MissingPolicy;
  /** Called for every absent partition that `skip` leaves out. */
  onSkipped?: (key: string) => void;
}

export interface ScannedPartition {
  key: string;
  table: CanonicalTable;
}

export interface RetrievalResult {
  kind: DatasetKind;
  table: CanonicalTable;
  partitions: string[];
  missing: string[];
}

export interface RetrievalScannerOptions {
  store: ObjectStore;
  logger: BaseLogger;
  /** Partitions fetched concurrently while scanning. */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 8;

export class RetrievalScanner {
  private readonly store: ObjectStore;
  private readonly logger: BaseLogger;
  private readonly batchSize: number;

  constructor(options: RetrievalScannerOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  /**
   * Lazily yields present partitions in key order. Every partition read is
   * checked against the registry, whatever the missing-partition policy.
   */
  async *scan(input: unknown, options: ScanOptions): AsyncGenerator<ScannedPartition, void, undefined> {
    const request = parseLogicalRequest(input);
    const keys = await this.resolveKeys(request);

    for (let offset = 0; offset < keys.length; offset += this.batchSize) {
      const batch = keys.slice(offset, offset + this.batchSize);
      const bodies = await this.store.getMany(batch);

      for (const [index, key] of batch.entries()) {
        const body = bodies[index];
        if (!body) {
          if (options.onMissing === 'fail') {
            throw new MissingPartitionError(key);
          }
          this.logger.warn({ key }, 'Partition is missing; skipping');
          options.onSkipped?.(key);
          continue;
        }
        yield { key, table: decodePartition(body, request.kind, key) };
      }
    }
  }

  async retrieve(input: unknown, options: { onMissing: MissingPolicy }): Promise<RetrievalResult> {
    const request = parseLogicalRequest(input);
    const tables: CanonicalTable[] = [];
    const partitions: string[] = [];
    const missing: string[] = [];

    const scan = this.scan(request, {
      onMissing: options.onMissing,
      onSkipped: (key) => {
        missing.push(key);
      }
    });
    for await (const partition of scan) {
      partitions.push(partition.key);
      tables.push(partition.table);
    }

    const table = tables.length > 0 ? concatTables(request.kind, tables) : emptyTable(request.kind);
    this.logger.info(
      { kind: request.kind, partitions: partitions.length, missing: missing.length, rowCount: table.rowCount },
      'Retrieved partitions'
    );
    return { kind: request.kind, table, partitions, missing };
  }

  private async resolveKeys(request: LogicalRequest): Promise<string[]> {
    const address: PartitionAddress = addressOf(request);
    const selection = resolveRange(request, { allowAll: true });
    if (selection.mode === 'range') {
      return keysFor(address, selection);
    }

    const pattern = wildcardPattern(address);
    const listed = await this.store.list(patternPrefix(pattern));
    return listed.filter((key) => matchesPattern(pattern, key)).sort();
  }
}
