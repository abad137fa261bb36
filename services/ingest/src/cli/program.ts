import { Command, Option } from 'commander';

import { loadServiceConfig } from '../config/serviceConfig';
import { DATASET_KINDS } from '../datasets/kinds';
import { tableToRecords } from '../datasets/table';
import type { SubmissionSnapshot } from '../dispatch/dispatcher';
import type { MissingPolicy } from '../retrieval/scanner';
import { createRuntime, type IngestRuntime } from '../runtime';

type RangeOptions = {
  symbol?: string;
  start?: number;
  end?: number;
  interval?: number;
  granularity?: string;
  expiration?: number;
  json?: boolean;
};

type RequestOptions = RangeOptions & { forceRefresh?: boolean };
type RetrieveOptions = RangeOptions & { all?: boolean; onMissing?: MissingPolicy };

export interface CliDependencies {
  runtimeFactory?: () => IngestRuntime;
  write?: (line: string) => void;
}

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

function buildRequest(kind: string, options: RangeOptions): Record<string, unknown> {
  const request: Record<string, unknown> = { kind };
  const fields: Array<[string, unknown]> = [
    ['symbol', options.symbol],
    ['start', options.start],
    ['end', options.end],
    ['interval', options.interval],
    ['granularity', options.granularity],
    ['expiration', options.expiration]
  ];
  for (const [name, value] of fields) {
    if (value !== undefined) {
      request[name] = value;
    }
  }
  return request;
}

export function formatSubmission(snapshot: SubmissionSnapshot): string[] {
  const lines = snapshot.jobs.map((job) => {
    const commit = job.commit;
    const status = commit === null ? job.state : commit.committed ? 'committed' : `commit failed (${commit.commitError ?? 'unknown'})`;
    return `${job.key} ${status} rows=${commit?.rowCount ?? 0} failed=${job.failedSlots.length}/${job.totalParts}`;
  });
  for (const key of snapshot.skipped) {
    lines.push(`${key} skipped (already stored)`);
  }
  lines.push(
    `${snapshot.state}: ${snapshot.jobs.length} partition(s), ${snapshot.skipped.length} skipped, ${snapshot.rowCount} row(s)`
  );
  return lines;
}

function addRangeOptions(command: Command): Command {
  return command
    .option('--symbol <symbol>', 'Ticker symbol (market kinds only)')
    .option('--start <date>', 'Start as YYYYMMDD or YYYYMM', parseInteger)
    .option('--end <date>', 'End as YYYYMMDD or YYYYMM (defaults to start)', parseInteger)
    .option('--interval <ms>', 'Bar interval in milliseconds (quote kinds)', parseInteger)
    .addOption(new Option('--granularity <granularity>', 'Partition granularity').choices(['monthly', 'daily']))
    .option('--expiration <date>', 'Option expiration as YYYYMMDD, 0 for all', parseInteger)
    .option('--json', 'Output JSON');
}

export function createInterface(deps: CliDependencies = {}): Command {
  const runtimeFactory = deps.runtimeFactory ?? (() => createRuntime(loadServiceConfig()));
  const write = deps.write ?? ((line: string) => console.log(line));
  const program = new Command();

  program.name('marketlake-ingest').description('Fetch market data into partitioned object storage and read it back');

  addRangeOptions(
    program
      .command('request')
      .description('Fetch a range and write its partitions, waiting until every partition is committed')
      .addArgument(program.createArgument('<kind>', 'Dataset kind').choices(DATASET_KINDS))
  )
    .option('--force-refresh', 'Re-fetch partitions that already exist', false)
    .action(async (kind: string, options: RequestOptions) => {
      const runtime = runtimeFactory();
      try {
        await runtime.store.ensureBucket();
        const input = { ...buildRequest(kind, options), forceRefresh: Boolean(options.forceRefresh) };
        const submission = await runtime.dispatcher.submit(input, { mode: 'sync' });
        const snapshot = runtime.dispatcher.poll(submission.id);
        if (options.json) {
          write(JSON.stringify(snapshot, null, 2));
          return;
        }
        for (const line of formatSubmission(snapshot)) {
          write(line);
        }
      } finally {
        runtime.close();
      }
    });

  addRangeOptions(
    program
      .command('retrieve')
      .description('Read stored partitions for a range')
      .addArgument(program.createArgument('<kind>', 'Dataset kind').choices(DATASET_KINDS))
  )
    .option('--all', 'Every stored partition for the symbol', false)
    .addOption(
      new Option('--on-missing <policy>', 'What to do about absent partitions').choices(['fail', 'skip']).default('fail')
    )
    .action(async (kind: string, options: RetrieveOptions) => {
      const runtime = runtimeFactory();
      try {
        const input = { ...buildRequest(kind, options), all: Boolean(options.all) };
        const result = await runtime.scanner.retrieve(input, { onMissing: options.onMissing ?? 'fail' });
        if (options.json) {
          for (const record of tableToRecords(result.table)) {
            write(JSON.stringify(record));
          }
          return;
        }
        for (const key of result.missing) {
          write(`${key} missing`);
        }
        write(
          `${result.kind}: ${result.table.rowCount} row(s) from ${result.partitions.length} partition(s), ${result.missing.length} missing`
        );
      } finally {
        runtime.close();
      }
    });

  return program;
}
