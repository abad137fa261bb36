import { z } from 'zod';

import { SchemaMismatchError } from '../errors';
import { createTable, emptyTable, type CanonicalTable, type CellValue } from '../datasets/table';
import { schemaFor } from '../datasets/schemas';
import { toIsoDate } from '../partitions/calendar';
import type { RawPayload } from '../provider/types';

const looseValue = z.union([z.string(), z.number()]).nullable().optional();

const earningsRowSchema = z
  .object({
    symbol: z.string().trim().min(1),
    name: z.string().nullable().optional(),
    time: looseValue,
    eps: looseValue,
    epsForecast: looseValue,
    surprise: looseValue,
    marketCap: looseValue,
    fiscalQuarterEnding: looseValue,
    noOfEsts: looseValue
  })
  .passthrough();

const earningsResponseSchema = z
  .object({
    data: z
      .object({
        asOf: z.string().nullable().optional(),
        rows: z.array(earningsRowSchema).nullable().optional()
      })
      .passthrough()
      .nullable()
      .optional()
  })
  .passthrough();

export type EarningsRow = z.infer<typeof earningsRowSchema>;

type LooseValue = z.infer<typeof looseValue>;

function textOf(value: LooseValue): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text === '' || text === 'N/A' ? null : text;
}

function toFinite(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

/** `$1.25`, `($2.55)` (negative), `N/A`. */
export function parseCurrency(value: LooseValue): number | null {
  const text = textOf(value);
  if (text === null) {
    return null;
  }
  let cleaned = text.replace(/[$,]/g, '');
  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    cleaned = `-${cleaned.slice(1, -1)}`;
  }
  return cleaned === '' ? null : toFinite(Number(cleaned));
}

export function parsePercentage(value: LooseValue): number | null {
  const text = textOf(value);
  return text === null ? null : toFinite(Number(text.replace(/%$/, '')));
}

/** `$899,395,987` */
export function parseMarketCap(value: LooseValue): number | null {
  const text = textOf(value);
  if (text === null) {
    return null;
  }
  const parsed = toFinite(Number(text.replace(/[$,]/g, '')));
  return parsed === null ? null : Math.trunc(parsed);
}

export function parseCount(value: LooseValue): number | null {
  const text = textOf(value);
  return text !== null && /^\d+$/.test(text) ? Number(text) : null;
}

export function parseAnnouncementTime(value: LooseValue): string | null {
  const text = textOf(value);
  return text === 'time-not-supplied' ? null : text;
}

export function normalizeEarningsPayload(payload: RawPayload): CanonicalTable {
  if (payload.noData || payload.body.trim() === '') {
    return emptyTable('earnings');
  }

  const context = { subRequestId: payload.subRequest.id, tradeDate: payload.subRequest.tradeDate };
  let raw: unknown;
  try {
    raw = JSON.parse(payload.body);
  } catch (error) {
    throw new SchemaMismatchError('Earnings payload is not valid JSON', {
      ...context,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = earningsResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaMismatchError('Earnings payload does not match the calendar format', {
      ...context,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const rows = parsed.data.data?.rows ?? [];
  if (rows.length === 0) {
    return emptyTable('earnings');
  }

  const date = toIsoDate(payload.subRequest.tradeDate);
  const columns: CellValue[][] = schemaFor('earnings').map(() => []);
  for (const row of rows) {
    const values: CellValue[] = [
      date,
      row.symbol.toUpperCase(),
      row.name?.trim() ?? '',
      parseAnnouncementTime(row.time),
      parseCurrency(row.eps),
      parseCurrency(row.epsForecast),
      parsePercentage(row.surprise),
      parseMarketCap(row.marketCap),
      textOf(row.fiscalQuarterEnding),
      parseCount(row.noOfEsts)
    ];
    values.forEach((value, index) => columns[index]?.push(value));
  }

  return createTable('earnings', columns);
}
