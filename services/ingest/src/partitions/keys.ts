import { InvalidRangeError } from '../errors';
import { endpointOf, isOptionKind, type DatasetKind, type Endpoint } from '../datasets/kinds';
import {
  daysInMonth,
  formatIntervalLabel,
  monthsBetween,
  pad2,
  parseDateInt,
  parseYearMonthInt,
  toDateInt,
  tradingDaysBetween,
  type YearMonth
} from './calendar';

export type Granularity = 'monthly' | 'daily';
export type PartitionFamily = 'historical-options' | 'historical-stock' | 'earnings';

export const PARTITION_FILE = 'data.json';

export interface PartitionAddress {
  kind: DatasetKind;
  /** Upper-case ticker; ignored for earnings. */
  symbol: string | null;
  granularity: Granularity;
  intervalMs: number;
  /** Option expiration filter as `YYYYMMDD`; 0 or absent means every expiration. */
  expiration?: number;
}

/** Inclusive `YYYYMMDD` bounds. */
export interface DateRange {
  start: number;
  end: number;
}

export type RangeSelection = ({ mode: 'range' } & DateRange) | { mode: 'all' };

export interface PartitionPeriod {
  year: number;
  month: number;
  day?: number;
}

export interface ParsedPartitionKey {
  family: PartitionFamily;
  kind: DatasetKind;
  endpoint: Endpoint | null;
  granularity: Granularity;
  interval: string | null;
  symbol: string | null;
  /** Option kinds only; 0 for the all-expirations partition. */
  expiration: number | null;
  year: number;
  month: number;
  day: number | null;
}

export function familyOf(kind: DatasetKind): PartitionFamily {
  if (kind === 'earnings') {
    return 'earnings';
  }
  return isOptionKind(kind) ? 'historical-options' : 'historical-stock';
}

export function intervalLabelFor(address: PartitionAddress): string {
  if (address.kind === 'earnings' || endpointOf(address.kind) === 'eod') {
    return '1d';
  }
  return formatIntervalLabel(address.intervalMs);
}

function effectiveGranularity(address: PartitionAddress): Granularity {
  return address.kind === 'earnings' ? 'monthly' : address.granularity;
}

function requireSymbol(address: PartitionAddress): string {
  if (!address.symbol) {
    throw new InvalidRangeError(`A symbol is required to address ${address.kind} partitions`);
  }
  return address.symbol;
}

export function expirationSegment(expiration: number | undefined): string {
  return expiration ? `exp-${expiration}` : 'exp-all';
}

function addressPrefix(address: PartitionAddress): string[] {
  if (address.kind === 'earnings') {
    return ['earnings'];
  }
  const segments = [
    familyOf(address.kind),
    endpointOf(address.kind),
    effectiveGranularity(address),
    intervalLabelFor(address),
    requireSymbol(address)
  ];
  if (isOptionKind(address.kind)) {
    segments.push(expirationSegment(address.expiration));
  }
  return segments;
}

export function partitionKey(address: PartitionAddress, period: PartitionPeriod): string {
  const segments = [...addressPrefix(address), period.year.toString(), pad2(period.month)];
  if (effectiveGranularity(address) === 'daily') {
    if (period.day === undefined) {
      throw new InvalidRangeError('Daily partitions need a day');
    }
    segments.push(pad2(period.day));
  }
  segments.push(PARTITION_FILE);
  return segments.join('/');
}

function yearMonthOf(value: number): YearMonth {
  return { year: Math.floor(value / 10_000), month: Math.floor((value % 10_000) / 100) };
}

/** Partition keys covering the range, ascending by time. */
export function keysFor(address: PartitionAddress, range: DateRange): string[] {
  if (effectiveGranularity(address) === 'daily') {
    return tradingDaysBetween(range.start, range.end).map((day) => keyForDay(address, day));
  }
  return monthsBetween(yearMonthOf(range.start), yearMonthOf(range.end)).map((month) => partitionKey(address, month));
}

/** Key of the partition a given trading day lands in. */
export function keyForDay(address: PartitionAddress, day: number): string {
  return partitionKey(address, {
    year: Math.floor(day / 10_000),
    month: Math.floor((day % 10_000) / 100),
    day: day % 100
  });
}

export function wildcardPattern(address: PartitionAddress): string {
  const depth = effectiveGranularity(address) === 'daily' ? 3 : 2;
  return [...addressPrefix(address), ...Array.from({ length: depth }, () => '*'), PARTITION_FILE].join('/');
}

export function patternsFor(address: PartitionAddress, selection: RangeSelection): string[] {
  if (selection.mode === 'all') {
    return [wildcardPattern(address)];
  }
  return keysFor(address, selection);
}

/** `*` matches exactly one path segment. */
export function matchesPattern(pattern: string, key: string): boolean {
  const patternSegments = pattern.split('/');
  const keySegments = key.split('/');
  if (patternSegments.length !== keySegments.length) {
    return false;
  }
  return patternSegments.every((segment, index) => segment === '*' || segment === keySegments[index]);
}

/** The literal prefix of a pattern, up to its first wildcard segment. */
export function patternPrefix(pattern: string): string {
  const segments = pattern.split('/');
  const wildcard = segments.indexOf('*');
  if (wildcard === -1) {
    return pattern;
  }
  return `${segments.slice(0, wildcard).join('/')}/`;
}

const SYMBOL_SEGMENT = /^[A-Z0-9.]{1,16}$/;
const INTERVAL_SEGMENT = /^(?:tick|\d+(?:ms|[smhd]))$/;
const EXPIRATION_SEGMENT = /^exp-(?:all|(\d{8}))$/;

function parseNumberSegment(value: string | undefined, width: number): number | null {
  if (value === undefined || value.length !== width || !/^\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

function parsePeriod(
  segments: string[],
  granularity: Granularity
): { year: number; month: number; day: number | null } | null {
  const expected = granularity === 'daily' ? 4 : 3;
  if (segments.length !== expected || segments[segments.length - 1] !== PARTITION_FILE) {
    return null;
  }
  const year = parseNumberSegment(segments[0], 4);
  const month = parseNumberSegment(segments[1], 2);
  if (year === null || month === null || !parseYearMonthInt(year * 100 + month)) {
    return null;
  }
  if (granularity === 'monthly') {
    return { year, month, day: null };
  }
  const day = parseNumberSegment(segments[2], 2);
  if (day === null || !parseDateInt(toDateInt({ year, month, day }))) {
    return null;
  }
  return { year, month, day };
}

/** Inverse of {@link partitionKey}; null when `key` is not a partition key. */
export function parsePartitionKey(key: string): ParsedPartitionKey | null {
  const segments = key.split('/');

  if (segments[0] === 'earnings') {
    const period = parsePeriod(segments.slice(1), 'monthly');
    if (!period) {
      return null;
    }
    return {
      family: 'earnings',
      kind: 'earnings',
      endpoint: null,
      granularity: 'monthly',
      interval: null,
      symbol: null,
      expiration: null,
      ...period
    };
  }

  const [family, endpoint, granularity, interval, symbol, ...rest] = segments;
  if (family !== 'historical-options' && family !== 'historical-stock') {
    return null;
  }
  if (endpoint !== 'quote' && endpoint !== 'eod') {
    return null;
  }
  if (granularity !== 'monthly' && granularity !== 'daily') {
    return null;
  }
  if (interval === undefined || !INTERVAL_SEGMENT.test(interval)) {
    return null;
  }
  if (symbol === undefined || !SYMBOL_SEGMENT.test(symbol)) {
    return null;
  }

  let expiration: number | null = null;
  if (family === 'historical-options') {
    const match = EXPIRATION_SEGMENT.exec(rest.shift() ?? '');
    if (!match) {
      return null;
    }
    expiration = match[1] === undefined ? 0 : Number.parseInt(match[1], 10);
    if (expiration !== 0 && !parseDateInt(expiration)) {
      return null;
    }
  }

  const period = parsePeriod(rest, granularity);
  if (!period) {
    return null;
  }

  const kind: DatasetKind =
    family === 'historical-options'
      ? endpoint === 'eod'
        ? 'option-eod'
        : 'option-quote'
      : endpoint === 'eod'
        ? 'stock-eod'
        : 'stock-quote';

  return { family, kind, endpoint, granularity, interval, symbol, expiration, ...period };
}

export interface RangeBounds {
  start?: number;
  end?: number;
  all?: boolean;
}

function resolveBound(value: number, edge: 'start' | 'end'): number {
  const digits = value.toString().length;
  if (digits === 8) {
    if (!parseDateInt(value)) {
      throw new InvalidRangeError(`${edge} ${value} is not a valid YYYYMMDD date`);
    }
    return value;
  }
  if (digits === 6) {
    const month = parseYearMonthInt(value);
    if (!month) {
      throw new InvalidRangeError(`${edge} ${value} is not a valid YYYYMM month`);
    }
    const day = edge === 'start' ? 1 : daysInMonth(month.year, month.month);
    return toDateInt({ ...month, day });
  }
  throw new InvalidRangeError(`${edge} ${value} must be a YYYYMM or YYYYMMDD integer`);
}

/**
 * Turns request bounds into a concrete selection. A missing end means the
 * same period as the start. `all` is accepted only when `allowAll` is set.
 */
export function resolveRange(bounds: RangeBounds, options: { allowAll: false }): { mode: 'range' } & DateRange;
export function resolveRange(bounds: RangeBounds, options: { allowAll: boolean }): RangeSelection;
export function resolveRange(bounds: RangeBounds, options: { allowAll: boolean }): RangeSelection {
  if (bounds.all) {
    if (!options.allowAll) {
      throw new InvalidRangeError('The "all" selector is only valid for retrieval');
    }
    return { mode: 'all' };
  }
  if (bounds.start === undefined) {
    throw new InvalidRangeError('A start date or the "all" selector is required');
  }

  const start = resolveBound(bounds.start, 'start');
  const end = resolveBound(bounds.end ?? bounds.start, 'end');
  if (end < start) {
    throw new InvalidRangeError(`end ${bounds.end ?? end} is before start ${bounds.start}`);
  }
  return { mode: 'range', start, end };
}
