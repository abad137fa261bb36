/**
 * Calendar arithmetic on integer dates (`YYYYMMDD`). All computations run in
 * UTC so results never depend on the host time zone.
 */

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

export interface YearMonth {
  year: number;
  month: number;
}

const DAY_MS = 86_400_000;

export function toDateInt(parts: DateParts): number {
  return parts.year * 10_000 + parts.month * 100 + parts.day;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Splits a `YYYYMMDD` integer; null when it is not a real calendar date. */
export function parseDateInt(value: number): DateParts | null {
  if (!Number.isInteger(value) || value < 10_000_101 || value > 99_991_231) {
    return null;
  }
  const year = Math.floor(value / 10_000);
  const month = Math.floor((value % 10_000) / 100);
  const day = value % 100;
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return { year, month, day };
}

export function parseYearMonthInt(value: number): YearMonth | null {
  if (!Number.isInteger(value) || value < 100_001 || value > 999_912) {
    return null;
  }
  const year = Math.floor(value / 100);
  const month = value % 100;
  if (month < 1 || month > 12) {
    return null;
  }
  return { year, month };
}

function toUtc(parts: DateParts): Date {
  return new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
}

function fromUtc(date: Date): DateParts {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
}

export function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

export function toIsoDate(value: number): string {
  const parts = parseDateInt(value);
  if (!parts) {
    throw new RangeError(`Invalid date ${value}`);
  }
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function monthLabel(value: YearMonth): string {
  return `${value.year}-${pad2(value.month)}`;
}

export function nextMonth(value: YearMonth): YearMonth {
  return value.month === 12 ? { year: value.year + 1, month: 1 } : { year: value.year, month: value.month + 1 };
}

function compareMonths(left: YearMonth, right: YearMonth): number {
  return left.year * 12 + left.month - (right.year * 12 + right.month);
}

/** Every month from `start` to `end` inclusive. */
export function monthsBetween(start: YearMonth, end: YearMonth): YearMonth[] {
  const months: YearMonth[] = [];
  for (let current = start; compareMonths(current, end) <= 0; current = nextMonth(current)) {
    months.push(current);
  }
  return months;
}

// weekday: 0 = Sunday ... 6 = Saturday
function nthWeekday(year: number, month: number, weekday: number, n: number): number {
  const first = new Date(Date.UTC(year, month - 1, 1)).getUTCDay();
  const day = 1 + ((weekday - first + 7) % 7) + (n - 1) * 7;
  return toDateInt({ year, month, day });
}

function lastWeekday(year: number, month: number, weekday: number): number {
  const lastDay = daysInMonth(year, month);
  const last = new Date(Date.UTC(year, month - 1, lastDay)).getUTCDay();
  return toDateInt({ year, month, day: lastDay - ((last - weekday + 7) % 7) });
}

function observed(year: number, month: number, day: number): number {
  const date = new Date(Date.UTC(year, month - 1, day));
  const weekday = date.getUTCDay();
  if (weekday === 6) {
    return toDateInt(fromUtc(new Date(date.getTime() - DAY_MS)));
  }
  if (weekday === 0) {
    return toDateInt(fromUtc(new Date(date.getTime() + DAY_MS)));
  }
  return toDateInt({ year, month, day });
}

const holidayCache = new Map<number, ReadonlySet<number>>();

export function usMarketHolidays(year: number): ReadonlySet<number> {
  const cached = holidayCache.get(year);
  if (cached) {
    return cached;
  }
  const holidays = new Set<number>([
    toDateInt({ year, month: 1, day: 1 }),
    nthWeekday(year, 1, 1, 3), // MLK Day
    nthWeekday(year, 2, 1, 3), // Presidents Day
    lastWeekday(year, 5, 1), // Memorial Day
    observed(year, 7, 4),
    nthWeekday(year, 9, 1, 1), // Labor Day
    nthWeekday(year, 11, 4, 4), // Thanksgiving
    observed(year, 12, 25)
  ]);
  holidayCache.set(year, holidays);
  return holidays;
}

export function isTradingDay(value: number): boolean {
  const parts = parseDateInt(value);
  if (!parts) {
    return false;
  }
  const weekday = toUtc(parts).getUTCDay();
  if (weekday === 0 || weekday === 6) {
    return false;
  }
  return !usMarketHolidays(parts.year).has(value);
}

export function tradingDaysBetween(start: number, end: number): number[] {
  const startParts = parseDateInt(start);
  const endParts = parseDateInt(end);
  if (!startParts || !endParts) {
    throw new RangeError(`Invalid date range ${start}..${end}`);
  }
  const days: number[] = [];
  const last = toUtc(endParts).getTime();
  for (let time = toUtc(startParts).getTime(); time <= last; time += DAY_MS) {
    const value = toDateInt(fromUtc(new Date(time)));
    if (isTradingDay(value)) {
      days.push(value);
    }
  }
  return days;
}

/** Trading days of the range keyed by `YYYY-MM`, months in ascending order. */
export function groupTradingDaysByMonth(start: number, end: number): Map<string, number[]> {
  const grouped = new Map<string, number[]>();
  for (const day of tradingDaysBetween(start, end)) {
    const label = monthLabel({ year: Math.floor(day / 10_000), month: Math.floor((day % 10_000) / 100) });
    const bucket = grouped.get(label);
    if (bucket) {
      bucket.push(day);
    } else {
      grouped.set(label, [day]);
    }
  }
  return grouped;
}

const INTERVAL_UNITS: ReadonlyArray<[number, string]> = [
  [DAY_MS, 'd'],
  [3_600_000, 'h'],
  [60_000, 'm'],
  [1_000, 's']
];

/** Largest unit that divides the interval exactly, else milliseconds; distinct intervals never share a label. */
export function formatIntervalLabel(intervalMs: number): string {
  if (intervalMs === 0) {
    return 'tick';
  }
  for (const [unitMs, suffix] of INTERVAL_UNITS) {
    if (intervalMs % unitMs === 0) {
      return `${intervalMs / unitMs}${suffix}`;
    }
  }
  return `${intervalMs}ms`;
}
