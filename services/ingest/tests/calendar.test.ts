import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  daysInMonth,
  formatIntervalLabel,
  groupTradingDaysByMonth,
  isTradingDay,
  monthsBetween,
  parseDateInt,
  parseYearMonthInt,
  toIsoDate,
  tradingDaysBetween,
  usMarketHolidays
} from '../src/partitions/calendar';

test('parseDateInt accepts real dates only', () => {
  assert.deepEqual(parseDateInt(20240229), { year: 2024, month: 2, day: 29 });
  assert.equal(parseDateInt(20230229), null);
  assert.equal(parseDateInt(20241301), null);
  assert.equal(parseDateInt(202401), null);
  assert.deepEqual(parseYearMonthInt(202312), { year: 2023, month: 12 });
  assert.equal(parseYearMonthInt(202313), null);
  assert.equal(daysInMonth(2024, 2), 29);
  assert.equal(toIsoDate(20240105), '2024-01-05');
});

test('US market holidays for 2024', () => {
  const holidays = [...usMarketHolidays(2024)].sort((left, right) => left - right);
  assert.deepEqual(holidays, [20240101, 20240115, 20240219, 20240527, 20240704, 20240902, 20241128, 20241225]);
});

test('weekend holidays move to the observed weekday', () => {
  assert.ok(usMarketHolidays(2020).has(20200703));
  assert.ok(usMarketHolidays(2021).has(20210705));
  assert.ok(usMarketHolidays(2022).has(20221226));
  assert.equal(isTradingDay(20221226), false);
  assert.equal(isTradingDay(20221227), true);
});

test('trading days skip weekends and holidays', () => {
  assert.deepEqual(tradingDaysBetween(20231228, 20240103), [20231228, 20231229, 20240102, 20240103]);
  assert.equal(tradingDaysBetween(20240101, 20240131).length, 21);
  assert.equal(tradingDaysBetween(20231201, 20231231).length, 20);
  assert.deepEqual(tradingDaysBetween(20240106, 20240107), []);
});

test('groupTradingDaysByMonth keys by YYYY-MM in order', () => {
  const grouped = groupTradingDaysByMonth(20231228, 20240103);
  assert.deepEqual([...grouped.entries()], [
    ['2023-12', [20231228, 20231229]],
    ['2024-01', [20240102, 20240103]]
  ]);
});

test('monthsBetween carries December into January', () => {
  assert.deepEqual(monthsBetween({ year: 2023, month: 11 }, { year: 2024, month: 2 }), [
    { year: 2023, month: 11 },
    { year: 2023, month: 12 },
    { year: 2024, month: 1 },
    { year: 2024, month: 2 }
  ]);
});

test('formatIntervalLabel', () => {
  assert.equal(formatIntervalLabel(0), 'tick');
  assert.equal(formatIntervalLabel(1_000), '1s');
  assert.equal(formatIntervalLabel(60_000), '1m');
  assert.equal(formatIntervalLabel(900_000), '15m');
  assert.equal(formatIntervalLabel(3_600_000), '1h');
  assert.equal(formatIntervalLabel(86_400_000), '1d');
});

test('formatIntervalLabel keeps intervals that are not whole units distinct', () => {
  assert.equal(formatIntervalLabel(90_000), '90s');
  assert.equal(formatIntervalLabel(500), '500ms');
  assert.equal(formatIntervalLabel(1_500), '1500ms');
  assert.equal(formatIntervalLabel(5_400_000), '90m');
  assert.equal(formatIntervalLabel(172_800_000), '2d');
  assert.notEqual(formatIntervalLabel(90_000), formatIntervalLabel(60_000));
});
