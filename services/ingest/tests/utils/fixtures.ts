import pino from 'pino';

import type { ServiceConfig } from '../../src/config/serviceConfig';
import { columnNames, schemaFor } from '../../src/datasets/schemas';
import type { DatasetKind } from '../../src/datasets/kinds';
import type { RawPayload } from '../../src/provider/types';
import type { SubRequest } from '../../src/requests/expansion';

export const THETA_BASE_URL = 'http://theta.test/v2';
export const EARNINGS_BASE_URL = 'http://earnings.test';

export const endpoints = { thetaBaseUrl: THETA_BASE_URL, earningsBaseUrl: EARNINGS_BASE_URL };

export const silentLogger = () => pino({ level: 'silent' });

export function csvHeader(kind: DatasetKind): string {
  return columnNames(schemaFor(kind)).join(',');
}

/** One stock quote row: 09:30 bid 100.5 x 10, ask 100.75 x 12. */
export function stockQuoteRow(date: number, msOfDay = 34_200_000): string {
  return `${msOfDay},10,1,100.5,0,12,1,100.75,0,${date}`;
}

export function stockEodRow(date: number): string {
  return `57600000,57600000,100,101.5,99.25,101,125000,340,10,1,100.95,0,12,1,101.05,0,${date}`;
}

export function optionQuoteRow(date: number, strike: number, right: 'C' | 'P'): string {
  return `SPY,20240119,${strike},${right},${stockQuoteRow(date)}`;
}

export function stockQuoteCsv(date: number, rows = 1): string {
  const lines = [csvHeader('stock-quote')];
  for (let index = 0; index < rows; index += 1) {
    lines.push(stockQuoteRow(date, 34_200_000 + index * 3_600_000));
  }
  return `${lines.join('\n')}\n`;
}

export function payloadFor(subRequest: SubRequest, body: string, noData = false): RawPayload {
  return { subRequest, format: subRequest.format, contentType: 'text/csv', body, noData };
}

export function makeSubRequest(overrides: Partial<SubRequest> = {}): SubRequest {
  return {
    id: 'historical-stock/quote/monthly/1h/AAPL/2024/01/data.json#0',
    jobKey: 'historical-stock/quote/monthly/1h/AAPL/2024/01/data.json',
    slot: 0,
    kind: 'stock-quote',
    leg: 'stock',
    symbol: 'AAPL',
    tradeDate: 20240102,
    url: `${THETA_BASE_URL}/hist/stock/quote?root=AAPL&start_date=20240102&end_date=20240102&use_csv=true&ivl=3600000`,
    format: 'csv',
    headers: {},
    ...overrides
  };
}

export function makeConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    metricsEnabled: true,
    thetaBaseUrl: THETA_BASE_URL,
    earningsBaseUrl: EARNINGS_BASE_URL,
    httpTimeoutMs: 1_000,
    fetchMaxAttempts: 2,
    backoff: { baseMs: 1, factor: 1, maxMs: 1, jitterRatio: 0 },
    maxWorkers: 2,
    readiness: { symbol: 'AAPL', timeoutMs: 100 },
    s3: {
      endpoint: 'http://127.0.0.1:9000',
      region: 'us-east-1',
      bucket: 'marketlake-test',
      accessKeyId: null,
      secretAccessKey: null,
      forcePathStyle: true
    },
    jobRetentionMs: 60_000,
    ...overrides
  };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
