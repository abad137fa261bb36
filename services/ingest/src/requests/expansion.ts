import { EmptyExpansionError } from '../errors';
import { endpointOf, underlyingKindOf, type DatasetKind, type MarketDatasetKind } from '../datasets/kinds';
import { toIsoDate, tradingDaysBetween } from '../partitions/calendar';
import { keyForDay, resolveRange } from '../partitions/keys';
import { addressOf, type LogicalRequest, type MarketRequest, type OptionRequest } from './logicalRequest';

export type SubRequestLeg = 'stock' | 'option' | 'earnings';
export type PayloadFormat = 'csv' | 'json';

export interface SubRequest {
  readonly id: string;
  readonly jobKey: string;
  readonly slot: number;
  /** Dataset kind of the partition this sub-request fills. */
  readonly kind: DatasetKind;
  readonly leg: SubRequestLeg;
  readonly symbol: string | null;
  readonly tradeDate: number;
  readonly url: string;
  readonly format: PayloadFormat;
  readonly headers: Readonly<Record<string, string>>;
}

export interface PartitionPlan {
  readonly key: string;
  readonly kind: DatasetKind;
  readonly subRequests: readonly SubRequest[];
}

export interface ExpansionEndpoints {
  thetaBaseUrl: string;
  earningsBaseUrl: string;
}

const STANDARD_INTERVALS = new Set([60_000, 3_600_000]);

export function isStandardInterval(intervalMs: number): boolean {
  return STANDARD_INTERVALS.has(intervalMs);
}

export const EARNINGS_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  accept: 'application/json, text/plain, */*',
  'accept-language': 'en-US,en;q=0.9',
  origin: 'https://www.nasdaq.com',
  referer: 'https://www.nasdaq.com/',
  'user-agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
});

const NO_HEADERS: Readonly<Record<string, string>> = Object.freeze({});

type DraftSubRequest = Omit<SubRequest, 'id' | 'jobKey' | 'slot'>;

function withQuery(base: string, params: Array<[string, string]>): string {
  return `${base}?${new URLSearchParams(params).toString()}`;
}

function stockLeg(request: MarketRequest, stockKind: MarketDatasetKind, day: number, baseUrl: string): DraftSubRequest {
  const endpoint = endpointOf(stockKind);
  const params: Array<[string, string]> = [
    ['root', request.symbol],
    ['start_date', day.toString()],
    ['end_date', day.toString()],
    ['use_csv', 'true']
  ];
  if (endpoint === 'quote') {
    params.push(['ivl', request.interval.toString()]);
  }
  return {
    kind: request.kind,
    leg: 'stock',
    symbol: request.symbol,
    tradeDate: day,
    url: withQuery(`${baseUrl}/hist/stock/${endpoint}`, params),
    format: 'csv',
    headers: NO_HEADERS
  };
}

function optionLeg(request: OptionRequest, day: number, baseUrl: string): DraftSubRequest {
  const endpoint = endpointOf(request.kind);
  const params: Array<[string, string]> = [
    ['root', request.symbol],
    ['exp', request.expiration.toString()],
    ['start_date', day.toString()],
    ['end_date', day.toString()],
    ['use_csv', 'true']
  ];
  if (endpoint === 'quote') {
    params.push(['ivl', request.interval.toString()]);
  }
  return {
    kind: request.kind,
    leg: 'option',
    symbol: request.symbol,
    tradeDate: day,
    url: withQuery(`${baseUrl}/bulk_hist/option/${endpoint}`, params),
    format: 'csv',
    headers: NO_HEADERS
  };
}

function earningsLeg(day: number, baseUrl: string): DraftSubRequest {
  return {
    kind: 'earnings',
    leg: 'earnings',
    symbol: null,
    tradeDate: day,
    url: withQuery(`${baseUrl}/api/calendar/earnings`, [['date', toIsoDate(day)]]),
    format: 'json',
    headers: EARNINGS_HEADERS
  };
}

function draftsFor(request: LogicalRequest, days: number[], endpoints: ExpansionEndpoints): DraftSubRequest[] {
  switch (request.kind) {
    case 'earnings':
      return days.map((day) => earningsLeg(day, endpoints.earningsBaseUrl));
    case 'stock-quote':
    case 'stock-eod': {
      const stock = request;
      return days.map((day) => stockLeg(stock, stock.kind, day, endpoints.thetaBaseUrl));
    }
    case 'option-quote':
    case 'option-eod': {
      // Underlying bars first, then the option chain, day by day within each leg.
      const option = request;
      const underlying = underlyingKindOf(option.kind);
      return [
        ...days.map((day) => stockLeg(option, underlying, day, endpoints.thetaBaseUrl)),
        ...days.map((day) => optionLeg(option, day, endpoints.thetaBaseUrl))
      ];
    }
  }
}

/**
 * Expands a write request into one plan per partition key, each carrying its
 * slot-numbered sub-requests. Performs no I/O.
 */
export function expandRequest(request: LogicalRequest, endpoints: ExpansionEndpoints): PartitionPlan[] {
  const selection = resolveRange(request, { allowAll: false });
  const address = addressOf(request);
  const daysByKey = new Map<string, number[]>();
  for (const day of tradingDaysBetween(selection.start, selection.end)) {
    const key = keyForDay(address, day);
    const bucket = daysByKey.get(key);
    if (bucket) {
      bucket.push(day);
    } else {
      daysByKey.set(key, [day]);
    }
  }

  const plans: PartitionPlan[] = [];
  for (const [key, days] of daysByKey) {
    const subRequests = draftsFor(request, days, endpoints).map((draft, slot) =>
      Object.freeze({ ...draft, id: `${key}#${slot}`, jobKey: key, slot })
    );
    plans.push(Object.freeze({ key, kind: request.kind, subRequests: Object.freeze(subRequests) }));
  }

  if (plans.length === 0) {
    throw new EmptyExpansionError(
      `No trading days between ${selection.start} and ${selection.end}; nothing to fetch`
    );
  }
  return plans;
}
