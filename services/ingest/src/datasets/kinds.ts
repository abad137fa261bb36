import { z } from 'zod';

export const DATASET_KINDS = ['option-quote', 'option-eod', 'stock-quote', 'stock-eod', 'earnings'] as const;

export const datasetKindSchema = z.enum(DATASET_KINDS);

export type DatasetKind = z.infer<typeof datasetKindSchema>;

export type MarketDatasetKind = Exclude<DatasetKind, 'earnings'>;
export type OptionDatasetKind = Extract<DatasetKind, `option-${string}`>;
export type StockDatasetKind = Extract<DatasetKind, `stock-${string}`>;

export type Endpoint = 'quote' | 'eod';

export function isDatasetKind(value: unknown): value is DatasetKind {
  return datasetKindSchema.safeParse(value).success;
}

export function isOptionKind(kind: DatasetKind): kind is OptionDatasetKind {
  return kind === 'option-quote' || kind === 'option-eod';
}

export function isStockKind(kind: DatasetKind): kind is StockDatasetKind {
  return kind === 'stock-quote' || kind === 'stock-eod';
}

export function endpointOf(kind: MarketDatasetKind): Endpoint {
  return kind.endsWith('-eod') ? 'eod' : 'quote';
}

/** The stock series fetched alongside an option series for its underlying. */
export function underlyingKindOf(kind: OptionDatasetKind): StockDatasetKind {
  return kind === 'option-eod' ? 'stock-eod' : 'stock-quote';
}
