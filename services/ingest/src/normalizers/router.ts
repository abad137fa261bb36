import { UnknownDatasetKindError } from '../errors';
import { isDatasetKind, type DatasetKind } from '../datasets/kinds';
import type { CanonicalTable } from '../datasets/table';
import type { RawPayload } from '../provider/types';
import { normalizeEarningsPayload } from './earnings';
import { normalizeOptionPayload, normalizeStockPayload } from './theta';

export type Normalizer = (payload: RawPayload) => CanonicalTable;

const NORMALIZERS: Readonly<Record<DatasetKind, Normalizer>> = Object.freeze({
  'option-quote': (payload) => normalizeOptionPayload(payload, 'option-quote'),
  'option-eod': (payload) => normalizeOptionPayload(payload, 'option-eod'),
  'stock-quote': (payload) => normalizeStockPayload(payload, 'stock-quote'),
  'stock-eod': (payload) => normalizeStockPayload(payload, 'stock-eod'),
  earnings: normalizeEarningsPayload
});

/** Parses a raw payload into the canonical table of `kind`. Pure. */
export function normalize(payload: RawPayload, kind: string): CanonicalTable {
  if (!isDatasetKind(kind)) {
    throw new UnknownDatasetKindError(kind);
  }
  return NORMALIZERS[kind](payload);
}
