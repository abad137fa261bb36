import { SchemaMismatchError } from '../errors';
import {
  underlyingKindOf,
  type OptionDatasetKind,
  type StockDatasetKind
} from '../datasets/kinds';
import { schemaFor } from '../datasets/schemas';
import { createTable, emptyTable, type CanonicalTable, type CellValue } from '../datasets/table';
import type { RawPayload } from '../provider/types';
import { parseStrictCsv } from './csv';

function isEmptyPayload(payload: RawPayload): boolean {
  return payload.noData || payload.body.trim() === '';
}

function contextOf(payload: RawPayload): Record<string, unknown> {
  return {
    subRequestId: payload.subRequest.id,
    leg: payload.subRequest.leg,
    tradeDate: payload.subRequest.tradeDate
  };
}

export function normalizeStockPayload(payload: RawPayload, kind: StockDatasetKind): CanonicalTable {
  if (isEmptyPayload(payload)) {
    return emptyTable(kind);
  }
  const parsed = parseStrictCsv(payload.body, schemaFor(kind), contextOf(payload));
  return createTable(kind, parsed.columns);
}

/**
 * Option partitions hold two legs: the option chain itself and the
 * underlying's bars. Underlying rows are widened with contract columns that
 * identify them (`root` = symbol, `expiration` = 0, no strike or right).
 */
export function normalizeOptionPayload(payload: RawPayload, kind: OptionDatasetKind): CanonicalTable {
  if (isEmptyPayload(payload)) {
    return emptyTable(kind);
  }

  if (payload.subRequest.leg === 'option') {
    const parsed = parseStrictCsv(payload.body, schemaFor(kind), contextOf(payload));
    return createTable(kind, parsed.columns);
  }

  if (payload.subRequest.leg !== 'stock') {
    throw new SchemaMismatchError(`Option partitions cannot hold ${payload.subRequest.leg} payloads`, contextOf(payload));
  }

  const symbol = payload.subRequest.symbol;
  if (!symbol) {
    throw new SchemaMismatchError('Underlying payload carries no symbol', contextOf(payload));
  }

  const parsed = parseStrictCsv(payload.body, schemaFor(underlyingKindOf(kind)), contextOf(payload));
  const repeat = (value: CellValue): CellValue[] => Array.from({ length: parsed.rowCount }, () => value);
  return createTable(kind, [repeat(symbol), repeat(0), repeat(null), repeat(null), ...parsed.columns]);
}
