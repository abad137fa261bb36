import type { DatasetKind } from './kinds';

export type ColumnType = 'int16' | 'int32' | 'int64' | 'float64' | 'string';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: ColumnType;
  readonly nullable: boolean;
}

export type ColumnSpec = readonly ColumnDefinition[];

function column(name: string, type: ColumnType, nullable = false): ColumnDefinition {
  return Object.freeze({ name, type, nullable });
}

const QUOTE_COLUMNS: ColumnDefinition[] = [
  column('ms_of_day', 'int64'),
  column('bid_size', 'int32'),
  column('bid_exchange', 'int16'),
  column('bid', 'float64'),
  column('bid_condition', 'int16'),
  column('ask_size', 'int32'),
  column('ask_exchange', 'int16'),
  column('ask', 'float64'),
  column('ask_condition', 'int16'),
  column('date', 'int32')
];

// End-of-day bars carry the closing quote after the OHLC block.
const EOD_COLUMNS: ColumnDefinition[] = [
  column('ms_of_day', 'int64'),
  column('ms_of_day_2', 'int64'),
  column('open', 'float64'),
  column('high', 'float64'),
  column('low', 'float64'),
  column('close', 'float64'),
  column('volume', 'int64'),
  column('count', 'int64'),
  ...QUOTE_COLUMNS.slice(1, -1),
  column('date', 'int32')
];

const CONTRACT_COLUMNS: ColumnDefinition[] = [
  column('root', 'string'),
  column('expiration', 'int32'),
  column('strike', 'int64', true),
  column('right', 'string', true)
];

const EARNINGS_COLUMNS: ColumnDefinition[] = [
  column('date', 'string'),
  column('symbol', 'string'),
  column('name', 'string'),
  column('time', 'string', true),
  column('eps', 'float64', true),
  column('eps_forecast', 'float64', true),
  column('surprise_pct', 'float64', true),
  column('market_cap', 'int64', true),
  column('fiscal_quarter_ending', 'string', true),
  column('num_estimates', 'int64', true)
];

const SCHEMA_REGISTRY: Readonly<Record<DatasetKind, ColumnSpec>> = Object.freeze({
  'stock-quote': Object.freeze([...QUOTE_COLUMNS]),
  'stock-eod': Object.freeze([...EOD_COLUMNS]),
  'option-quote': Object.freeze([...CONTRACT_COLUMNS, ...QUOTE_COLUMNS]),
  'option-eod': Object.freeze([...CONTRACT_COLUMNS, ...EOD_COLUMNS]),
  earnings: Object.freeze([...EARNINGS_COLUMNS])
});

export function schemaFor(kind: DatasetKind): ColumnSpec {
  return SCHEMA_REGISTRY[kind];
}

export function columnNames(schema: ColumnSpec): string[] {
  return schema.map((entry) => entry.name);
}

export function schemasEqual(left: ColumnSpec, right: ColumnSpec): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((entry, index) => {
    const other = right[index];
    return (
      other !== undefined &&
      entry.name === other.name &&
      entry.type === other.type &&
      entry.nullable === other.nullable
    );
  });
}

/** Human-readable description of the first difference, or null when equal. */
export function describeSchemaDifference(expected: ColumnSpec, actual: ColumnSpec): string | null {
  const length = Math.max(expected.length, actual.length);
  for (let index = 0; index < length; index += 1) {
    const want = expected[index];
    const got = actual[index];
    if (!want) {
      return `unexpected column ${got?.name ?? '?'} at position ${index}`;
    }
    if (!got) {
      return `missing column ${want.name} at position ${index}`;
    }
    if (want.name !== got.name) {
      return `column ${index} is ${got.name}, expected ${want.name}`;
    }
    if (want.type !== got.type) {
      return `column ${want.name} has type ${got.type}, expected ${want.type}`;
    }
    if (want.nullable !== got.nullable) {
      return `column ${want.name} nullability is ${got.nullable}, expected ${want.nullable}`;
    }
  }
  return null;
}
