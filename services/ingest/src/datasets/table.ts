import { SchemaMismatchError } from '../errors';
import type { DatasetKind } from './kinds';
import { describeSchemaDifference, schemaFor, type ColumnDefinition, type ColumnSpec } from './schemas';

export type CellValue = number | string | null;

export interface CanonicalTable {
  readonly kind: DatasetKind;
  readonly schema: ColumnSpec;
  readonly rowCount: number;
  readonly columns: readonly (readonly CellValue[])[];
}

export type TableRecord = Record<string, CellValue>;

const INTEGER_BOUNDS: Record<'int16' | 'int32' | 'int64', [number, number]> = {
  int16: [-32_768, 32_767],
  int32: [-2_147_483_648, 2_147_483_647],
  int64: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER]
};

/** Returns a reason when `value` is not a valid cell for `column`. */
export function checkCell(column: ColumnDefinition, value: CellValue): string | null {
  if (value === null) {
    return column.nullable ? null : 'null in non-nullable column';
  }

  switch (column.type) {
    case 'string':
      return typeof value === 'string' ? null : `expected string, got ${typeof value}`;
    case 'float64':
      if (typeof value !== 'number') {
        return `expected float64, got ${typeof value}`;
      }
      return Number.isFinite(value) ? null : 'float64 must be finite';
    case 'int16':
    case 'int32':
    case 'int64': {
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        return `expected ${column.type}, got ${JSON.stringify(value)}`;
      }
      const [min, max] = INTEGER_BOUNDS[column.type];
      return value >= min && value <= max ? null : `${value} does not fit ${column.type}`;
    }
  }
}

function freezeTable(kind: DatasetKind, columns: CellValue[][]): CanonicalTable {
  const schema = schemaFor(kind);
  return Object.freeze({
    kind,
    schema,
    rowCount: columns[0]?.length ?? 0,
    columns: Object.freeze(columns.map((values) => Object.freeze(values)))
  });
}

export function emptyTable(kind: DatasetKind): CanonicalTable {
  return freezeTable(
    kind,
    schemaFor(kind).map(() => [])
  );
}

/**
 * Builds a table from column-major values, checking every cell against the
 * registry schema of `kind`.
 */
export function createTable(kind: DatasetKind, columns: CellValue[][]): CanonicalTable {
  const schema = schemaFor(kind);
  if (columns.length !== schema.length) {
    throw new SchemaMismatchError(`Expected ${schema.length} columns for ${kind}, received ${columns.length}`, {
      kind,
      expected: schema.length,
      received: columns.length
    });
  }

  const rowCount = columns[0]?.length ?? 0;
  schema.forEach((definition, columnIndex) => {
    const values = columns[columnIndex] ?? [];
    if (values.length !== rowCount) {
      throw new SchemaMismatchError(`Column ${definition.name} has ${values.length} values, expected ${rowCount}`, {
        kind,
        column: definition.name
      });
    }
    values.forEach((value, rowIndex) => {
      const problem = checkCell(definition, value);
      if (problem) {
        throw new SchemaMismatchError(`Row ${rowIndex} column ${definition.name}: ${problem}`, {
          kind,
          row: rowIndex,
          column: definition.name
        });
      }
    });
  });

  return freezeTable(kind, columns);
}

export function assertSchema(kind: DatasetKind, actual: ColumnSpec, context: Record<string, unknown> = {}): void {
  const difference = describeSchemaDifference(schemaFor(kind), actual);
  if (difference) {
    throw new SchemaMismatchError(`Schema for ${kind} drifted: ${difference}`, { ...context, kind, difference });
  }
}

/** Concatenates tables in the order given. */
export function concatTables(kind: DatasetKind, tables: readonly CanonicalTable[]): CanonicalTable {
  const schema = schemaFor(kind);
  const merged: CellValue[][] = schema.map(() => []);

  tables.forEach((table, index) => {
    assertSchema(kind, table.schema, { part: index });
    table.columns.forEach((values, columnIndex) => {
      const target = merged[columnIndex];
      if (target) {
        for (const value of values) {
          target.push(value);
        }
      }
    });
  });

  return freezeTable(kind, merged);
}

export function tableToRecords(table: CanonicalTable): TableRecord[] {
  const records: TableRecord[] = [];
  for (let row = 0; row < table.rowCount; row += 1) {
    const record: TableRecord = {};
    table.schema.forEach((definition, columnIndex) => {
      record[definition.name] = table.columns[columnIndex]?.[row] ?? null;
    });
    records.push(record);
  }
  return records;
}

export function columnValues(table: CanonicalTable, name: string): readonly CellValue[] {
  const index = table.schema.findIndex((entry) => entry.name === name);
  if (index === -1) {
    throw new SchemaMismatchError(`Column ${name} is not part of ${table.kind}`, { kind: table.kind, column: name });
  }
  return table.columns[index] ?? [];
}
