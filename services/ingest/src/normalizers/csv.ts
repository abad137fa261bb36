import Papa from 'papaparse';

import { SchemaMismatchError } from '../errors';
import { columnNames, type ColumnDefinition, type ColumnSpec } from '../datasets/schemas';
import { checkCell, type CellValue } from '../datasets/table';

const INTEGER_TEXT = /^[-+]?\d+$/;
const FLOAT_TEXT = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

export function parseCell(column: ColumnDefinition, raw: string): CellValue | undefined {
  const text = raw.trim();
  if (text === '') {
    return null;
  }
  switch (column.type) {
    case 'string':
      return text;
    case 'float64':
      return FLOAT_TEXT.test(text) ? Number(text) : undefined;
    case 'int16':
    case 'int32':
    case 'int64':
      return INTEGER_TEXT.test(text) ? Number(text) : undefined;
  }
}

export interface ParsedCsv {
  /** Column-major values in schema order. */
  columns: CellValue[][];
  rowCount: number;
}

/**
 * Parses CSV text whose header must list exactly the schema's columns in
 * order. Cells are converted to the column's primitive type; anything that
 * does not convert cleanly is a SchemaMismatchError naming row and column.
 */
export function parseStrictCsv(body: string, schema: ColumnSpec, context: Record<string, unknown> = {}): ParsedCsv {
  const columns: CellValue[][] = schema.map(() => []);
  if (body.trim() === '') {
    return { columns, rowCount: 0 };
  }

  const parsed = Papa.parse<string[]>(body, { header: false, skipEmptyLines: true });
  const [fatal] = parsed.errors;
  if (fatal) {
    throw new SchemaMismatchError(`CSV payload could not be parsed: ${fatal.message}`, {
      ...context,
      row: fatal.row
    });
  }

  const [header, ...rows] = parsed.data;
  const expected = columnNames(schema);
  const received = (header ?? []).map((name) => name.trim());
  if (received.length !== expected.length || received.some((name, index) => name !== expected[index])) {
    throw new SchemaMismatchError(`CSV header does not match schema: got [${received.join(', ')}]`, {
      ...context,
      expected,
      received
    });
  }

  rows.forEach((cells, rowIndex) => {
    if (cells.length !== schema.length) {
      throw new SchemaMismatchError(`Row ${rowIndex} has ${cells.length} cells, expected ${schema.length}`, {
        ...context,
        row: rowIndex
      });
    }
    schema.forEach((definition, columnIndex) => {
      const raw = cells[columnIndex] ?? '';
      const value = parseCell(definition, raw);
      const problem = value === undefined ? `cannot read ${JSON.stringify(raw)} as ${definition.type}` : checkCell(definition, value);
      if (problem !== null || value === undefined) {
        throw new SchemaMismatchError(`Row ${rowIndex} column ${definition.name}: ${problem ?? 'invalid value'}`, {
          ...context,
          row: rowIndex,
          column: definition.name
        });
      }
      columns[columnIndex]?.push(value);
    });
  });

  return { columns, rowCount: rows.length };
}
