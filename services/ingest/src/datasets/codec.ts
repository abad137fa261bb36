import { z } from 'zod';

import { SchemaMismatchError } from '../errors';
import type { DatasetKind } from './kinds';
import type { ColumnSpec } from './schemas';
import { assertSchema, createTable, type CanonicalTable } from './table';

export const PARTITION_FORMAT = 'marketlake.columnar/v1';
export const PARTITION_CONTENT_TYPE = 'application/json';

const columnDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['int16', 'int32', 'int64', 'float64', 'string']),
  nullable: z.boolean()
});

const envelopeSchema = z.object({
  format: z.literal(PARTITION_FORMAT),
  kind: z.string(),
  schema: z.array(columnDefinitionSchema),
  rowCount: z.number().int().nonnegative(),
  columns: z.array(z.array(z.union([z.number(), z.string(), z.null()])))
});

export function encodePartition(table: CanonicalTable): Uint8Array {
  const envelope = {
    format: PARTITION_FORMAT,
    kind: table.kind,
    schema: table.schema,
    rowCount: table.rowCount,
    columns: table.columns
  };
  return Buffer.from(JSON.stringify(envelope), 'utf8');
}

/**
 * Decodes a stored partition and re-validates it against the registry, so a
 * partition written under another schema surfaces as a SchemaMismatchError.
 */
export function decodePartition(bytes: Uint8Array, expectedKind: DatasetKind, key?: string): CanonicalTable {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch (error) {
    throw new SchemaMismatchError('Stored partition is not valid JSON', {
      key,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaMismatchError('Stored partition envelope is malformed', {
      key,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const envelope = parsed.data;
  if (envelope.kind !== expectedKind) {
    throw new SchemaMismatchError(`Stored partition holds ${envelope.kind}, expected ${expectedKind}`, { key });
  }

  const storedSchema: ColumnSpec = envelope.schema;
  assertSchema(expectedKind, storedSchema, { key });

  const table = createTable(expectedKind, envelope.columns);
  if (table.rowCount !== envelope.rowCount) {
    throw new SchemaMismatchError(
      `Stored partition declares ${envelope.rowCount} rows but holds ${table.rowCount}`,
      { key }
    );
  }
  return table;
}
