import assert from 'node:assert/strict';
import { test } from 'node:test';

import { SchemaMismatchError } from '../src/errors';
import { decodePartition, encodePartition, PARTITION_FORMAT } from '../src/datasets/codec';
import { schemaFor } from '../src/datasets/schemas';
import { createTable, emptyTable } from '../src/datasets/table';

const stockQuote = () =>
  createTable('stock-quote', [[34_200_000], [10], [1], [100.5], [0], [12], [1], [100.75], [0], [20240102]]);

const encodeEnvelope = (envelope: unknown) => Buffer.from(JSON.stringify(envelope), 'utf8');

test('encoded partitions are self-describing and decode to the same table', () => {
  const table = stockQuote();
  const bytes = encodePartition(table);
  const envelope = JSON.parse(Buffer.from(bytes).toString('utf8'));

  assert.equal(envelope.format, PARTITION_FORMAT);
  assert.equal(envelope.kind, 'stock-quote');
  assert.equal(envelope.rowCount, 1);
  assert.equal(envelope.schema.length, 10);

  const decoded = decodePartition(bytes, 'stock-quote');
  assert.deepEqual(decoded.columns, table.columns);
  assert.equal(decoded.rowCount, 1);
  assert.equal(decodePartition(encodePartition(emptyTable('earnings')), 'earnings').rowCount, 0);
});

test('decodePartition rejects drifted schemas', () => {
  const table = stockQuote();
  const drifted = {
    format: PARTITION_FORMAT,
    kind: 'stock-quote',
    schema: schemaFor('stock-quote').map((column) => (column.name === 'ask' ? { ...column, nullable: true } : column)),
    rowCount: 1,
    columns: table.columns
  };

  assert.throws(
    () => decodePartition(encodeEnvelope(drifted), 'stock-quote', 'some/key/data.json'),
    (error: unknown) =>
      error instanceof SchemaMismatchError &&
      error.message === 'Schema for stock-quote drifted: column ask nullability is true, expected false'
  );
});

test('decodePartition rejects corrupt or mislabelled partitions', () => {
  assert.throws(() => decodePartition(Buffer.from('{"format":'), 'stock-quote'), /not valid JSON/);
  assert.throws(() => decodePartition(encodeEnvelope({ format: 'csv' }), 'stock-quote'), /envelope is malformed/);
  assert.throws(
    () => decodePartition(encodePartition(stockQuote()), 'stock-eod'),
    /Stored partition holds stock-quote, expected stock-eod/
  );

  const envelope = JSON.parse(Buffer.from(encodePartition(stockQuote())).toString('utf8'));
  assert.throws(
    () => decodePartition(encodeEnvelope({ ...envelope, rowCount: 2 }), 'stock-quote'),
    /declares 2 rows but holds 1/
  );
  assert.throws(
    () => decodePartition(encodeEnvelope({ ...envelope, columns: [['x'], ...envelope.columns.slice(1)] }), 'stock-quote'),
    /Row 0 column ms_of_day/
  );
});
