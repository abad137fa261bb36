import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setImmediate as tick } from 'node:timers/promises';

import { WorkerPool } from '../src/dispatch/workerPool';
import { deferred } from './utils/fixtures';

test('rejects pools without workers', () => {
  assert.throws(() => new WorkerPool({ maxWorkers: 0 }), RangeError);
  assert.throws(() => new WorkerPool({ maxWorkers: 1.5 }), RangeError);
});

test('runs at most maxWorkers tasks at once, in FIFO order', async () => {
  const depths: number[] = [];
  const pool = new WorkerPool({ maxWorkers: 2, onQueueDepth: (depth) => depths.push(depth) });
  const gates = Array.from({ length: 5 }, () => deferred<void>());
  const started: number[] = [];
  let peak = 0;

  const results = gates.map((gate, index) =>
    pool.run(async () => {
      started.push(index);
      peak = Math.max(peak, pool.activeCount);
      await gate.promise;
      return index;
    })
  );

  assert.equal(pool.activeCount, 2);
  assert.equal(pool.queuedCount, 3);
  assert.deepEqual(depths, [1, 0, 1, 0, 1, 2, 3]);

  await tick();
  assert.deepEqual(started, [0, 1]);

  gates[1]?.resolve();
  await tick();
  assert.deepEqual(started, [0, 1, 2]);

  gates[0]?.resolve();
  await tick();
  assert.deepEqual(started, [0, 1, 2, 3]);

  for (const gate of gates) {
    gate.resolve();
  }
  assert.deepEqual(await Promise.all(results), [0, 1, 2, 3, 4]);
  await pool.onIdle();

  assert.equal(peak, 2);
  assert.equal(pool.activeCount, 0);
  assert.equal(depths.at(-1), 0);
});

test('a failing task rejects only its own caller', async () => {
  const pool = new WorkerPool({ maxWorkers: 1 });

  const failing = pool.run(async () => {
    throw new Error('boom');
  });
  const throwing = pool.run((): Promise<string> => {
    throw new Error('sync boom');
  });
  const healthy = pool.run(async () => 'ok');

  await assert.rejects(failing, /boom/);
  await assert.rejects(throwing, /sync boom/);
  assert.equal(await healthy, 'ok');
  await pool.onIdle();
  assert.equal(pool.activeCount, 0);
});
