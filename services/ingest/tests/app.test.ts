import assert from 'node:assert/strict';
import { test, type TestContext } from 'node:test';

import { createApp } from '../src/app';
import type { ServiceConfig } from '../src/config/serviceConfig';
import { FakeProvider, StaticReadiness, type FakeResponder } from './utils/fakeProvider';
import { deferred, makeConfig, payloadFor, silentLogger, stockQuoteCsv } from './utils/fixtures';
import { InMemoryObjectStore } from './utils/inMemoryS3';

const JANUARY_KEY = 'historical-stock/quote/monthly/1h/AAPL/2024/01/data.json';

async function buildApp(
  t: TestContext,
  options: { responder?: FakeResponder; ready?: boolean; config?: Partial<ServiceConfig> } = {}
) {
  const store = new InMemoryObjectStore();
  const readiness = new StaticReadiness(options.ready ?? true);
  const provider = new FakeProvider(options.responder ?? ((sub) => payloadFor(sub, stockQuoteCsv(sub.tradeDate))));
  const { app } = await createApp(makeConfig(options.config), {
    logger: silentLogger(),
    provider,
    store,
    readiness
  });
  t.after(async () => {
    await app.close();
  });
  return { app, store, readiness, provider };
}

test('healthz and readyz report liveness and provider readiness', async (t) => {
  const { app, readiness } = await buildApp(t, { ready: false });

  const health = await app.inject({ method: 'GET', url: '/healthz' });
  assert.equal(health.statusCode, 200);
  assert.deepEqual(health.json(), { status: 'ok' });

  const notReady = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(notReady.statusCode, 503);
  assert.deepEqual(notReady.json(), { status: 'not_ready', components: { provider: false } });

  readiness.ready = true;
  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 200);
  assert.deepEqual(ready.json(), { status: 'ready', components: { provider: true } });
});

test('a synchronous submission answers with the finished snapshot', async (t) => {
  const { app, store } = await buildApp(t);

  const response = await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'aapl', start: 20240102, end: 20240103 }, mode: 'sync' }
  });

  assert.equal(response.statusCode, 200);
  const body = response.json();
  assert.equal(body.state, 'finalized');
  assert.equal(body.rowCount, 2);
  assert.equal(body.request.symbol, 'AAPL');
  assert.equal(body.jobs.length, 1);
  assert.equal(body.jobs[0].key, JANUARY_KEY);
  assert.deepEqual(body.jobs[0].commit, { committed: true, rowCount: 2, commitError: null });
  assert.deepEqual(store.puts, [JANUARY_KEY]);

  const listed = await app.inject({ method: 'GET', url: '/jobs' });
  assert.deepEqual(
    listed.json().submissions.map((submission: { id: string }) => submission.id),
    [body.id]
  );
});

test('asynchronous submissions can be polled and cancelled', async (t) => {
  const gate = deferred<void>();
  const { app } = await buildApp(t, {
    responder: async (sub) => {
      await gate.promise;
      return payloadFor(sub, stockQuoteCsv(sub.tradeDate));
    }
  });

  const accepted = await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240102, end: 20240105 } }
  });
  assert.equal(accepted.statusCode, 202);
  const { id } = accepted.json();
  assert.equal(accepted.json().state, 'open');

  const polled = await app.inject({ method: 'GET', url: `/jobs/${id}` });
  assert.equal(polled.statusCode, 200);
  assert.equal(polled.json().totalParts, 4);
  assert.equal(polled.json().completedParts, 0);

  const cancelled = await app.inject({ method: 'DELETE', url: `/jobs/${id}` });
  assert.equal(cancelled.statusCode, 200);
  assert.equal(cancelled.json().state, 'aborted');

  gate.resolve();
});

test('errors map to status codes', async (t) => {
  const { app } = await buildApp(t);

  const unknown = await app.inject({ method: 'GET', url: '/jobs/unknown' });
  assert.equal(unknown.statusCode, 404);
  assert.deepEqual(unknown.json(), { code: 'SUBMISSION_NOT_FOUND', message: 'Submission unknown was not found' });

  const invalid = await app.inject({ method: 'POST', url: '/jobs', payload: { request: { kind: 'crypto' } } });
  assert.equal(invalid.statusCode, 400);
  assert.equal(invalid.json().code, 'VALIDATION_FAILED');

  const badMode = await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240102 }, mode: 'later' }
  });
  assert.equal(badMode.statusCode, 400);
  assert.equal(badMode.json().code, 'VALIDATION_FAILED');

  const reversed = await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240110, end: 20240102 } }
  });
  assert.equal(reversed.statusCode, 400);
  assert.equal(reversed.json().code, 'INVALID_RANGE');

  const weekend = await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240106, end: 20240107 } }
  });
  assert.equal(weekend.statusCode, 400);
  assert.equal(weekend.json().code, 'EMPTY_EXPANSION');
});

test('submissions are refused while the provider is not ready', async (t) => {
  const { app, provider } = await buildApp(t, { ready: false });

  const response = await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240102 } }
  });

  assert.equal(response.statusCode, 503);
  assert.deepEqual(response.json(), { code: 'PROVIDER_NOT_READY', message: 'Data provider is not ready' });
  assert.equal(provider.calls.length, 0);
});

test('dataset queries read back committed partitions', async (t) => {
  const { app } = await buildApp(t);
  await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240102, end: 20240103 }, mode: 'sync' }
  });

  const query = await app.inject({
    method: 'POST',
    url: '/datasets/query',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 202312, end: 202401 }, onMissing: 'skip', limit: 1 }
  });
  assert.equal(query.statusCode, 200);
  const body = query.json();
  assert.equal(body.kind, 'stock-quote');
  assert.equal(body.rowCount, 2);
  assert.deepEqual(body.partitions, [JANUARY_KEY]);
  assert.deepEqual(body.missing, ['historical-stock/quote/monthly/1h/AAPL/2023/12/data.json']);
  assert.equal(body.schema.length, 10);
  assert.deepEqual(body.rows, [
    {
      ms_of_day: 34_200_000,
      bid_size: 10,
      bid_exchange: 1,
      bid: 100.5,
      bid_condition: 0,
      ask_size: 12,
      ask_exchange: 1,
      ask: 100.75,
      ask_condition: 0,
      date: 20240102
    }
  ]);

  const strict = await app.inject({
    method: 'POST',
    url: '/datasets/query',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 202312 } }
  });
  assert.equal(strict.statusCode, 409);
  assert.deepEqual(strict.json(), {
    code: 'MISSING_PARTITION',
    message: 'Partition historical-stock/quote/monthly/1h/AAPL/2023/12/data.json does not exist',
    details: { key: 'historical-stock/quote/monthly/1h/AAPL/2023/12/data.json' }
  });
});

test('metrics are exposed only when enabled', async (t) => {
  const { app } = await buildApp(t);
  await app.inject({
    method: 'POST',
    url: '/jobs',
    payload: { request: { kind: 'stock-quote', symbol: 'AAPL', start: 20240102 }, mode: 'sync' }
  });

  const metrics = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(metrics.statusCode, 200);
  assert.match(metrics.body, /marketlake_sub_requests_total\{kind="stock-quote",outcome="success"\} 1/);
  assert.match(metrics.body, /marketlake_rows_committed_total\{kind="stock-quote"\} 1/);

  const disabled = await buildApp(t, { config: { metricsEnabled: false } });
  const missing = await disabled.app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(missing.statusCode, 404);
});
