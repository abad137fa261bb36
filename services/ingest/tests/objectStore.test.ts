import assert from 'node:assert/strict';
import { test } from 'node:test';
import { S3ServiceException } from '@aws-sdk/client-s3';

import { isNotFoundError, S3ObjectStore } from '../src/storage/objectStore';
import { silentLogger } from './utils/fixtures';
import { InMemoryS3Client } from './utils/inMemoryS3';

const bytes = (text: string) => new Uint8Array(Buffer.from(text, 'utf8'));

function createStore(options: { bucketExists?: boolean; pageSize?: number } = {}) {
  const s3 = new InMemoryS3Client(options);
  const store = new S3ObjectStore({ client: s3.asClient(), bucket: 'marketlake-test', logger: silentLogger() });
  return { s3, store };
}

test('put stores bytes with their content type', async () => {
  const { s3, store } = createStore();

  await store.put('earnings/2024/01/data.json', bytes('{}'), 'application/json');

  const stored = s3.objects.get('earnings/2024/01/data.json');
  assert.ok(stored);
  assert.equal(Buffer.from(stored.body).toString('utf8'), '{}');
  assert.equal(stored.contentType, 'application/json');
  assert.deepEqual(s3.sent, ['PutObjectCommand']);
});

test('getMany keeps key order and maps absent objects to null', async () => {
  const { store } = createStore();
  await store.put('a/data.json', bytes('first'), 'application/json');
  await store.put('c/data.json', bytes('third'), 'application/json');

  const bodies = await store.getMany(['c/data.json', 'b/data.json', 'a/data.json']);

  assert.deepEqual(
    bodies.map((body) => (body ? Buffer.from(body).toString('utf8') : null)),
    ['third', null, 'first']
  );
});

test('exists answers from HeadObject', async () => {
  const { store } = createStore();
  await store.put('a/data.json', bytes('x'), 'application/json');

  assert.equal(await store.exists('a/data.json'), true);
  assert.equal(await store.exists('b/data.json'), false);
});

test('list follows continuation tokens', async () => {
  const { s3, store } = createStore({ pageSize: 2 });
  for (const key of ['earnings/2024/03/data.json', 'earnings/2024/01/data.json', 'earnings/2024/02/data.json', 'other/data.json']) {
    await store.put(key, bytes('x'), 'application/json');
  }
  s3.sent.length = 0;

  const keys = await store.list('earnings/');

  assert.deepEqual(keys, ['earnings/2024/01/data.json', 'earnings/2024/02/data.json', 'earnings/2024/03/data.json']);
  assert.deepEqual(s3.sent, ['ListObjectsV2Command', 'ListObjectsV2Command']);
});

test('ensureBucket creates a missing bucket once', async () => {
  const { s3, store } = createStore({ bucketExists: false });

  await store.ensureBucket();
  await store.ensureBucket();

  assert.equal(s3.bucketExists, true);
  assert.deepEqual(s3.sent, ['HeadBucketCommand', 'CreateBucketCommand', 'HeadBucketCommand']);
});

test('isNotFoundError recognises 404 service exceptions only', () => {
  const notFound = new S3ServiceException({
    name: 'NoSuchThing',
    $fault: 'client',
    $metadata: { httpStatusCode: 404 }
  });
  const forbidden = new S3ServiceException({
    name: 'AccessDenied',
    $fault: 'client',
    $metadata: { httpStatusCode: 403 }
  });

  assert.equal(isNotFoundError(notFound), true);
  assert.equal(isNotFoundError(forbidden), false);
  assert.equal(isNotFoundError(new Error('boom')), false);
});
