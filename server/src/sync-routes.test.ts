import assert from 'node:assert/strict';
import test from 'node:test';
import type { FastifyInstance } from 'fastify';
import {
  ResultValidationError,
  buildAttachmentDisposition,
  normalizeResultUpdate,
  parseResultId
} from './sync-routes.js';
import { createTestServer } from './test-support.js';

const BOUNDARY = '----gearledger-test-boundary';

function multipartBody(filename: string, content: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\n` +
        `Content-Disposition: form-data; name="file"; filename="${filename}"\r\n` +
        'Content-Type: application/octet-stream\r\n\r\n'
    ),
    content,
    Buffer.from(`\r\n--${BOUNDARY}--\r\n`)
  ]);
}

function uploadCatalog(app: FastifyInstance, filename: string, content: Buffer) {
  return app.inject({
    method: 'POST',
    url: '/api/catalog',
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
    payload: multipartBody(filename, content)
  });
}

void test('status answers with static identity', async () => {
  const server = await createTestServer();

  try {
    const response = await server.app.inject({ method: 'GET', url: '/api/status' });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: 'ok', server: 'GearLedger Server', version: '1.0.0' });
    assert.equal(server.service.connectedClientCount(), 0);
  } finally {
    await server.close();
  }
});

void test('version probe registers the caller as a connected client', async () => {
  const server = await createTestServer();

  try {
    const version = await server.app.inject({ method: 'GET', url: '/api/sync/version' });
    assert.deepEqual(version.json(), { ok: true, version: 0 });

    const count = await server.app.inject({ method: 'GET', url: '/api/clients/count' });
    assert.deepEqual(count.json(), { ok: true, count: 1 });
  } finally {
    await server.close();
  }
});

void test('posting the same part twice merges and bumps the version each time', async () => {
  const server = await createTestServer();

  try {
    const first = await server.app.inject({
      method: 'POST',
      url: '/api/results',
      payload: { artikul: 'PK-5396', client: 'Acme', quantity: 1 }
    });
    assert.equal(first.statusCode, 200);
    assert.deepEqual(first.json(), { ok: true, action: 'inserted', id: 1 });

    const second = await server.app.inject({
      method: 'POST',
      url: '/api/results',
      payload: { artikul: 'pk 5396', client: 'ACME', quantity: 1 }
    });
    assert.deepEqual(second.json(), { ok: true, action: 'updated', id: 1 });

    const list = await server.app.inject({ method: 'GET', url: '/api/results' });
    const body = list.json<{ ok: boolean; results: Array<{ artikul: string; quantity: number }> }>();
    assert.equal(body.results.length, 1);
    assert.equal(body.results[0]?.quantity, 2);

    const version = await server.app.inject({ method: 'GET', url: '/api/sync/version' });
    assert.deepEqual(version.json(), { ok: true, version: 2 });
  } finally {
    await server.close();
  }
});

void test('results write rejects missing artikul or client and empty bodies', async () => {
  const server = await createTestServer();

  try {
    const missingClient = await server.app.inject({
      method: 'POST',
      url: '/api/results',
      payload: { artikul: 'PK-5396' }
    });
    assert.equal(missingClient.statusCode, 400);
    assert.deepEqual(missingClient.json(), { ok: false, error: 'artikul and client required' });

    const blankArtikul = await server.app.inject({
      method: 'POST',
      url: '/api/results',
      payload: { artikul: '   ', client: 'Acme' }
    });
    assert.equal(blankArtikul.statusCode, 400);

    const noBody = await server.app.inject({ method: 'POST', url: '/api/results' });
    assert.equal(noBody.statusCode, 400);
    assert.deepEqual(noBody.json(), { ok: false, error: 'No data provided' });

    assert.equal(server.service.getVersion(), 0);
  } finally {
    await server.close();
  }
});

void test('results list filters by client', async () => {
  const server = await createTestServer();

  try {
    server.service.recordResult({ artikul: 'A-1', client: 'Acme' });
    server.service.recordResult({ artikul: 'B-1', client: 'Globex' });

    const response = await server.app.inject({ method: 'GET', url: '/api/results?client=Globex' });
    const body = response.json<{ results: Array<{ artikul: string }> }>();
    assert.deepEqual(
      body.results.map((row) => row.artikul),
      ['B-1']
    );

    const clients = await server.app.inject({ method: 'GET', url: '/api/clients' });
    assert.deepEqual(clients.json(), { ok: true, clients: ['Acme', 'Globex'] });
  } finally {
    await server.close();
  }
});

void test('point read, update and delete by id', async () => {
  const server = await createTestServer();

  try {
    const { id } = server.service.recordResult({ artikul: 'A-1', client: 'Acme', sale_price: 4 });

    const read = await server.app.inject({ method: 'GET', url: `/api/results/${id}` });
    assert.equal(read.json<{ result: { artikul: string } }>().result.artikul, 'A-1');

    const update = await server.app.inject({
      method: 'PUT',
      url: `/api/results/${id}`,
      payload: { quantity: '3', brand: 'Bosch', id: 42, last_updated: 'never' }
    });
    assert.deepEqual(update.json(), { ok: true });
    assert.equal(server.store.getResultById(id)?.quantity, 3);
    assert.equal(server.store.getResultById(id)?.brand, 'Bosch');

    const ignored = await server.app.inject({
      method: 'PUT',
      url: `/api/results/${id}`,
      payload: { unknown: 1 }
    });
    assert.deepEqual(ignored.json(), { ok: false });

    const removed = await server.app.inject({ method: 'DELETE', url: `/api/results/${id}` });
    assert.deepEqual(removed.json(), { ok: true });

    const missing = await server.app.inject({ method: 'GET', url: `/api/results/${id}` });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json(), { ok: false, error: 'Not found' });

    const invalid = await server.app.inject({ method: 'GET', url: '/api/results/abc' });
    assert.equal(invalid.statusCode, 400);

    assert.equal(server.service.getVersion(), 1);
  } finally {
    await server.close();
  }
});

void test('renaming a row onto an existing part and client answers 409', async () => {
  const server = await createTestServer();

  try {
    server.service.recordResult({ artikul: 'A-1', client: 'Acme' });
    const { id } = server.service.recordResult({ artikul: 'B-1', client: 'Acme' });

    const response = await server.app.inject({
      method: 'PUT',
      url: `/api/results/${id}`,
      payload: { artikul: 'A-1' }
    });
    assert.equal(response.statusCode, 409);
    assert.deepEqual(response.json(), {
      ok: false,
      error: 'A result for this artikul and client already exists'
    });
  } finally {
    await server.close();
  }
});

void test('renames that only differ by case or punctuation from another row answer 409', async () => {
  const server = await createTestServer();

  try {
    const { id: existingId } = server.service.recordResult({ artikul: 'PK-5396', client: 'Acme' });
    const { id } = server.service.recordResult({ artikul: 'B-1', client: 'Acme' });

    for (const payload of [{ artikul: 'pk5396', client: 'ACME' }, { artikul: 'P.K 5396' }]) {
      const response = await server.app.inject({ method: 'PUT', url: `/api/results/${id}`, payload });
      assert.equal(response.statusCode, 409);
      assert.deepEqual(response.json(), {
        ok: false,
        error: 'A result for this artikul and client already exists'
      });
    }

    assert.equal(server.store.getResultById(id)?.artikul, 'B-1');

    const own = await server.app.inject({
      method: 'PUT',
      url: `/api/results/${existingId}`,
      payload: { artikul: 'pk 5396', client: 'acme' }
    });
    assert.deepEqual(own.json(), { ok: true });

    server.service.recordResult({ artikul: 'PK5396', client: 'Acme', quantity: 5 });
    assert.deepEqual(
      server.store.getAllResults().map((row) => [row.artikul, row.quantity]).sort(),
      [
        ['B-1', 1],
        ['pk 5396', 6]
      ]
    );
  } finally {
    await server.close();
  }
});

void test('negative quantities are rejected on write and update', async () => {
  const server = await createTestServer();

  try {
    for (const quantity of [-7, '-0.5']) {
      const response = await server.app.inject({
        method: 'POST',
        url: '/api/results',
        payload: { artikul: 'X-1', client: 'Acme', quantity }
      });
      assert.equal(response.statusCode, 400);
      assert.deepEqual(response.json(), { ok: false, error: 'quantity must be a non-negative integer' });
    }
    assert.deepEqual(server.store.getAllResults(), []);
    assert.equal(server.service.getVersion(), 0);

    const { id } = server.service.recordResult({ artikul: 'X-1', client: 'Acme', quantity: 2 });
    const update = await server.app.inject({
      method: 'PUT',
      url: `/api/results/${id}`,
      payload: { quantity: -1 }
    });
    assert.equal(update.statusCode, 400);
    assert.deepEqual(update.json(), { ok: false, error: 'quantity must be a non-negative integer' });
    assert.equal(server.store.getResultById(id)?.quantity, 2);

    const zero = await server.app.inject({
      method: 'PUT',
      url: `/api/results/${id}`,
      payload: { quantity: 0 }
    });
    assert.deepEqual(zero.json(), { ok: true });
    assert.equal(server.store.getResultById(id)?.quantity, 0);
  } finally {
    await server.close();
  }
});

void test('clear deletes rows, optionally per client, and bumps the version', async () => {
  const server = await createTestServer();

  try {
    server.service.recordResult({ artikul: 'A-1', client: 'Acme' });
    server.service.recordResult({ artikul: 'A-2', client: 'Acme' });
    server.service.recordResult({ artikul: 'B-1', client: 'Globex' });

    const scoped = await server.app.inject({
      method: 'POST',
      url: '/api/results/clear',
      payload: { client: 'acme' }
    });
    assert.deepEqual(scoped.json(), { ok: true, deleted: 2 });
    assert.equal(server.service.getVersion(), 4);

    const all = await server.app.inject({ method: 'POST', url: '/api/results/clear', payload: {} });
    assert.deepEqual(all.json(), { ok: true, deleted: 1 });
    assert.equal(server.service.getVersion(), 5);
  } finally {
    await server.close();
  }
});

void test('export groups results by client', async () => {
  const server = await createTestServer();

  try {
    server.service.recordResult({ artikul: 'A-1', client: 'Acme' });
    server.service.recordResult({ artikul: 'B-1', client: 'Globex' });

    const response = await server.app.inject({ method: 'GET', url: '/api/results/export' });
    const body = response.json<{ ok: boolean; clients: Record<string, Array<{ artikul: string }>> }>();
    assert.equal(body.ok, true);
    assert.deepEqual(Object.keys(body.clients).sort(), ['Acme', 'Globex']);
    assert.equal(body.clients.Globex?.[0]?.artikul, 'B-1');
  } finally {
    await server.close();
  }
});

void test('catalog upload round-trips bytes and reports metadata', async () => {
  const server = await createTestServer();
  const bytes = Buffer.alloc(500, 7);

  try {
    const before = await server.app.inject({ method: 'GET', url: '/api/catalog/info' });
    assert.deepEqual(before.json(), { ok: true, exists: false });

    const missing = await server.app.inject({ method: 'GET', url: '/api/catalog' });
    assert.equal(missing.statusCode, 404);

    const upload = await uploadCatalog(server.app, 'parts.xlsx', bytes);
    assert.equal(upload.statusCode, 200);
    assert.deepEqual(upload.json(), { ok: true, filename: 'parts.xlsx', size: 500, version: 1 });

    const info = await server.app.inject({ method: 'GET', url: '/api/catalog/info' });
    const infoBody = info.json<{ exists: boolean; filename: string; size: number; version: number }>();
    assert.equal(infoBody.exists, true);
    assert.equal(infoBody.filename, 'parts.xlsx');
    assert.equal(infoBody.size, 500);
    assert.equal(infoBody.version, 1);

    const download = await server.app.inject({ method: 'GET', url: '/api/catalog' });
    assert.equal(download.statusCode, 200);
    assert.equal(
      download.headers['content-disposition'],
      `attachment; filename="parts.xlsx"; filename*=UTF-8''parts.xlsx`
    );
    assert.ok(download.rawPayload.equals(bytes));
  } finally {
    await server.close();
  }
});

void test('catalog upload rejects requests without a usable file', async () => {
  const server = await createTestServer({ app: { catalogMaxBytes: 16 } });

  try {
    const notMultipart = await server.app.inject({
      method: 'POST',
      url: '/api/catalog',
      payload: { filename: 'parts.xlsx' }
    });
    assert.equal(notMultipart.statusCode, 400);
    assert.deepEqual(notMultipart.json(), { ok: false, error: 'No file provided' });

    const blankName = await uploadCatalog(server.app, '   ', Buffer.from('data'));
    assert.equal(blankName.statusCode, 400);
    assert.deepEqual(blankName.json(), { ok: false, error: 'No file selected' });

    const tooLarge = await uploadCatalog(server.app, 'parts.xlsx', Buffer.alloc(32));
    assert.equal(tooLarge.statusCode, 413);
    assert.deepEqual(tooLarge.json(), { ok: false, error: 'Catalog file too large' });

    assert.equal(server.service.getVersion(), 0);
    assert.equal(server.service.getCatalogInfo(), null);
  } finally {
    await server.close();
  }
});

void test('unknown paths answer a structured 404', async () => {
  const server = await createTestServer();

  try {
    const response = await server.app.inject({ method: 'GET', url: '/api/nope' });
    assert.equal(response.statusCode, 404);
    assert.deepEqual(response.json(), { ok: false, error: 'Not found', path: '/api/nope' });
  } finally {
    await server.close();
  }
});

void test('update payloads are reduced to allow-listed, typed fields', () => {
  assert.deepEqual(
    normalizeResultUpdate({
      quantity: '4.7',
      sale_price: '12.5',
      weight: 'heavy',
      brand: 7,
      description: 'Gasket',
      id: 3
    }),
    { quantity: 4, sale_price: 12.5, description: 'Gasket' }
  );
  assert.throws(() => normalizeResultUpdate({ quantity: '-3' }), ResultValidationError);
});

void test('result ids must be plain positive integers', () => {
  assert.equal(parseResultId('12'), 12);
  assert.equal(parseResultId('-1'), null);
  assert.equal(parseResultId('1.5'), null);
  assert.equal(parseResultId('abc'), null);
});

void test('attachment disposition keeps non-ascii names in the extended parameter', () => {
  assert.equal(
    buildAttachmentDisposition('прайс.xlsx'),
    `attachment; filename="_____.xlsx"; filename*=UTF-8''%D0%BF%D1%80%D0%B0%D0%B9%D1%81.xlsx`
  );
});
