import test from 'node:test';
import assert from 'node:assert/strict';

import { GridGraphqlClient } from '../src/data/gridGraphqlClient.js';
import { isGridRateLimitError, isGridRequestError } from '../src/data/gridErrors.js';
import { fakeFetch, jsonResponse, noSleep } from './helpers/fakes.js';

const window = { since: new Date('2024-01-01T00:00:00Z'), until: new Date('2024-03-01T00:00:00Z') };

function page(ids: string[], hasNextPage: boolean, endCursor: string | null) {
  return {
    data: {
      allSeries: {
        totalCount: 3,
        pageInfo: { hasNextPage, endCursor },
        edges: ids.map((id) => ({
          node: { id, startTimeScheduled: '2024-02-01T12:00:00Z', teams: [{ baseInfo: { id: 't1', name: 'Alpha' } }] },
        })),
      },
    },
  };
}

function variablesOf(body: unknown): unknown {
  return typeof body === 'object' && body !== null && 'variables' in body ? body.variables : undefined;
}

test('listScrimSeries follows cursors and sends the scrim filter variables', async () => {
  const { fetchImpl, calls } = fakeFetch((req) => {
    const vars = variablesOf(req.body);
    const after = typeof vars === 'object' && vars !== null && 'after' in vars ? vars.after : undefined;
    return jsonResponse(after === null ? page(['s1', 's2'], true, 'c1') : page(['s3'], false, null));
  });
  const client = new GridGraphqlClient('test-key', { fetchImpl, pageSize: 2 });

  const nodes = await client.listScrimSeries(window);

  assert.deepEqual(nodes.map((n) => n.id), ['s1', 's2', 's3']);
  assert.equal(calls.length, 2);
  assert.equal(calls[0]?.url, 'https://api.grid.gg/central-data/graphql');
  assert.equal(calls[0]?.headers['x-api-key'], 'test-key');
  assert.deepEqual(variablesOf(calls[0]?.body), {
    first: 2,
    after: null,
    titleIds: ['3'],
    gte: '2024-01-01T00:00:00.000Z',
    lte: '2024-03-01T00:00:00.000Z',
  });
  assert.deepEqual(variablesOf(calls[1]?.body), {
    first: 2,
    after: 'c1',
    titleIds: ['3'],
    gte: '2024-01-01T00:00:00.000Z',
    lte: '2024-03-01T00:00:00.000Z',
  });
});

test('numeric series ids are normalized to strings', async () => {
  const { fetchImpl } = fakeFetch(() => jsonResponse({
    data: { allSeries: { pageInfo: { hasNextPage: false }, edges: [{ node: { id: 2700123 } }] } },
  }));
  const client = new GridGraphqlClient('test-key', { fetchImpl });
  const nodes = await client.listScrimSeries(window);
  assert.deepEqual(nodes, [{ id: '2700123' }]);
});

test('429 and 5xx are retried, honouring Retry-After', async () => {
  const delays: number[] = [];
  let n = 0;
  const { fetchImpl, calls } = fakeFetch(() => {
    n++;
    if (n === 1) return new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } });
    if (n === 2) return new Response('upstream', { status: 502 });
    return jsonResponse(page(['s1'], false, null));
  });
  const client = new GridGraphqlClient('test-key', {
    fetchImpl,
    baseDelayMs: 100,
    sleep: async (ms) => { delays.push(ms); },
  });

  const nodes = await client.listScrimSeries(window);
  assert.equal(nodes.length, 1);
  assert.equal(calls.length, 3);
  assert.deepEqual(delays, [2000, 200]);
});

test('rate limits surface as GridRateLimitError once retries run out', async () => {
  const { fetchImpl, calls } = fakeFetch(() => new Response('', { status: 429 }));
  const client = new GridGraphqlClient('test-key', { fetchImpl, retries: 1, sleep: noSleep });
  await assert.rejects(client.listScrimSeries(window), (err: unknown) => isGridRateLimitError(err));
  assert.equal(calls.length, 2);
});

test('4xx and GraphQL errors are not retried', async () => {
  const forbidden = fakeFetch(() => new Response('nope', { status: 403 }));
  const client = new GridGraphqlClient('test-key', { fetchImpl: forbidden.fetchImpl, sleep: noSleep });
  await assert.rejects(client.listScrimSeries(window), (err: unknown) => isGridRequestError(err) && err.status === 403);
  assert.equal(forbidden.calls.length, 1);

  const gqlError = fakeFetch(() => jsonResponse({ errors: [{ message: 'Unknown field' }] }));
  const client2 = new GridGraphqlClient('test-key', { fetchImpl: gqlError.fetchImpl, sleep: noSleep });
  await assert.rejects(client2.listScrimSeries(window), /GRID GraphQL Error: Unknown field/);
  assert.equal(gqlError.calls.length, 1);
});

test('network failures are retried as transient', async () => {
  let n = 0;
  const { fetchImpl } = fakeFetch(() => {
    n++;
    if (n === 1) throw new TypeError('fetch failed');
    return jsonResponse(page([], false, null));
  });
  const client = new GridGraphqlClient('test-key', { fetchImpl, sleep: noSleep });
  assert.deepEqual(await client.listScrimSeries(window), []);
  assert.equal(n, 2);
});

test('a missing API key fails before any request', async () => {
  const { fetchImpl, calls } = fakeFetch(() => jsonResponse(page([], false, null)));
  const client = new GridGraphqlClient('', { fetchImpl });
  await assert.rejects(client.listScrimSeries(window), /GRID_API_KEY is missing/);
  assert.equal(calls.length, 0);
});
