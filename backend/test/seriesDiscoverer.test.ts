import test from 'node:test';
import assert from 'node:assert/strict';

import { SeriesDiscoverer, discoveryWindow, sortByScheduledAt } from '../src/pipeline/seriesDiscoverer.js';
import { GridRateLimitError, GridRequestError } from '../src/data/gridErrors.js';
import { isDiscoveryFailedError } from '../src/errors.js';
import type { Series } from '@scrim-drafts/shared';
import { InMemoryLedger, InMemoryScrimProvider, noSleep } from './helpers/fakes.js';

const series = (id: string, scheduledAt: string): Series => ({ id, scheduledAt, team1Name: 'A', team2Name: 'B' });

test('series already in the ledger are not rediscovered', async () => {
  const provider = new InMemoryScrimProvider([series('s1', '2024-01-15T10:00:00Z'), series('s2', '2024-02-15T10:00:00Z')]);
  const discoverer = new SeriesDiscoverer(provider, new InMemoryLedger(['s1']));

  const found = await discoverer.discover(new Date('2024-01-01T00:00:00Z'), new Date('2024-03-01T00:00:00Z'));
  assert.deepEqual(found.map((s) => s.id), ['s2']);
});

test('results are de-duplicated and sorted by schedule, undated last', async () => {
  const provider = new InMemoryScrimProvider([]);
  provider.listSeries = async () => [
    series('b', '2024-02-02T00:00:00Z'),
    series('x', 'not a date'),
    series('a', '2024-02-02T00:00:00Z'),
    series('c', '2024-01-05T00:00:00Z'),
    series('a', '2024-02-02T00:00:00Z'),
  ];
  const discoverer = new SeriesDiscoverer(provider, new InMemoryLedger());
  const found = await discoverer.discover(new Date('2024-01-01T00:00:00Z'), new Date('2024-03-01T00:00:00Z'));
  assert.deepEqual(found.map((s) => s.id), ['c', 'a', 'b', 'x']);
});

test('transient provider errors are retried', async () => {
  const provider = new InMemoryScrimProvider([series('s1', '2024-01-15T10:00:00Z')]);
  let failures = 1;
  const list = provider.listSeries.bind(provider);
  provider.listSeries = async (window) => {
    if (failures-- > 0) throw new GridRateLimitError('slow down');
    return list(window);
  };
  const discoverer = new SeriesDiscoverer(provider, new InMemoryLedger(), { sleep: noSleep });
  const found = await discoverer.discover(new Date('2024-01-01T00:00:00Z'), new Date('2024-03-01T00:00:00Z'));
  assert.deepEqual(found.map((s) => s.id), ['s1']);
});

test('exhausted retries and hard errors become DiscoveryFailed', async () => {
  const provider = new InMemoryScrimProvider([]);
  provider.listError = new GridRequestError('HTTP 502', { status: 502 });
  const discoverer = new SeriesDiscoverer(provider, new InMemoryLedger(), { retries: 2, sleep: noSleep });
  await assert.rejects(
    discoverer.discover(new Date('2024-01-01T00:00:00Z'), new Date('2024-03-01T00:00:00Z')),
    (err: unknown) => isDiscoveryFailedError(err) && err.cause === provider.listError,
  );
  assert.equal(provider.listCalls, 3);

  const unauthorized = new InMemoryScrimProvider([]);
  unauthorized.listError = new GridRequestError('HTTP 401', { status: 401 });
  await assert.rejects(
    new SeriesDiscoverer(unauthorized, new InMemoryLedger(), { sleep: noSleep }).discover(new Date(0), new Date()),
    (err: unknown) => isDiscoveryFailedError(err),
  );
  assert.equal(unauthorized.listCalls, 1);
});

test('discoveryWindow steps back calendar months in UTC', () => {
  const window = discoveryWindow(new Date('2024-03-01T00:00:00Z'), 2);
  assert.equal(window.since.toISOString(), '2024-01-01T00:00:00.000Z');
  assert.equal(window.until.toISOString(), '2024-03-01T00:00:00.000Z');
});

test('discoveryWindow clamps the day to the end of a shorter month', () => {
  const cases: Array<[string, number, string]> = [
    ['2024-04-30T12:00:00Z', 2, '2024-02-29T12:00:00.000Z'],
    ['2023-03-31T00:00:00Z', 1, '2023-02-28T00:00:00.000Z'],
    ['2024-01-31T08:30:00Z', 2, '2023-11-30T08:30:00.000Z'],
    ['2024-05-31T00:00:00Z', 12, '2023-05-31T00:00:00.000Z'],
  ];
  for (const [now, months, since] of cases) {
    assert.equal(discoveryWindow(new Date(now), months).since.toISOString(), since);
  }
});

test('sortByScheduledAt does not mutate its input', () => {
  const input = [series('b', '2024-02-01T00:00:00Z'), series('a', '2024-01-01T00:00:00Z')];
  const sorted = sortByScheduledAt(input);
  assert.deepEqual(sorted.map((s) => s.id), ['a', 'b']);
  assert.deepEqual(input.map((s) => s.id), ['b', 'a']);
});
