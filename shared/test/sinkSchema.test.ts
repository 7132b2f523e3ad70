import test from 'node:test';
import assert from 'node:assert/strict';

import { SINK_COLUMNS, formatSeriesDate, toSinkRow } from '../src/sinkSchema.js';
import { emptySlots } from '../src/models.js';
import type { DraftRecord, Series } from '../src/models.js';

const series: Series = {
  id: 'series-42',
  scheduledAt: '2024-02-03T18:05:00Z',
  team1Name: 'Team Alpha',
  team2Name: 'Team Beta',
};

test('SINK_COLUMNS has the fixed 24-column layout', () => {
  assert.equal(SINK_COLUMNS.length, 24);
  assert.deepEqual(SINK_COLUMNS.slice(0, 5), ['Series ID', 'Date', 'Team 1', 'Team 2', 'Blue Ban 1']);
  assert.equal(SINK_COLUMNS[13], 'Red Ban 5');
  assert.equal(SINK_COLUMNS[14], 'Team 1 Pick 1');
  assert.equal(SINK_COLUMNS[23], 'Team 2 Pick 5');
});

test('formatSeriesDate renders UTC minutes and passes through junk', () => {
  assert.equal(formatSeriesDate('2024-02-03T18:05:59Z'), '2024-02-03 18:05');
  assert.equal(formatSeriesDate('not a date'), 'not a date');
  assert.equal(formatSeriesDate(''), 'Unknown');
});

test('toSinkRow keeps empty slots positional', () => {
  const draft: DraftRecord = {
    seriesId: series.id,
    blueBans: ['Ahri', '', 'Jax', 'Lux', 'Zed'],
    redBans: emptySlots(),
    team1Picks: ['Annie', 'Olaf', 'Galio', 'Twisted Fate', 'Xin Zhao'],
    team2Picks: ['Urgot', 'LeBlanc', 'Vladimir', 'Fiddlesticks', 'Kayle'],
  };

  const row = toSinkRow(series, draft);

  assert.equal(row.key, 'series-42');
  assert.equal(row.cells.length, SINK_COLUMNS.length);
  assert.deepEqual(row.cells.slice(0, 4), ['series-42', '2024-02-03 18:05', 'Team Alpha', 'Team Beta']);
  assert.deepEqual(row.cells.slice(4, 9), ['Ahri', '', 'Jax', 'Lux', 'Zed']);
  assert.deepEqual(row.cells.slice(9, 14), ['', '', '', '', '']);
  assert.equal(row.cells[23], 'Kayle');
});

test('toSinkRow falls back to livestats tags, then to generic names', () => {
  const anonymous: Series = { ...series, team1Name: '', team2Name: '  ' };
  const draft: DraftRecord = {
    seriesId: series.id,
    blueBans: emptySlots(),
    redBans: emptySlots(),
    team1Picks: emptySlots(),
    team2Picks: emptySlots(),
  };

  assert.deepEqual(toSinkRow(anonymous, draft, { team1: 'ALP' }).cells.slice(2, 4), ['ALP', 'Team 2']);
});
