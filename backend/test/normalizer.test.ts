import test from 'node:test';
import assert from 'node:assert/strict';

import { isRiotLivestatsFile, normalizeLivestatsFiles, normalizeSeriesNode } from '../src/data/normalizer.js';
import type { GridFileEntry } from '../src/data/gridFileDownloadClient.js';

test('normalizeSeriesNode keeps GRID team order and trims names', () => {
  const series = normalizeSeriesNode({
    id: '2700001',
    startTimeScheduled: '2024-02-10T15:00:00Z',
    teams: [{ baseInfo: { id: '1', name: ' Alpha ' } }, { baseInfo: { id: '2', name: 'Beta' } }],
  });
  assert.deepEqual(series, {
    id: '2700001',
    scheduledAt: '2024-02-10T15:00:00Z',
    team1Name: 'Alpha',
    team2Name: 'Beta',
  });
});

test('normalizeSeriesNode leaves missing teams and dates empty', () => {
  assert.deepEqual(normalizeSeriesNode({ id: '7', startTimeScheduled: null, teams: [{ baseInfo: null }] }), {
    id: '7',
    scheduledAt: '',
    team1Name: '',
    team2Name: '',
  });
});

const file = (overrides: Partial<GridFileEntry>): GridFileEntry => ({
  id: 'state-riot-game-1',
  description: 'Riot Livestats Game 1',
  status: 'ready',
  fileName: 'riot_livestats_1.jsonl',
  fullURL: 'https://files.example/1',
  ...overrides,
});

test('isRiotLivestatsFile matches on the description', () => {
  assert.equal(isRiotLivestatsFile(file({})), true);
  assert.equal(isRiotLivestatsFile(file({ description: 'GRID Series Events' })), false);
  assert.equal(isRiotLivestatsFile(file({ description: 'Riot Summary Game 1' })), false);
});

test('normalizeLivestatsFiles keeps ready livestats files once, in listing order', () => {
  const games = normalizeLivestatsFiles([
    file({ id: 'g2', fullURL: 'https://files.example/2', fileName: null }),
    file({ id: 'events', description: 'Series events (GRID)' }),
    file({ id: 'g3', status: 'processing' }),
    file({ id: 'g1', status: undefined }),
    file({ id: 'g2', fullURL: 'https://files.example/dup' }),
  ]);
  assert.deepEqual(games, [
    { gameId: 'g2', fileName: undefined, downloadUrl: 'https://files.example/2' },
    { gameId: 'g1', fileName: 'riot_livestats_1.jsonl', downloadUrl: 'https://files.example/1' },
  ]);
});
