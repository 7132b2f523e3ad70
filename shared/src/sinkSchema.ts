import type { DraftRecord, DraftSlots, Series, SinkRow, TeamTags } from './models.js';

function numbered(prefix: string): string[] {
  return [1, 2, 3, 4, 5].map((n) => `${prefix} ${n}`);
}

export const SINK_COLUMNS: readonly string[] = [
  'Series ID',
  'Date',
  'Team 1',
  'Team 2',
  ...numbered('Blue Ban'),
  ...numbered('Red Ban'),
  ...numbered('Team 1 Pick'),
  ...numbered('Team 2 Pick'),
];

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:mm` in UTC. Values that don't parse as a date are passed through as-is.
 */
export function formatSeriesDate(raw: string): string {
  const t = new Date(raw);
  if (!raw || Number.isNaN(t.getTime())) return raw || 'Unknown';
  return `${t.getUTCFullYear()}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())} ${pad(t.getUTCHours())}:${pad(t.getUTCMinutes())}`;
}

function resolveTeamName(fromProvider: string, fromTag: string | undefined, fallback: string): string {
  const provider = fromProvider.trim();
  if (provider) return provider;
  const tag = (fromTag || '').trim();
  return tag || fallback;
}

export function resolveTeamNames(series: Series, tags: TeamTags = {}): { team1: string; team2: string } {
  return {
    team1: resolveTeamName(series.team1Name, tags.team1, 'Team 1'),
    team2: resolveTeamName(series.team2Name, tags.team2, 'Team 2'),
  };
}

/**
 * Lays a draft out in `SINK_COLUMNS` order, keyed by the series id.
 */
export function toSinkRow(series: Series, draft: DraftRecord, tags: TeamTags = {}): SinkRow {
  const names = resolveTeamNames(series, tags);
  const slots = (s: DraftSlots) => [...s];
  return {
    key: series.id,
    cells: [
      series.id,
      formatSeriesDate(series.scheduledAt),
      names.team1,
      names.team2,
      ...slots(draft.blueBans),
      ...slots(draft.redBans),
      ...slots(draft.team1Picks),
      ...slots(draft.team2Picks),
    ],
  };
}
