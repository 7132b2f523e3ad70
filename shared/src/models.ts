export type TeamKey = 'team1' | 'team2';

export type DraftSide = 'blue' | 'red';

/**
 * One scrim series as announced by the provider. `id` is provider-assigned and never
 * regenerated locally.
 */
export interface Series {
  id: string;
  scheduledAt: string;
  team1Name: string;
  team2Name: string;
}

export interface Game {
  id: string;
  /**
   * Raw livestats file content (JSONL).
   */
  rawEvents: Uint8Array;
  /**
   * Local cache path the bytes were read from or written to, when cached.
   */
  sourcePath?: string;
}

export const DRAFT_SLOT_COUNT = 5;

export const EMPTY_SLOT = '';

/**
 * Fixed five-slot sequence. Index is pick/ban order; an unfilled slot is `EMPTY_SLOT`.
 */
export type DraftSlots = [string, string, string, string, string];

export interface DraftRecord {
  seriesId: string;
  blueBans: DraftSlots;
  redBans: DraftSlots;
  team1Picks: DraftSlots;
  team2Picks: DraftSlots;
}

export interface TeamTags {
  team1?: string;
  team2?: string;
}

export interface LedgerEntry {
  seriesId: string;
  processedAt: string;
  team1Name: string;
  team2Name: string;
  filePath: string;
}

export interface SinkRow {
  key: string;
  cells: string[];
}

export type SeriesStage = 'Discovered' | 'Fetched' | 'Extracted' | 'Reconciled' | 'Committed';

export type PipelineStep = 'fetch' | 'extract' | 'reconcile' | 'commit';

export interface SkippedSeries {
  seriesId: string;
  stage: PipelineStep;
  reason: string;
}

export interface TimeWindow {
  since: Date;
  until: Date;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  window: { since: string; until: string };
  discovered: number;
  processed: number;
  /**
   * Series whose row was already in the sink, so only the ledger commit ran.
   */
  alreadyInSink: number;
  skipped: number;
  skippedSeries: SkippedSeries[];
}

export function emptySlots(): DraftSlots {
  return [EMPTY_SLOT, EMPTY_SLOT, EMPTY_SLOT, EMPTY_SLOT, EMPTY_SLOT];
}
