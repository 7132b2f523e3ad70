import { DRAFT_SLOT_COUNT, emptySlots } from '@scrim-drafts/shared';
import type { DraftRecord, DraftSide, DraftSlots, TeamKey, TeamTags } from '@scrim-drafts/shared';
import type { ChampionCatalog } from './championCatalog.js';
import { parseLivestats } from './livestatsParser.js';
import type { DraftEvent, ParsedLivestats } from './livestatsParser.js';

export interface DraftExtraction {
  draft: DraftRecord;
  tags: TeamTags;
  stats: Omit<ParsedLivestats, 'events'>;
}

const otherSide = (side: DraftSide): DraftSide => (side === 'blue' ? 'red' : 'blue');

function isSlot(slot: number): boolean {
  return Number.isInteger(slot) && slot >= 0 && slot < DRAFT_SLOT_COUNT;
}

/**
 * Places every ban/pick at its announced slot, in stream order. A later event for an
 * occupied slot replaces it (champion swap). Sides map to teams via the first
 * `SideAssigned`; without one, the first side seen in a pick is team1.
 */
export function buildDraft(seriesId: string, events: DraftEvent[], catalog: ChampionCatalog): { draft: DraftRecord; tags: TeamTags } {
  const bans: Record<DraftSide, DraftSlots> = { blue: emptySlots(), red: emptySlots() };
  const picks: Record<DraftSide, DraftSlots> = { blue: emptySlots(), red: emptySlots() };
  const assigned = new Map<TeamKey, DraftSide>();
  const tags: TeamTags = {};
  let firstPickSide: DraftSide | undefined;

  for (const event of events) {
    switch (event.kind) {
      case 'SideAssigned':
        if (!assigned.has(event.team)) assigned.set(event.team, event.side);
        break;
      case 'TeamTagged':
        if (tags[event.team] === undefined) tags[event.team] = event.tag;
        break;
      case 'ChampionBanned':
        if (isSlot(event.slot)) bans[event.side][event.slot] = catalog.nameOf(event.championId);
        break;
      case 'ChampionPicked':
        if (!isSlot(event.slot)) break;
        firstPickSide ??= event.side;
        picks[event.side][event.slot] = catalog.nameOf(event.championId);
        break;
    }
  }

  const team1Assigned = assigned.get('team1');
  const team2Assigned = assigned.get('team2');
  const team1Side: DraftSide = team1Assigned
    ?? (team2Assigned ? otherSide(team2Assigned) : undefined)
    ?? firstPickSide
    ?? 'blue';

  return {
    draft: {
      seriesId,
      blueBans: bans.blue,
      redBans: bans.red,
      team1Picks: picks[team1Side],
      team2Picks: picks[otherSide(team1Side)],
    },
    tags,
  };
}

/**
 * Bytes in, draft out. Throws `MalformedDraftDataError` when the stream holds no usable
 * champion select data; missing individual slots are not an error.
 */
export function extractDraft(seriesId: string, rawEvents: Uint8Array, catalog: ChampionCatalog): DraftExtraction {
  const { events, ...stats } = parseLivestats(rawEvents);
  const { draft, tags } = buildDraft(seriesId, events, catalog);
  return { draft, tags, stats };
}
