import { z } from 'zod';
import { DRAFT_SLOT_COUNT } from '@scrim-drafts/shared';
import type { DraftSide, TeamKey } from '@scrim-drafts/shared';
import { MalformedDraftDataError } from '../errors.js';

/**
 * Draft actions recovered from a livestats stream, in stream order.
 */
export type DraftEvent =
  | { kind: 'SideAssigned'; team: TeamKey; side: DraftSide }
  | { kind: 'TeamTagged'; team: TeamKey; tag: string }
  | { kind: 'ChampionBanned'; side: DraftSide; slot: number; championId: number }
  | { kind: 'ChampionPicked'; side: DraftSide; slot: number; championId: number };

export interface ParsedLivestats {
  events: DraftEvent[];
  linesRead: number;
  linesSkipped: number;
  champSelectSnapshots: number;
  /** Bans/picks with no side or turn, or beyond the fifth distinct turn of their side. */
  unplacedActions: number;
}

// Tournament draft: six alternating bans, six picks, four bans, four picks.
export const BAN_TURNS: Record<DraftSide, readonly number[]> = {
  blue: [1, 3, 5, 14, 16],
  red: [2, 4, 6, 13, 15],
};

export const PICK_TURNS: Record<DraftSide, readonly number[]> = {
  blue: [7, 10, 11, 18, 19],
  red: [8, 9, 12, 17, 20],
};

const CHAMP_SELECT_STATES = new Set(['CHAMP_SELECT', 'PRE_CHAMP_SELECT']);

const playerSchema = z.object({
  participantID: z.number().int(),
  championID: z.number().int().default(0),
  pickTurn: z.number().int().default(0),
  displayName: z.string().default(''),
  teamID: z.number().int().optional(),
});

const banSchema = z.object({
  championID: z.number().int(),
  pickTurn: z.number().int(),
  teamID: z.number().int(),
});

const snapshotSchema = z.object({
  gameState: z.string(),
  bannedChampions: z.array(z.unknown()).nullish(),
  teamOne: z.array(z.unknown()).nullish(),
  teamTwo: z.array(z.unknown()).nullish(),
});

type Player = z.infer<typeof playerSchema>;
type Ban = z.infer<typeof banSchema>;

function parseEach<S extends z.ZodTypeAny>(schema: S, items: unknown[] | null | undefined): Array<z.infer<S>> {
  const out: Array<z.infer<S>> = [];
  for (const item of items ?? []) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

export function sideOfTeamId(teamId: number | undefined): DraftSide | undefined {
  if (teamId === 100) return 'blue';
  if (teamId === 200) return 'red';
  return undefined;
}

const otherTeam = (team: TeamKey): TeamKey => (team === 'team1' ? 'team2' : 'team1');
const otherSide = (side: DraftSide): DraftSide => (side === 'blue' ? 'red' : 'blue');

/** A ban or pick whose slot is decided once the whole stream has been read. */
type PendingAction = PendingActionFields & ({ kind: 'ban' } | { kind: 'pick' });

interface PendingActionFields {
  /** Side from the action's own teamID. */
  side?: DraftSide;
  /** Roster the pick came from, for picks without a teamID. */
  team?: TeamKey;
  pickTurn: number;
  championId: number;
}

/**
 * Slot of every turn seen for one side's bans or picks. Turns that all fit the tournament
 * table keep their table position; otherwise the side's distinct turns are ranked in
 * ascending order (streams that number each phase from 1).
 */
function slotsForTurns(table: readonly number[], turns: number[]): Map<number, number> {
  const slots = new Map<number, number>();
  if (turns.every((turn) => table.includes(turn))) {
    for (const turn of turns) slots.set(turn, table.indexOf(turn));
    return slots;
  }
  [...new Set(turns)].sort((a, b) => a - b).forEach((turn, rank) => slots.set(turn, rank));
  return slots;
}

/**
 * Most common first word among display names like "T1 Faker".
 */
export function teamTagOf(players: Player[]): string | undefined {
  const counts = new Map<string, number>();
  for (const p of players) {
    const name = p.displayName.trim();
    if (!name.includes(' ')) continue;
    const prefix = name.split(/\s+/)[0];
    counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [prefix, count] of counts) {
    if (count > bestCount) {
      best = prefix;
      bestCount = count;
    }
  }
  return best;
}

function splitLines(bytes: Uint8Array): string[] {
  return new TextDecoder('utf-8').decode(bytes).split(/\r?\n/);
}

/**
 * Turns a Riot livestats JSONL stream into draft events by diffing successive
 * champion-select snapshots. Lines that are not JSON objects are skipped; the stream as a
 * whole is rejected when nothing in it is usable.
 */
export function parseLivestats(bytes: Uint8Array): ParsedLivestats {
  const stream: Array<DraftEvent | PendingAction> = [];
  const seenBans = new Set<string>();
  const pickedBy = new Map<number, number>();
  const teamSides = new Map<TeamKey, DraftSide>();
  const tagged = new Set<TeamKey>();

  let linesRead = 0;
  let linesSkipped = 0;
  let jsonObjects = 0;
  let champSelectSnapshots = 0;

  const conventionalSide: Record<TeamKey, DraftSide> = { team1: 'blue', team2: 'red' };

  const handleBan = (ban: Ban) => {
    if (ban.championID <= 0) return;
    const key = `${ban.championID}:${ban.pickTurn}:${ban.teamID}`;
    if (seenBans.has(key)) return;
    seenBans.add(key);
    stream.push({ kind: 'ban', side: sideOfTeamId(ban.teamID), pickTurn: ban.pickTurn, championId: ban.championID });
  };

  const handleRoster = (team: TeamKey, players: Player[]) => {
    if (!teamSides.has(team)) {
      const side = players.map((p) => sideOfTeamId(p.teamID)).find((s) => s !== undefined);
      if (side) {
        teamSides.set(team, side);
        stream.push({ kind: 'SideAssigned', team, side });
      }
    }

    if (!tagged.has(team)) {
      const tag = teamTagOf(players);
      if (tag) {
        tagged.add(team);
        stream.push({ kind: 'TeamTagged', team, tag });
      }
    }

    for (const player of players) {
      if (player.championID <= 0) continue;
      if (pickedBy.get(player.participantID) === player.championID) continue;
      pickedBy.set(player.participantID, player.championID);
      stream.push({
        kind: 'pick',
        side: sideOfTeamId(player.teamID),
        team,
        pickTurn: player.pickTurn,
        championId: player.championID,
      });
    }
  };

  for (const line of splitLines(bytes)) {
    if (line.trim() === '') continue;
    linesRead++;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      linesSkipped++;
      continue;
    }
    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
      linesSkipped++;
      continue;
    }
    jsonObjects++;

    const snapshot = snapshotSchema.safeParse(json);
    if (!snapshot.success || !CHAMP_SELECT_STATES.has(snapshot.data.gameState)) continue;
    champSelectSnapshots++;

    for (const ban of parseEach(banSchema, snapshot.data.bannedChampions)) handleBan(ban);
    handleRoster('team1', parseEach(playerSchema, snapshot.data.teamOne));
    handleRoster('team2', parseEach(playerSchema, snapshot.data.teamTwo));
  }

  if (linesRead === 0) {
    throw new MalformedDraftDataError('Livestats stream is empty');
  }
  if (jsonObjects === 0) {
    throw new MalformedDraftDataError(`Livestats stream has no JSON events (${linesSkipped} unreadable lines)`);
  }
  if (champSelectSnapshots === 0) {
    throw new MalformedDraftDataError('Livestats stream has no champion select data');
  }

  // Picks without a teamID take their roster's side, else the opposite of the other roster's.
  const rosterSide = (team: TeamKey): DraftSide => {
    const own = teamSides.get(team);
    if (own) return own;
    const other = teamSides.get(otherTeam(team));
    return other ? otherSide(other) : conventionalSide[team];
  };
  const sideOf = (action: PendingAction): DraftSide | undefined =>
    action.side ?? (action.team ? rosterSide(action.team) : undefined);

  const groups = new Map<string, { table: readonly number[]; turns: number[] }>();
  for (const item of stream) {
    if (item.kind !== 'ban' && item.kind !== 'pick') continue;
    const side = sideOf(item);
    if (!side || item.pickTurn <= 0) continue;
    const key = `${item.kind}:${side}`;
    const table = (item.kind === 'ban' ? BAN_TURNS : PICK_TURNS)[side];
    const group = groups.get(key) ?? { table, turns: [] };
    group.turns.push(item.pickTurn);
    groups.set(key, group);
  }
  const slotsByGroup = new Map<string, Map<number, number>>();
  for (const [key, group] of groups) slotsByGroup.set(key, slotsForTurns(group.table, group.turns));

  const events: DraftEvent[] = [];
  let unplacedActions = 0;
  for (const item of stream) {
    if (item.kind !== 'ban' && item.kind !== 'pick') {
      events.push(item);
      continue;
    }
    const side = sideOf(item);
    const slot = side ? slotsByGroup.get(`${item.kind}:${side}`)?.get(item.pickTurn) : undefined;
    if (!side || slot === undefined || slot >= DRAFT_SLOT_COUNT) {
      unplacedActions++;
      continue;
    }
    events.push({ kind: item.kind === 'ban' ? 'ChampionBanned' : 'ChampionPicked', side, slot, championId: item.championId });
  }

  return {
    events,
    linesRead,
    linesSkipped,
    champSelectSnapshots,
    unplacedActions,
  };
}
