import type { Series } from '@scrim-drafts/shared';
import type { GridSeriesNode } from './gridGraphqlClient.js';
import type { GridFileEntry } from './gridFileDownloadClient.js';
import type { GameMetadata } from './scrimProvider.js';

/**
 * Normalizes a GRID Central Data series node into our domain Series model.
 * Team order follows GRID's `teams` array; missing names stay empty.
 */
export function normalizeSeriesNode(node: GridSeriesNode): Series {
  const teams = node.teams ?? [];
  const nameAt = (i: number) => (teams[i]?.baseInfo?.name ?? '').trim();
  return {
    id: node.id,
    scheduledAt: node.startTimeScheduled ?? '',
    team1Name: nameAt(0),
    team2Name: nameAt(1),
  };
}

export function isRiotLivestatsFile(file: GridFileEntry): boolean {
  const description = file.description.toLowerCase();
  return description.includes('riot') && description.includes('livestats');
}

function isReady(file: GridFileEntry): boolean {
  return !file.status || file.status.toLowerCase() === 'ready';
}

/**
 * Picks the Riot livestats files out of a GRID file listing, one per game, keeping the
 * listing order.
 */
export function normalizeLivestatsFiles(files: GridFileEntry[]): GameMetadata[] {
  const seen = new Set<string>();
  const games: GameMetadata[] = [];
  for (const file of files) {
    if (!isRiotLivestatsFile(file) || !isReady(file)) continue;
    if (seen.has(file.id)) continue;
    seen.add(file.id);
    games.push({
      gameId: file.id,
      fileName: file.fileName ?? undefined,
      downloadUrl: file.fullURL,
    });
  }
  return games;
}
