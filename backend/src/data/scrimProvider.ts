import type { Series, TimeWindow } from '@scrim-drafts/shared';
import type { GridGraphqlClient } from './gridGraphqlClient.js';
import type { GridFileDownloadClient } from './gridFileDownloadClient.js';
import { normalizeLivestatsFiles, normalizeSeriesNode } from './normalizer.js';

export interface GameMetadata {
  gameId: string;
  fileName?: string;
  downloadUrl: string;
}

/**
 * Everything the pipeline needs from the remote esports data provider.
 */
export interface ScrimProvider {
  listSeries(window: TimeWindow): Promise<Series[]>;
  getSeriesGames(seriesId: string): Promise<GameMetadata[]>;
  getLivestats(seriesId: string, gameId: string): Promise<Uint8Array>;
}

/**
 * Remembers the download URLs of the most recently listed series only.
 */
export class GridScrimProvider implements ScrimProvider {
  private listed?: { seriesId: string; urls: Map<string, string> };

  constructor(
    private readonly graphql: GridGraphqlClient,
    private readonly files: GridFileDownloadClient,
  ) {}

  async listSeries(window: TimeWindow): Promise<Series[]> {
    const nodes = await this.graphql.listScrimSeries(window);
    return nodes.map(normalizeSeriesNode);
  }

  async getSeriesGames(seriesId: string): Promise<GameMetadata[]> {
    const games = normalizeLivestatsFiles(await this.files.listFiles(seriesId));
    this.listed = { seriesId, urls: new Map(games.map((game) => [game.gameId, game.downloadUrl])) };
    return games;
  }

  async getLivestats(seriesId: string, gameId: string): Promise<Uint8Array> {
    if (this.listed?.seriesId !== seriesId || !this.listed.urls.has(gameId)) {
      await this.getSeriesGames(seriesId);
    }
    const url = this.listed?.urls.get(gameId);
    if (!url) {
      throw new Error(`GRID lists no livestats file ${gameId} for series ${seriesId}`);
    }
    return this.files.download(url);
  }
}
