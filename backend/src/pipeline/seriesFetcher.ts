import fs from 'node:fs/promises';
import path from 'node:path';
import type { Game } from '@scrim-drafts/shared';
import type { GameMetadata, ScrimProvider } from '../data/scrimProvider.js';
import { isRetryableGridError } from '../data/gridErrors.js';
import { NoPlayableGameError, SeriesFetchFailedError, errorMessage } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface SeriesFetcherOptions {
  downloadsDir: string;
  retries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (err: unknown) => boolean;
  logger?: Logger;
}

const safeSegment = (s: string) => s.replace(/[^A-Za-z0-9._-]/g, '_');

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Downloads the livestats blobs of a series, reusing the local cache keyed by
 * (seriesId, gameId).
 */
export class SeriesFetcher {
  private readonly logger: Logger;

  constructor(
    private readonly provider: ScrimProvider,
    private readonly opts: SeriesFetcherOptions,
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  cachePath(seriesId: string, gameId: string): string {
    return path.join(this.opts.downloadsDir, 'livestats', `series_${safeSegment(seriesId)}_${safeSegment(gameId)}.jsonl`);
  }

  private retry<T>(fn: () => Promise<T>, what: string, seriesId: string): Promise<T> {
    return withRetry(fn, {
      retries: this.opts.retries ?? 3,
      baseDelayMs: this.opts.baseDelayMs ?? 500,
      sleep: this.opts.sleep,
      isRetryable: this.opts.isRetryable ?? isRetryableGridError,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn(`${what} failed, retrying`, { seriesId, attempt, delayMs, error: errorMessage(error) });
      },
    });
  }

  private async readCached(filePath: string): Promise<Uint8Array | undefined> {
    try {
      const bytes = await fs.readFile(filePath);
      return bytes.length > 0 ? new Uint8Array(bytes) : undefined;
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
  }

  /**
   * Temp file + rename: a cached file is always complete.
   */
  private async writeCache(filePath: string, bytes: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.part`;
    await fs.writeFile(tmpPath, bytes);
    await fs.rename(tmpPath, filePath);
  }

  private async loadGame(seriesId: string, meta: GameMetadata): Promise<Game> {
    const filePath = this.cachePath(seriesId, meta.gameId);

    const cached = await this.readCached(filePath);
    if (cached) {
      this.logger.info('Using cached livestats file', { seriesId, gameId: meta.gameId, path: filePath });
      return { id: meta.gameId, rawEvents: cached, sourcePath: filePath };
    }

    this.logger.info('Downloading livestats file', { seriesId, gameId: meta.gameId });
    const bytes = await this.retry(() => this.provider.getLivestats(seriesId, meta.gameId), 'Livestats download', seriesId);
    if (bytes.length === 0) {
      throw new Error('empty livestats file');
    }

    try {
      await this.writeCache(filePath, bytes);
      return { id: meta.gameId, rawEvents: bytes, sourcePath: filePath };
    } catch (err) {
      this.logger.warn('Could not cache livestats file', { seriesId, gameId: meta.gameId, error: errorMessage(err) });
      return { id: meta.gameId, rawEvents: bytes };
    }
  }

  /**
   * Games with readable livestats, in listing order. Unusable games are skipped; if none
   * remain the series fails with `NoPlayableGameError`.
   */
  async fetch(seriesId: string): Promise<Game[]> {
    let listing: GameMetadata[];
    try {
      listing = await this.retry(() => this.provider.getSeriesGames(seriesId), 'Game listing', seriesId);
    } catch (err) {
      throw new SeriesFetchFailedError(`Could not list games for series ${seriesId}: ${errorMessage(err)}`, { seriesId, cause: err });
    }

    const games: Game[] = [];
    const skipped: Array<{ gameId: string; reason: string }> = [];
    for (const meta of listing) {
      try {
        games.push(await this.loadGame(seriesId, meta));
      } catch (err) {
        const reason = errorMessage(err);
        skipped.push({ gameId: meta.gameId, reason });
        this.logger.warn('Skipping unusable game', { seriesId, gameId: meta.gameId, reason });
      }
    }

    if (games.length === 0) {
      throw new NoPlayableGameError(seriesId, skipped);
    }
    return games;
  }
}
