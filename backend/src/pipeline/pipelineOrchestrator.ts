import { resolveTeamNames } from '@scrim-drafts/shared';
import type { Game, RunSummary, Series, SeriesStage, SkippedSeries } from '@scrim-drafts/shared';
import type { ChampionCatalog } from '../draft/championCatalog.js';
import { extractDraft } from '../draft/draftExtractor.js';
import type { DraftExtraction } from '../draft/draftExtractor.js';
import type { ProcessedLedger } from '../ledger/processedLedger.js';
import type { SheetReconciler } from '../sheets/sheetReconciler.js';
import type { SeriesDiscoverer } from './seriesDiscoverer.js';
import { discoveryWindow } from './seriesDiscoverer.js';
import type { SeriesFetcher } from './seriesFetcher.js';
import {
  MalformedDraftDataError,
  errorMessage,
  isFatalPipelineError,
  isMalformedDraftDataError,
  isPipelineError,
} from '../errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export type DraftGamePolicy = 'first-parseable' | 'last-parseable';

export const DRAFT_GAME_POLICIES: readonly DraftGamePolicy[] = ['first-parseable', 'last-parseable'];

export interface PipelineOrchestratorDeps {
  discoverer: SeriesDiscoverer;
  fetcher: SeriesFetcher;
  reconciler: SheetReconciler;
  ledger: ProcessedLedger;
  catalog: ChampionCatalog;
  lookbackMonths: number;
  draftGamePolicy?: DraftGamePolicy;
  logger?: Logger;
}

interface ExtractedGame {
  game: Game;
  extraction: DraftExtraction;
}

/**
 * Drives each newly discovered series through fetch → extract → reconcile → commit, one
 * series at a time. The ledger is only written after the sink holds the row.
 */
export class PipelineOrchestrator {
  private readonly logger: Logger;
  private readonly policy: DraftGamePolicy;

  constructor(private readonly deps: PipelineOrchestratorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.policy = deps.draftGamePolicy ?? 'first-parseable';
  }

  /**
   * Tries the games in policy order and keeps the first one whose every ban and pick lands
   * in a slot.
   */
  private extractFromGames(seriesId: string, games: Game[]): ExtractedGame {
    const ordered = this.policy === 'last-parseable' ? [...games].reverse() : games;
    const reasons: string[] = [];

    for (const game of ordered) {
      try {
        const extraction = extractDraft(seriesId, game.rawEvents, this.deps.catalog);
        if (extraction.stats.unplacedActions > 0) {
          throw new MalformedDraftDataError(
            `${extraction.stats.unplacedActions} draft actions could not be placed`,
            { seriesId },
          );
        }
        return { game, extraction };
      } catch (err) {
        if (!isMalformedDraftDataError(err)) throw err;
        reasons.push(`${game.id}: ${err.message}`);
        this.logger.warn('Livestats game has no usable draft', { seriesId, gameId: game.id, reason: err.message });
      }
    }

    throw new MalformedDraftDataError(`No game of series ${seriesId} yielded a draft (${reasons.join('; ')})`, { seriesId });
  }

  private async processSeries(series: Series, onStage: (stage: SeriesStage) => void): Promise<'appended' | 'already-present'> {
    onStage('Discovered');

    const games = await this.deps.fetcher.fetch(series.id);
    onStage('Fetched');

    const { game, extraction } = this.extractFromGames(series.id, games);
    onStage('Extracted');

    const outcome = await this.deps.reconciler.append(series, extraction.draft, extraction.tags);
    onStage('Reconciled');

    const names = resolveTeamNames(series, extraction.tags);
    await this.deps.ledger.commit({
      seriesId: series.id,
      processedAt: new Date().toISOString(),
      team1Name: names.team1,
      team2Name: names.team2,
      filePath: game.sourcePath ?? '',
    });
    onStage('Committed');

    return outcome;
  }

  async run(now: Date = new Date()): Promise<RunSummary> {
    const startedAt = new Date().toISOString();
    const window = discoveryWindow(now, this.deps.lookbackMonths);
    this.logger.info('Scrim run started', {
      since: window.since.toISOString(),
      until: window.until.toISOString(),
      policy: this.policy,
    });

    this.deps.reconciler.beginRun();
    const candidates = await this.deps.discoverer.discover(window.since, window.until);

    let processed = 0;
    let alreadyInSink = 0;
    const skippedSeries: SkippedSeries[] = [];

    for (const series of candidates) {
      let stage: SeriesStage = 'Discovered';
      try {
        const outcome = await this.processSeries(series, (next) => {
          stage = next;
        });
        processed += 1;
        if (outcome === 'already-present') alreadyInSink += 1;
        this.logger.info('Series committed', { seriesId: series.id, outcome });
      } catch (err) {
        if (isFatalPipelineError(err) || !isPipelineError(err)) {
          this.logger.error('Scrim run aborted', { seriesId: series.id, stage, error: errorMessage(err) });
          throw err;
        }
        const skipped: SkippedSeries = {
          seriesId: series.id,
          stage: err.stage ?? 'fetch',
          reason: errorMessage(err),
        };
        skippedSeries.push(skipped);
        this.logger.warn('Series skipped', { ...skipped, lastStage: stage, error: err.name });
      }
    }

    const summary: RunSummary = {
      startedAt,
      finishedAt: new Date().toISOString(),
      window: { since: window.since.toISOString(), until: window.until.toISOString() },
      discovered: candidates.length,
      processed,
      alreadyInSink,
      skipped: skippedSeries.length,
      skippedSeries,
    };
    this.logger.info('Scrim run finished', {
      discovered: summary.discovered,
      processed: summary.processed,
      alreadyInSink: summary.alreadyInSink,
      skipped: summary.skipped,
    });
    return summary;
  }
}
