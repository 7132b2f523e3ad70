import { toSinkRow } from '@scrim-drafts/shared';
import type { DraftRecord, Series, TeamTags } from '@scrim-drafts/shared';
import type { TabularSink } from './googleSheetsSink.js';
import { errorMessage, isSinkTransientError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export type AppendOutcome = 'appended' | 'already-present';

export interface SheetReconcilerOptions {
  retries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Writes one row per series, at most once. Transient sink errors are retried here; once
 * the budget is spent the last `SinkTransientError` propagates to the caller.
 */
export class SheetReconciler {
  private readonly logger: Logger;

  constructor(
    private readonly sink: TabularSink,
    private readonly opts: SheetReconcilerOptions = {},
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  /** Starts a run against the sink's current contents rather than a previous run's view. */
  beginRun(): void {
    this.sink.refresh();
  }

  async append(series: Series, draft: DraftRecord, tags: TeamTags = {}): Promise<AppendOutcome> {
    const row = toSinkRow(series, draft, tags);

    return withRetry(
      async () => {
        if (await this.sink.hasRow(row.key)) return 'already-present';
        await this.sink.upsertRow(row.key, row.cells);
        return 'appended';
      },
      {
        retries: this.opts.retries ?? 3,
        baseDelayMs: this.opts.baseDelayMs ?? 1000,
        sleep: this.opts.sleep,
        isRetryable: isSinkTransientError,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn('Sink write failed, retrying', { seriesId: series.id, attempt, delayMs, error: errorMessage(error) });
        },
      },
    );
  }
}
