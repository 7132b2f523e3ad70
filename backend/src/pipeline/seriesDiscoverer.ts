import type { Series, TimeWindow } from '@scrim-drafts/shared';
import type { ScrimProvider } from '../data/scrimProvider.js';
import type { ProcessedLedger } from '../ledger/processedLedger.js';
import { isRetryableGridError } from '../data/gridErrors.js';
import { DiscoveryFailedError, errorMessage } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface SeriesDiscovererOptions {
  retries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (err: unknown) => boolean;
  logger?: Logger;
}

/**
 * `[now - lookbackMonths, now]`, stepping back calendar months in UTC. The day is clamped
 * to the end of a shorter target month (Apr 30 minus 2 months is Feb 29 in a leap year).
 */
export function discoveryWindow(now: Date, lookbackMonths: number): TimeWindow {
  const month = now.getUTCMonth() - lookbackMonths;
  const lastDay = new Date(Date.UTC(now.getUTCFullYear(), month + 1, 0)).getUTCDate();
  const since = new Date(now.getTime());
  since.setUTCFullYear(now.getUTCFullYear(), month, Math.min(now.getUTCDate(), lastDay));
  return { since, until: new Date(now.getTime()) };
}

function scheduledTime(series: Series): number {
  const t = new Date(series.scheduledAt).getTime();
  return Number.isFinite(t) ? t : Number.POSITIVE_INFINITY;
}

/**
 * Chronological order so commits advance through the window; undated series go last.
 */
export function sortByScheduledAt(series: Series[]): Series[] {
  return [...series].sort((a, b) => {
    const ta = scheduledTime(a);
    const tb = scheduledTime(b);
    if (ta !== tb) return ta < tb ? -1 : 1;
    return a.id.localeCompare(b.id);
  });
}

export class SeriesDiscoverer {
  private readonly logger: Logger;

  constructor(
    private readonly provider: ScrimProvider,
    private readonly ledger: Pick<ProcessedLedger, 'contains'>,
    private readonly opts: SeriesDiscovererOptions = {},
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Scrim series scheduled within `[since, until]` that the ledger has not seen yet.
   * Throws `DiscoveryFailedError` once the retry budget is spent.
   */
  async discover(since: Date, until: Date): Promise<Series[]> {
    let listed: Series[];
    try {
      listed = await withRetry(() => this.provider.listSeries({ since, until }), {
        retries: this.opts.retries ?? 2,
        baseDelayMs: this.opts.baseDelayMs ?? 1000,
        sleep: this.opts.sleep,
        isRetryable: this.opts.isRetryable ?? isRetryableGridError,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn('Series discovery failed, retrying', { attempt, delayMs, error: errorMessage(error) });
        },
      });
    } catch (err) {
      throw new DiscoveryFailedError(`Series discovery failed: ${errorMessage(err)}`, { cause: err });
    }

    const seen = new Set<string>();
    const fresh: Series[] = [];
    for (const series of listed) {
      if (seen.has(series.id)) continue;
      seen.add(series.id);
      if (this.ledger.contains(series.id)) continue;
      fresh.push(series);
    }

    this.logger.info('Discovered scrim series', {
      since: since.toISOString(),
      until: until.toISOString(),
      listed: seen.size,
      new: fresh.length,
    });
    return sortByScheduledAt(fresh);
  }
}
