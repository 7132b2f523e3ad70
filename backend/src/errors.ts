import type { PipelineStep } from '@scrim-drafts/shared';

interface ErrorContext {
  seriesId?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the pipeline classifies. `stage` is the step that was
 * being attempted when the error surfaced.
 */
export class PipelineError extends Error {
  seriesId?: string;
  stage?: PipelineStep;

  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, ctx.cause === undefined ? undefined : { cause: ctx.cause });
    this.name = 'PipelineError';
    this.seriesId = ctx.seriesId;
  }
}

/** Fatal: the run aborts before touching the sink or the ledger. */
export class DiscoveryFailedError extends PipelineError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, ctx);
    this.name = 'DiscoveryFailed';
  }
}

export class SeriesFetchFailedError extends PipelineError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, ctx);
    this.name = 'SeriesFetchFailed';
    this.stage = 'fetch';
  }
}

export class NoPlayableGameError extends PipelineError {
  skippedGames: Array<{ gameId: string; reason: string }>;

  constructor(seriesId: string, skippedGames: Array<{ gameId: string; reason: string }>) {
    const detail = skippedGames.length === 0
      ? 'no livestats files listed'
      : skippedGames.map((g) => `${g.gameId}: ${g.reason}`).join('; ');
    super(`No playable game for series ${seriesId} (${detail})`, { seriesId });
    this.name = 'NoPlayableGame';
    this.stage = 'fetch';
    this.skippedGames = skippedGames;
  }
}

export class MalformedDraftDataError extends PipelineError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, ctx);
    this.name = 'MalformedDraftData';
    this.stage = 'extract';
  }
}

/** Fatal at startup: the persisted ledger can't be trusted either way. */
export class LedgerCorruptError extends PipelineError {
  path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Ledger at ${path} is corrupt: ${reason}`, { cause });
    this.name = 'LedgerCorrupt';
    this.path = path;
  }
}

export class LedgerWriteFailedError extends PipelineError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, ctx);
    this.name = 'LedgerWriteFailed';
    this.stage = 'commit';
  }
}

/** Unrecoverable sink failure (bad schema, revoked access). Fatal for the run. */
export class SinkWriteFailedError extends PipelineError {
  status?: number;

  constructor(message: string, ctx: ErrorContext & { status?: number } = {}) {
    super(message, ctx);
    this.name = 'SinkWriteFailed';
    this.stage = 'reconcile';
    this.status = ctx.status;
  }
}

export class SinkTransientError extends PipelineError {
  status?: number;
  retryAfterMs?: number;

  constructor(message: string, ctx: ErrorContext & { status?: number; retryAfterMs?: number } = {}) {
    super(message, ctx);
    this.name = 'SinkTransientError';
    this.stage = 'reconcile';
    this.status = ctx.status;
    this.retryAfterMs = ctx.retryAfterMs;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function isDiscoveryFailedError(err: unknown): err is DiscoveryFailedError {
  return err instanceof DiscoveryFailedError;
}

export function isNoPlayableGameError(err: unknown): err is NoPlayableGameError {
  return err instanceof NoPlayableGameError;
}

export function isMalformedDraftDataError(err: unknown): err is MalformedDraftDataError {
  return err instanceof MalformedDraftDataError;
}

export function isLedgerCorruptError(err: unknown): err is LedgerCorruptError {
  return err instanceof LedgerCorruptError;
}

export function isSinkWriteFailedError(err: unknown): err is SinkWriteFailedError {
  return err instanceof SinkWriteFailedError;
}

export function isSinkTransientError(err: unknown): err is SinkTransientError {
  return err instanceof SinkTransientError;
}

/**
 * Errors that abort the whole run rather than a single series.
 */
export function isFatalPipelineError(err: unknown): boolean {
  return err instanceof DiscoveryFailedError
    || err instanceof LedgerCorruptError
    || err instanceof LedgerWriteFailedError
    || err instanceof SinkWriteFailedError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
