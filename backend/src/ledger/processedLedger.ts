import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { LedgerEntry } from '@scrim-drafts/shared';
import { LedgerCorruptError, LedgerWriteFailedError, errorMessage } from '../errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface ProcessedLedger {
  contains(seriesId: string): boolean;
  /**
   * Durably records `entry`. Resolves `false` without writing when the series is already
   * present; entries are never overwritten.
   */
  commit(entry: LedgerEntry): Promise<boolean>;
  load(): Set<string>;
  allEntries(): LedgerEntry[];
}

/**
 * On-disk shape, kept compatible with ledgers written by earlier versions of the tool.
 */
const storedEntrySchema = z.object({
  processed_at: z.string(),
  file_path: z.string().default(''),
  team1: z.string().default(''),
  team2: z.string().default(''),
});

const ledgerFileSchema = z.object({
  processed_series: z.record(storedEntrySchema),
  last_update: z.string().nullish(),
});

type StoredEntry = z.infer<typeof storedEntrySchema>;

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function toStored(entry: LedgerEntry): StoredEntry {
  return {
    processed_at: entry.processedAt,
    file_path: entry.filePath,
    team1: entry.team1Name,
    team2: entry.team2Name,
  };
}

function fromStored(seriesId: string, stored: StoredEntry): LedgerEntry {
  return {
    seriesId,
    processedAt: stored.processed_at,
    filePath: stored.file_path,
    team1Name: stored.team1,
    team2Name: stored.team2,
  };
}

/**
 * JSON-file ledger. Every commit rewrites the whole file through a temp file + fsync +
 * rename, so a crash leaves either the old or the new ledger on disk, never a torn one.
 */
export class FileLedgerStore implements ProcessedLedger {
  private readonly entries: Map<string, LedgerEntry>;

  private constructor(
    readonly filePath: string,
    entries: Map<string, LedgerEntry>,
    private readonly logger: Logger,
  ) {
    this.entries = entries;
  }

  static async open(filePath: string, opts: { logger?: Logger } = {}): Promise<FileLedgerStore> {
    const logger = opts.logger ?? silentLogger;

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        logger.info('Ledger not found, starting empty', { path: filePath });
        return new FileLedgerStore(filePath, new Map(), logger);
      }
      throw new LedgerCorruptError(filePath, `unreadable (${errorMessage(err)})`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new LedgerCorruptError(filePath, 'not valid JSON', err);
    }

    const parsed = ledgerFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new LedgerCorruptError(filePath, `${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`);
    }

    const entries = new Map<string, LedgerEntry>();
    for (const [seriesId, stored] of Object.entries(parsed.data.processed_series)) {
      entries.set(seriesId, fromStored(seriesId, stored));
    }
    logger.info('Ledger loaded', { path: filePath, entries: entries.size });
    return new FileLedgerStore(filePath, entries, logger);
  }

  contains(seriesId: string): boolean {
    return this.entries.has(seriesId);
  }

  load(): Set<string> {
    return new Set(this.entries.keys());
  }

  allEntries(): LedgerEntry[] {
    return [...this.entries.values()];
  }

  async commit(entry: LedgerEntry): Promise<boolean> {
    if (this.entries.has(entry.seriesId)) return false;

    const next = new Map(this.entries);
    next.set(entry.seriesId, entry);
    await this.persist(next);
    this.entries.set(entry.seriesId, entry);
    return true;
  }

  private async persist(entries: Map<string, LedgerEntry>): Promise<void> {
    const processed_series: Record<string, StoredEntry> = {};
    for (const [seriesId, entry] of entries) processed_series[seriesId] = toStored(entry);
    const body = JSON.stringify({ processed_series, last_update: new Date().toISOString() }, null, 2);

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(body, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn('Could not remove ledger temp file', { path: tmpPath, error: errorMessage(cleanupErr) });
      });
      throw new LedgerWriteFailedError(`Failed to write ledger ${this.filePath}: ${errorMessage(err)}`, {
        seriesId: [...entries.keys()].find((id) => !this.entries.has(id)),
        cause: err,
      });
    }
  }
}
