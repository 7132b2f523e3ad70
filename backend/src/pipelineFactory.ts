import type { AppConfig } from './config.js';
import { AppConfigStore } from './appConfigStore.js';
import { loadChampionCatalog } from './draft/championCatalog.js';
import { GridFileDownloadClient } from './data/gridFileDownloadClient.js';
import { GridGraphqlClient } from './data/gridGraphqlClient.js';
import { GridScrimProvider } from './data/scrimProvider.js';
import type { ScrimProvider } from './data/scrimProvider.js';
import { FileLedgerStore } from './ledger/processedLedger.js';
import { PipelineOrchestrator } from './pipeline/pipelineOrchestrator.js';
import { SeriesDiscoverer } from './pipeline/seriesDiscoverer.js';
import { SeriesFetcher } from './pipeline/seriesFetcher.js';
import { OAuthRefreshCredentials, StaticTokenCredentials } from './sheets/credentials.js';
import type { CredentialProvider } from './sheets/credentials.js';
import { GoogleSheetsSink } from './sheets/googleSheetsSink.js';
import { SheetReconciler } from './sheets/sheetReconciler.js';
import { SinkWriteFailedError } from './errors.js';
import type { Logger } from './utils/logger.js';

export function createCredentials(config: AppConfig): CredentialProvider {
  switch (config.google.kind) {
    case 'oauth-refresh':
      return new OAuthRefreshCredentials(config.google);
    case 'access-token':
      return new StaticTokenCredentials(config.google.accessToken);
    case 'none':
      throw new SinkWriteFailedError(
        'No Google credentials configured: set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN, or GOOGLE_ACCESS_TOKEN',
      );
  }
}

export interface RetryPlan {
  grid: RetrySettings;
  discovery: RetrySettings;
  fetch: RetrySettings;
  sink: RetrySettings;
}

interface RetrySettings {
  retries: number;
  baseDelayMs: number;
  logger: Logger;
}

/**
 * Retry budget per layer. The GRID clients retry each request themselves, so discovery
 * and fetching on top of them do not retry again.
 */
export function retryPlan(config: AppConfig, logger: Logger): RetryPlan {
  const base: RetrySettings = { retries: config.maxRetries, baseDelayMs: config.retryBaseMs, logger };
  return { grid: base, discovery: { ...base, retries: 0 }, fetch: { ...base, retries: 0 }, sink: base };
}

export function createScrimProvider(config: AppConfig, logger: Logger): ScrimProvider {
  if (!config.gridApiKey) {
    throw new Error('GRID_API_KEY is not set');
  }
  const { grid } = retryPlan(config, logger);
  return new GridScrimProvider(
    new GridGraphqlClient(config.gridApiKey, grid),
    new GridFileDownloadClient(config.gridApiKey, grid),
  );
}

/**
 * Spreadsheet to write to: `SPREADSHEET_ID`, else the id saved in `config.json`. With
 * `createIfMissing`, a new formatted spreadsheet is created and its id saved.
 */
export async function resolveSpreadsheetId(
  config: AppConfig,
  credentials: CredentialProvider,
  logger: Logger,
  opts: { createIfMissing: boolean },
): Promise<string> {
  if (config.spreadsheetId) return config.spreadsheetId;

  const store = new AppConfigStore(config.appConfigFile);
  const saved = await store.spreadsheetId();
  if (saved) return saved;

  if (!opts.createIfMissing) {
    throw new SinkWriteFailedError(`No spreadsheet configured: set SPREADSHEET_ID or run the CLI once to create one`);
  }

  const spreadsheetId = await GoogleSheetsSink.createSpreadsheet({
    title: 'Scrim Drafts',
    sheetName: config.sheetName,
    credentials,
  });
  const sink = new GoogleSheetsSink({ spreadsheetId, sheetName: config.sheetName, credentials, logger });
  await sink.ensureHeader();
  await sink.formatSheet();
  await store.saveSpreadsheetId(spreadsheetId);
  logger.info('Created spreadsheet', { spreadsheetId, config: store.filePath });
  return spreadsheetId;
}

export interface Pipeline {
  orchestrator: PipelineOrchestrator;
  ledger: FileLedgerStore;
}

/**
 * Wires the production pipeline: GRID in, Google Sheets out, JSON ledger on disk.
 */
export async function createPipeline(
  config: AppConfig,
  logger: Logger,
  opts: { createSpreadsheetIfMissing?: boolean } = {},
): Promise<Pipeline> {
  const catalog = loadChampionCatalog(config.championCatalogFile);
  const ledger = await FileLedgerStore.open(config.ledgerFile, { logger });
  const provider = createScrimProvider(config, logger);

  const credentials = createCredentials(config);
  const spreadsheetId = await resolveSpreadsheetId(config, credentials, logger, {
    createIfMissing: opts.createSpreadsheetIfMissing ?? false,
  });
  const sink = new GoogleSheetsSink({ spreadsheetId, sheetName: config.sheetName, credentials, logger });

  const retry = retryPlan(config, logger);
  const orchestrator = new PipelineOrchestrator({
    discoverer: new SeriesDiscoverer(provider, ledger, retry.discovery),
    fetcher: new SeriesFetcher(provider, { ...retry.fetch, downloadsDir: config.downloadsDir }),
    reconciler: new SheetReconciler(sink, retry.sink),
    ledger,
    catalog,
    lookbackMonths: config.lookbackMonths,
    draftGamePolicy: config.draftGamePolicy,
    logger,
  });

  return { orchestrator, ledger };
}
