import path from 'node:path';
import { DRAFT_GAME_POLICIES } from './pipeline/pipelineOrchestrator.js';
import type { DraftGamePolicy } from './pipeline/pipelineOrchestrator.js';
import { DEFAULT_CHAMPION_CATALOG_FILE } from './draft/championCatalog.js';

export type GoogleCredentialConfig =
  | { kind: 'oauth-refresh'; clientId: string; clientSecret: string; refreshToken: string }
  | { kind: 'access-token'; accessToken: string }
  | { kind: 'none' };

export interface AppConfig {
  gridApiKey: string;
  spreadsheetId?: string;
  sheetName: string;
  lookbackMonths: number;
  downloadsDir: string;
  ledgerFile: string;
  draftGamePolicy: DraftGamePolicy;
  maxRetries: number;
  retryBaseMs: number;
  championCatalogFile: string;
  appConfigFile: string;
  google: GoogleCredentialConfig;
  port: number;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

export function toBoundedInt(v: unknown, fallback: number, min: number, max: number): number {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? parseInt(v, 10) : NaN;
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(n)));
}

function str(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parsePolicy(raw: string | undefined): DraftGamePolicy {
  const value = raw?.toLowerCase();
  return DRAFT_GAME_POLICIES.find((p) => p === value) ?? 'first-parseable';
}

function googleCredentials(env: Env): GoogleCredentialConfig {
  const clientId = str(env, 'GOOGLE_CLIENT_ID');
  const clientSecret = str(env, 'GOOGLE_CLIENT_SECRET');
  const refreshToken = str(env, 'GOOGLE_REFRESH_TOKEN');
  if (clientId && clientSecret && refreshToken) {
    return { kind: 'oauth-refresh', clientId, clientSecret, refreshToken };
  }
  const accessToken = str(env, 'GOOGLE_ACCESS_TOKEN');
  if (accessToken) return { kind: 'access-token', accessToken };
  return { kind: 'none' };
}

/**
 * Reads settings from an env map (normally `process.env`). Relative paths resolve against
 * `cwd`.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const resolvePath = (value: string) => path.resolve(cwd, value);
  const catalogFile = str(env, 'CHAMPION_CATALOG_FILE');

  return {
    gridApiKey: str(env, 'GRID_API_KEY') ?? '',
    spreadsheetId: str(env, 'SPREADSHEET_ID'),
    sheetName: str(env, 'SHEET_NAME') ?? 'Draft Data',
    lookbackMonths: toBoundedInt(env.SCRIM_LOOKBACK_MONTHS, 2, 1, 24),
    downloadsDir: resolvePath(str(env, 'SCRIM_DOWNLOADS_DIR') ?? 'scrim_downloads'),
    ledgerFile: resolvePath(str(env, 'SCRIM_LEDGER_FILE') ?? 'processed_scrims.json'),
    draftGamePolicy: parsePolicy(str(env, 'SCRIM_DRAFT_GAME_POLICY')),
    maxRetries: toBoundedInt(env.SCRIM_MAX_RETRIES, 3, 0, 10),
    retryBaseMs: toBoundedInt(env.SCRIM_RETRY_BASE_MS, 500, 0, 60_000),
    championCatalogFile: catalogFile ? resolvePath(catalogFile) : DEFAULT_CHAMPION_CATALOG_FILE,
    appConfigFile: resolvePath(str(env, 'APP_CONFIG_FILE') ?? 'config.json'),
    google: googleCredentials(env),
    port: toBoundedInt(env.PORT, 3001, 1, 65535),
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:5173')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  };
}
