import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { SINK_COLUMNS } from '@scrim-drafts/shared';
import type { CredentialProvider } from './credentials.js';
import { SinkTransientError, SinkWriteFailedError, errorMessage } from '../errors.js';
import { parseRetryAfterMs } from '../data/gridErrors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export const SHEETS_API_BASE = 'https://sheets.googleapis.com/v4/spreadsheets';

export type UpsertResult = 'inserted' | 'updated';

/**
 * Row store keyed by a natural key held in the first column.
 */
export interface TabularSink {
  hasRow(key: string): Promise<boolean>;
  upsertRow(key: string, cells: string[]): Promise<UpsertResult>;
  /** Drops cached state so the next read sees the store as it is now. */
  refresh(): void;
}

const valueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]).transform(String))).default([]),
});

const appendResponseSchema = z.object({
  updates: z.object({ updatedRange: z.string().optional() }).optional(),
});

const spreadsheetMetaSchema = z.object({
  spreadsheetId: z.string().optional(),
  sheets: z
    .array(z.object({ properties: z.object({ sheetId: z.number(), title: z.string() }) }))
    .default([]),
});

export function columnLetter(n: number): string {
  let s = '';
  let x = n;
  while (x > 0) {
    const rem = (x - 1) % 26;
    s = String.fromCharCode(65 + rem) + s;
    x = Math.floor((x - 1) / 26);
  }
  return s;
}

export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/** Row number out of an A1 range such as `'Draft Data'!A7:X7`. */
export function rowOfRange(range: string | undefined): number | undefined {
  const match = range?.match(/![A-Z]+(\d+)/);
  return match ? Number(match[1]) : undefined;
}

interface SheetsRequestDeps {
  http: AxiosInstance;
  credentials: CredentialProvider;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null) return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' ? value : undefined;
}

function toSinkError(err: unknown, what: string): Error {
  if (err instanceof SinkWriteFailedError || err instanceof SinkTransientError) return err;
  if (!axios.isAxiosError(err)) {
    return new SinkWriteFailedError(`${what}: ${errorMessage(err)}`, { cause: err });
  }
  const status = err.response?.status;
  if (status === undefined) {
    return new SinkTransientError(`${what}: network error (${err.message})`, { cause: err });
  }
  if (status === 429 || status >= 500) {
    return new SinkTransientError(`${what}: HTTP ${status}`, {
      status,
      retryAfterMs: parseRetryAfterMs(headerValue(err.response?.headers, 'retry-after')),
      cause: err,
    });
  }
  return new SinkWriteFailedError(`${what}: HTTP ${status}`, { status, cause: err });
}

/**
 * Authorized Sheets API call. Refreshes an invalid token up front, and retries exactly
 * once after a 401 with a freshly refreshed token.
 */
async function sheetsRequest(deps: SheetsRequestDeps, what: string, config: AxiosRequestConfig): Promise<unknown> {
  const send = async () => {
    const response = await deps.http.request<unknown>({
      ...config,
      headers: { ...config.headers, Authorization: `Bearer ${deps.credentials.accessToken()}` },
    });
    return response.data;
  };

  try {
    if (!deps.credentials.isValid()) await deps.credentials.refresh();
    try {
      return await send();
    } catch (err) {
      if (!axios.isAxiosError(err) || err.response?.status !== 401) throw err;
      await deps.credentials.refresh();
      return await send();
    }
  } catch (err) {
    throw toSinkError(err, what);
  }
}

export interface GoogleSheetsSinkOptions {
  spreadsheetId: string;
  sheetName: string;
  credentials: CredentialProvider;
  http?: AxiosInstance;
  baseUrl?: string;
  logger?: Logger;
}

/**
 * One row per series in a Google Sheet; column A holds the series id. Keys are read once
 * per `refresh()` and then tracked locally as rows are written.
 */
export class GoogleSheetsSink implements TabularSink {
  private readonly deps: SheetsRequestDeps;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private keyRows?: Map<string, number>;

  constructor(private readonly opts: GoogleSheetsSinkOptions) {
    this.deps = { http: opts.http ?? axios.create(), credentials: opts.credentials };
    this.baseUrl = (opts.baseUrl ?? SHEETS_API_BASE).replace(/\/+$/, '');
    this.logger = opts.logger ?? silentLogger;
  }

  private valuesUrl(range: string, suffix = ''): string {
    return `${this.baseUrl}/${encodeURIComponent(this.opts.spreadsheetId)}/values/${encodeURIComponent(range)}${suffix}`;
  }

  private range(a1: string): string {
    return `${quoteSheetName(this.opts.sheetName)}!${a1}`;
  }

  private get lastColumn(): string {
    return columnLetter(SINK_COLUMNS.length);
  }

  /**
   * Loads column A into a key → row map. An empty sheet gets the header row first.
   */
  private async loadKeys(): Promise<Map<string, number>> {
    if (this.keyRows) return this.keyRows;

    const body = await sheetsRequest(this.deps, 'read key column', {
      method: 'GET',
      url: this.valuesUrl(this.range('A:A')),
      params: { majorDimension: 'ROWS' },
    });
    const parsed = valueRangeSchema.safeParse(body);
    if (!parsed.success) {
      throw new SinkWriteFailedError('Unexpected response reading the key column');
    }

    const keys = new Map<string, number>();
    parsed.data.values.forEach((row, index) => {
      const key = (row[0] ?? '').trim();
      if (index === 0 || key === '' || keys.has(key)) return;
      keys.set(key, index + 1);
    });

    if (parsed.data.values.length === 0) {
      await this.writeHeader();
    }

    this.keyRows = keys;
    return keys;
  }

  private async writeHeader(): Promise<void> {
    await sheetsRequest(this.deps, 'write header row', {
      method: 'PUT',
      url: this.valuesUrl(this.range(`A1:${this.lastColumn}1`)),
      params: { valueInputOption: 'RAW' },
      data: { values: [[...SINK_COLUMNS]] },
    });
    this.logger.info('Wrote sheet header row', { sheet: this.opts.sheetName });
  }

  /** Writes the header row when the sheet is empty. */
  async ensureHeader(): Promise<void> {
    await this.loadKeys();
  }

  async hasRow(key: string): Promise<boolean> {
    return (await this.loadKeys()).has(key);
  }

  refresh(): void {
    this.keyRows = undefined;
  }

  async upsertRow(key: string, cells: string[]): Promise<UpsertResult> {
    const keys = await this.loadKeys();
    const existing = keys.get(key);

    try {
      if (existing !== undefined) {
        await sheetsRequest(this.deps, `update row for ${key}`, {
          method: 'PUT',
          url: this.valuesUrl(this.range(`A${existing}:${this.lastColumn}${existing}`)),
          params: { valueInputOption: 'RAW' },
          data: { values: [cells] },
        });
        return 'updated';
      }

      const body = await sheetsRequest(this.deps, `append row for ${key}`, {
        method: 'POST',
        url: this.valuesUrl(this.range(`A:${this.lastColumn}`), ':append'),
        params: { valueInputOption: 'RAW', insertDataOption: 'INSERT_ROWS' },
        data: { values: [cells] },
      });
      const parsed = appendResponseSchema.safeParse(body);
      const row = parsed.success ? rowOfRange(parsed.data.updates?.updatedRange) : undefined;
      if (row === undefined) {
        // Unknown position: re-read column A before the next write.
        this.keyRows = undefined;
      } else {
        keys.set(key, row);
      }
      return 'inserted';
    } catch (err) {
      // The write may have landed before the failure surfaced.
      this.keyRows = undefined;
      throw err;
    }
  }

  private async sheetId(): Promise<number> {
    const body = await sheetsRequest(this.deps, 'read spreadsheet metadata', {
      method: 'GET',
      url: `${this.baseUrl}/${encodeURIComponent(this.opts.spreadsheetId)}`,
      params: { fields: 'sheets.properties' },
    });
    const parsed = spreadsheetMetaSchema.safeParse(body);
    const sheet = parsed.success
      ? parsed.data.sheets.find((s) => s.properties.title === this.opts.sheetName)
      : undefined;
    if (!sheet) {
      throw new SinkWriteFailedError(`Sheet "${this.opts.sheetName}" not found in spreadsheet ${this.opts.spreadsheetId}`);
    }
    return sheet.properties.sheetId;
  }

  /**
   * Freezes and bolds the header row and auto-sizes the draft columns.
   */
  async formatSheet(): Promise<void> {
    const sheetId = await this.sheetId();
    await sheetsRequest(this.deps, 'format sheet', {
      method: 'POST',
      url: `${this.baseUrl}/${encodeURIComponent(this.opts.spreadsheetId)}:batchUpdate`,
      data: {
        requests: [
          {
            updateSheetProperties: {
              properties: { sheetId, gridProperties: { frozenRowCount: 1 } },
              fields: 'gridProperties.frozenRowCount',
            },
          },
          {
            repeatCell: {
              range: { sheetId, startRowIndex: 0, endRowIndex: 1 },
              cell: { userEnteredFormat: { textFormat: { bold: true } } },
              fields: 'userEnteredFormat.textFormat.bold',
            },
          },
          {
            autoResizeDimensions: {
              dimensions: { sheetId, dimension: 'COLUMNS', startIndex: 0, endIndex: SINK_COLUMNS.length },
            },
          },
        ],
      },
    });
  }

  /**
   * Creates a spreadsheet with a single, empty draft sheet and returns its id.
   */
  static async createSpreadsheet(opts: {
    title: string;
    sheetName: string;
    credentials: CredentialProvider;
    http?: AxiosInstance;
    baseUrl?: string;
  }): Promise<string> {
    const deps: SheetsRequestDeps = { http: opts.http ?? axios.create(), credentials: opts.credentials };
    const body = await sheetsRequest(deps, 'create spreadsheet', {
      method: 'POST',
      url: (opts.baseUrl ?? SHEETS_API_BASE).replace(/\/+$/, ''),
      params: { fields: 'spreadsheetId' },
      data: {
        properties: { title: opts.title },
        sheets: [
          {
            properties: {
              title: opts.sheetName,
              gridProperties: { rowCount: 1000, columnCount: SINK_COLUMNS.length },
            },
          },
        ],
      },
    });
    const parsed = spreadsheetMetaSchema.safeParse(body);
    if (!parsed.success || !parsed.data.spreadsheetId) {
      throw new SinkWriteFailedError('Spreadsheet creation returned no spreadsheetId');
    }
    return parsed.data.spreadsheetId;
  }
}
