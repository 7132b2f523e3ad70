import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { DEFAULT_GRID_API_BASE } from './gridGraphqlClient.js';
import { GridRateLimitError, GridRequestError, isRetryableGridError, parseRetryAfterMs } from './gridErrors.js';
import { withRetry } from '../utils/retry.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

const fileEntrySchema = z.object({
  id: z.string(),
  description: z.string().default(''),
  status: z.string().nullish(),
  fileName: z.string().nullish(),
  fullURL: z.string(),
});

export type GridFileEntry = z.infer<typeof fileEntrySchema>;

const fileListSchema = z.object({
  files: z.array(z.unknown()).default([]),
});

export interface GridFileDownloadClientOptions {
  http?: AxiosInstance;
  baseUrl?: string;
  retries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  timeoutMs?: number;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null) return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Maps an axios failure onto the GRID error types the retry policy understands.
 */
export function toGridError(err: unknown, what: string): Error {
  if (!axios.isAxiosError(err)) return err instanceof Error ? err : new Error(errorMessage(err));
  const status = err.response?.status;
  if (status === undefined) {
    return new GridRequestError(`${what}: network error (${err.message})`, { network: true, cause: err });
  }
  if (status === 429) {
    return new GridRateLimitError(`${what}: rate limited (429)`, parseRetryAfterMs(headerValue(err.response?.headers, 'retry-after')));
  }
  return new GridRequestError(`${what}: HTTP ${status}`, { status, cause: err });
}

/**
 * GRID File Download API: per-series file listings and raw file downloads.
 */
export class GridFileDownloadClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly retries: number;
  private readonly baseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(private readonly apiKey: string, opts: GridFileDownloadClientOptions = {}) {
    this.http = opts.http ?? axios.create();
    this.baseUrl = (opts.baseUrl ?? DEFAULT_GRID_API_BASE).replace(/\/+$/, '');
    this.retries = opts.retries ?? 3;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
    this.sleep = opts.sleep;
    this.logger = opts.logger ?? silentLogger;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  private retrying<T>(what: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          throw toGridError(err, what);
        }
      },
      {
        retries: this.retries,
        baseDelayMs: this.baseDelayMs,
        sleep: this.sleep,
        isRetryable: isRetryableGridError,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn('GRID file request failed, retrying', { what, attempt, delayMs, error: errorMessage(error) });
        },
      },
    );
  }

  /**
   * Files GRID holds for a series. A 404 means nothing has been uploaded yet.
   */
  async listFiles(seriesId: string): Promise<GridFileEntry[]> {
    const url = `${this.baseUrl}/file-download/list/${encodeURIComponent(seriesId)}`;
    let body: unknown;
    try {
      body = await this.retrying(`list files for series ${seriesId}`, async () => {
        const response = await this.http.get<unknown>(url, {
          headers: { 'x-api-key': this.apiKey },
          timeout: this.timeoutMs,
        });
        return response.data;
      });
    } catch (err) {
      if (err instanceof GridRequestError && err.status === 404) return [];
      throw err;
    }

    const parsed = fileListSchema.safeParse(body);
    if (!parsed.success) {
      throw new GridRequestError(`Unexpected file listing for series ${seriesId}`);
    }
    const files: GridFileEntry[] = [];
    for (const item of parsed.data.files) {
      const entry = fileEntrySchema.safeParse(item);
      if (entry.success) files.push(entry.data);
    }
    return files;
  }

  async download(fileUrl: string): Promise<Uint8Array> {
    return this.retrying(`download ${fileUrl}`, async () => {
      const response = await this.http.get<ArrayBuffer>(fileUrl, {
        headers: { 'x-api-key': this.apiKey },
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
      });
      return new Uint8Array(response.data);
    });
  }
}
