import { z } from 'zod';
import type { TimeWindow } from '@scrim-drafts/shared';
import { GridRateLimitError, GridRequestError, isRetryableGridError, parseRetryAfterMs } from './gridErrors.js';
import { withRetry } from '../utils/retry.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

export const DEFAULT_GRID_API_BASE = 'https://api.grid.gg';

/** GRID title id for League of Legends. */
export const LOL_TITLE_ID = '3';

/**
 * GRID Central Data schema (subset of the fields this tool reads).
 */
const gridSeriesNodeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  startTimeScheduled: z.string().nullish(),
  teams: z
    .array(
      z.object({
        baseInfo: z.object({ id: z.string().nullish(), name: z.string().nullish() }).nullish(),
      }),
    )
    .nullish(),
});

export type GridSeriesNode = z.infer<typeof gridSeriesNodeSchema>;

const allSeriesPageSchema = z.object({
  allSeries: z.object({
    totalCount: z.number().nullish(),
    pageInfo: z.object({
      hasNextPage: z.boolean(),
      endCursor: z.string().nullish(),
    }),
    edges: z.array(z.object({ node: gridSeriesNodeSchema })),
  }),
});

const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).nullish(),
});

type FetchImpl = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface GridGraphqlClientOptions {
  fetchImpl?: FetchImpl;
  baseUrl?: string;
  retries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  pageSize?: number;
  maxPages?: number;
}

const SCRIM_SERIES_QUERY = `
  query ScrimSeries($first: Int!, $after: Cursor, $titleIds: [ID!], $gte: String!, $lte: String!) {
    allSeries(
      first: $first
      after: $after
      filter: {
        titleIds: { in: $titleIds }
        types: [SCRIM]
        startTimeScheduled: { gte: $gte, lte: $lte }
      }
      orderBy: StartTimeScheduled
      orderDirection: ASC
    ) {
      totalCount
      pageInfo {
        hasNextPage
        endCursor
      }
      edges {
        node {
          id
          startTimeScheduled
          teams {
            baseInfo {
              id
              name
            }
          }
        }
      }
    }
  }
`;

/**
 * GRID Central Data GraphQL client with bounded retry on rate limits, 5xx and network
 * failures.
 */
export class GridGraphqlClient {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchImpl;
  private readonly endpoint: string;
  private readonly retries: number;
  private readonly baseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly pageSize: number;
  private readonly maxPages: number;

  constructor(apiKey: string, opts: GridGraphqlClientOptions = {}) {
    this.apiKey = apiKey;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.endpoint = `${(opts.baseUrl ?? DEFAULT_GRID_API_BASE).replace(/\/+$/, '')}/central-data/graphql`;
    this.retries = opts.retries ?? 3;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
    this.sleep = opts.sleep;
    this.logger = opts.logger ?? silentLogger;
    this.pageSize = opts.pageSize ?? 50;
    this.maxPages = opts.maxPages ?? 100;
  }

  private async postOnce(query: string, variables: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
        },
        body: JSON.stringify({ query, variables }),
      });
    } catch (err) {
      throw new GridRequestError(`GRID API network error: ${errorMessage(err)}`, { network: true, cause: err });
    }

    if (response.status === 429) {
      throw new GridRateLimitError('GRID API rate limit exceeded (429).', parseRetryAfterMs(response.headers.get('Retry-After')));
    }

    if (!response.ok) {
      const errorTextRaw = await response.text();
      const errorText = errorTextRaw.length > 500 ? `${errorTextRaw.slice(0, 500)}…` : errorTextRaw;
      throw new GridRequestError(`GRID API HTTP error: ${response.status} - ${errorText}`, { status: response.status });
    }

    const envelope = graphqlEnvelopeSchema.safeParse(await response.json());
    if (!envelope.success) {
      throw new GridRequestError('GRID API returned a malformed GraphQL response.');
    }
    if (envelope.data.errors && envelope.data.errors.length > 0) {
      const messages = envelope.data.errors.map((e) => e.message).join(', ');
      throw new GridRequestError(`GRID GraphQL Error: ${messages}`);
    }
    if (envelope.data.data === undefined || envelope.data.data === null) {
      throw new GridRequestError('GRID API returned no data.');
    }
    return envelope.data.data;
  }

  /**
   * Executes a Central Data query and validates `data` against `schema`.
   */
  async executeQuery<S extends z.ZodTypeAny>(query: string, variables: Record<string, unknown>, schema: S): Promise<z.infer<S>> {
    if (!this.apiKey) {
      throw new Error('GRID_API_KEY is missing. Please set it in your environment variables.');
    }

    const data = await withRetry(() => this.postOnce(query, variables), {
      retries: this.retries,
      baseDelayMs: this.baseDelayMs,
      sleep: this.sleep,
      isRetryable: isRetryableGridError,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn('GRID query failed, retrying', {
          attempt,
          maxRetries: this.retries,
          delayMs,
          error: errorMessage(error),
        });
      },
    });

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new GridRequestError(`GRID API response did not match the expected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  /**
   * All LoL scrim series scheduled inside `window`, following pagination to the end.
   */
  async listScrimSeries(window: TimeWindow, titleIds: string[] = [LOL_TITLE_ID]): Promise<GridSeriesNode[]> {
    const nodes: GridSeriesNode[] = [];
    let after: string | null = null;

    for (let page = 0; page < this.maxPages; page++) {
      const data: z.infer<typeof allSeriesPageSchema> = await this.executeQuery(
        SCRIM_SERIES_QUERY,
        {
          first: this.pageSize,
          after,
          titleIds,
          gte: window.since.toISOString(),
          lte: window.until.toISOString(),
        },
        allSeriesPageSchema,
      );

      nodes.push(...data.allSeries.edges.map((e) => e.node));

      const { hasNextPage, endCursor } = data.allSeries.pageInfo;
      if (!hasNextPage || !endCursor) return nodes;
      after = endCursor;
    }

    this.logger.warn('GRID series listing hit the page limit', { maxPages: this.maxPages, fetched: nodes.length });
    return nodes;
  }
}
