import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import crypto from 'node:crypto';
import type { LedgerEntry, RunSummary } from '@scrim-drafts/shared';
import { errorMessage, isPipelineError } from './errors.js';
import type { Logger } from './utils/logger.js';

export interface AppDeps {
  ledger: { allEntries(): LedgerEntry[] };
  runPipeline: () => Promise<RunSummary>;
  corsOrigins: string[];
  logger: Logger;
}

/**
 * Status and trigger endpoints for the scrim pipeline. Only one run at a time per process.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();
  let activeRun: Promise<RunSummary> | undefined;

  app.use(cors({
    origin: (origin, callback) => {
      // Allow non-browser clients (no Origin header) and same-origin.
      if (!origin) return callback(null, true);
      if (deps.corsOrigins.includes(origin)) return callback(null, true);
      return callback(null, false);
    },
  }));

  app.use(express.json());

  app.use((req, res, next) => {
    const headerId = req.headers['x-request-id'];
    const requestId = (typeof headerId === 'string' && headerId.trim()) ? headerId.trim() : crypto.randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const elapsedMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      const pathOnly = (req.originalUrl || req.url || '').split('?')[0];
      deps.logger.info('request', {
        requestId,
        method: req.method,
        path: pathOnly,
        status: res.statusCode,
        durationMs: Math.round(elapsedMs),
      });
    });
    next();
  });

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', message: 'Scrim draft pipeline is running', runActive: activeRun !== undefined });
  });

  app.get('/api/ledger', (_req, res) => {
    const entries = deps.ledger.allEntries();
    res.json({ count: entries.length, entries });
  });

  /**
   * POST /api/runs
   * Runs the pipeline to completion and returns the run summary.
   */
  app.post('/api/runs', async (_req, res) => {
    if (activeRun) {
      return res.status(409).json({ error: 'A scrim run is already in progress' });
    }

    activeRun = deps.runPipeline();
    try {
      const summary = await activeRun;
      res.json(summary);
    } catch (error) {
      deps.logger.error('Scrim run failed', {
        requestId: res.locals.requestId,
        kind: isPipelineError(error) ? error.name : undefined,
        error: errorMessage(error),
      });
      res.status(500).json({ error: 'Scrim run failed', detail: errorMessage(error) });
    } finally {
      activeRun = undefined;
    }
  });

  return app;
}
