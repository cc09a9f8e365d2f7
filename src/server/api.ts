/**
 * News Reader — HTTP API
 *
 * Thin Express layer over the article cache. Reads come straight from
 * the store and never wait on a refresh cycle.
 *
 * Endpoints:
 * - GET  /health        — Health check for monitoring
 * - GET  /articles      — Most recent articles (limit/offset)
 * - GET  /articles/:id  — One article
 * - GET  /sources       — Per-source health
 * - POST /extract       — Convert one article page to Markdown
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ArticleStore } from '../cache/store';
import type { Scheduler } from '../scheduler/scheduler';
import { ArticleExtractor, type ExtractResult } from '../extract/extractor';
import { ExtractionError, type ExtractionErrorKind } from '../lib/errors';
import { logger } from '../lib/logger';

export const SERVICE_NAME = 'news-reader-api';

export interface AppDeps {
  store: ArticleStore;
  scheduler?: Pick<Scheduler, 'getSourceHealth' | 'getLastReport'>;
  extractor?: Pick<ArticleExtractor, 'extract'>;
}

// ============================================================
// REQUEST SCHEMAS
// ============================================================

export const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

const ExtractBodySchema = z.object({
  url: z.string().min(1),
});

const EXTRACTION_STATUS: Record<ExtractionErrorKind, number> = {
  invalid_url: 400,
  not_html: 422,
  upstream: 502,
  request: 502,
};

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

// ============================================================
// EXPRESS APP
// ============================================================

export function createApp(deps: AppDeps): Express {
  const { store, scheduler } = deps;
  const extractor = deps.extractor ?? new ArticleExtractor();
  const app = express();

  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      articles: store.size(),
      lastCycleAt: scheduler?.getLastReport()?.completedAt ?? null,
    });
  });

  app.get('/articles', (req: Request, res: Response) => {
    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid query parameters',
        details: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const { limit, offset } = parsed.data;
    res.json({
      articles: store.listRecent(limit, offset),
      limit,
      offset,
      total: store.size(),
    });
  });

  app.get('/articles/:id', (req: Request, res: Response) => {
    const article = store.get(req.params.id);
    if (!article) {
      res.status(404).json({ error: 'Article not found' });
      return;
    }
    res.json(article);
  });

  app.get('/sources', (_req: Request, res: Response) => {
    res.json({ sources: scheduler?.getSourceHealth() ?? [] });
  });

  app.post('/extract', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ExtractBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Request body must be { "url": string }' });
      return;
    }

    let result: ExtractResult;
    try {
      result = await extractor.extract(parsed.data.url);
    } catch (error) {
      if (error instanceof ExtractionError) {
        logger.warn('Extraction failed', { url: parsed.data.url, kind: error.kind, error: error.message });
        res.status(EXTRACTION_STATUS[error.kind]).json({ error: error.message });
        return;
      }
      next(error);
      return;
    }

    res.json(result);
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }
    logger.error('Unhandled error in API server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
