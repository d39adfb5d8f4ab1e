/**
 * Feedcast — Query API
 *
 * On-demand access to the aggregated news.
 *
 * Endpoints:
 * - GET /health                          — Health check for monitoring
 * - GET /sources                         — Source catalog grouped by country/category
 * - GET /news/latest?limit=              — Newest items across all sources
 * - GET /news/category/:category?limit=  — Newest items of one category
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { NewsService } from '../feeds/service';
import type { SourceRegistry } from '../feeds/registry';
import { serializeNewsItem } from '../feeds/serialize';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'api' });

export const MAX_QUERY_LIMIT = 50;
const SERVICE_NAME = 'feedcast';
const SERVICE_VERSION = '1.0.0';

export interface DatabaseHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

export interface ApiDependencies {
  news: Pick<NewsService, 'latest' | 'byCategory'>;
  registry: SourceRegistry;
  /** Limit used when the query has none */
  defaultLimit: number;
  databaseHealth?: () => Promise<DatabaseHealth>;
}

function limitSchema(defaultLimit: number) {
  return z.object({
    limit: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_QUERY_LIMIT)
      .default(Math.min(defaultLimit, MAX_QUERY_LIMIT)),
  });
}

export function createApp(deps: ApiDependencies): Express {
  const app = express();
  const QuerySchema = limitSchema(deps.defaultLimit);

  function parseLimit(req: Request, res: Response): number | undefined {
    const parsed = QuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid query',
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return undefined;
    }
    return parsed.data.limit;
  }

  // ============================================================
  // HEALTH ENDPOINT
  // ============================================================

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const database = deps.databaseHealth ? await deps.databaseHealth() : undefined;
      res.status(database && !database.healthy ? 503 : 200).json({
        status: database && !database.healthy ? 'degraded' : 'healthy',
        timestamp: new Date().toISOString(),
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        ...(database ? { database } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // CATALOG
  // ============================================================

  app.get('/sources', (_req: Request, res: Response) => {
    res.json({
      total: deps.registry.size,
      countries: deps.registry.describe(),
    });
  });

  // ============================================================
  // NEWS QUERIES
  // ============================================================

  app.get('/news/latest', async (req: Request, res: Response, next: NextFunction) => {
    const limit = parseLimit(req, res);
    if (limit === undefined) return;

    try {
      const items = await deps.news.latest(limit);
      res.json({ items: items.map(serializeNewsItem) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/news/category/:category', async (req: Request, res: Response, next: NextFunction) => {
    const limit = parseLimit(req, res);
    if (limit === undefined) return;

    const { category } = req.params;
    try {
      const items = await deps.news.byCategory(category, limit);
      res.json({ category, items: items.map(serializeNewsItem) });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    log.error('Unhandled error in query API', { path: req.path, error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
