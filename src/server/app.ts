/**
 * Trendwire — HTTP API
 *
 * Endpoints:
 * - GET /          — Liveness
 * - GET /health    — Aggregator, rate limit and cache status
 * - GET /sources   — Configured sources and target distribution
 * - GET /ai-news   — Ranked trending AI articles (rate limited)
 *
 * Everything stateful is injected; the composition root lives in index.ts.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { NewsResponseSchema, type Article, type NewsResponse } from '../types';
import { getFallbackArticles, getSourcesUsed, type AggregatorInit } from '../feeds';
import type { Settings } from '../lib/config';
import { generateCacheKey, type CacheStore } from '../lib/cache';
import { AggregationTimeoutError, withTimeout } from '../lib/errors';
import { logger } from '../lib/logger';
import type { RateLimiter } from '../lib/rate-limiter';
import { errorHandler, rateLimit, requestLogger } from './middleware';

export const API_VERSION = '1.0.0';

/** Share of the article target each source is expected to fill */
const TARGET_DISTRIBUTION = {
  forum: 7,
  link_aggregator: 7,
  news_search: 6,
};

export interface AppDependencies {
  settings: Settings;
  aggregatorInit: AggregatorInit;
  rateLimiter: RateLimiter;
  cache: CacheStore;
  now?: () => Date;
}

export function createApp(deps: AppDependencies): Express {
  const { settings, aggregatorInit, rateLimiter, cache } = deps;
  const now = deps.now ?? (() => new Date());
  const cacheKey = generateCacheKey('ai-news', { limit: settings.totalArticles });

  if (!aggregatorInit.ok) {
    logger.warn('Aggregator unavailable, /ai-news will serve fallback articles', {
      error: aggregatorInit.error.message,
    });
  }

  const app = express();

  app.use(cors());
  app.use(requestLogger);

  // ============================================================
  // LIVENESS
  // ============================================================

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Trendwire API is running',
      version: API_VERSION,
    });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: aggregatorInit.ok ? 'healthy' : 'degraded',
      timestamp: now().toISOString(),
      services: {
        aggregator: aggregatorInit.ok,
        rateLimiting: true,
        cache: cache.enabled,
      },
      ...(aggregatorInit.ok ? {} : { aggregatorError: aggregatorInit.error.message }),
      configuration: {
        maxArticles: settings.totalArticles,
        rateLimit: `${settings.rateLimit.requests} requests per ${settings.rateLimit.periodSeconds} seconds`,
      },
    });
  });

  // ============================================================
  // SOURCES
  // ============================================================

  app.get('/sources', (_req: Request, res: Response) => {
    res.json({
      sources: aggregatorInit.ok ? aggregatorInit.aggregator.describeSources() : [],
      communities: settings.reddit.subreddits,
      searchTerms: settings.newsApi.searchTerms,
      totalTargetArticles: settings.totalArticles,
      distribution: TARGET_DISTRIBUTION,
    });
  });

  // ============================================================
  // NEWS
  // ============================================================

  async function loadArticles(): Promise<Article[]> {
    if (!aggregatorInit.ok) {
      return getFallbackArticles(now()).slice(0, settings.totalArticles);
    }

    const { requestTimeoutMs } = settings;
    return withTimeout(aggregatorInit.aggregator.getTrendingNews(), requestTimeoutMs, () => {
      throw new AggregationTimeoutError(requestTimeoutMs);
    });
  }

  app.get(
    '/ai-news',
    rateLimit(rateLimiter),
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const cached = await cache.get(cacheKey, NewsResponseSchema);
        if (cached) {
          logger.debug('Serving cached news response', { key: cacheKey });
          res.json(cached);
          return;
        }

        const articles = await loadArticles();

        if (articles.length === 0) {
          res.status(503).json({
            error: 'Service temporarily unavailable',
            message: 'Unable to fetch articles from any source. Please try again later.',
          });
          return;
        }

        const body: NewsResponse = {
          articles,
          totalCount: articles.length,
          sourcesUsed: getSourcesUsed(articles),
          lastUpdated: now().toISOString(),
        };

        await cache.set(cacheKey, body);
        res.json(body);
      } catch (error) {
        if (error instanceof AggregationTimeoutError) {
          logger.error('News request timed out', { timeoutMs: error.timeoutMs });
          res.status(error.status).json({
            error: 'Gateway timeout',
            message: 'Fetching articles took too long. Please try again later.',
          });
          return;
        }
        next(error);
      }
    }
  );

  app.use(errorHandler);

  return app;
}
