/**
 * Trendwire — News Aggregator
 *
 * Orchestrates one aggregation run:
 * 1. Fetch from every source concurrently, each under its own deadline
 * 2. Concatenate results in the fixed source order
 * 3. Deduplicate
 * 4. Rank and truncate
 * 5. Fall back to (or pad with) the seed set when live data is thin
 */

import type { Article, SourceDescriptor, SourceFetchResult, SourceName } from '../types';
import type { NewsSource } from './base';
import { deduplicate } from './dedup';
import { rankArticles } from './ranker';
import { getFallbackArticles } from './fallback';
import { createSources, sortBySourceOrder } from './sources';
import type { Settings } from '../lib/config';
import { InitError, withTimeout } from '../lib/errors';
import { logger, errorMessage, timeOperation } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorConfig {
  /** Articles returned per run */
  totalArticles?: number;
  /** Articles requested from each source */
  maxArticlesPerSource?: number;
  /** Deadline per source in ms */
  sourceTimeoutMs?: number;
  /** Below this many ranked articles the result is padded */
  minArticles?: number;
  /** Clock used for ranking and fallback timestamps */
  now?: () => Date;
}

export type AggregatorInit =
  | { ok: true; aggregator: NewsAggregator }
  | { ok: false; error: InitError };

type SourceOutcome = Omit<SourceFetchResult, 'sourceName' | 'durationMs'>;

const DEFAULT_CONFIG: Required<AggregatorConfig> = {
  totalArticles: 20,
  maxArticlesPerSource: 10,
  sourceTimeoutMs: 8000,
  minArticles: 5,
  now: () => new Date(),
};

/**
 * Distinct source names in order of first appearance.
 */
export function getSourcesUsed(articles: Article[]): SourceName[] {
  return [...new Set(articles.map((article) => article.source))];
}

// ============================================================
// AGGREGATOR
// ============================================================

export class NewsAggregator {
  readonly sources: readonly NewsSource[];
  private readonly config: Required<AggregatorConfig>;

  constructor(sources: NewsSource[], config: AggregatorConfig = {}) {
    this.sources = sortBySourceOrder(sources);
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get totalArticles(): number {
    return this.config.totalArticles;
  }

  /**
   * Ranked top articles. Never rejects and never returns an empty list
   * while `totalArticles` is positive.
   */
  async getTrendingNews(): Promise<Article[]> {
    try {
      return await timeOperation('Aggregation', () => this.aggregate());
    } catch (error) {
      logger.error('Aggregation failed, serving fallback articles', { error: errorMessage(error) });
      return this.fallback();
    }
  }

  /**
   * Run every source concurrently. Results come back in source order
   * whatever order the sources finish in.
   */
  async fetchAll(): Promise<SourceFetchResult[]> {
    return Promise.all(this.sources.map((source) => this.runSource(source)));
  }

  getSourcesUsed(articles: Article[]): SourceName[] {
    return getSourcesUsed(articles);
  }

  describeSources(): SourceDescriptor[] {
    return this.sources.map((source) => source.describe());
  }

  private async aggregate(): Promise<Article[]> {
    const { totalArticles, minArticles } = this.config;
    const results = await this.fetchAll();
    const combined = results.flatMap((result) => result.articles);

    logger.info('Source fetch phase completed', {
      sources: results.map((r) => ({
        source: r.sourceName,
        status: r.status,
        articles: r.articles.length,
        durationMs: r.durationMs,
      })),
      total: combined.length,
    });

    if (combined.length === 0) {
      logger.warn('No articles from any source, serving fallback articles');
      return this.fallback();
    }

    const { articles: unique, duplicateCount } = deduplicate(combined);
    const ranked = rankArticles(unique, this.config.now()).slice(0, totalArticles);

    logger.info('Ranking completed', {
      before: combined.length,
      duplicates: duplicateCount,
      ranked: ranked.length,
    });

    if (ranked.length < minArticles) {
      const padding = this.fallback().slice(0, totalArticles - ranked.length);
      logger.info('Padding thin result with fallback articles', { padding: padding.length });
      return [...ranked, ...padding];
    }

    return ranked;
  }

  private async runSource(source: NewsSource): Promise<SourceFetchResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    const { maxArticlesPerSource, sourceTimeoutMs } = this.config;

    const outcome = await withTimeout(
      source
        .run(maxArticlesPerSource, controller.signal)
        .then(({ articles, error }): SourceOutcome =>
          error ? { status: 'failed', articles, error } : { status: 'ok', articles }
        )
        .catch((error: unknown): SourceOutcome => ({
          status: 'failed',
          articles: [],
          error: errorMessage(error),
        })),
      sourceTimeoutMs,
      (): SourceOutcome => {
        // Abandon the call: closing its session aborts in-flight requests
        controller.abort();
        return { status: 'timeout', articles: [], error: `Timeout after ${sourceTimeoutMs}ms` };
      }
    );

    const result: SourceFetchResult = {
      sourceName: source.name,
      durationMs: Date.now() - startTime,
      ...outcome,
    };

    if (result.status !== 'ok') {
      logger.warn('Source fetch degraded', {
        source: source.name,
        status: result.status,
        error: result.error,
        articles: result.articles.length,
        durationMs: result.durationMs,
      });
    }

    return result;
  }

  private fallback(): Article[] {
    return getFallbackArticles(this.config.now()).slice(0, this.config.totalArticles);
  }
}

// ============================================================
// CONSTRUCTION
// ============================================================

/**
 * Build the aggregator from settings once at startup.
 */
export function initAggregator(
  settings: Pick<
    Settings,
    | 'enabledSources'
    | 'reddit'
    | 'newsApi'
    | 'totalArticles'
    | 'maxArticlesPerSource'
    | 'sourceTimeoutMs'
  >
): AggregatorInit {
  try {
    const sources = createSources(settings);
    if (sources.length === 0) {
      return { ok: false, error: new InitError('No news sources enabled') };
    }

    const aggregator = new NewsAggregator(sources, {
      totalArticles: settings.totalArticles,
      maxArticlesPerSource: settings.maxArticlesPerSource,
      sourceTimeoutMs: settings.sourceTimeoutMs,
    });

    logger.info('Aggregator initialized', { sources: sources.map((s) => s.name) });
    return { ok: true, aggregator };
  } catch (error) {
    logger.error('Aggregator initialization failed', { error: errorMessage(error) });
    return { ok: false, error: new InitError(errorMessage(error)) };
  }
}
