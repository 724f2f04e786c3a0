/**
 * Trendwire — NewsAPI Source (news search)
 *
 * One "everything" search per configured term. NewsAPI exposes no
 * engagement metric, so each article gets a synthetic popularity score
 * from its outlet and age.
 */

import { z } from 'zod';
import { NewsSource } from '../base';
import { normalizeArticle } from '../normalizer';
import type { HttpSession } from '../../lib/http';
import { UpstreamError } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import { hoursSince, toInstant } from '../../lib/time';
import type { Article, SourceName } from '../../types';

const NEWSAPI_BASE = 'https://newsapi.org/v2';
const MAX_PAGE_SIZE = 20;

export const REPUTABLE_TECH_OUTLETS = [
  'techcrunch',
  'ars technica',
  'the verge',
  'wired',
  'venturebeat',
  'ieee spectrum',
  'mit technology review',
  'ai news',
  'artificial intelligence news',
];

const SearchResponseSchema = z.object({
  status: z.string().optional(),
  articles: z.array(z.unknown()).default([]),
});

const NewsApiArticleSchema = z.object({
  source: z
    .object({
      id: z.string().nullable().optional(),
      name: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
  title: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  publishedAt: z.string().nullable().optional(),
});

// ============================================================
// SCORING
// ============================================================

/**
 * 50 base, +30 for a reputable tech outlet, plus up to 24 points for
 * articles under a day old (one point per remaining hour).
 */
export function calculatePopularityScore(
  outletName: string | null | undefined,
  publishedAt: string | null,
  now: Date = new Date()
): number {
  let score = 50;

  const outlet = (outletName ?? '').toLowerCase();
  if (REPUTABLE_TECH_OUTLETS.some((name) => outlet.includes(name))) {
    score += 30;
  }

  const hoursAgo = publishedAt ? hoursSince(publishedAt, now) : null;
  if (hoursAgo !== null && hoursAgo < 24) {
    score += Math.floor(24 - Math.max(0, hoursAgo));
  }

  return score;
}

/**
 * NewsAPI timestamps are ISO-8601 with a zone. Missing or unparsable
 * values fall back to now.
 */
export function parsePublishedAt(value: string | null | undefined, now: Date = new Date()): string {
  if (value && toInstant(value) !== null) {
    return value;
  }
  return now.toISOString();
}

// ============================================================
// SOURCE
// ============================================================

export interface NewsApiOptions {
  apiKey: string;
  searchTerms: string[];
  now?: () => Date;
}

/**
 * Mainstream tech coverage via NewsAPI search.
 */
export class NewsApiSource extends NewsSource {
  readonly name: SourceName = 'news_search';
  readonly provider = 'newsapi';
  readonly description = 'Mainstream tech publications and news outlets';
  readonly website = 'https://newsapi.org';
  readonly provides = ['professional_journalism', 'industry_coverage'];

  private readonly apiKey: string;
  private readonly searchTerms: string[];
  private readonly now: () => Date;

  constructor(options: NewsApiOptions) {
    super();
    this.apiKey = options.apiKey;
    this.searchTerms = options.searchTerms;
    this.now = options.now ?? (() => new Date());
  }

  protected sessionHeaders(): Record<string, string> {
    return { 'X-Api-Key': this.apiKey };
  }

  protected topics(): string[] {
    return this.searchTerms;
  }

  protected async collect(session: HttpSession, limit: number, collected: Article[]): Promise<void> {
    const seenUrls = new Set<string>();

    for (const term of this.searchTerms) {
      if (collected.length >= limit) break;

      let rawArticles: unknown[];
      try {
        const response = await session.requestJson(`${NEWSAPI_BASE}/everything`, SearchResponseSchema, {
          params: {
            q: term,
            sortBy: 'popularity',
            language: 'en',
            pageSize: Math.min(limit, MAX_PAGE_SIZE),
          },
        });
        rawArticles = response.articles;
      } catch (error) {
        if (session.closed) throw error;
        if (error instanceof UpstreamError && error.rateLimited) {
          this.logger.warn('NewsAPI rate limit exceeded, stopping search', { term });
          return;
        }
        this.logger.warn('NewsAPI search failed', { term, error: errorMessage(error) });
        continue;
      }

      for (const raw of rawArticles) {
        if (collected.length >= limit) break;

        const article = this.toArticle(raw);
        if (!article || seenUrls.has(article.url)) continue;

        seenUrls.add(article.url);
        collected.push(article);
      }
    }
  }

  private toArticle(raw: unknown): Article | null {
    const parsed = NewsApiArticleSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug('Skipping malformed search result');
      return null;
    }

    const { title, description, url, publishedAt, source } = parsed.data;
    if (!title || title === '[Removed]' || !url) return null;

    const now = this.now();
    const published = parsePublishedAt(publishedAt, now);

    return normalizeArticle({
      title,
      body: description,
      url,
      source: this.name,
      score: calculatePopularityScore(source?.name, published, now),
      comments: [],
      publishedAt: published,
      sourceId: url,
    });
  }
}
