/**
 * Trendwire — Ranker
 *
 * Combined score = engagement + recency + source quality. The score is
 * written back onto each article, then articles are sorted descending.
 * Array.prototype.sort is stable, so equal scores keep their
 * post-dedup order.
 */

import type { Article, SourceName } from '../types';
import { hoursSince } from '../lib/time';

// ============================================================
// CONFIGURATION
// ============================================================

export const SOURCE_QUALITY_SCORES: Record<SourceName, number> = {
  link_aggregator: 85,
  forum: 70,
  news_search: 60,
};

export const DEFAULT_SOURCE_QUALITY = 50;

const COMMENT_POINTS = 10;
const LONG_COMMENT_LENGTH = 100;
const LONG_COMMENT_BONUS = 5;
const UPVOTED_COMMENT_THRESHOLD = 10;

/** Upper bounds (exclusive, in hours) and their recency points */
const RECENCY_BUCKETS: ReadonlyArray<readonly [number, number]> = [
  [1, 100],
  [6, 80],
  [24, 60],
  [72, 40],
];
const STALE_RECENCY = 20;

// ============================================================
// COMPONENT SCORES
// ============================================================

export function calculateEngagementScore(article: Article): number {
  const base = article.score || 0;
  const commentScore = article.comments.length * COMMENT_POINTS;

  let qualityBonus = 0;
  for (const comment of article.comments) {
    if (comment.content.length > LONG_COMMENT_LENGTH) {
      qualityBonus += LONG_COMMENT_BONUS;
    }
    if (comment.score > UPVOTED_COMMENT_THRESHOLD) {
      qualityBonus += Math.floor(comment.score / 2);
    }
  }

  return base + commentScore + qualityBonus;
}

/**
 * Step function of article age. Missing or unparsable timestamps score 0.
 */
export function calculateRecencyScore(article: Article, now: Date = new Date()): number {
  if (!article.publishedAt) return 0;

  const hoursAgo = hoursSince(article.publishedAt, now);
  if (hoursAgo === null) return 0;

  for (const [maxHours, points] of RECENCY_BUCKETS) {
    if (hoursAgo < maxHours) return points;
  }
  return STALE_RECENCY;
}

export function calculateSourceScore(article: Pick<Article, 'source'>): number {
  return SOURCE_QUALITY_SCORES[article.source] ?? DEFAULT_SOURCE_QUALITY;
}

export function calculateRankScore(article: Article, now: Date = new Date()): number {
  return (
    calculateEngagementScore(article) +
    calculateRecencyScore(article, now) +
    calculateSourceScore(article)
  );
}

// ============================================================
// RANKING
// ============================================================

/**
 * Overwrite each article's score with its rank score and return the
 * articles sorted by it, highest first.
 */
export function rankArticles(articles: Article[], now: Date = new Date()): Article[] {
  for (const article of articles) {
    article.score = calculateRankScore(article, now);
  }

  return [...articles].sort((a, b) => b.score - a.score);
}
