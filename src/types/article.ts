/**
 * Trendwire — Article Types
 *
 * Common shape every news source is normalized into, plus the
 * response envelope served by the API.
 */

import { z } from 'zod';

// ============================================================
// LIMITS
// ============================================================

export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_COMMENT_LENGTH = 300;
export const MAX_COMMENTS_PER_ARTICLE = 5;

/** Text limits count code points, not UTF-16 units */
const boundedText = (max: number) =>
  z.string().refine((value) => Array.from(value).length <= max, {
    message: `Must contain at most ${max} character(s)`,
  });

// ============================================================
// SOURCE NAME
// ============================================================

export const SourceNameSchema = z.enum([
  'forum',            // Reddit
  'link_aggregator',  // Hacker News
  'news_search',      // NewsAPI
]);
export type SourceName = z.infer<typeof SourceNameSchema>;

/** Fixed order in which source results are concatenated before dedup. */
export const SOURCE_ORDER: readonly SourceName[] = ['forum', 'link_aggregator', 'news_search'];

// ============================================================
// COMMENT
// ============================================================

export const CommentSchema = z.object({
  author: z.string(),
  content: boundedText(MAX_COMMENT_LENGTH),
  score: z.number().int(),
  createdUtc: z.string(),
});
export type Comment = z.infer<typeof CommentSchema>;

// ============================================================
// ARTICLE
// ============================================================

/**
 * `publishedAt` is ISO-8601. Strings without a zone designator are naive
 * and read as local wall-clock time (see lib/time).
 */
export const ArticleSchema = z.object({
  title: z.string(),
  description: boundedText(MAX_DESCRIPTION_LENGTH),
  url: z.string(),
  source: SourceNameSchema,
  score: z.number().int(),
  comments: z.array(CommentSchema).max(MAX_COMMENTS_PER_ARTICLE),
  publishedAt: z.string().nullable(),
  sourceId: z.string(),
});
export type Article = z.infer<typeof ArticleSchema>;

// ============================================================
// RESPONSE
// ============================================================

export const NewsResponseSchema = z.object({
  articles: z.array(ArticleSchema),
  totalCount: z.number().int().min(0),
  sourcesUsed: z.array(SourceNameSchema),
  lastUpdated: z.string(),
});
export type NewsResponse = z.infer<typeof NewsResponseSchema>;
