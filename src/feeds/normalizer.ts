/**
 * Trendwire — Article Normalizer
 *
 * Field-level rules shared by every source: description and comment
 * truncation and the per-article comment cap.
 */

import {
  MAX_COMMENT_LENGTH,
  MAX_COMMENTS_PER_ARTICLE,
  MAX_DESCRIPTION_LENGTH,
  type Article,
  type Comment,
  type SourceName,
} from '../types';
import { truncate } from '../lib/html';

export interface ArticleInput {
  title: string;
  /** Body text; the title stands in when empty */
  body?: string | null;
  url: string;
  source: SourceName;
  score: number;
  comments?: Comment[];
  publishedAt: string | null;
  sourceId: string;
}

export interface CommentInput {
  author?: string | null;
  content: string;
  score?: number;
  createdUtc: string;
}

export function normalizeComment(input: CommentInput, fallbackAuthor = 'anonymous'): Comment {
  return {
    author: input.author || fallbackAuthor,
    content: truncate(input.content, MAX_COMMENT_LENGTH),
    score: Math.trunc(input.score ?? 0),
    createdUtc: input.createdUtc,
  };
}

export function normalizeArticle(input: ArticleInput): Article {
  const body = input.body?.trim();

  return {
    title: input.title,
    description: truncate(body ? body : input.title, MAX_DESCRIPTION_LENGTH),
    url: input.url,
    source: input.source,
    score: Math.trunc(input.score),
    comments: (input.comments ?? []).slice(0, MAX_COMMENTS_PER_ARTICLE),
    publishedAt: input.publishedAt,
    sourceId: input.sourceId,
  };
}
