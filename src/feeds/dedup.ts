/**
 * Trendwire — Deduplication
 *
 * Single left-to-right pass; the first occurrence wins. Two articles are
 * duplicates when their normalized URLs match, or when their normalized
 * titles share a 50-character prefix longer than 20 characters.
 */

import type { Article } from '../types';

const TITLE_PREFIX_LENGTH = 50;
const MIN_TITLE_PREFIX_LENGTH = 21;

export interface DedupResult {
  articles: Article[];
  duplicateCount: number;
}

/**
 * Lower-case and strip leading/trailing slashes.
 */
export function normalizeUrl(url: string): string {
  return url.toLowerCase().replace(/^\/+|\/+$/g, '');
}

export function titlePrefix(title: string): string {
  return title.toLowerCase().trim().slice(0, TITLE_PREFIX_LENGTH);
}

export function deduplicate(articles: Article[]): DedupResult {
  const unique: Article[] = [];
  const seenUrls = new Set<string>();
  const seenTitles = new Set<string>();

  for (const article of articles) {
    const url = normalizeUrl(article.url);
    if (seenUrls.has(url)) continue;

    // Short prefixes are too generic to match on
    const prefix = titlePrefix(article.title);
    if (prefix.length >= MIN_TITLE_PREFIX_LENGTH && seenTitles.has(prefix)) continue;

    seenUrls.add(url);
    seenTitles.add(prefix);
    unique.push(article);
  }

  return {
    articles: unique,
    duplicateCount: articles.length - unique.length,
  };
}

export function removeDuplicates(articles: Article[]): Article[] {
  return deduplicate(articles).articles;
}
