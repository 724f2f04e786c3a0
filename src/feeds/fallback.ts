/**
 * Trendwire — Fallback Seed Set
 *
 * Fixed list of plausible AI stories served when every live source
 * comes back empty, or used to pad a thin result. Timestamps are
 * stamped at generation time.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ArticleSchema, CommentSchema, type Article } from '../types';

const FALLBACK_FILE = new URL('../../data/fallback-articles.json', import.meta.url);

const FallbackEntrySchema = ArticleSchema.omit({ publishedAt: true, comments: true }).extend({
  comments: z.array(CommentSchema.omit({ createdUtc: true })).max(5),
});
type FallbackEntry = z.infer<typeof FallbackEntrySchema>;

let entries: FallbackEntry[] | undefined;

function loadEntries(): FallbackEntry[] {
  entries ??= z.array(FallbackEntrySchema).min(1).parse(
    JSON.parse(readFileSync(FALLBACK_FILE, 'utf-8'))
  );
  return entries;
}

/**
 * Fresh copies of the seed set, stamped with `now`.
 */
export function getFallbackArticles(now: Date = new Date()): Article[] {
  const stamp = now.toISOString();

  return loadEntries().map((entry) => ({
    ...entry,
    comments: entry.comments.map((comment) => ({ ...comment, createdUtc: stamp })),
    publishedAt: stamp,
  }));
}
