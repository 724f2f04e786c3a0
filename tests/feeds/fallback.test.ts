import { describe, it, expect } from 'vitest';
import { getFallbackArticles } from '../../src/feeds/fallback';
import { ArticleSchema } from '../../src/types';

describe('getFallbackArticles', () => {
  const now = new Date('2026-10-19T12:00:00Z');

  it('should load twenty valid articles', () => {
    const articles = getFallbackArticles(now);

    expect(articles).toHaveLength(20);
    for (const article of articles) {
      expect(ArticleSchema.safeParse(article).success).toBe(true);
    }
  });

  it('should stamp articles and comments with the generation time', () => {
    const articles = getFallbackArticles(now);

    expect(new Set(articles.map((a) => a.publishedAt))).toEqual(new Set(['2026-10-19T12:00:00.000Z']));
    for (const c of articles.flatMap((a) => a.comments)) {
      expect(c.createdUtc).toBe('2026-10-19T12:00:00.000Z');
    }
  });

  it('should cover every source and keep ids unique', () => {
    const articles = getFallbackArticles(now);

    expect(new Set(articles.map((a) => a.source))).toEqual(
      new Set(['forum', 'link_aggregator', 'news_search'])
    );
    expect(new Set(articles.map((a) => a.sourceId)).size).toBe(20);
    expect(articles[0].sourceId).toBe('fallback-1');
  });

  it('should return fresh copies on every call', () => {
    const first = getFallbackArticles(now);
    first[0].score = -1;
    first[0].comments.length = 0;

    const second = getFallbackArticles(now);
    expect(second[0].score).not.toBe(-1);
  });
});
