/**
 * Trendwire — Source Factory
 *
 * Builds the configured sources in their fixed concatenation order:
 * forum, link aggregator, news search.
 */

import type { Settings } from '../../lib/config';
import { logger } from '../../lib/logger';
import { SOURCE_ORDER } from '../../types';
import type { NewsSource } from '../base';
import { HackerNewsSource } from './hacker-news';
import { NewsApiSource } from './news-api';
import { RedditSource } from './reddit';

export { HackerNewsSource } from './hacker-news';
export { NewsApiSource, calculatePopularityScore, parsePublishedAt } from './news-api';
export { RedditSource } from './reddit';

export type SourceSettings = Pick<Settings, 'enabledSources' | 'reddit' | 'newsApi'>;

export function createSources(settings: SourceSettings): NewsSource[] {
  const enabled = new Set(settings.enabledSources);
  const sources: NewsSource[] = [];

  if (enabled.has('forum')) {
    sources.push(
      new RedditSource({
        subreddits: settings.reddit.subreddits,
        userAgent: settings.reddit.userAgent,
        credentials: settings.reddit.credentials,
      })
    );
  }

  if (enabled.has('link_aggregator')) {
    sources.push(new HackerNewsSource());
  }

  if (enabled.has('news_search')) {
    if (settings.newsApi.apiKey) {
      sources.push(
        new NewsApiSource({
          apiKey: settings.newsApi.apiKey,
          searchTerms: settings.newsApi.searchTerms,
        })
      );
    } else {
      logger.warn('NEWSAPI_KEY not set, news search source disabled');
    }
  }

  return sortBySourceOrder(sources);
}

export function sortBySourceOrder<T extends { name: NewsSource['name'] }>(items: T[]): T[] {
  return [...items].sort((a, b) => SOURCE_ORDER.indexOf(a.name) - SOURCE_ORDER.indexOf(b.name));
}
