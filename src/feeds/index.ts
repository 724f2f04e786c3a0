/**
 * Trendwire — Feeds Module
 *
 * Source adapters, deduplication, ranking and the aggregator that ties
 * them together.
 */

export { NewsSource, type SourceRunResult } from './base';

export {
  createSources,
  sortBySourceOrder,
  RedditSource,
  HackerNewsSource,
  NewsApiSource,
} from './sources';

export { normalizeArticle, normalizeComment } from './normalizer';

export { AI_KEYWORDS, isAiRelated } from './relevance';

export { deduplicate, removeDuplicates, normalizeUrl, type DedupResult } from './dedup';

export {
  rankArticles,
  calculateRankScore,
  calculateEngagementScore,
  calculateRecencyScore,
  calculateSourceScore,
  SOURCE_QUALITY_SCORES,
} from './ranker';

export { getFallbackArticles } from './fallback';

export {
  NewsAggregator,
  initAggregator,
  getSourcesUsed,
  type AggregatorConfig,
  type AggregatorInit,
} from './aggregator';
