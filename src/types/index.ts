/**
 * Trendwire — Type Exports
 */

export {
  MAX_DESCRIPTION_LENGTH,
  MAX_COMMENT_LENGTH,
  MAX_COMMENTS_PER_ARTICLE,
  SOURCE_ORDER,
  SourceNameSchema,
  CommentSchema,
  ArticleSchema,
  NewsResponseSchema,
} from './article';
export type { SourceName, Comment, Article, NewsResponse } from './article';

export type { SourceFetchStatus, SourceFetchResult, SourceDescriptor } from './source';
