/**
 * Trendwire — Hacker News Source (link aggregator)
 *
 * Walks the top-stories ranking, keeps AI-related stories and attaches
 * their first comments. Uses the official HN Firebase API.
 */

import { z } from 'zod';
import { NewsSource } from '../base';
import { isAiRelated } from '../relevance';
import { normalizeArticle, normalizeComment } from '../normalizer';
import type { HttpSession } from '../../lib/http';
import { errorMessage } from '../../lib/logger';
import { stripHtml } from '../../lib/html';
import { fromUnixSeconds } from '../../lib/time';
import { MAX_COMMENTS_PER_ARTICLE, type Article, type Comment, type SourceName } from '../../types';

const HN_API_BASE = 'https://hacker-news.firebaseio.com/v0';
const HN_ITEM_URL = 'https://news.ycombinator.com/item?id=';

const HNItemSchema = z.object({
  id: z.number(),
  type: z.string().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  title: z.string().optional(),
  text: z.string().optional(),
  url: z.string().optional(),
  score: z.number().optional(),
  kids: z.array(z.number()).optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});
type HNItem = z.infer<typeof HNItemSchema>;

const HNItemResponseSchema = HNItemSchema.nullable();
const HNStoryIdsSchema = z.array(z.number());

export interface HackerNewsOptions {
  /** How many top-story ids are probed at most */
  probeLimit?: number;
  /** Story details fetched concurrently while probing */
  batchSize?: number;
}

/**
 * Hacker News top stories, filtered for AI relevance.
 */
export class HackerNewsSource extends NewsSource {
  readonly name: SourceName = 'link_aggregator';
  readonly provider = 'hackernews';
  readonly description = 'Technical discussions and startup insights';
  readonly website = 'https://news.ycombinator.com';
  readonly provides = ['comments', 'technical_discussions', 'startup_news'];

  private readonly probeLimit: number;
  private readonly batchSize: number;

  constructor(options: HackerNewsOptions = {}) {
    super();
    this.probeLimit = options.probeLimit ?? 100;
    this.batchSize = options.batchSize ?? 10;
  }

  protected async collect(session: HttpSession, limit: number, collected: Article[]): Promise<void> {
    const storyIds = await session.requestJson(`${HN_API_BASE}/topstories.json`, HNStoryIdsSchema);
    const candidates = storyIds.slice(0, this.probeLimit);

    // Probe in small concurrent batches, consuming results in ranking order
    for (let offset = 0; offset < candidates.length; offset += this.batchSize) {
      if (collected.length >= limit) break;

      const batch = candidates.slice(offset, offset + this.batchSize);
      const stories = await Promise.all(batch.map((id) => this.fetchStory(session, id)));

      for (const story of stories) {
        if (collected.length >= limit) break;
        if (!story || !story.title) continue;
        if (!isAiRelated(story.title, story.text)) continue;

        const comments = await this.fetchComments(session, story);
        collected.push(this.toArticle(story, story.title, comments));
      }
    }
  }

  private toArticle(story: HNItem, title: string, comments: Comment[]): Article {
    return normalizeArticle({
      title,
      body: story.text ? stripHtml(story.text) : null,
      url: story.url || `${HN_ITEM_URL}${story.id}`,
      source: this.name,
      score: story.score ?? 0,
      comments,
      publishedAt: story.time !== undefined ? fromUnixSeconds(story.time) : null,
      sourceId: String(story.id),
    });
  }

  /**
   * Story details, or null for missing items, non-stories and failed
   * lookups. Rethrows once the session is closed so probing stops.
   */
  private async fetchStory(session: HttpSession, id: number): Promise<HNItem | null> {
    try {
      const item = await session.requestJson(`${HN_API_BASE}/item/${id}.json`, HNItemResponseSchema);
      return item && item.type === 'story' && !item.deleted && !item.dead ? item : null;
    } catch (error) {
      if (session.closed) throw error;
      this.logger.debug('Story lookup failed', { id, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * First comments of a story, fetched concurrently. HN exposes no
   * comment scores, so they are recorded as 0.
   */
  private async fetchComments(session: HttpSession, story: HNItem): Promise<Comment[]> {
    const kids = (story.kids ?? []).slice(0, MAX_COMMENTS_PER_ARTICLE);
    if (kids.length === 0) return [];

    const results = await Promise.allSettled(
      kids.map((id) => session.requestJson(`${HN_API_BASE}/item/${id}.json`, HNItemResponseSchema))
    );

    if (session.closed) {
      throw new Error('Session closed while fetching comments');
    }

    const comments: Comment[] = [];
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.debug('Comment lookup failed', {
          storyId: story.id,
          error: errorMessage(result.reason),
        });
        continue;
      }

      const item = result.value;
      if (!item || item.type !== 'comment' || item.deleted || item.dead || !item.text) continue;

      comments.push(
        normalizeComment({
          author: item.by,
          content: stripHtml(item.text),
          score: 0,
          createdUtc: fromUnixSeconds(item.time ?? 0),
        })
      );
    }

    return comments;
  }
}
