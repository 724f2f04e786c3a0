/**
 * Trendwire — Reddit Source (forum)
 *
 * Pulls "hot" posts from the configured subreddits and keeps the
 * AI-related ones. With client credentials the app-only OAuth flow is
 * used; without them the public JSON endpoints.
 */

import { z } from 'zod';
import { NewsSource } from '../base';
import { isAiRelated } from '../relevance';
import { normalizeArticle, normalizeComment } from '../normalizer';
import type { HttpSession } from '../../lib/http';
import type { RedditCredentials } from '../../lib/config';
import { errorMessage } from '../../lib/logger';
import { fromUnixSeconds } from '../../lib/time';
import { MAX_COMMENTS_PER_ARTICLE, type Article, type Comment, type SourceName } from '../../types';

const PUBLIC_BASE = 'https://www.reddit.com';
const OAUTH_BASE = 'https://oauth.reddit.com';
const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';

// ============================================================
// PAYLOAD SCHEMAS
// ============================================================

const ListingSchema = z.object({
  kind: z.string().optional(),
  data: z.object({
    children: z.array(
      z.object({
        kind: z.string(),
        data: z.unknown(),
      })
    ),
  }),
});
type Listing = z.infer<typeof ListingSchema>;

const PostSchema = z.object({
  id: z.string(),
  title: z.string(),
  selftext: z.string().default(''),
  url: z.string(),
  permalink: z.string().optional(),
  score: z.number(),
  created_utc: z.number(),
  stickied: z.boolean().default(false),
});
type RedditPost = z.infer<typeof PostSchema>;

const CommentDataSchema = z.object({
  author: z.string().nullable().optional(),
  body: z.string(),
  score: z.number().default(0),
  created_utc: z.number(),
});

// /comments/{id}.json answers [post listing, comment listing]
const CommentThreadSchema = z.tuple([ListingSchema, ListingSchema]);

const TokenSchema = z.object({
  access_token: z.string(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

// ============================================================
// SOURCE
// ============================================================

export interface RedditOptions {
  subreddits: string[];
  userAgent: string;
  credentials?: RedditCredentials;
}

/**
 * Per-session Reddit client: resolves the API base and token once.
 */
class RedditClient {
  private authorization?: Promise<string | undefined>;

  constructor(
    private readonly session: HttpSession,
    private readonly credentials?: RedditCredentials
  ) {}

  get base(): string {
    return this.credentials ? OAUTH_BASE : PUBLIC_BASE;
  }

  async get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, string | number>
  ): Promise<T> {
    const token = await this.token();
    return this.session.requestJson(`${this.base}${path}`, schema, {
      params: { ...params, raw_json: 1 },
      headers: token ? { Authorization: `bearer ${token}` } : undefined,
    });
  }

  private token(): Promise<string | undefined> {
    this.authorization ??= this.requestToken();
    return this.authorization;
  }

  private async requestToken(): Promise<string | undefined> {
    if (!this.credentials) return undefined;

    const basic = Buffer.from(
      `${this.credentials.clientId}:${this.credentials.clientSecret}`
    ).toString('base64');

    const res = await this.session.requestJson(TOKEN_URL, TokenSchema, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }),
    });
    return res.access_token;
  }
}

/**
 * AI-focused subreddits.
 */
export class RedditSource extends NewsSource {
  readonly name: SourceName = 'forum';
  readonly provider = 'reddit';
  readonly description = 'AI-focused subreddits with community discussions';
  readonly website = 'https://www.reddit.com';
  readonly provides = ['comments', 'upvotes', 'community_insights'];

  private readonly subreddits: string[];
  private readonly userAgent: string;
  private readonly credentials?: RedditCredentials;

  constructor(options: RedditOptions) {
    super();
    this.subreddits = options.subreddits;
    this.userAgent = options.userAgent;
    this.credentials = options.credentials;
  }

  protected sessionHeaders(): Record<string, string> {
    return { 'User-Agent': this.userAgent };
  }

  protected topics(): string[] {
    return this.subreddits;
  }

  protected async collect(session: HttpSession, limit: number, collected: Article[]): Promise<void> {
    if (this.subreddits.length === 0) {
      this.logger.warn('No subreddits configured');
      return;
    }

    const client = new RedditClient(session, this.credentials);
    const perSubreddit = Math.floor(limit / this.subreddits.length) + 1;

    for (const subreddit of this.subreddits) {
      if (collected.length >= limit) break;

      try {
        const path = `/r/${encodeURIComponent(subreddit)}/hot.json`;
        const listing = await client.get(path, ListingSchema, { limit: perSubreddit });

        for (const post of this.readPosts(listing)) {
          if (collected.length >= limit) break;
          if (post.stickied) continue;
          if (!isAiRelated(post.title, post.selftext)) continue;

          const comments = await this.fetchComments(client, session, post);
          collected.push(this.toArticle(post, comments));
        }
      } catch (error) {
        if (session.closed) throw error;
        this.logger.warn('Subreddit fetch failed', { subreddit, error: errorMessage(error) });
      }
    }
  }

  private readPosts(listing: Listing): RedditPost[] {
    const posts: RedditPost[] = [];
    for (const child of listing.data.children) {
      if (child.kind !== 't3') continue;
      const parsed = PostSchema.safeParse(child.data);
      if (parsed.success) {
        posts.push(parsed.data);
      } else {
        this.logger.debug('Skipping malformed post', { issues: parsed.error.issues.length });
      }
    }
    return posts;
  }

  private toArticle(post: RedditPost, comments: Comment[]): Article {
    return normalizeArticle({
      title: post.title,
      body: post.selftext,
      url: post.url,
      source: this.name,
      score: post.score,
      comments,
      publishedAt: fromUnixSeconds(post.created_utc),
      sourceId: post.id,
    });
  }

  /**
   * Top-level comments of a post. A failed lookup costs the post its
   * comments, not the post itself.
   */
  private async fetchComments(
    client: RedditClient,
    session: HttpSession,
    post: RedditPost
  ): Promise<Comment[]> {
    try {
      const [, thread] = await client.get(`/comments/${post.id}.json`, CommentThreadSchema, {
        limit: MAX_COMMENTS_PER_ARTICLE,
        depth: 1,
      });

      const comments: Comment[] = [];
      for (const child of thread.data.children) {
        if (comments.length >= MAX_COMMENTS_PER_ARTICLE) break;
        if (child.kind !== 't1') continue;

        const parsed = CommentDataSchema.safeParse(child.data);
        if (!parsed.success || parsed.data.body === '[deleted]') continue;

        comments.push(
          normalizeComment(
            {
              author: parsed.data.author,
              content: parsed.data.body,
              score: parsed.data.score,
              createdUtc: fromUnixSeconds(parsed.data.created_utc),
            },
            'deleted'
          )
        );
      }
      return comments;
    } catch (error) {
      if (session.closed) throw error;
      this.logger.debug('Comment fetch failed', { postId: post.id, error: errorMessage(error) });
      return [];
    }
  }
}
