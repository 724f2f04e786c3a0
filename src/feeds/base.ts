/**
 * Trendwire — News Source Base
 *
 * Abstract base class for the three source adapters.
 * Subclasses implement collect(); run() wraps it with a scoped HTTP
 * session and error containment so nothing escapes the adapter.
 */

import type { Article, SourceDescriptor, SourceName } from '../types';
import { HttpSession, withSession } from '../lib/http';
import { logger, errorMessage, type Logger } from '../lib/logger';

export interface SourceRunResult {
  /** Everything gathered before the run ended, capped at the limit */
  articles: Article[];
  /** Set when the run ended early on an error */
  error?: string;
}

/**
 * Abstract base class for news sources.
 */
export abstract class NewsSource {
  abstract readonly name: SourceName;
  abstract readonly provider: string;
  abstract readonly description: string;
  abstract readonly website: string;
  abstract readonly provides: string[];

  private cachedLogger?: Logger;

  protected get logger(): Logger {
    this.cachedLogger ??= logger.child({ source: this.name });
    return this.cachedLogger;
  }

  /**
   * Headers sent with every request of a session.
   */
  protected sessionHeaders(): Record<string, string> {
    return {};
  }

  /**
   * Topics the source iterates over, reported by describe().
   */
  protected topics(): string[] | undefined {
    return undefined;
  }

  /**
   * Gather up to `limit` articles into `collected`.
   * Throwing is allowed: whatever was pushed so far is kept.
   */
  protected abstract collect(
    session: HttpSession,
    limit: number,
    collected: Article[]
  ): Promise<void>;

  /**
   * Fetch with failure reporting. Never rejects.
   */
  async run(limit: number, signal?: AbortSignal): Promise<SourceRunResult> {
    const collected: Article[] = [];

    try {
      await withSession({ headers: this.sessionHeaders(), signal }, (session) =>
        this.collect(session, limit, collected)
      );
      return { articles: collected.slice(0, limit) };
    } catch (error) {
      const message = errorMessage(error);

      if (signal?.aborted) {
        this.logger.debug('Fetch abandoned', { partial: collected.length });
      } else {
        this.logger.warn('Fetch failed, keeping partial results', {
          error: message,
          partial: collected.length,
        });
      }

      return { articles: collected.slice(0, limit), error: message };
    }
  }

  /**
   * Fetch up to `limit` articles. Failure means fewer (or zero) articles.
   */
  async fetch(limit: number, signal?: AbortSignal): Promise<Article[]> {
    const { articles } = await this.run(limit, signal);
    return articles;
  }

  describe(): SourceDescriptor {
    return {
      name: this.name,
      provider: this.provider,
      description: this.description,
      website: this.website,
      provides: this.provides,
      topics: this.topics(),
    };
  }
}
