/**
 * Shared test fixtures: article factory, a fixed-list source, an
 * in-process Redis stand-in and a stubbed global fetch routed on URL.
 */

import { vi } from 'vitest';
import { NewsSource } from '../src/feeds/base';
import type { CacheClient } from '../src/lib/cache';
import type { HttpSession } from '../src/lib/http';
import type { Article, SourceName } from '../src/types';

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    title: 'Test article about machine learning',
    description: 'Test description',
    url: 'https://example.com/test',
    source: 'forum',
    score: 0,
    comments: [],
    publishedAt: null,
    sourceId: 'test-1',
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type FetchHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

/**
 * Replace global fetch; every call is routed through `handler`.
 */
export function stubFetch(handler: FetchHandler) {
  const mockFetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    return handler(new URL(url), init);
  });
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

/**
 * URLs requested through a stubbed fetch, in call order.
 */
export function requestedUrls(mockFetch: ReturnType<typeof stubFetch>): URL[] {
  return mockFetch.mock.calls.map(([input]) => new URL(String(input)));
}

/**
 * Source serving a fixed list of articles, optionally failing after
 * pushing them.
 */
export class StaticSource extends NewsSource {
  readonly provider = 'static';
  readonly description = 'Fixed test articles';
  readonly website = 'https://example.com';
  readonly provides = ['articles'];

  constructor(
    readonly name: SourceName,
    private readonly articles: Article[],
    private readonly failWith?: string
  ) {
    super();
  }

  protected async collect(_session: HttpSession, limit: number, collected: Article[]): Promise<void> {
    for (const article of this.articles.slice(0, limit)) {
      collected.push(article);
    }
    if (this.failWith) {
      throw new Error(this.failWith);
    }
  }
}

/**
 * In-process stand-in for the Redis client. Expiry is left to Redis,
 * so TTLs are only recorded.
 */
export class FakeRedis implements CacheClient {
  readonly store = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  pingError?: Error;
  commandError?: Error;
  disconnected = false;
  quitCalls = 0;

  async ping(): Promise<string> {
    if (this.pingError) throw this.pingError;
    return 'PONG';
  }

  async get(key: string): Promise<string | null> {
    this.failIfBroken();
    return this.store.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<string> {
    this.failIfBroken();
    this.store.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    this.failIfBroken();
    this.ttls.delete(key);
    return this.store.delete(key) ? 1 : 0;
  }

  async flushdb(): Promise<string> {
    this.failIfBroken();
    this.store.clear();
    this.ttls.clear();
    return 'OK';
  }

  async quit(): Promise<string> {
    this.quitCalls += 1;
    return 'OK';
  }

  disconnect(): void {
    this.disconnected = true;
  }

  private failIfBroken(): void {
    if (this.commandError) throw this.commandError;
  }
}
