import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SEARCH_TERMS,
  DEFAULT_SUBREDDITS,
  loadSettings,
} from '../../src/lib/config';
import { ConfigError } from '../../src/lib/errors';

describe('loadSettings', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      port: 8000,
      enabledSources: ['forum', 'link_aggregator', 'news_search'],
      reddit: {
        credentials: undefined,
        userAgent: 'Trendwire/1.0',
        subreddits: DEFAULT_SUBREDDITS,
      },
      newsApi: {
        apiKey: undefined,
        searchTerms: DEFAULT_SEARCH_TERMS,
      },
      rateLimit: {
        requests: 100,
        periodSeconds: 3600,
        cleanupIntervalSeconds: 300,
      },
      maxArticlesPerSource: 10,
      totalArticles: 20,
      sourceTimeoutMs: 8000,
      requestTimeoutMs: 25000,
      cache: {
        enabled: false,
        redisUrl: 'redis://localhost:6379',
        ttlSeconds: 300,
      },
    });
  });

  it('should keep the duplicate community in the default list', () => {
    expect(DEFAULT_SUBREDDITS.filter((name) => name === 'singularity')).toHaveLength(2);
  });

  it('should read overrides', () => {
    const settings = loadSettings({
      PORT: '9000',
      RATE_LIMIT_REQUESTS: '3',
      RATE_LIMIT_PERIOD: '10',
      AI_SUBREDDITS: 'LocalLLaMA, OpenAI,,',
      NEWSAPI_SEARCH_TERMS: 'robotics',
      ENABLE_CACHE: 'true',
      CACHE_TTL: '60',
      REDIS_URL: 'redis://cache.internal:6380/2',
      ENABLED_SOURCES: 'link_aggregator',
    });

    expect(settings.port).toBe(9000);
    expect(settings.rateLimit).toEqual({ requests: 3, periodSeconds: 10, cleanupIntervalSeconds: 300 });
    expect(settings.reddit.subreddits).toEqual(['LocalLLaMA', 'OpenAI']);
    expect(settings.newsApi.searchTerms).toEqual(['robotics']);
    expect(settings.cache).toEqual({
      enabled: true,
      redisUrl: 'redis://cache.internal:6380/2',
      ttlSeconds: 60,
    });
    expect(settings.enabledSources).toEqual(['link_aggregator']);
  });

  it('should build Reddit credentials only when both parts are set', () => {
    expect(
      loadSettings({ REDDIT_CLIENT_ID: 'test-id', REDDIT_CLIENT_SECRET: 'test-secret' }).reddit.credentials
    ).toEqual({ clientId: 'test-id', clientSecret: 'test-secret' });
    expect(loadSettings({ REDDIT_CLIENT_ID: 'test-id' }).reddit.credentials).toBeUndefined();
  });

  it('should treat the sample NewsAPI key as unset', () => {
    expect(loadSettings({ NEWSAPI_KEY: 'test_api_key' }).newsApi.apiKey).toBeUndefined();
    expect(loadSettings({ NEWSAPI_KEY: 'test-secret' }).newsApi.apiKey).toBe('test-secret');
  });

  it('should fall back to defaults for blank values', () => {
    const settings = loadSettings({ PORT: '', NEWSAPI_KEY: '  ', AI_SUBREDDITS: ' ', REDIS_URL: '' });
    expect(settings.port).toBe(8000);
    expect(settings.cache.redisUrl).toBe('redis://localhost:6379');
    expect(settings.newsApi.apiKey).toBeUndefined();
    expect(settings.reddit.subreddits).toEqual(DEFAULT_SUBREDDITS);
  });

  it('should only enable the cache for truthy flags', () => {
    expect(loadSettings({ ENABLE_CACHE: 'yes' }).cache.enabled).toBe(true);
    expect(loadSettings({ ENABLE_CACHE: 'ON' }).cache.enabled).toBe(true);
    expect(loadSettings({ ENABLE_CACHE: 'false' }).cache.enabled).toBe(false);
    expect(loadSettings({ ENABLE_CACHE: 'nope' }).cache.enabled).toBe(false);
  });

  it('should reject non-numeric values', () => {
    expect(() => loadSettings({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadSettings({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('should reject values below the minimum', () => {
    expect(() => loadSettings({ RATE_LIMIT_REQUESTS: '0' })).toThrow(/RATE_LIMIT_REQUESTS: /);
  });

  it('should reject a malformed Redis URL', () => {
    expect(() => loadSettings({ REDIS_URL: 'not a url' })).toThrow(/REDIS_URL: /);
  });

  it('should reject unknown source names', () => {
    expect(() => loadSettings({ ENABLED_SOURCES: 'forum,bogus' })).toThrow(/ENABLED_SOURCES\.1: /);
  });
});
