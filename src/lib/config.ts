/**
 * Trendwire — Settings
 *
 * Environment-driven configuration, validated once at startup.
 * Entry points load `.env` through dotenv before calling loadSettings().
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { SOURCE_ORDER, SourceNameSchema, type SourceName } from '../types';

// ============================================================
// DEFAULTS
// ============================================================

// Listed as observed upstream, duplicate entry included
export const DEFAULT_SUBREDDITS = [
  'artificial',
  'MachineLearning',
  'deeplearning',
  'singularity',
  'OpenAI',
  'ChatGPT',
  'singularity',
];

export const DEFAULT_SEARCH_TERMS = [
  'artificial intelligence',
  'machine learning',
  'AI',
  'neural networks',
  'deep learning',
  'OpenAI',
  'ChatGPT',
];

/** Placeholder key shipped in sample environments; treated as unset. */
const PLACEHOLDER_NEWSAPI_KEY = 'test_api_key';

// ============================================================
// SCHEMA
// ============================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const intWithDefault = (fallback: number, min = 1) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().min(min).default(fallback)
  );

const listWithDefault = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (!value || value.trim() === '') return fallback;
      return value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    });

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase()));

const sourceList = z
  .string()
  .optional()
  .transform((value) =>
    !value || value.trim() === ''
      ? [...SOURCE_ORDER]
      : value
          .split(',')
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0)
  )
  .pipe(z.array(SourceNameSchema));

const EnvSchema = z.object({
  PORT: intWithDefault(8000),
  ENABLED_SOURCES: sourceList,
  REDDIT_CLIENT_ID: optionalString,
  REDDIT_CLIENT_SECRET: optionalString,
  REDDIT_USER_AGENT: z.string().default('Trendwire/1.0'),
  NEWSAPI_KEY: optionalString,
  RATE_LIMIT_REQUESTS: intWithDefault(100),
  RATE_LIMIT_PERIOD: intWithDefault(3600),
  RATE_LIMIT_CLEANUP_INTERVAL: intWithDefault(300),
  MAX_ARTICLES_PER_SOURCE: intWithDefault(10),
  TOTAL_ARTICLES: intWithDefault(20),
  SOURCE_TIMEOUT_MS: intWithDefault(8000),
  REQUEST_TIMEOUT_MS: intWithDefault(25000),
  AI_SUBREDDITS: listWithDefault(DEFAULT_SUBREDDITS),
  NEWSAPI_SEARCH_TERMS: listWithDefault(DEFAULT_SEARCH_TERMS),
  ENABLE_CACHE: booleanFlag,
  REDIS_URL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().url().default('redis://localhost:6379')
  ),
  CACHE_TTL: intWithDefault(300),
});

// ============================================================
// SETTINGS
// ============================================================

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
}

export interface Settings {
  port: number;
  /** Sources to query; the news search source also needs an API key */
  enabledSources: SourceName[];
  reddit: {
    credentials?: RedditCredentials;
    userAgent: string;
    subreddits: string[];
  };
  newsApi: {
    apiKey?: string;
    searchTerms: string[];
  };
  rateLimit: {
    requests: number;
    periodSeconds: number;
    cleanupIntervalSeconds: number;
  };
  maxArticlesPerSource: number;
  totalArticles: number;
  sourceTimeoutMs: number;
  requestTimeoutMs: number;
  cache: {
    enabled: boolean;
    redisUrl: string;
    ttlSeconds: number;
  };
}

/**
 * Parse and validate settings from an environment map.
 * Throws ConfigError listing every offending key.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const credentials =
    values.REDDIT_CLIENT_ID && values.REDDIT_CLIENT_SECRET
      ? { clientId: values.REDDIT_CLIENT_ID, clientSecret: values.REDDIT_CLIENT_SECRET }
      : undefined;
  const newsApiKey =
    values.NEWSAPI_KEY === PLACEHOLDER_NEWSAPI_KEY ? undefined : values.NEWSAPI_KEY;

  return {
    port: values.PORT,
    enabledSources: values.ENABLED_SOURCES,
    reddit: {
      credentials,
      userAgent: values.REDDIT_USER_AGENT,
      subreddits: values.AI_SUBREDDITS,
    },
    newsApi: {
      apiKey: newsApiKey,
      searchTerms: values.NEWSAPI_SEARCH_TERMS,
    },
    rateLimit: {
      requests: values.RATE_LIMIT_REQUESTS,
      periodSeconds: values.RATE_LIMIT_PERIOD,
      cleanupIntervalSeconds: values.RATE_LIMIT_CLEANUP_INTERVAL,
    },
    maxArticlesPerSource: values.MAX_ARTICLES_PER_SOURCE,
    totalArticles: values.TOTAL_ARTICLES,
    sourceTimeoutMs: values.SOURCE_TIMEOUT_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    cache: {
      enabled: values.ENABLE_CACHE,
      redisUrl: values.REDIS_URL,
      ttlSeconds: values.CACHE_TTL,
    },
  };
}
