/**
 * Trendwire — Response Cache
 *
 * Redis-backed TTL cache wrapped around the aggregator output.
 * Values are stored as JSON text and validated against a schema on read.
 * A failed connection check at startup turns the cache off for the
 * lifetime of the process.
 */

import Redis from 'ioredis';
import type { z } from 'zod';
import { logger, errorMessage } from './logger';

export interface CacheStore {
  readonly enabled: boolean;
  get<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * The Redis commands the cache issues. ioredis' client satisfies it.
 */
export interface CacheClient {
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  flushdb(): Promise<unknown>;
  quit(): Promise<unknown>;
  disconnect(): void;
}

export interface CacheOptions {
  enabled: boolean;
  redisUrl: string;
  ttlSeconds: number;
}

const log = logger.child({ component: 'cache' });

export class RedisCache implements CacheStore {
  private client: CacheClient | null;
  private readonly ttlSeconds: number;

  /**
   * A null client builds a disabled cache.
   */
  constructor(client: CacheClient | null, ttlSeconds: number) {
    this.client = client;
    this.ttlSeconds = ttlSeconds;
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  /**
   * Check the connection. On failure the client is dropped and every
   * later call is a no-op.
   */
  async connect(): Promise<boolean> {
    if (!this.client) return false;

    try {
      await this.client.ping();
      return true;
    } catch (error) {
      log.warn('Redis connection failed, disabling cache', { error: errorMessage(error) });
      this.client.disconnect();
      this.client = null;
      return false;
    }
  }

  async get<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    if (!this.client) return null;

    let payload: string | null;
    try {
      payload = await this.client.get(key);
    } catch (error) {
      log.warn('Cache get failed', { key, error: errorMessage(error) });
      return null;
    }
    if (payload === null) return null;

    let parsed: z.SafeParseReturnType<unknown, T>;
    try {
      parsed = schema.safeParse(JSON.parse(payload));
    } catch (error) {
      log.warn('Cached value is not JSON, dropping', { key, error: errorMessage(error) });
      await this.delete(key);
      return null;
    }

    if (!parsed.success) {
      log.warn('Cached value failed validation, dropping', { key });
      await this.delete(key);
      return null;
    }
    return parsed.data;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<boolean> {
    if (!this.client) return false;

    try {
      const payload = JSON.stringify(value);
      if (payload === undefined) return false;

      await this.client.set(key, payload, 'EX', ttlSeconds ?? this.ttlSeconds);
      return true;
    } catch (error) {
      log.warn('Cache set failed', { key, error: errorMessage(error) });
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    if (!this.client) return false;

    try {
      await this.client.del(key);
      return true;
    } catch (error) {
      log.warn('Cache delete failed', { key, error: errorMessage(error) });
      return false;
    }
  }

  async clear(): Promise<boolean> {
    if (!this.client) return false;

    try {
      await this.client.flushdb();
      return true;
    } catch (error) {
      log.warn('Cache clear failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (!this.client) return;

    try {
      await this.client.quit();
    } catch (error) {
      log.warn('Closing Redis connection failed', { error: errorMessage(error) });
    }
  }
}

/**
 * Build the cache from settings and verify the connection once.
 */
export async function createCache(options: CacheOptions): Promise<RedisCache> {
  if (!options.enabled) {
    return new RedisCache(null, options.ttlSeconds);
  }

  const redis = new Redis(options.redisUrl, { maxRetriesPerRequest: 1 });

  redis.on('error', (error: Error) => {
    log.error('Redis error', { error: error.message });
  });
  redis.on('connect', () => {
    log.info('Redis connected');
  });

  const cache = new RedisCache(redis, options.ttlSeconds);
  await cache.connect();
  return cache;
}

/**
 * Deterministic key from a prefix and request parameters:
 * `prefix:k1:v1:k2:v2`, keys sorted.
 */
export function generateCacheKey(
  prefix: string,
  params: Record<string, string | number | boolean> = {}
): string {
  const parts = [prefix];
  for (const key of Object.keys(params).sort()) {
    parts.push(`${key}:${params[key]}`);
  }
  return parts.join(':');
}
