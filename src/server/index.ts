/**
 * Trendwire — Server Entry Point
 *
 * Builds settings, aggregator, rate limiter and cache, hands them to
 * createApp() and starts listening. Run with: npm start
 */

import 'dotenv/config';
import { loadSettings, type Settings } from '../lib/config';
import { createCache } from '../lib/cache';
import { RateLimiter } from '../lib/rate-limiter';
import { logger, errorMessage } from '../lib/logger';
import { initAggregator } from '../feeds';
import { createApp } from './app';

async function startServer(settings: Settings): Promise<void> {
  const rateLimiter = new RateLimiter({
    limit: settings.rateLimit.requests,
    periodSeconds: settings.rateLimit.periodSeconds,
  });
  const cache = await createCache(settings.cache);

  const app = createApp({
    settings,
    aggregatorInit: initAggregator(settings),
    rateLimiter,
    cache,
  });

  const sweep = setInterval(() => {
    const removed = rateLimiter.cleanupOldEntries(settings.rateLimit.periodSeconds);
    if (removed > 0) {
      logger.debug('Rate limiter sweep', { removed, tracked: rateLimiter.trackedClients });
    }
  }, settings.rateLimit.cleanupIntervalSeconds * 1000);
  sweep.unref();

  const server = app.listen(settings.port, () => {
    logger.info(`Trendwire API listening on port ${settings.port}`, {
      cache: cache.enabled,
      rateLimit: settings.rateLimit.requests,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    clearInterval(sweep);
    server.close((error) => {
      if (error) {
        logger.error('Server close failed', { error: errorMessage(error) });
      }
      void cache.close().then(() => process.exit(error ? 1 : 0));
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

async function main(): Promise<void> {
  await startServer(loadSettings());
}

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
