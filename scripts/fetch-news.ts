/**
 * Trendwire — Fetch News Script
 *
 * Runs one aggregation without the HTTP server and prints the ranked list.
 *
 * Usage:
 *   npm run fetch                       # Configured article target
 *   npm run fetch -- --limit 5          # Top five only
 *   npm run fetch -- --json             # NewsResponse JSON on stdout
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import { loadSettings } from '../src/lib/config';
import { logger, errorMessage } from '../src/lib/logger';
import { getSourcesUsed, initAggregator } from '../src/feeds';
import type { Article, NewsResponse } from '../src/types';

// ============================================================
// ARGUMENTS
// ============================================================

export interface FetchOptions {
  limit?: number;
  json: boolean;
}

export function parseArgs(args: string[]): FetchOptions {
  const options: FetchOptions = { json: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--json') {
      options.json = true;
    } else if (args[i] === '--limit' && args[i + 1]) {
      const limit = parseInt(args[i + 1], 10);
      if (Number.isInteger(limit) && limit > 0) {
        options.limit = limit;
      }
      i++;
    }
  }

  return options;
}

// ============================================================
// OUTPUT
// ============================================================

export function renderArticle(article: Article, rank: number): string {
  const comments = article.comments.length === 1 ? '1 comment' : `${article.comments.length} comments`;
  return [
    `${rank}. [${article.source}] ${article.title}`,
    `   score ${article.score} · ${comments} · ${article.publishedAt ?? 'undated'}`,
    `   ${article.url}`,
  ].join('\n');
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const settings = loadSettings();
  const totalArticles = options.limit ?? settings.totalArticles;

  const init = initAggregator({ ...settings, totalArticles });
  if (!init.ok) {
    throw init.error;
  }

  const articles = await init.aggregator.getTrendingNews();

  if (options.json) {
    const response: NewsResponse = {
      articles,
      totalCount: articles.length,
      sourcesUsed: getSourcesUsed(articles),
      lastUpdated: new Date().toISOString(),
    };
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  console.log(`\nTop ${articles.length} AI stories (${getSourcesUsed(articles).join(', ')})\n`);
  articles.forEach((article, index) => {
    console.log(renderArticle(article, index + 1));
    console.log('');
  });
}

/**
 * True when the module at `moduleUrl` is the script Node was started with.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  return scriptPath !== undefined && moduleUrl === pathToFileURL(scriptPath).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch((error: unknown) => {
    logger.error('Fetch failed', { error: errorMessage(error) });
    process.exit(1);
  });
}
