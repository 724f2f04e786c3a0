/**
 * Trendwire — Source Types
 *
 * Per-source fetch outcomes and descriptive metadata.
 */

import type { Article, SourceName } from './article';

export type SourceFetchStatus = 'ok' | 'failed' | 'timeout';

/**
 * Outcome of one source call inside an aggregation run.
 * Failures are reported here and in the log; the articles list is
 * always usable (empty on failure or timeout).
 */
export interface SourceFetchResult {
  sourceName: SourceName;
  status: SourceFetchStatus;
  articles: Article[];
  durationMs: number;
  error?: string;
}

export interface SourceDescriptor {
  name: SourceName;
  provider: string;
  description: string;
  website: string;
  provides: string[];
  /** Communities (forum) or search terms (news search), when the source uses them */
  topics?: string[];
}
