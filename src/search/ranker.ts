// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH RANKER — Score, Filter, Sort, Truncate
// ═══════════════════════════════════════════════════════════════════════════════
//
// Full scan of the topic store on every search. Fine for a few thousand
// topics; past that this needs an index.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { TopicStore } from '../topics/index.js';
import { loggers } from '../observability/logging/index.js';
import type { RelevancePolicy, SearchPreferences, SearchResult } from './types.js';

export const DEFAULT_MAX_RESULTS = 10;

export interface SearchRankerOptions {
  readonly maxResults?: number;
  readonly clock?: () => Date;
}

export class SearchRanker {
  private readonly maxResults: number;
  private readonly clock: () => Date;

  constructor(
    private readonly topics: TopicStore,
    private readonly relevance: RelevancePolicy,
    options: SearchRankerOptions = {}
  ) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Scores descending; equal scores keep store scan order.
   * Rejects with StorageFailure when the scan fails.
   */
  async search(query: string, preferences: SearchPreferences | null): Promise<SearchResult[]> {
    const now = this.clock();
    const topics = await this.topics.scan();

    const scored: SearchResult[] = [];
    for (const topic of topics) {
      const score = this.relevance({ query, topic, preferences, now });
      // NaN fails this comparison too
      if (score > 0) {
        scored.push({ sector: topic.sector, content: topic.content, score });
      }
    }

    // Array.prototype.sort is stable
    scored.sort((a, b) => b.score - a.score);
    const results = scored.slice(0, this.maxResults);

    loggers.search.debug('Search ranked', {
      scanned: topics.length,
      matched: scored.length,
      returned: results.length,
    });
    return results;
  }
}
