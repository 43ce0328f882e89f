// ═══════════════════════════════════════════════════════════════════════════════
// RELEVANCE POLICIES — Query × Topic → Score
// ═══════════════════════════════════════════════════════════════════════════════
//
// constant      0.5 for every topic
// term-overlap  share of distinct query terms found in the topic, boosted for
//               recent topics and preferred sectors
//
// ═══════════════════════════════════════════════════════════════════════════════

import { daysSinceUpdate } from '../topics/index.js';
import { Tokenizer } from './tokenizer.js';
import type { RelevanceInput, RelevancePolicy, RelevancePolicyName } from './types.js';

export const CONSTANT_SCORE = 0.5;

/** Topics younger than this get a linearly decaying boost */
export const RECENCY_WINDOW_DAYS = 7;
export const MAX_RECENCY_BOOST = 0.5;
export const PREFERRED_SECTOR_BOOST = 1.5;

export const constantRelevance: RelevancePolicy = () => CONSTANT_SCORE;

export function createTermOverlapRelevance(tokenizer: Tokenizer = new Tokenizer()): RelevancePolicy {
  return ({ query, topic, preferences, now }: RelevanceInput): number => {
    const queryTerms = tokenizer.tokenizeUnique(query);
    if (queryTerms.length === 0) return 0;

    const topicTerms = new Set(tokenizer.tokenize(`${topic.sector} ${topic.content}`));
    const matched = queryTerms.filter(term => topicTerms.has(term)).length;
    if (matched === 0) return 0;

    let score = matched / queryTerms.length;

    if (preferences?.recencyBoost !== false) {
      const days = daysSinceUpdate(topic, now);
      if (days < RECENCY_WINDOW_DAYS) {
        score *= 1 + MAX_RECENCY_BOOST * (1 - days / RECENCY_WINDOW_DAYS);
      }
    }

    if (preferences?.sectors?.includes(topic.sector)) {
      score *= PREFERRED_SECTOR_BOOST;
    }

    return score;
  };
}

export function createRelevancePolicy(name: RelevancePolicyName): RelevancePolicy {
  switch (name) {
    case 'constant':
      return constantRelevance;
    case 'term-overlap':
      return createTermOverlapRelevance();
  }
}
