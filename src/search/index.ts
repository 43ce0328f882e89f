// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH MODULE — Ranked Search over Stored Topics
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  SearchPreferences,
  SearchResult,
  RelevanceInput,
  RelevancePolicy,
  RelevancePolicyName,
  TokenizerOptions,
} from './types.js';
export { DEFAULT_TOKENIZER_OPTIONS } from './types.js';
export { Tokenizer, STOP_WORDS } from './tokenizer.js';
export {
  constantRelevance,
  createTermOverlapRelevance,
  createRelevancePolicy,
  CONSTANT_SCORE,
  RECENCY_WINDOW_DAYS,
  MAX_RECENCY_BOOST,
  PREFERRED_SECTOR_BOOST,
} from './relevance.js';
export { SearchRanker, DEFAULT_MAX_RESULTS, type SearchRankerOptions } from './ranker.js';
