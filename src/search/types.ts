// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH TYPES — Ranked Topic Search
// ═══════════════════════════════════════════════════════════════════════════════

import type { Topic } from '../topics/index.js';

/**
 * Caller hints. Unknown fields are accepted and ignored.
 */
export interface SearchPreferences {
  /** Sectors the caller favours; matching topics score higher */
  readonly sectors?: readonly string[];
  /** false disables the boost for recently updated topics */
  readonly recencyBoost?: boolean;
}

export interface SearchResult {
  readonly sector: string;
  /** Full topic content; callers shorten it for display */
  readonly content: string;
  readonly score: number;
}

export interface RelevanceInput {
  readonly query: string;
  readonly topic: Topic;
  readonly preferences: SearchPreferences | null;
  readonly now: Date;
}

/**
 * Must be deterministic for equal inputs. Scores ≤ 0 (and NaN) exclude the
 * topic from results.
 */
export type RelevancePolicy = (input: RelevanceInput) => number;

export type RelevancePolicyName = 'term-overlap' | 'constant';

// ─────────────────────────────────────────────────────────────────────────────────
// TOKENIZER
// ─────────────────────────────────────────────────────────────────────────────────

export interface TokenizerOptions {
  lowercase?: boolean;
  removeStopWords?: boolean;
  minLength?: number;
  maxLength?: number;
}

export const DEFAULT_TOKENIZER_OPTIONS: Required<TokenizerOptions> = {
  lowercase: true,
  removeStopWords: true,
  minLength: 2,
  maxLength: 50,
};
