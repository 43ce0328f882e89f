// ═══════════════════════════════════════════════════════════════════════════════
// TOKENIZER — Text → Searchable Terms
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { DEFAULT_TOKENIZER_OPTIONS, type TokenizerOptions } from './types.js';

function loadStopWords(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/stop-words.json', import.meta.url), 'utf8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('stop-words.json must contain an array of strings');
  }
  return new Set(raw.filter((word): word is string => typeof word === 'string'));
}

export const STOP_WORDS = loadStopWords();

export class Tokenizer {
  private readonly options: Required<TokenizerOptions>;

  constructor(options: TokenizerOptions = {}) {
    this.options = { ...DEFAULT_TOKENIZER_OPTIONS, ...options };
  }

  /**
   * Split on anything that is not a letter or digit, then filter.
   */
  tokenize(text: string): string[] {
    if (!text) {
      return [];
    }

    let tokens = text
      .split(/[^\p{L}\p{N}]+/u)
      .filter(Boolean);

    if (this.options.lowercase) {
      tokens = tokens.map(t => t.toLowerCase());
    }

    if (this.options.removeStopWords) {
      tokens = tokens.filter(t => !STOP_WORDS.has(t.toLowerCase()));
    }

    return tokens.filter(t =>
      t.length >= this.options.minLength &&
      t.length <= this.options.maxLength
    );
  }

  tokenizeUnique(text: string): string[] {
    return [...new Set(this.tokenize(text))];
  }
}
