/**
 * Tokenization and lexicon-based sentiment for document text
 */

import stopWordList from './data/stop-words.json' with { type: 'json' };
import sentimentLexicon from './data/sentiment-lexicon.json' with { type: 'json' };
import { SentimentDistribution, TextDocument } from '../anomaly/anomaly-types.js';

export type SentimentLabel = keyof SentimentDistribution;

const STOP_WORDS = new Set<string>(stopWordList);
const POSITIVE_WORDS = new Set<string>(sentimentLexicon.positive);
const NEGATIVE_WORDS = new Set<string>(sentimentLexicon.negative);

const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SEPARATOR)
    .filter((token) => token.length >= 2 && !STOP_WORDS.has(token));
}

/**
 * Curated keywords count as terms of their own, even multi-word ones.
 */
export function documentTerms(doc: TextDocument): string[] {
  const terms = tokenize(doc.content);
  for (const keyword of doc.keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized.length > 0) terms.push(normalized);
  }
  return terms;
}

export function classifySentiment(tokens: readonly string[]): SentimentLabel {
  let positive = 0;
  let negative = 0;
  for (const token of tokens) {
    if (POSITIVE_WORDS.has(token)) positive++;
    if (NEGATIVE_WORDS.has(token)) negative++;
  }

  if (positive > negative) return 'positive';
  if (negative > positive) return 'negative';
  return 'neutral';
}

/**
 * Per-document term lists, computed once per document object
 */
export class TermCache {
  private cache = new WeakMap<TextDocument, string[]>();

  get(doc: TextDocument): string[] {
    let terms = this.cache.get(doc);
    if (!terms) {
      terms = documentTerms(doc);
      this.cache.set(doc, terms);
    }
    return terms;
  }
}
