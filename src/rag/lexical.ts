/**
 * Lexical Search
 *
 * Term-overlap scoring used by hybrid retrieval. A chunk scores the fraction
 * of distinct query terms it contains, plus a small log-frequency bonus.
 */

import type { Chunk } from './types.js';

export interface LexicalMatch {
  chunk: Chunk;
  score: number;
  matchedTerms: string[];
}

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'do', 'does', 'for', 'from',
  'how', 'in', 'is', 'it', 'of', 'on', 'or', 'the', 'this', 'that', 'to', 'was',
  'what', 'when', 'where', 'which', 'who', 'why', 'with',
]);

/** Weight of the term-frequency bonus relative to coverage */
const TF_BONUS = 0.1;

/**
 * Tokenize text into lowercase terms of two or more characters.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((token) => token.length >= 2);
}

/**
 * Distinct, non-stopword query terms in first-seen order.
 */
export function queryTerms(query: string): string[] {
  return [...new Set(tokenize(query).filter((token) => !STOPWORDS.has(token)))];
}

/**
 * Score chunks against a query. Chunks with no matching term are dropped.
 * Results are sorted by score desc, then chunk id asc.
 */
export function lexicalSearch(query: string, chunks: Chunk[], topK: number): LexicalMatch[] {
  const terms = queryTerms(query);
  if (terms.length === 0 || topK <= 0) {
    return [];
  }

  const matches: LexicalMatch[] = [];

  for (const chunk of chunks) {
    const counts = new Map<string, number>();
    for (const token of tokenize(chunk.text)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const matchedTerms = terms.filter((term) => counts.has(term));
    if (matchedTerms.length === 0) {
      continue;
    }

    const coverage = matchedTerms.length / terms.length;
    const frequency =
      matchedTerms.reduce((sum, term) => sum + Math.log(1 + (counts.get(term) ?? 0)), 0) / terms.length;

    matches.push({
      chunk,
      score: coverage + TF_BONUS * frequency,
      matchedTerms,
    });
  }

  return matches
    .sort((a, b) => b.score - a.score || compareIds(a.chunk.id, b.chunk.id))
    .slice(0, topK);
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
