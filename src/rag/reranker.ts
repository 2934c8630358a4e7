/**
 * Reranker Module
 *
 * Second-stage scoring pass over retrieved candidates. The composite score
 * blends the original relevance with a recency factor (from `uploadedAt`)
 * and a length factor that penalizes very short and very long chunks.
 */

import { compareIds } from './lexical.js';
import type { MetadataValue, RetrievalMatch } from './types.js';

export interface RerankerConfig {
  relevanceWeight: number;
  recencyWeight: number;
  lengthWeight: number;
  /** Age at which the recency factor halves */
  recencyHalfLifeDays: number;
  /** Length factor is 1 between these bounds */
  idealMinChars: number;
  idealMaxChars: number;
}

export const DEFAULT_RERANKER_CONFIG: RerankerConfig = {
  relevanceWeight: 0.7,
  recencyWeight: 0.15,
  lengthWeight: 0.15,
  recencyHalfLifeDays: 30,
  idealMinChars: 100,
  idealMaxChars: 1000,
};

/** Recency used when a chunk carries no timestamp */
export const NEUTRAL_RECENCY = 0.5;

const DAY_MS = 24 * 60 * 60 * 1000;

export class Reranker {
  private config: RerankerConfig;
  private now: () => number;

  constructor(config: Partial<RerankerConfig> = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_RERANKER_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Rerank and keep the top `topK`. Ties fall back to the original score,
   * then to the chunk id.
   */
  rerank(matches: RetrievalMatch[], topK: number): RetrievalMatch[] {
    const { relevanceWeight, recencyWeight, lengthWeight } = this.config;

    const scored = matches.map((match) => {
      const recency = this.recencyFactor(match.chunk.metadata.uploadedAt);
      const length = this.lengthFactor(match.chunk.text.length);
      const composite = relevanceWeight * match.score + recencyWeight * recency + lengthWeight * length;
      return { match, composite, recency, length };
    });

    scored.sort(
      (a, b) =>
        b.composite - a.composite ||
        b.match.score - a.match.score ||
        compareIds(a.match.id, b.match.id)
    );

    return scored.slice(0, topK).map(({ match, composite, recency, length }) => ({
      ...match,
      score: composite,
      metadata: {
        ...match.metadata,
        originalScore: match.score,
        recencyFactor: recency,
        lengthFactor: length,
      },
    }));
  }

  recencyFactor(uploadedAt: MetadataValue | undefined): number {
    const timestamp =
      typeof uploadedAt === 'string' ? Date.parse(uploadedAt) : typeof uploadedAt === 'number' ? uploadedAt : NaN;
    if (Number.isNaN(timestamp)) {
      return NEUTRAL_RECENCY;
    }

    const ageDays = Math.max(0, this.now() - timestamp) / DAY_MS;
    return Math.pow(0.5, ageDays / this.config.recencyHalfLifeDays);
  }

  lengthFactor(length: number): number {
    const { idealMinChars, idealMaxChars } = this.config;

    if (length < idealMinChars) {
      return idealMinChars === 0 ? 1 : length / idealMinChars;
    }
    if (length <= idealMaxChars) {
      return 1;
    }
    return Math.max(0, 1 - (length - idealMaxChars) / idealMaxChars);
  }
}
