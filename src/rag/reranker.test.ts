import { describe, expect, it } from 'vitest';
import { NEUTRAL_RECENCY, Reranker } from './reranker.js';
import type { ChunkMetadata, RetrievalMatch } from './types.js';

const NOW = Date.parse('2026-03-01T00:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function match(id: string, score: number, textLength = 300, metadata: ChunkMetadata = {}): RetrievalMatch {
  const text = 'x'.repeat(textLength);
  return {
    id,
    score,
    chunk: {
      id,
      documentId: id.split(':')[0],
      sourceName: 'doc.txt',
      modality: 'text',
      position: 0,
      text,
      span: { start: 0, end: textLength },
      metadata,
    },
    metadata: {},
  };
}

describe('Reranker', () => {
  const reranker = new Reranker({}, () => NOW);

  it('preserves the original order when recency and length are neutral', () => {
    const matches = [match('a:0', 0.9), match('b:0', 0.8), match('c:0', 0.8), match('d:0', 0.3)];
    const reranked = reranker.rerank(matches, 4);

    expect(reranked.map((m) => m.id)).toEqual(['a:0', 'b:0', 'c:0', 'd:0']);
    expect(reranked[0].score).toBeCloseTo(0.7 * 0.9 + 0.15 * NEUTRAL_RECENCY + 0.15, 10);
  });

  it('favours recent chunks over slightly more relevant stale ones', () => {
    const stale = match('old:0', 0.8, 300, { uploadedAt: new Date(NOW - 365 * DAY_MS).toISOString() });
    const fresh = match('new:0', 0.78, 300, { uploadedAt: new Date(NOW).toISOString() });

    expect(reranker.rerank([stale, fresh], 2).map((m) => m.id)).toEqual(['new:0', 'old:0']);
  });

  it('records the factors behind each score', () => {
    const [result] = reranker.rerank([match('a:0', 0.6, 50)], 1);
    expect(result.metadata).toEqual({ originalScore: 0.6, recencyFactor: 0.5, lengthFactor: 0.5 });
  });

  it('keeps only the top results', () => {
    const matches = [match('a:0', 0.2), match('b:0', 0.9), match('c:0', 0.5)];
    expect(reranker.rerank(matches, 2).map((m) => m.id)).toEqual(['b:0', 'c:0']);
  });

  it('halves recency every half-life', () => {
    expect(reranker.recencyFactor(new Date(NOW).toISOString())).toBe(1);
    expect(reranker.recencyFactor(new Date(NOW - 30 * DAY_MS).toISOString())).toBeCloseTo(0.5, 10);
    expect(reranker.recencyFactor(NOW - 60 * DAY_MS)).toBeCloseTo(0.25, 10);
    expect(reranker.recencyFactor(undefined)).toBe(NEUTRAL_RECENCY);
    expect(reranker.recencyFactor('not a date')).toBe(NEUTRAL_RECENCY);
  });

  it('penalizes very short and very long chunks', () => {
    expect(reranker.lengthFactor(0)).toBe(0);
    expect(reranker.lengthFactor(50)).toBe(0.5);
    expect(reranker.lengthFactor(100)).toBe(1);
    expect(reranker.lengthFactor(1000)).toBe(1);
    expect(reranker.lengthFactor(1500)).toBe(0.5);
    expect(reranker.lengthFactor(2500)).toBe(0);
  });
});
