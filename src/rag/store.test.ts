import { describe, expect, it } from 'vitest';
import { InMemoryVectorStore, cosineSimilarity, matchesFilter } from './store.js';
import type { Chunk, ChunkModality, VectorEntry } from './types.js';

function chunk(documentId: string, position: number, modality: ChunkModality = 'text'): Chunk {
  return {
    id: `${documentId}:${position}`,
    documentId,
    sourceName: `${documentId}.txt`,
    modality,
    position,
    text: `chunk ${position} of ${documentId}`,
    span: { start: 0, end: 10 },
    metadata: { topic: position % 2 === 0 ? 'even' : 'odd' },
  };
}

function entry(documentId: string, position: number, embedding: number[], modality?: ChunkModality): VectorEntry {
  return { chunk: chunk(documentId, position, modality), embedding };
}

describe('cosineSimilarity', () => {
  it('measures the angle between vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('returns 0 for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe('matchesFilter', () => {
  it('matches chunk fields and metadata keys', () => {
    const c = chunk('doc', 2);
    expect(matchesFilter(c, undefined)).toBe(true);
    expect(matchesFilter(c, { documentId: 'doc', topic: 'even' })).toBe(true);
    expect(matchesFilter(c, { modality: 'image' })).toBe(false);
    expect(matchesFilter(c, { missing: null })).toBe(false);
  });
});

describe('InMemoryVectorStore', () => {
  async function seeded(): Promise<InMemoryVectorStore> {
    const store = new InMemoryVectorStore();
    await store.put([
      entry('a', 0, [1, 0]),
      entry('a', 1, [0, 1]),
      entry('b', 0, [1, 1], 'image'),
      entry('b', 1, [-1, 0]),
    ]);
    return store;
  }

  it('returns nearest neighbours best first with scores in [0, 1]', async () => {
    const store = await seeded();
    const matches = await store.query([1, 0], 3);

    expect(matches.map((m) => m.chunk.id)).toEqual(['a:0', 'b:0', 'a:1']);
    expect(matches[0].score).toBe(1);
    expect(matches[2].score).toBe(0.5);
  });

  it('applies filters before ranking', async () => {
    const store = await seeded();
    expect((await store.query([1, 0], 10, { documentId: 'b' })).map((m) => m.chunk.id)).toEqual(['b:0', 'b:1']);
    expect((await store.query([1, 0], 10, { modality: 'image' })).map((m) => m.chunk.id)).toEqual(['b:0']);
  });

  it('scans stored chunks up to a limit', async () => {
    const store = await seeded();
    expect((await store.scan(undefined, 2)).map((c) => c.id)).toEqual(['a:0', 'a:1']);
    expect((await store.scan({ topic: 'odd' }, 10)).map((c) => c.id)).toEqual(['a:1', 'b:1']);
  });

  it('deletes a document and counts what remains', async () => {
    const store = await seeded();
    expect(await store.count()).toBe(4);
    expect(await store.documentCount()).toBe(2);

    expect(await store.deleteDocument('a')).toBe(2);
    expect(await store.deleteDocument('a')).toBe(0);
    expect(await store.count()).toBe(2);
    expect(await store.documentCount()).toBe(1);
  });

  it('lists and removes individual chunks', async () => {
    const store = await seeded();
    expect(await store.documentChunkIds('b')).toEqual(['b:0', 'b:1']);
    expect(await store.documentChunkIds('missing')).toEqual([]);

    expect(await store.deleteChunks(['b:1', 'a:9'])).toBe(1);
    expect(await store.documentChunkIds('b')).toEqual(['b:0']);
  });

  it('replaces entries written again under the same id', async () => {
    const store = await seeded();
    await store.put([{ chunk: { ...chunk('a', 0), text: 'rewritten' }, embedding: [0, 1] }]);

    expect(await store.count()).toBe(4);
    expect((await store.scan({ documentId: 'a' }, 10)).map((c) => c.text)).toEqual(['rewritten', 'chunk 1 of a']);
  });

  it('stores copies of the written chunks', async () => {
    const store = new InMemoryVectorStore();
    const written = entry('a', 0, [1, 0]);
    await store.put([written]);
    written.chunk.text = 'changed';

    const [stored] = await store.scan(undefined, 1);
    expect(stored.text).toBe('chunk 0 of a');
  });
});
