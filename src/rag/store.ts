import type { Chunk, MetadataFilter, MetadataValue, StoreMatch, VectorEntry, VectorStore } from './types.js';

/**
 * Chunk fields that filters may address directly, alongside metadata keys.
 */
export const FILTERABLE_CHUNK_FIELDS = ['documentId', 'sourceName', 'modality', 'position'] as const;

type FilterableField = (typeof FILTERABLE_CHUNK_FIELDS)[number];

function isFilterableField(key: string): key is FilterableField {
  return (FILTERABLE_CHUNK_FIELDS as readonly string[]).includes(key);
}

/**
 * Value of a filter key on a chunk: a top-level field or a metadata entry.
 */
export function chunkFieldValue(chunk: Chunk, key: string): MetadataValue | undefined {
  if (isFilterableField(key)) {
    return chunk[key];
  }
  return chunk.metadata[key];
}

export function matchesFilter(chunk: Chunk, filter: MetadataFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, value]) => chunkFieldValue(chunk, key) === value);
}

/**
 * Cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * In-memory Vector Store - exact cosine search over stored embeddings
 *
 * Suitable for tests and small corpora. Use LanceStore for persistence.
 */
export class InMemoryVectorStore implements VectorStore {
  private entries: Map<string, VectorEntry> = new Map();

  async put(entries: VectorEntry[]): Promise<string[]> {
    for (const entry of entries) {
      this.entries.set(entry.chunk.id, {
        chunk: structuredClone(entry.chunk),
        embedding: [...entry.embedding],
      });
    }
    return entries.map((entry) => entry.chunk.id);
  }

  async query(embedding: number[], k: number, filter?: MetadataFilter): Promise<StoreMatch[]> {
    const results: StoreMatch[] = [];

    for (const entry of this.entries.values()) {
      if (!matchesFilter(entry.chunk, filter)) {
        continue;
      }

      // Map cosine [-1, 1] into [0, 1]
      const score = (cosineSimilarity(embedding, entry.embedding) + 1) / 2;
      results.push({ chunk: structuredClone(entry.chunk), score });
    }

    results.sort((a, b) => b.score - a.score || (a.chunk.id < b.chunk.id ? -1 : 1));
    return results.slice(0, k);
  }

  async scan(filter: MetadataFilter | undefined, limit: number): Promise<Chunk[]> {
    const chunks: Chunk[] = [];
    for (const entry of this.entries.values()) {
      if (chunks.length >= limit) break;
      if (matchesFilter(entry.chunk, filter)) {
        chunks.push(structuredClone(entry.chunk));
      }
    }
    return chunks;
  }

  async deleteDocument(documentId: string): Promise<number> {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.chunk.documentId === documentId) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async documentChunkIds(documentId: string): Promise<string[]> {
    const ids: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.chunk.documentId === documentId) {
        ids.push(entry.chunk.id);
      }
    }
    return ids;
  }

  async deleteChunks(ids: string[]): Promise<number> {
    let removed = 0;
    for (const id of ids) {
      if (this.entries.delete(id)) {
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async documentCount(): Promise<number> {
    const documents = new Set<string>();
    for (const entry of this.entries.values()) {
      documents.add(entry.chunk.documentId);
    }
    return documents.size;
  }
}
