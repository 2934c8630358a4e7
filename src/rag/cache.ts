/**
 * Result Cache
 * Maps a canonical retrieval key to a snapshot of its result, with a TTL.
 */

import { createHash } from 'crypto';
import type { MetadataFilter, RetrievalResult, RetrievalStrategy } from './types.js';

export interface CacheKeyParts {
  query: string;
  strategy: RetrievalStrategy;
  nResults: number;
  rerank: boolean;
  filter?: MetadataFilter;
}

export interface ResultCacheOptions {
  enabled: boolean;
  ttlMs: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_OPTIONS: ResultCacheOptions = {
  enabled: true,
  ttlMs: 60 * 60 * 1000,
  maxEntries: 500,
};

export interface CacheStats {
  enabled: boolean;
  size: number;
  hits: number;
  misses: number;
  invalidations: number;
}

/**
 * Anything the ingestion pipeline can tell that the store changed.
 */
export interface CacheInvalidator {
  invalidate(reason: string): void;
}

interface CacheEntry {
  value: Readonly<RetrievalResult>;
  storedAt: number;
}

/**
 * Build the canonical key. Filter keys are sorted and query whitespace is
 * collapsed, so logically identical requests share a key.
 */
export function buildCacheKey(parts: CacheKeyParts): string {
  const filter = parts.filter
    ? Object.fromEntries(Object.entries(parts.filter).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
    : null;

  const canonical = JSON.stringify([
    parts.query.replace(/\s+/g, ' ').trim(),
    parts.strategy,
    parts.nResults,
    parts.rerank,
    filter,
  ]);

  return createHash('sha256').update(canonical).digest('hex');
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class ResultCache implements CacheInvalidator {
  private entries: Map<string, CacheEntry> = new Map();
  private options: ResultCacheOptions;
  private now: () => number;
  private hits = 0;
  private misses = 0;
  private invalidations = 0;
  /** Bumped by every invalidation; results computed across a bump are not stored */
  private generation = 0;

  constructor(options: Partial<ResultCacheOptions> = {}, now: () => number = Date.now) {
    this.options = { ...DEFAULT_CACHE_OPTIONS, ...options };
    this.now = now;
  }

  /**
   * Return a fresh copy of a live entry, or undefined on miss/expiry.
   */
  get(key: string): RetrievalResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.storedAt >= this.options.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    // refresh LRU position
    this.entries.delete(key);
    this.entries.set(key, entry);
    return structuredClone(entry.value);
  }

  /**
   * Store a frozen snapshot. The whole entry replaces any previous one at once.
   */
  set(key: string, value: RetrievalResult): void {
    if (!this.options.enabled) {
      return;
    }

    this.entries.delete(key);
    this.entries.set(key, { value: deepFreeze(structuredClone(value)), storedAt: this.now() });

    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Serve from cache within the TTL, otherwise compute and store.
   * Errors from `compute` propagate and nothing is stored, as do values
   * rejected by `shouldStore` and values whose computation overlapped an
   * invalidation.
   */
  async getOrCompute(
    key: string,
    compute: () => Promise<RetrievalResult>,
    shouldStore: (value: RetrievalResult) => boolean = () => true
  ): Promise<RetrievalResult> {
    if (!this.options.enabled) {
      return compute();
    }

    const cached = this.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const generation = this.generation;
    const value = await compute();
    if (generation === this.generation && shouldStore(value)) {
      this.set(key, value);
    }
    return value;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.now() - entry.storedAt < this.options.ttlMs;
  }

  invalidate(reason: string): void {
    if (this.entries.size > 0) {
      console.log(`[ResultCache] Invalidated ${this.entries.size} entries (${reason})`);
    }
    this.entries.clear();
    this.invalidations++;
    this.generation++;
  }

  clear(): void {
    this.invalidate('cleared');
  }

  getStats(): CacheStats {
    return {
      enabled: this.options.enabled,
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      invalidations: this.invalidations,
    };
  }
}
