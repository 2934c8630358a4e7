/**
 * Embedding Providers
 * Remote embedding services, a local fallback, and a circuit breaker between them.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { ValidationError, errorMessage } from './errors.js';
import { tokenize } from './lexical.js';
import type { EmbeddingProvider } from './types.js';

const googleEmbeddingSchema = z.object({
  embedding: z.object({ values: z.array(z.number()) }).optional(),
});

const openAIEmbeddingSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).optional(),
});

/**
 * Google embedding provider using text-embedding-004 model.
 */
export class GoogleEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'google';
  private apiKey: string;
  private baseUrl = 'https://generativelanguage.googleapis.com/v1beta';
  private dimensions = 768;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  async embed(text: string): Promise<number[]> {
    const url = `${this.baseUrl}/models/text-embedding-004:embedContent?key=${this.apiKey}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: 'models/text-embedding-004',
        content: { parts: [{ text }] },
      }),
    });

    if (!response.ok) {
      throw new Error(`Embedding API error: ${response.status}`);
    }

    const data = googleEmbeddingSchema.parse(await response.json());
    const values = data.embedding?.values;
    if (!values || values.length === 0) {
      throw new Error('Embedding API returned no values');
    }
    return values;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    // Google doesn't have a batch endpoint, so we parallelize
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * OpenAI embedding provider.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private dimensions = 1536;

  constructor(
    apiKey: string,
    model: string = 'text-embedding-3-small',
    baseUrl: string = 'https://api.openai.com/v1'
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl;

    if (model === 'text-embedding-3-large') {
      this.dimensions = 3072;
    }
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(`OpenAI embedding API error: ${response.status}`);
    }

    const data = openAIEmbeddingSchema.parse(await response.json());
    const embeddings = data.data?.map((item) => item.embedding) ?? [];
    if (embeddings.length !== texts.length) {
      throw new Error(`OpenAI embedding API returned ${embeddings.length} vectors for ${texts.length} inputs`);
    }
    return embeddings;
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * Local embedding provider using the feature-hashing trick over word
 * unigrams and bigrams. Runs offline and is deterministic.
 */
export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local';
  private dimensions: number;

  constructor(dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ValidationError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  getDimensions(): number {
    return this.dimensions;
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);
    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    for (const feature of features) {
      const digest = createHash('sha256').update(feature).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

export interface CircuitBreakerOptions {
  /** Consecutive primary failures before the circuit opens */
  failureThreshold: number;
  /** How long the circuit stays open before the primary is tried again */
  resetAfterMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerOptions = {
  failureThreshold: 3,
  resetAfterMs: 60_000,
};

/**
 * Uses the primary provider while it is healthy and the fallback otherwise.
 * After `failureThreshold` consecutive failures the primary is skipped until
 * `resetAfterMs` has passed, then tried once more (half-open).
 */
export class FallbackEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  private primary: EmbeddingProvider;
  private fallback: EmbeddingProvider;
  private options: CircuitBreakerOptions;
  private now: () => number;
  private consecutiveFailures = 0;
  private openedAt: number | null = null;

  constructor(
    primary: EmbeddingProvider,
    fallback: EmbeddingProvider,
    options: Partial<CircuitBreakerOptions> = {},
    now: () => number = Date.now
  ) {
    if (primary.getDimensions() !== fallback.getDimensions()) {
      throw new ValidationError(
        `Fallback embedding dimensions (${fallback.getDimensions()}) must match primary (${primary.getDimensions()})`
      );
    }
    this.primary = primary;
    this.fallback = fallback;
    this.options = { ...DEFAULT_CIRCUIT_BREAKER, ...options };
    this.now = now;
    this.name = `${primary.name}+${fallback.name}`;
  }

  isOpen(): boolean {
    if (this.openedAt === null) {
      return false;
    }
    return this.now() - this.openedAt < this.options.resetAfterMs;
  }

  async embed(text: string): Promise<number[]> {
    return this.run(
      () => this.primary.embed(text),
      () => this.fallback.embed(text)
    );
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return this.run(
      () => embedMany(this.primary, texts),
      () => embedMany(this.fallback, texts)
    );
  }

  getDimensions(): number {
    return this.primary.getDimensions();
  }

  private async run<T>(primary: () => Promise<T>, fallback: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      return fallback();
    }

    try {
      const result = await primary();
      this.consecutiveFailures = 0;
      this.openedAt = null;
      return result;
    } catch (error) {
      this.consecutiveFailures++;
      if (this.consecutiveFailures >= this.options.failureThreshold) {
        this.openedAt = this.now();
        console.warn(
          `[Embeddings] ${this.primary.name} failed ${this.consecutiveFailures} times, using ${this.fallback.name} for ${this.options.resetAfterMs}ms`
        );
      } else {
        console.warn(`[Embeddings] ${this.primary.name} failed, falling back to ${this.fallback.name}:`, errorMessage(error));
      }
      return fallback();
    }
  }
}

/**
 * Batch through `embedBatch` where the provider has one.
 */
export async function embedMany(provider: EmbeddingProvider, texts: string[]): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }
  if (provider.embedBatch) {
    return provider.embedBatch(texts);
  }
  return Promise.all(texts.map((text) => provider.embed(text)));
}
