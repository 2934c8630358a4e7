import { describe, expect, it } from 'vitest';
import { createEmbeddingProvider, createLLMService, createVectorStore } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { FallbackEmbeddingProvider, LocalEmbeddingProvider } from './rag/embedding-providers.js';
import { InMemoryVectorStore } from './rag/store.js';

describe('bootstrap', () => {
  it('uses local embeddings by default', () => {
    const embedder = createEmbeddingProvider(loadConfig({ LOCAL_EMBEDDING_DIMENSIONS: '128' }));
    expect(embedder).toBeInstanceOf(LocalEmbeddingProvider);
    expect(embedder.getDimensions()).toBe(128);
  });

  it('pairs a remote provider with a local fallback of the same size', () => {
    const embedder = createEmbeddingProvider(
      loadConfig({ EMBEDDING_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' })
    );
    expect(embedder).toBeInstanceOf(FallbackEmbeddingProvider);
    expect(embedder.name).toBe('openai+local');
    expect(embedder.getDimensions()).toBe(1536);
  });

  it('skips the fallback when disabled', () => {
    const embedder = createEmbeddingProvider(
      loadConfig({ EMBEDDING_PROVIDER: 'google', GOOGLE_API_KEY: 'test-secret', EMBEDDING_FALLBACK: 'false' })
    );
    expect(embedder.name).toBe('google');
  });

  it('requires API keys for remote providers', () => {
    expect(() => createEmbeddingProvider(loadConfig({ EMBEDDING_PROVIDER: 'openai' }))).toThrow(
      'OPENAI_API_KEY required for OpenAI embeddings'
    );
    expect(() => createLLMService(loadConfig({ LLM_PROVIDER: 'anthropic' }))).toThrow(
      'ANTHROPIC_API_KEY required for Anthropic provider'
    );
  });

  it('runs without an LLM and with the in-memory store by default', async () => {
    const config = loadConfig({});
    expect(createLLMService(config)).toBeNull();
    expect(await createVectorStore(config)).toBeInstanceOf(InMemoryVectorStore);
  });
});
