/**
 * Builds a MultimodalRAGService from configuration.
 */

import { loadConfig, type RAGConfig } from './config/index.js';
import { AnthropicProvider, LLMService, OpenAIProvider, type LLMProvider } from './llm/index.js';
import {
  FallbackEmbeddingProvider,
  GoogleEmbeddingProvider,
  LocalEmbeddingProvider,
  OpenAIEmbeddingProvider,
} from './rag/embedding-providers.js';
import { createLanceStore } from './rag/lance-store.js';
import { MultimodalRAGService } from './rag/service.js';
import { InMemoryVectorStore } from './rag/store.js';
import type { EmbeddingProvider, VectorStore } from './rag/types.js';

export function createLLMProvider(config: RAGConfig, model: string): LLMProvider | null {
  switch (config.llmProvider) {
    case 'openai':
      if (!config.openaiApiKey) {
        throw new Error('OPENAI_API_KEY required for OpenAI provider');
      }
      return new OpenAIProvider(config.openaiApiKey, model, config.openaiBaseUrl);

    case 'anthropic':
      if (!config.anthropicApiKey) {
        throw new Error('ANTHROPIC_API_KEY required for Anthropic provider');
      }
      return new AnthropicProvider(config.anthropicApiKey, model);

    case 'none':
      return null;
  }
}

export function createLLMService(config: RAGConfig): LLMService | null {
  const main = createLLMProvider(config, config.mainModel);
  const fast = createLLMProvider(config, config.fastModel);
  if (!main || !fast) {
    return null;
  }
  return new LLMService({ main, fast });
}

function createRemoteEmbeddingProvider(config: RAGConfig): EmbeddingProvider | null {
  switch (config.embeddingProvider) {
    case 'openai':
      if (!config.openaiApiKey) {
        throw new Error('OPENAI_API_KEY required for OpenAI embeddings');
      }
      return new OpenAIEmbeddingProvider(config.openaiApiKey, config.embeddingModel, config.openaiBaseUrl);

    case 'google':
      if (!config.googleApiKey) {
        throw new Error('GOOGLE_API_KEY required for Google embeddings');
      }
      return new GoogleEmbeddingProvider(config.googleApiKey);

    case 'local':
      return null;
  }
}

/**
 * The configured embedding provider. A remote provider is paired with a
 * local one of the same dimension unless EMBEDDING_FALLBACK is off.
 */
export function createEmbeddingProvider(config: RAGConfig): EmbeddingProvider {
  const remote = createRemoteEmbeddingProvider(config);
  if (!remote) {
    return new LocalEmbeddingProvider(config.localEmbeddingDimensions);
  }
  if (!config.embeddingFallback) {
    return remote;
  }
  return new FallbackEmbeddingProvider(remote, new LocalEmbeddingProvider(remote.getDimensions()));
}

export async function createVectorStore(config: RAGConfig): Promise<VectorStore> {
  switch (config.vectorStore) {
    case 'lancedb':
      return createLanceStore(config.lanceDbPath);
    case 'memory':
      return new InMemoryVectorStore();
  }
}

export async function createRAGService(config: RAGConfig = loadConfig()): Promise<MultimodalRAGService> {
  const embedder = createEmbeddingProvider(config);
  const store = await createVectorStore(config);
  const llm = createLLMService(config);

  console.log(
    `[RAG] Embeddings: ${embedder.name} (${embedder.getDimensions()} dims), store: ${config.vectorStore}, ` +
      `LLM: ${llm ? `${llm.getMainModel()} / ${llm.getFastModel()}` : 'disabled'}`
  );

  return new MultimodalRAGService({ store, embedder, captioner: llm, expander: llm, answerer: llm }, config);
}
