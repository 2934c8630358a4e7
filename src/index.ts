export * from './rag/index.js';
export { LLMService, AnthropicProvider, OpenAIProvider, parseExpansions, type LLMProvider } from './llm/index.js';
export { loadConfig, DEFAULT_RAG_CONFIG, type RAGConfig } from './config/index.js';
export {
  createRAGService,
  createEmbeddingProvider,
  createLLMService,
  createVectorStore,
} from './bootstrap.js';
