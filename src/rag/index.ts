export * from './types.js';
export * from './errors.js';
export { Chunker, type ChunkingOptions } from './chunker.js';
export * from './normalizers/index.js';
export { loadDocument, isSupportedFile, detectImageType, SUPPORTED_EXTENSIONS } from './documents.js';
export {
  GoogleEmbeddingProvider,
  OpenAIEmbeddingProvider,
  LocalEmbeddingProvider,
  FallbackEmbeddingProvider,
  embedMany,
  type CircuitBreakerOptions,
} from './embedding-providers.js';
export { InMemoryVectorStore, cosineSimilarity, matchesFilter } from './store.js';
export { LanceStore, createLanceStore } from './lance-store.js';
export { ResultCache, buildCacheKey, type CacheStats, type CacheInvalidator, type ResultCacheOptions } from './cache.js';
export { QueryClassifier, DEFAULT_INTENT_STRATEGIES } from './classifier.js';
export { lexicalSearch, tokenize } from './lexical.js';
export { Reranker, type RerankerConfig } from './reranker.js';
export { IngestionPipeline, type IngestionPipelineOptions } from './ingestion.js';
export { RetrievalEngine, type RetrievalOptions } from './retrieval.js';
export { callCapability, type CapabilityPolicy } from './capability.js';
export {
  MultimodalRAGService,
  type RAGServiceComponents,
  type QueryClassification,
  type AnswerOptions,
} from './service.js';
