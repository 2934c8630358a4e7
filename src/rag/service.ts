/**
 * Multimodal RAG Service
 *
 * Public surface over ingestion and retrieval. Wires the chunker, the
 * normalizers, the result cache and the retrieval engine around the
 * capabilities it is given (embeddings, vector store, captions, completions).
 */

import { EventEmitter } from 'events';
import { DEFAULT_RAG_CONFIG, type RAGConfig } from '../config/index.js';
import { ResultCache, type CacheStats } from './cache.js';
import { callCapability, guardedCaptioner, guardedExpander, type CapabilityPolicy } from './capability.js';
import { Chunker } from './chunker.js';
import { QueryClassifier } from './classifier.js';
import { errorMessage } from './errors.js';
import { IngestionPipeline } from './ingestion.js';
import {
  ImageNormalizer,
  PdfNormalizer,
  TextNormalizer,
  UnpdfReader,
  type PdfReader,
} from './normalizers/index.js';
import { Reranker } from './reranker.js';
import { RetrievalEngine } from './retrieval.js';
import type {
  AnswerProvider,
  AnswerResult,
  CaptionProvider,
  DocumentInput,
  EmbeddingProvider,
  IngestOptions,
  IngestionBatchResult,
  IngestionProgress,
  IngestionResult,
  QueryExpander,
  QueryIntent,
  RAGStats,
  RetrievalRequest,
  RetrievalResult,
  RetrievalStrategy,
  VectorStore,
} from './types.js';

export interface RAGServiceComponents {
  store: VectorStore;
  embedder: EmbeddingProvider;
  /** Image captioning; images get placeholder text without it */
  captioner?: CaptionProvider | null;
  /** Query paraphrasing; expanded retrieval degrades to semantic without it */
  expander?: QueryExpander | null;
  /** Answer synthesis for `answer()` */
  answerer?: AnswerProvider | null;
  pdfReader?: PdfReader;
}

export interface QueryClassification {
  intent: QueryIntent;
  strategy: RetrievalStrategy;
}

export interface AnswerOptions {
  nResults?: number;
  strategy?: RetrievalStrategy;
  filter?: RetrievalRequest['filter'];
}

export class MultimodalRAGService extends EventEmitter {
  private store: VectorStore;
  private answerer: AnswerProvider | null;
  private policy: CapabilityPolicy;
  private cache: ResultCache;
  private classifier: QueryClassifier;
  private pipeline: IngestionPipeline;
  private engine: RetrievalEngine;

  constructor(components: RAGServiceComponents, config: RAGConfig = DEFAULT_RAG_CONFIG) {
    super();
    this.store = components.store;
    this.answerer = components.answerer ?? null;
    this.policy = {
      timeoutMs: config.capabilityTimeoutMs,
      retries: config.capabilityRetries,
      backoffMs: config.retryBackoffMs,
    };

    this.cache = new ResultCache({
      enabled: config.cacheEnabled,
      ttlMs: config.cacheTtlMs,
      maxEntries: config.cacheMaxEntries,
    });
    this.classifier = new QueryClassifier();

    const textNormalizer = new TextNormalizer();
    const imageNormalizer = new ImageNormalizer(
      components.captioner ? guardedCaptioner(components.captioner, this.policy) : null
    );
    const pdfNormalizer = new PdfNormalizer(
      components.pdfReader ?? new UnpdfReader(config.pdfRenderScale),
      textNormalizer,
      imageNormalizer,
      config.pdfMinPageTextChars
    );

    this.pipeline = new IngestionPipeline(
      {
        chunker: new Chunker({ maxChunkSize: config.chunkSize, overlap: config.chunkOverlap }),
        store: this.store,
        embedder: components.embedder,
        textNormalizer,
        imageNormalizer,
        pdfNormalizer,
        invalidator: this.cache,
      },
      {
        maxWorkers: config.maxWorkers,
        embedBatchSize: config.embedBatchSize,
        maxDocumentBytes: config.maxDocumentBytes,
        capabilityPolicy: this.policy,
      }
    );
    this.pipeline.on('ingestion_progress', (progress: IngestionProgress) => {
      this.emit('ingestion_progress', progress);
    });

    this.engine = new RetrievalEngine(
      {
        store: this.store,
        embedder: components.embedder,
        classifier: this.classifier,
        reranker: new Reranker({
          relevanceWeight: config.rerankRelevanceWeight,
          recencyWeight: config.rerankRecencyWeight,
          lengthWeight: config.rerankLengthWeight,
          recencyHalfLifeDays: config.recencyHalfLifeDays,
          idealMinChars: config.rerankIdealMinChars,
          idealMaxChars: config.rerankIdealMaxChars,
        }),
        cache: this.cache,
        expander: components.expander ? guardedExpander(components.expander, this.policy) : null,
      },
      {
        defaultNResults: config.defaultNResults,
        maxNResults: config.maxNResults,
        rerankByDefault: config.rerankByDefault,
        semanticWeight: config.semanticWeight,
        lexicalWeight: config.lexicalWeight,
        lexicalScanLimit: config.lexicalScanLimit,
        expansionVariants: config.expansionVariants,
        capabilityPolicy: this.policy,
      }
    );
  }

  async ingestOne(input: DocumentInput): Promise<IngestionResult> {
    return this.pipeline.ingestOne(input);
  }

  async ingestMany(inputs: DocumentInput[], options?: IngestOptions): Promise<IngestionBatchResult> {
    return this.pipeline.ingestMany(inputs, options);
  }

  async ingestFiles(paths: string[], options?: IngestOptions): Promise<IngestionBatchResult> {
    return this.pipeline.ingestFiles(paths, options);
  }

  async retrieve(request: RetrievalRequest): Promise<RetrievalResult> {
    return this.engine.retrieve(request);
  }

  classify(query: string): QueryClassification {
    const intent = this.classifier.classify(query);
    return { intent, strategy: this.classifier.strategyFor(intent) };
  }

  /**
   * Retrieve passages and synthesize an answer from them. Synthesis failures
   * come back as `answer: null` with the error, alongside the sources.
   */
  async answer(query: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const result = await this.retrieve({
      query,
      nResults: options.nResults,
      strategy: options.strategy ?? 'expanded',
      filter: options.filter,
    });

    const base = { query: result.query, strategy: result.strategy, sources: result.matches };

    if (!this.answerer) {
      return { ...base, answer: null, error: 'No answer provider configured' };
    }
    const answerer = this.answerer;

    const contexts = result.matches.map((match) => ({ text: match.chunk.text, sourceName: match.chunk.sourceName }));
    try {
      const answer = await callCapability('completion', () => answerer.answer(result.query, contexts), this.policy);
      return { ...base, answer };
    } catch (error) {
      console.error('[RAGService] Answer generation failed:', errorMessage(error));
      return { ...base, answer: null, error: errorMessage(error) };
    }
  }

  /**
   * Remove a document's chunks. Cached results are dropped when anything was removed.
   */
  async deleteDocument(documentId: string): Promise<number> {
    const removed = await callCapability('vector_store', () => this.store.deleteDocument(documentId), this.policy, false);
    if (removed > 0) {
      this.cache.invalidate(`deleted ${documentId}`);
    }
    console.log(`[RAGService] Deleted ${removed} chunks of document ${documentId}`);
    return removed;
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }

  async stats(): Promise<RAGStats> {
    const [documentCount, chunkCount] = await Promise.all([
      callCapability('vector_store', () => this.store.documentCount(), this.policy),
      callCapability('vector_store', () => this.store.count(), this.policy),
    ]);
    return { documentCount, chunkCount };
  }

  async close(): Promise<void> {
    this.removeAllListeners();
    this.pipeline.removeAllListeners();
    await this.store.close?.();
  }
}
