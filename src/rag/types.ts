/**
 * RAG (Retrieval-Augmented Generation) Types
 * Shared data model and capability contracts for ingestion and retrieval.
 */

import type { PartialIngestionFailure } from './errors.js';

/**
 * Declared type of a submitted document.
 */
export type DocumentModality = 'text' | 'image' | 'pdf';

/**
 * Origin of a chunk's text.
 */
export type ChunkModality = 'text' | 'image' | 'pdf-text' | 'pdf-image';

/**
 * How a PDF was classified from its pages.
 */
export type PdfKind = 'text' | 'image' | 'mixed';

export type RetrievalStrategy = 'semantic' | 'hybrid' | 'expanded';

export type QueryIntent = 'factual' | 'exploratory' | 'cross_modal';

export type MetadataValue = string | number | boolean | null;

export type ChunkMetadata = Record<string, MetadataValue>;

/**
 * Equality filter over chunk metadata. Every key must match.
 */
export type MetadataFilter = Record<string, MetadataValue>;

export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

/**
 * A unit of user-submitted content, alive only while it is being ingested.
 */
export interface RAGDocument {
  id: string;
  sourceName: string;
  modality: DocumentModality;
  mimeType: string;
  bytes: Uint8Array;
  /** SHA-256 of the payload */
  contentHash: string;
  uploadedAt: Date;
  metadata: ChunkMetadata;
}

/**
 * Caller-facing document input. Either `content` or `path` is required.
 */
export interface DocumentInput {
  id?: string;
  sourceName?: string;
  /** Inferred from the source name extension when omitted */
  modality?: DocumentModality;
  content?: string | Uint8Array;
  path?: string;
  uploadedAt?: Date | string;
  metadata?: ChunkMetadata;
}

/**
 * Image payload handed to the captioning capability.
 */
export interface ImageInput {
  data: Uint8Array;
  mediaType: ImageMediaType;
  filename: string;
}

/**
 * Output of a modality normalizer, before chunking.
 */
export interface NormalizedUnit {
  text: string;
  modality: ChunkModality;
  metadata: ChunkMetadata;
}

export interface ChunkSpan {
  start: number;
  end: number;
}

/**
 * The atomic retrievable unit.
 */
export interface Chunk {
  /** `<documentId>:<position>` */
  id: string;
  documentId: string;
  sourceName: string;
  modality: ChunkModality;
  /** Index within the source document, in page order */
  position: number;
  text: string;
  /** Character span within the normalized unit the chunk came from */
  span: ChunkSpan;
  metadata: ChunkMetadata;
}

/**
 * A chunk and its embedding, as written to the vector store.
 */
export interface VectorEntry {
  chunk: Chunk;
  embedding: number[];
}

/**
 * A ranked match returned by the vector store.
 */
export interface StoreMatch {
  chunk: Chunk;
  /** Similarity mapped into [0, 1], higher is better */
  score: number;
}

export interface RetrievalMatch {
  id: string;
  score: number;
  chunk: Chunk;
  /** Per-strategy scoring details (semantic/lexical components, sub-query hits, rerank factors) */
  metadata: ChunkMetadata;
}

export interface RetrievalRequest {
  query: string;
  nResults?: number;
  /** Picked by the query classifier when omitted */
  strategy?: RetrievalStrategy;
  filter?: MetadataFilter;
  rerank?: boolean;
}

export interface RetrievalResult {
  query: string;
  strategy: RetrievalStrategy;
  /** Classified intent of the query, whether or not it picked the strategy */
  intent: QueryIntent;
  matches: RetrievalMatch[];
  reranked: boolean;
  expandedQueries?: string[];
  /** True when the requested strategy fell back to a simpler one */
  degraded?: boolean;
}

export interface IngestionResult {
  documentId: string;
  sourceName: string;
  success: boolean;
  chunksCreated: number;
  modality?: DocumentModality;
  pdfKind?: PdfKind;
  error?: string;
  errorType?: string;
}

export interface IngestOptions {
  parallel?: boolean;
}

/**
 * Report for a batch. `failure` is set when any document failed.
 */
export interface IngestionBatchResult {
  results: IngestionResult[];
  succeeded: number;
  failed: number;
  failure: PartialIngestionFailure | null;
}

/**
 * Progress update during batch ingestion.
 */
export interface IngestionProgress {
  status: 'started' | 'processing' | 'completed';
  totalDocuments: number;
  processedDocuments: number;
  currentDocument?: string;
  timestamp: string;
}

export interface RAGStats {
  documentCount: number;
  chunkCount: number;
}

/**
 * Embedding provider interface.
 */
export interface EmbeddingProvider {
  readonly name: string;
  /** Generate embedding for a single text */
  embed(text: string): Promise<number[]>;
  /** Generate embeddings for multiple texts (batch) */
  embedBatch?(texts: string[]): Promise<number[][]>;
  /** Get the embedding dimension */
  getDimensions(): number;
}

export interface CaptionProvider {
  caption(image: ImageInput): Promise<string>;
}

/**
 * Produces paraphrases of a query for expanded retrieval.
 */
export interface QueryExpander {
  expandQuery(query: string, count: number): Promise<string[]>;
}

/**
 * A retrieved passage handed to answer synthesis.
 */
export interface AnswerContext {
  text: string;
  sourceName?: string;
}

/**
 * Writes an answer to a query from retrieved passages.
 */
export interface AnswerProvider {
  answer(query: string, contexts: AnswerContext[]): Promise<string>;
}

export interface AnswerResult {
  query: string;
  /** Null when no answer could be produced; `error` says why */
  answer: string | null;
  error?: string;
  strategy: RetrievalStrategy;
  sources: RetrievalMatch[];
}

export interface CompletionProvider {
  complete(prompt: string, options?: { maxTokens?: number; temperature?: number }): Promise<string>;
}

/**
 * Vector store capability. Index internals live behind this contract.
 */
export interface VectorStore {
  /** Write entries, replacing any stored entry with the same chunk id. Returns the ids. */
  put(entries: VectorEntry[]): Promise<string[]>;
  /** Nearest neighbours of `embedding`, best first */
  query(embedding: number[], k: number, filter?: MetadataFilter): Promise<StoreMatch[]>;
  /** Enumerate stored chunks matching `filter`, used by lexical matching */
  scan(filter: MetadataFilter | undefined, limit: number): Promise<Chunk[]>;
  /** Remove every chunk of a document, returning how many were removed */
  deleteDocument(documentId: string): Promise<number>;
  /** Ids of the chunks currently stored for a document */
  documentChunkIds(documentId: string): Promise<string[]>;
  /** Remove chunks by id, returning how many were removed */
  deleteChunks(ids: string[]): Promise<number>;
  /** Number of stored chunks */
  count(): Promise<number>;
  /** Number of distinct documents */
  documentCount(): Promise<number>;
  close?(): Promise<void>;
}
