/**
 * Ingestion Pipeline
 *
 * Loads each document, normalizes it by modality, chunks the normalized units,
 * embeds the chunks in batches and writes them to the vector store. Documents
 * fail independently; a failed document leaves the store as it was.
 */

import { EventEmitter } from 'events';
import { basename } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { CacheInvalidator } from './cache.js';
import { callCapability, type CapabilityPolicy, DEFAULT_CAPABILITY_POLICY } from './capability.js';
import type { Chunker } from './chunker.js';
import { DEFAULT_MAX_DOCUMENT_BYTES, loadDocument } from './documents.js';
import { embedMany } from './embedding-providers.js';
import { PartialIngestionFailure, RAGError, ValidationError, errorMessage, type FailedDocument } from './errors.js';
import type { ImageNormalizer, PdfNormalizer, TextNormalizer } from './normalizers/index.js';
import type {
  Chunk,
  DocumentInput,
  EmbeddingProvider,
  ImageMediaType,
  IngestOptions,
  IngestionBatchResult,
  IngestionProgress,
  IngestionResult,
  NormalizedUnit,
  PdfKind,
  RAGDocument,
  VectorEntry,
  VectorStore,
} from './types.js';
import { mapWithConcurrency } from '../utils/async.js';

export interface IngestionPipelineOptions {
  /** Documents processed at once when `parallel` is requested */
  maxWorkers: number;
  /** Texts per embedding request */
  embedBatchSize: number;
  maxDocumentBytes: number;
  capabilityPolicy: CapabilityPolicy;
}

export const DEFAULT_INGESTION_OPTIONS: IngestionPipelineOptions = {
  maxWorkers: 4,
  embedBatchSize: 64,
  maxDocumentBytes: DEFAULT_MAX_DOCUMENT_BYTES,
  capabilityPolicy: DEFAULT_CAPABILITY_POLICY,
};

export interface IngestionDependencies {
  chunker: Chunker;
  store: VectorStore;
  embedder: EmbeddingProvider;
  textNormalizer: TextNormalizer;
  imageNormalizer: ImageNormalizer;
  pdfNormalizer: PdfNormalizer;
  /** Told about every successful write so cached results do not go stale */
  invalidator?: CacheInvalidator;
}

interface NormalizedDocument {
  units: NormalizedUnit[];
  pdfKind?: PdfKind;
}

const IMAGE_MEDIA_TYPES: readonly ImageMediaType[] = ['image/png', 'image/jpeg', 'image/gif', 'image/webp'];

function toImageMediaType(mimeType: string): ImageMediaType {
  const mediaType = IMAGE_MEDIA_TYPES.find((type) => type === mimeType);
  if (!mediaType) {
    throw new ValidationError(`Unsupported image type ${mimeType}`);
  }
  return mediaType;
}

function inputSourceName(input: DocumentInput): string {
  return input.sourceName ?? (input.path ? basename(input.path) : 'unknown');
}

export class IngestionPipeline extends EventEmitter {
  private deps: IngestionDependencies;
  private options: IngestionPipelineOptions;

  constructor(deps: IngestionDependencies, options: Partial<IngestionPipelineOptions> = {}) {
    super();
    this.deps = deps;
    this.options = { ...DEFAULT_INGESTION_OPTIONS, ...options };
  }

  /**
   * Ingest one document. Failures are reported in the result, not thrown.
   */
  async ingestOne(input: DocumentInput): Promise<IngestionResult> {
    const documentId = input.id ?? uuidv4();
    const sourceName = inputSourceName(input);

    try {
      const document = await loadDocument({ ...input, id: documentId }, this.options.maxDocumentBytes);
      const { units, pdfKind } = await this.normalize(document);
      const chunks = this.buildChunks(document, units);
      const entries = await this.embedChunks(chunks);
      await this.write(document, entries);

      console.log(`[Ingestion] Ingested ${document.sourceName} (${document.modality}): ${chunks.length} chunks`);
      return {
        documentId,
        sourceName: document.sourceName,
        success: true,
        chunksCreated: chunks.length,
        modality: document.modality,
        ...(pdfKind ? { pdfKind } : {}),
      };
    } catch (error) {
      console.error(`[Ingestion] Failed to ingest ${sourceName}:`, errorMessage(error));
      return {
        documentId,
        sourceName,
        success: false,
        chunksCreated: 0,
        error: errorMessage(error),
        errorType: error instanceof RAGError ? error.code : 'internal_error',
      };
    }
  }

  /**
   * Ingest a batch. Results keep input order. With `parallel`, up to
   * `maxWorkers` documents are in flight at once.
   */
  async ingestMany(inputs: DocumentInput[], options: IngestOptions = {}): Promise<IngestionBatchResult> {
    const total = inputs.length;
    const limit = options.parallel ? this.options.maxWorkers : 1;
    let processed = 0;

    this.emitProgress({ status: 'started', totalDocuments: total, processedDocuments: 0 });

    const results = await mapWithConcurrency(inputs, limit, async (input) => {
      this.emitProgress({
        status: 'processing',
        totalDocuments: total,
        processedDocuments: processed,
        currentDocument: inputSourceName(input),
      });
      const result = await this.ingestOne(input);
      processed++;
      return result;
    });

    const failures: FailedDocument[] = [];
    results.forEach((result, index) => {
      if (!result.success) {
        failures.push({
          index,
          documentId: result.documentId,
          sourceName: result.sourceName,
          error: result.error ?? 'unknown error',
        });
      }
    });

    this.emitProgress({ status: 'completed', totalDocuments: total, processedDocuments: processed });

    const failure = failures.length > 0 ? new PartialIngestionFailure(failures, total) : null;
    if (failure) {
      console.warn(`[Ingestion] ${failure.message}`);
    }

    return {
      results,
      succeeded: total - failures.length,
      failed: failures.length,
      failure,
    };
  }

  /**
   * Ingest files from disk. Modality comes from each file extension.
   */
  async ingestFiles(paths: string[], options: IngestOptions = {}): Promise<IngestionBatchResult> {
    return this.ingestMany(
      paths.map((path) => ({ path })),
      options
    );
  }

  private async normalize(document: RAGDocument): Promise<NormalizedDocument> {
    switch (document.modality) {
      case 'text': {
        const text = new TextDecoder('utf-8').decode(document.bytes);
        return { units: [this.deps.textNormalizer.normalize(text)] };
      }
      case 'image': {
        const unit = await this.deps.imageNormalizer.normalize({
          data: document.bytes,
          mediaType: toImageMediaType(document.mimeType),
          filename: document.sourceName,
        });
        return { units: [unit] };
      }
      case 'pdf': {
        const { kind, units } = await this.deps.pdfNormalizer.normalize(document.bytes, document.sourceName);
        return { units, pdfKind: kind };
      }
    }
  }

  /**
   * Chunk every unit. Positions count across units so page order survives.
   */
  private buildChunks(document: RAGDocument, units: NormalizedUnit[]): Chunk[] {
    const chunks: Chunk[] = [];
    let position = 0;

    for (const unit of units) {
      if (unit.text.length === 0) {
        continue;
      }

      for (const span of this.deps.chunker.chunk(unit.text)) {
        chunks.push({
          id: `${document.id}:${position}`,
          documentId: document.id,
          sourceName: document.sourceName,
          modality: unit.modality,
          position,
          text: unit.text.slice(span.start, span.end),
          span,
          metadata: {
            ...document.metadata,
            ...unit.metadata,
            mimeType: document.mimeType,
            contentHash: document.contentHash,
            uploadedAt: document.uploadedAt.toISOString(),
          },
        });
        position++;
      }
    }

    if (chunks.length === 0) {
      throw new ValidationError(`${document.sourceName} has no extractable content`);
    }

    for (const chunk of chunks) {
      chunk.metadata.totalChunks = chunks.length;
    }
    return chunks;
  }

  private async embedChunks(chunks: Chunk[]): Promise<VectorEntry[]> {
    const { embedBatchSize, capabilityPolicy } = this.options;
    const entries: VectorEntry[] = [];

    for (let i = 0; i < chunks.length; i += embedBatchSize) {
      const batch = chunks.slice(i, i + embedBatchSize);
      const embeddings = await callCapability(
        'embedding',
        () => embedMany(this.deps.embedder, batch.map((chunk) => chunk.text)),
        capabilityPolicy
      );

      if (embeddings.length !== batch.length) {
        throw new ValidationError(`Embedding provider returned ${embeddings.length} vectors for ${batch.length} chunks`);
      }
      batch.forEach((chunk, index) => entries.push({ chunk, embedding: embeddings[index] }));
    }

    return entries;
  }

  /**
   * Upsert the document's chunks, then drop chunks left over from a previous
   * version. A failed put removes only the ids the document did not have
   * before, so the previous version stays in place.
   */
  private async write(document: RAGDocument, entries: VectorEntry[]): Promise<void> {
    const { store, invalidator } = this.deps;
    const policy = this.options.capabilityPolicy;

    const previousIds = await callCapability('vector_store', () => store.documentChunkIds(document.id), policy);
    const newIds = new Set(entries.map((entry) => entry.chunk.id));

    try {
      await callCapability('vector_store', () => store.put(entries), policy, false);
    } catch (error) {
      await this.rollback(document, previousIds, newIds);
      throw error;
    }

    try {
      const staleIds = previousIds.filter((id) => !newIds.has(id));
      if (previousIds.length > 0) {
        console.log(
          `[Ingestion] Replacing ${previousIds.length} existing chunks of ${document.sourceName} (${staleIds.length} stale)`
        );
      }
      if (staleIds.length > 0) {
        await callCapability('vector_store', () => store.deleteChunks(staleIds), policy, false);
      }
    } finally {
      invalidator?.invalidate(`ingested ${document.sourceName}`);
    }
  }

  private async rollback(document: RAGDocument, previousIds: string[], newIds: Set<string>): Promise<void> {
    const previous = new Set(previousIds);
    const addedIds = [...newIds].filter((id) => !previous.has(id));
    if (addedIds.length === 0) {
      return;
    }

    try {
      const removed = await callCapability(
        'vector_store',
        () => this.deps.store.deleteChunks(addedIds),
        this.options.capabilityPolicy,
        false
      );
      if (removed > 0) {
        this.deps.invalidator?.invalidate(`rolled back ${document.sourceName}`);
      }
    } catch (error) {
      console.error(`[Ingestion] Rollback failed for ${document.sourceName}:`, errorMessage(error));
    }
  }

  private emitProgress(progress: Omit<IngestionProgress, 'timestamp'>): void {
    const event: IngestionProgress = { ...progress, timestamp: new Date().toISOString() };
    this.emit('ingestion_progress', event);
  }
}
