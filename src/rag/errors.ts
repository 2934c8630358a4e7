/**
 * RAG error taxonomy.
 */

export type RAGErrorCode =
  | 'validation_error'
  | 'capability_unavailable'
  | 'no_data'
  | 'partial_ingestion_failure';

export abstract class RAGError extends Error {
  abstract readonly code: RAGErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed query or document input. Never retried.
 */
export class ValidationError extends RAGError {
  readonly code = 'validation_error';
}

export type CapabilityName = 'embedding' | 'caption' | 'completion' | 'vector_store' | 'pdf';

/**
 * An external capability failed or timed out.
 */
export class CapabilityUnavailableError extends RAGError {
  readonly code = 'capability_unavailable';
  readonly capability: CapabilityName;

  constructor(capability: CapabilityName, message: string, options?: { cause?: unknown }) {
    super(`${capability} unavailable: ${message}`, options);
    this.capability = capability;
  }
}

/**
 * The store holds no chunks yet.
 */
export class NoDataError extends RAGError {
  readonly code = 'no_data';

  constructor(message = 'No documents have been ingested yet') {
    super(message);
  }
}

export interface FailedDocument {
  index: number;
  documentId: string;
  sourceName: string;
  error: string;
}

/**
 * One or more documents of a batch failed. Reported, not thrown.
 */
export class PartialIngestionFailure extends RAGError {
  readonly code = 'partial_ingestion_failure';
  readonly failures: FailedDocument[];
  readonly total: number;

  constructor(failures: FailedDocument[], total: number) {
    super(`${failures.length} of ${total} documents failed to ingest`);
    this.failures = failures;
    this.total = total;
  }
}

/**
 * Normalize an unknown thrown value into a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
