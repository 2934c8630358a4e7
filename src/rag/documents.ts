/**
 * Document Loader
 * Builds validated documents from file paths or in-memory payloads.
 */

import { createHash } from 'crypto';
import { readFile, stat } from 'fs/promises';
import { basename, extname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError, errorMessage } from './errors.js';
import type { DocumentInput, DocumentModality, ImageMediaType, RAGDocument } from './types.js';

interface FileType {
  modality: DocumentModality;
  mimeType: string;
}

/**
 * Supported file extensions and their modality and MIME type.
 */
export const SUPPORTED_EXTENSIONS: Record<string, FileType> = {
  '.txt': { modality: 'text', mimeType: 'text/plain' },
  '.md': { modality: 'text', mimeType: 'text/markdown' },
  '.markdown': { modality: 'text', mimeType: 'text/markdown' },
  '.png': { modality: 'image', mimeType: 'image/png' },
  '.jpg': { modality: 'image', mimeType: 'image/jpeg' },
  '.jpeg': { modality: 'image', mimeType: 'image/jpeg' },
  '.gif': { modality: 'image', mimeType: 'image/gif' },
  '.webp': { modality: 'image', mimeType: 'image/webp' },
  '.pdf': { modality: 'pdf', mimeType: 'application/pdf' },
};

export const DEFAULT_MAX_DOCUMENT_BYTES = 50 * 1024 * 1024;

/**
 * Check if a file extension is supported.
 */
export function isSupportedFile(filename: string): boolean {
  return extname(filename).toLowerCase() in SUPPORTED_EXTENSIONS;
}

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

const PDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-
const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const GIF_SIGNATURE = [0x47, 0x49, 0x46, 0x38]; // GIF8
const RIFF_SIGNATURE = [0x52, 0x49, 0x46, 0x46];
const WEBP_SIGNATURE = [0x57, 0x45, 0x42, 0x50];

/**
 * Detect an image format from its leading bytes.
 */
export function detectImageType(bytes: Uint8Array): ImageMediaType | null {
  if (startsWith(bytes, PNG_SIGNATURE)) return 'image/png';
  if (startsWith(bytes, JPEG_SIGNATURE)) return 'image/jpeg';
  if (startsWith(bytes, GIF_SIGNATURE)) return 'image/gif';
  if (startsWith(bytes, RIFF_SIGNATURE) && startsWith(bytes, WEBP_SIGNATURE, 8)) return 'image/webp';
  return null;
}

export function isPdf(bytes: Uint8Array): boolean {
  return startsWith(bytes, PDF_SIGNATURE);
}

function resolveModality(input: DocumentInput, sourceName: string): FileType {
  const byExtension = SUPPORTED_EXTENSIONS[extname(sourceName).toLowerCase()];

  if (input.modality) {
    if (byExtension && byExtension.modality === input.modality) {
      return byExtension;
    }
    const fallbackMime: Record<DocumentModality, string> = {
      text: 'text/plain',
      image: 'application/octet-stream',
      pdf: 'application/pdf',
    };
    return { modality: input.modality, mimeType: fallbackMime[input.modality] };
  }

  if (!byExtension) {
    const ext = extname(sourceName) || '(none)';
    throw new ValidationError(`Unsupported file type ${ext} for ${sourceName}`);
  }
  return byExtension;
}

function resolveUploadedAt(value: Date | string | undefined): Date {
  if (value === undefined) {
    return new Date();
  }
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid uploadedAt timestamp: ${String(value)}`);
  }
  return date;
}

async function readPayload(input: DocumentInput, maxBytes: number): Promise<Uint8Array> {
  if (input.content !== undefined) {
    return typeof input.content === 'string' ? new TextEncoder().encode(input.content) : input.content;
  }

  if (!input.path) {
    throw new ValidationError('Document requires either content or a path');
  }

  let size: number;
  try {
    size = (await stat(input.path)).size;
  } catch (error) {
    throw new ValidationError(`Cannot read ${input.path}: ${errorMessage(error)}`, { cause: error });
  }
  if (size > maxBytes) {
    throw new ValidationError(`${input.path} is ${size} bytes, above the ${maxBytes} byte limit`);
  }

  return new Uint8Array(await readFile(input.path));
}

/**
 * Build a document from caller input. Rejects unsupported types, oversized
 * payloads and payloads whose signature does not match their modality.
 */
export async function loadDocument(
  input: DocumentInput,
  maxBytes: number = DEFAULT_MAX_DOCUMENT_BYTES
): Promise<RAGDocument> {
  const sourceName = input.sourceName ?? (input.path ? basename(input.path) : undefined);
  if (!sourceName) {
    throw new ValidationError('Document requires a sourceName when no path is given');
  }

  const { modality, mimeType: declaredMime } = resolveModality(input, sourceName);
  const bytes = await readPayload(input, maxBytes);

  if (bytes.length === 0) {
    throw new ValidationError(`${sourceName} is empty`);
  }
  if (bytes.length > maxBytes) {
    throw new ValidationError(`${sourceName} is ${bytes.length} bytes, above the ${maxBytes} byte limit`);
  }

  let mimeType = declaredMime;
  if (modality === 'pdf' && !isPdf(bytes)) {
    throw new ValidationError(`${sourceName} is not a valid PDF (missing %PDF- header)`);
  }
  if (modality === 'image') {
    const detected = detectImageType(bytes);
    if (!detected) {
      throw new ValidationError(`${sourceName} is not a recognized PNG, JPEG, GIF or WEBP image`);
    }
    mimeType = detected;
  }

  return {
    id: input.id ?? uuidv4(),
    sourceName,
    modality,
    mimeType,
    bytes,
    contentHash: createHash('sha256').update(bytes).digest('hex'),
    uploadedAt: resolveUploadedAt(input.uploadedAt),
    metadata: { ...input.metadata },
  };
}
