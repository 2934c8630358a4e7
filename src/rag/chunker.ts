import { ValidationError } from './errors.js';
import type { ChunkSpan } from './types.js';

export interface ChunkingOptions {
  maxChunkSize: number; // characters
  overlap: number; // characters shared by consecutive chunks
}

const SENTENCE_END = /[.!?](?=\s|$)/g;
const PARAGRAPH_BREAK = /\n[ \t]*\n/g;

/**
 * Document Chunker - Splits normalized text into overlapping, sentence-aligned spans
 */
export class Chunker {
  private defaultOptions: ChunkingOptions;

  constructor(defaults: Partial<ChunkingOptions> = {}) {
    this.defaultOptions = { maxChunkSize: 512, overlap: 50, ...defaults };
  }

  /**
   * Chunk text into spans. Each span is at most `maxChunkSize` characters and
   * starts `overlap` characters before the end of the previous one.
   */
  chunk(text: string, options?: Partial<ChunkingOptions>): ChunkSpan[] {
    const { maxChunkSize, overlap } = { ...this.defaultOptions, ...options };
    this.validate(maxChunkSize, overlap);

    const length = text.length;
    if (length <= maxChunkSize) {
      return [{ start: 0, end: length }];
    }

    const boundaries = this.findBoundaries(text, maxChunkSize);
    const spans: ChunkSpan[] = [];
    let start = 0;

    while (length - start > maxChunkSize) {
      const limit = start + maxChunkSize;
      const end =
        this.lastBoundaryIn(boundaries, start + overlap, limit) ??
        this.lastWhitespaceIn(text, start + overlap, limit) ??
        limit;

      spans.push({ start, end });
      start = end - overlap;
    }

    spans.push({ start, end: length });
    return spans;
  }

  /**
   * Chunk text and return the chunk strings.
   */
  chunkText(text: string, options?: Partial<ChunkingOptions>): string[] {
    return this.chunk(text, options).map((span) => text.slice(span.start, span.end));
  }

  private validate(maxChunkSize: number, overlap: number): void {
    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
      throw new ValidationError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
      throw new ValidationError(`overlap must be an integer in [0, ${maxChunkSize}), got ${overlap}`);
    }
  }

  /**
   * Sorted sentence end offsets. Sentences longer than `maxChunkSize` get
   * extra boundaries at the last whitespace before the limit.
   */
  private findBoundaries(text: string, maxChunkSize: number): number[] {
    const ends = new Set<number>([text.length]);
    for (const match of text.matchAll(SENTENCE_END)) {
      ends.add((match.index ?? 0) + 1);
    }
    for (const match of text.matchAll(PARAGRAPH_BREAK)) {
      ends.add(match.index ?? 0);
    }
    ends.delete(0);

    const boundaries: number[] = [];
    let previous = 0;

    for (const end of [...ends].sort((a, b) => a - b)) {
      let cursor = previous;
      while (end - cursor > maxChunkSize) {
        const cut = this.lastWhitespaceIn(text, cursor, cursor + maxChunkSize) ?? cursor + maxChunkSize;
        boundaries.push(cut);
        cursor = cut;
      }
      boundaries.push(end);
      previous = end;
    }

    return boundaries;
  }

  /**
   * Largest boundary b with lower < b <= upper.
   */
  private lastBoundaryIn(boundaries: number[], lower: number, upper: number): number | undefined {
    let found: number | undefined;
    for (const boundary of boundaries) {
      if (boundary > upper) break;
      if (boundary > lower) found = boundary;
    }
    return found;
  }

  /**
   * Largest offset i with lower < i <= upper where text[i] is whitespace.
   */
  private lastWhitespaceIn(text: string, lower: number, upper: number): number | undefined {
    for (let i = Math.min(upper, text.length - 1); i > lower; i--) {
      if (/\s/.test(text[i])) {
        return i;
      }
    }
    return undefined;
  }
}
