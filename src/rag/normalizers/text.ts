import type { ChunkMetadata, ChunkModality, NormalizedUnit } from '../types.js';

/**
 * Normalize whitespace without dropping content: CRLF to LF, runs of spaces
 * and tabs to one space, three or more newlines to a paragraph break.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class TextNormalizer {
  normalize(
    text: string,
    modality: ChunkModality = 'text',
    metadata: ChunkMetadata = {}
  ): NormalizedUnit {
    return {
      text: normalizeWhitespace(text),
      modality,
      metadata,
    };
  }
}
