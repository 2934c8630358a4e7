/**
 * PDF Normalizer
 * Classifies pages as text or image and routes each through the matching path.
 */

import { ValidationError, errorMessage } from '../errors.js';
import type { ChunkMetadata, NormalizedUnit, PdfKind } from '../types.js';
import type { ImageNormalizer } from './image.js';
import { captionPlaceholder } from './image.js';
import type { OpenedPdf, PdfReader } from './pdf-reader.js';
import type { TextNormalizer } from './text.js';

export type PageKind = 'text' | 'image';

export interface PdfNormalization {
  kind: PdfKind;
  pageKinds: PageKind[];
  units: NormalizedUnit[];
}

/**
 * A page counts as text when its trimmed text reaches the threshold.
 */
export function classifyPage(text: string, minTextChars: number): PageKind {
  return text.trim().length >= minTextChars ? 'text' : 'image';
}

export function classifyPdf(pageKinds: PageKind[]): PdfKind {
  if (pageKinds.length > 0 && pageKinds.every((kind) => kind === 'text')) {
    return 'text';
  }
  if (pageKinds.length > 0 && pageKinds.every((kind) => kind === 'image')) {
    return 'image';
  }
  return 'mixed';
}

export class PdfNormalizer {
  private reader: PdfReader;
  private textNormalizer: TextNormalizer;
  private imageNormalizer: ImageNormalizer;
  private minPageTextChars: number;

  constructor(
    reader: PdfReader,
    textNormalizer: TextNormalizer,
    imageNormalizer: ImageNormalizer,
    minPageTextChars: number
  ) {
    this.reader = reader;
    this.textNormalizer = textNormalizer;
    this.imageNormalizer = imageNormalizer;
    this.minPageTextChars = minPageTextChars;
  }

  async normalize(bytes: Uint8Array, filename: string): Promise<PdfNormalization> {
    let pdf: OpenedPdf;
    try {
      pdf = await this.reader.open(bytes, filename);
    } catch (error) {
      throw new ValidationError(`Failed to parse PDF: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const pageKinds = pdf.pageTexts.map((text) => classifyPage(text, this.minPageTextChars));
      const kind = classifyPdf(pageKinds);
      const units: NormalizedUnit[] = [];

      for (let index = 0; index < pdf.pageTexts.length; index++) {
        const pageNumber = index + 1;
        const metadata: ChunkMetadata = { pageNumber, pdfKind: kind };

        if (pageKinds[index] === 'text') {
          units.push(this.textNormalizer.normalize(pdf.pageTexts[index], 'pdf-text', metadata));
          continue;
        }

        try {
          const image = await pdf.renderPage(pageNumber);
          units.push(await this.imageNormalizer.normalize(image, 'pdf-image', metadata));
        } catch (error) {
          console.warn(`[PdfNormalizer] Failed to render page ${pageNumber} of ${filename}:`, errorMessage(error));
          units.push({
            text: captionPlaceholder(`${filename}#page=${pageNumber}`, errorMessage(error)),
            modality: 'pdf-image',
            metadata: { ...metadata, captionError: true },
          });
        }
      }

      console.log(`[PdfNormalizer] ${filename}: ${pdf.pageTexts.length} pages, classified as ${kind}`);
      return { kind, pageKinds, units };
    } finally {
      await pdf.close();
    }
  }
}
