/**
 * PDF Reader
 * Page text extraction and page rasterization backed by unpdf.
 */

import { extractText, getDocumentProxy, renderPageAsImage } from 'unpdf';
import type { ImageInput } from '../types.js';

/**
 * An opened PDF: per-page text plus on-demand rendering of single pages.
 */
export interface OpenedPdf {
  /** Extracted text, one entry per page (index 0 is page 1) */
  pageTexts: string[];
  /** Rasterize a 1-based page to an image */
  renderPage(pageNumber: number): Promise<ImageInput>;
  close(): Promise<void>;
}

export interface PdfReader {
  open(bytes: Uint8Array, filename: string): Promise<OpenedPdf>;
}

export class UnpdfReader implements PdfReader {
  private scale: number;

  constructor(scale: number = 1.5) {
    this.scale = scale;
  }

  async open(bytes: Uint8Array, filename: string): Promise<OpenedPdf> {
    // pdf.js may transfer the buffer it is given, so hand it a copy
    const pdf = await getDocumentProxy(new Uint8Array(bytes));
    const { text } = await extractText(pdf, { mergePages: false });
    const scale = this.scale;

    return {
      pageTexts: text,
      async renderPage(pageNumber: number): Promise<ImageInput> {
        const png = await renderPageAsImage(pdf, pageNumber, {
          canvasImport: () => import('@napi-rs/canvas'),
          scale,
        });
        return {
          data: new Uint8Array(png),
          mediaType: 'image/png',
          filename: `${filename}#page=${pageNumber}`,
        };
      },
      async close(): Promise<void> {
        await pdf.destroy();
      },
    };
  }
}
