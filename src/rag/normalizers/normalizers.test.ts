import { describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../errors.js';
import type { CaptionProvider, ImageInput } from '../types.js';
import { ImageNormalizer, captionPlaceholder } from './image.js';
import { PdfNormalizer, classifyPage, classifyPdf } from './pdf.js';
import type { OpenedPdf, PdfReader } from './pdf-reader.js';
import { TextNormalizer, normalizeWhitespace } from './text.js';

const image: ImageInput = { data: new Uint8Array([1, 2, 3]), mediaType: 'image/png', filename: 'chart.png' };

function fakeReader(pageTexts: string[], renderError?: Error): PdfReader & { closed: number } {
  const reader = {
    closed: 0,
    async open(_bytes: Uint8Array, filename: string): Promise<OpenedPdf> {
      return {
        pageTexts,
        async renderPage(pageNumber: number): Promise<ImageInput> {
          if (renderError) throw renderError;
          return { data: new Uint8Array([pageNumber]), mediaType: 'image/png', filename: `${filename}#page=${pageNumber}` };
        },
        async close() {
          reader.closed++;
        },
      };
    },
  };
  return reader;
}

function captioner(caption: (image: ImageInput) => Promise<string>): CaptionProvider {
  return { caption };
}

describe('normalizeWhitespace', () => {
  it('normalizes line endings, spaces and blank lines', () => {
    expect(normalizeWhitespace('  Hello\t\t world \r\nnext   line\r\n\r\n\r\n\r\nlast  ')).toBe(
      'Hello world\nnext line\n\nlast'
    );
  });

  it('keeps single paragraph breaks', () => {
    expect(normalizeWhitespace('a\n\nb')).toBe('a\n\nb');
  });
});

describe('TextNormalizer', () => {
  it('produces a text unit with the given modality and metadata', () => {
    const unit = new TextNormalizer().normalize(' page  one ', 'pdf-text', { pageNumber: 1 });
    expect(unit).toEqual({ text: 'page one', modality: 'pdf-text', metadata: { pageNumber: 1 } });
  });
});

describe('ImageNormalizer', () => {
  it('uses the caption as the unit text', async () => {
    const normalizer = new ImageNormalizer(captioner(async () => '  A bar   chart of sales. '));
    const unit = await normalizer.normalize(image);
    expect(unit).toEqual({ text: 'A bar chart of sales.', modality: 'image', metadata: { captionError: false } });
  });

  it('falls back to a placeholder when captioning fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const normalizer = new ImageNormalizer(
      captioner(async () => {
        throw new Error('model offline');
      })
    );

    const unit = await normalizer.normalize(image);
    expect(unit.text).toBe('[Image: chart.png] Caption unavailable (model offline)');
    expect(unit.metadata.captionError).toBe(true);
    warn.mockRestore();
  });

  it('uses a placeholder without a captioner or with an empty caption', async () => {
    expect((await new ImageNormalizer(null).normalize(image)).text).toBe(
      captionPlaceholder('chart.png', 'no captioning provider configured')
    );
    expect((await new ImageNormalizer(captioner(async () => '   ')).normalize(image)).text).toBe(
      captionPlaceholder('chart.png', 'empty caption')
    );
  });
});

describe('PDF classification', () => {
  it('classifies pages by trimmed text length', () => {
    expect(classifyPage('   short   ', 25)).toBe('image');
    expect(classifyPage('x'.repeat(25), 25)).toBe('text');
  });

  it('classifies documents from their pages', () => {
    expect(classifyPdf(['text', 'text'])).toBe('text');
    expect(classifyPdf(['image'])).toBe('image');
    expect(classifyPdf(['text', 'image'])).toBe('mixed');
  });
});

describe('PdfNormalizer', () => {
  const pageText = 'This page has plenty of extractable text on it.';

  it('routes text pages and image pages in page order', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const reader = fakeReader([pageText, '', pageText]);
    const caption = vi.fn(async (input: ImageInput) => `Scanned diagram from ${input.filename}`);
    const normalizer = new PdfNormalizer(reader, new TextNormalizer(), new ImageNormalizer(captioner(caption)), 25);

    const result = await normalizer.normalize(new Uint8Array(), 'report.pdf');

    expect(result.kind).toBe('mixed');
    expect(result.pageKinds).toEqual(['text', 'image', 'text']);
    expect(result.units.map((unit) => unit.modality)).toEqual(['pdf-text', 'pdf-image', 'pdf-text']);
    expect(result.units[1]).toEqual({
      text: 'Scanned diagram from report.pdf#page=2',
      modality: 'pdf-image',
      metadata: { pageNumber: 2, pdfKind: 'mixed', captionError: false },
    });
    expect(result.units[2].metadata).toEqual({ pageNumber: 3, pdfKind: 'mixed' });
    expect(caption).toHaveBeenCalledTimes(1);
    expect(reader.closed).toBe(1);
    vi.restoreAllMocks();
  });

  it('captions every page of an image-only PDF', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const normalizer = new PdfNormalizer(
      fakeReader(['', ' ']),
      new TextNormalizer(),
      new ImageNormalizer(captioner(async () => 'a scanned page')),
      25
    );

    const result = await normalizer.normalize(new Uint8Array(), 'scan.pdf');
    expect(result.kind).toBe('image');
    expect(result.units.map((unit) => unit.metadata.pageNumber)).toEqual([1, 2]);
    vi.restoreAllMocks();
  });

  it('keeps going when a page cannot be rendered', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const normalizer = new PdfNormalizer(
      fakeReader([''], new Error('no canvas')),
      new TextNormalizer(),
      new ImageNormalizer(null),
      25
    );

    const result = await normalizer.normalize(new Uint8Array(), 'scan.pdf');
    expect(result.units).toEqual([
      {
        text: '[Image: scan.pdf#page=1] Caption unavailable (no canvas)',
        modality: 'pdf-image',
        metadata: { pageNumber: 1, pdfKind: 'image', captionError: true },
      },
    ]);
    vi.restoreAllMocks();
  });

  it('reports unreadable PDFs as validation errors', async () => {
    const reader: PdfReader = {
      async open() {
        throw new Error('Invalid PDF structure');
      },
    };
    const normalizer = new PdfNormalizer(reader, new TextNormalizer(), new ImageNormalizer(null), 25);

    await expect(normalizer.normalize(new Uint8Array(), 'broken.pdf')).rejects.toThrow(
      new ValidationError('Failed to parse PDF: Invalid PDF structure')
    );
  });
});
