import { createHash } from 'crypto';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { detectImageType, isPdf, isSupportedFile, loadDocument } from './documents.js';
import { ValidationError } from './errors.js';

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 13]);
const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0, 16]);
const WEBP = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x57, 0x45, 0x42, 0x50]);
const PDF = new TextEncoder().encode('%PDF-1.7\n%test\n');

describe('file type detection', () => {
  it('recognizes supported extensions case-insensitively', () => {
    expect(isSupportedFile('notes.MD')).toBe(true);
    expect(isSupportedFile('scan.pdf')).toBe(true);
    expect(isSupportedFile('report.docx')).toBe(false);
  });

  it('detects image formats and PDFs from their signatures', () => {
    expect(detectImageType(PNG)).toBe('image/png');
    expect(detectImageType(JPEG)).toBe('image/jpeg');
    expect(detectImageType(new TextEncoder().encode('GIF89a'))).toBe('image/gif');
    expect(detectImageType(WEBP)).toBe('image/webp');
    expect(detectImageType(PDF)).toBeNull();
    expect(isPdf(PDF)).toBe(true);
    expect(isPdf(PNG)).toBe(false);
  });
});

describe('loadDocument', () => {
  it('builds a text document from in-memory content', async () => {
    const doc = await loadDocument({
      id: 'doc-1',
      sourceName: 'notes.md',
      content: 'Hello world',
      uploadedAt: '2026-01-15T10:00:00.000Z',
      metadata: { team: 'search' },
    });

    expect(doc).toMatchObject({
      id: 'doc-1',
      sourceName: 'notes.md',
      modality: 'text',
      mimeType: 'text/markdown',
      metadata: { team: 'search' },
    });
    expect(doc.uploadedAt.toISOString()).toBe('2026-01-15T10:00:00.000Z');
    expect(doc.contentHash).toBe(createHash('sha256').update('Hello world').digest('hex'));
  });

  it('generates an id when none is given', async () => {
    const doc = await loadDocument({ sourceName: 'a.txt', content: 'text' });
    expect(doc.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('takes the image type from the payload', async () => {
    const doc = await loadDocument({ sourceName: 'photo.png', content: JPEG });
    expect(doc.modality).toBe('image');
    expect(doc.mimeType).toBe('image/jpeg');
  });

  it('accepts an explicit modality for unknown extensions', async () => {
    const doc = await loadDocument({ sourceName: 'README', modality: 'text', content: 'plain' });
    expect(doc.mimeType).toBe('text/plain');
  });

  it.each([
    [{ sourceName: 'report.docx', content: 'x' }, 'Unsupported file type .docx for report.docx'],
    [{ sourceName: 'Makefile', content: 'x' }, 'Unsupported file type (none) for Makefile'],
    [{ sourceName: 'empty.txt', content: '' }, 'empty.txt is empty'],
    [{ sourceName: 'broken.pdf', content: 'not a pdf' }, 'broken.pdf is not a valid PDF (missing %PDF- header)'],
    [{ sourceName: 'fake.png', content: 'plain text' }, 'fake.png is not a recognized PNG, JPEG, GIF or WEBP image'],
    [{ content: 'x' }, 'Document requires a sourceName when no path is given'],
    [{ sourceName: 'a.txt' }, 'Document requires either content or a path'],
    [{ sourceName: 'a.txt', content: 'x', uploadedAt: 'yesterday' }, 'Invalid uploadedAt timestamp: yesterday'],
  ])('rejects %j', async (input, message) => {
    await expect(loadDocument(input)).rejects.toThrow(new ValidationError(message));
  });

  it('enforces the size limit', async () => {
    await expect(loadDocument({ sourceName: 'big.txt', content: 'x'.repeat(11) }, 10)).rejects.toThrow(
      'big.txt is 11 bytes, above the 10 byte limit'
    );
  });

  describe('from disk', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'rag-documents-'));
      await writeFile(join(dir, 'guide.txt'), 'Read me from disk');
      await writeFile(join(dir, 'scan.pdf'), PDF);
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads the file and names it after its basename', async () => {
      const doc = await loadDocument({ path: join(dir, 'guide.txt') });
      expect(doc.sourceName).toBe('guide.txt');
      expect(new TextDecoder().decode(doc.bytes)).toBe('Read me from disk');
    });

    it('checks the size before reading', async () => {
      const path = join(dir, 'guide.txt');
      await expect(loadDocument({ path }, 5)).rejects.toThrow(`${path} is 17 bytes, above the 5 byte limit`);
    });

    it('loads PDFs', async () => {
      const doc = await loadDocument({ path: join(dir, 'scan.pdf') });
      expect(doc.modality).toBe('pdf');
      expect(doc.mimeType).toBe('application/pdf');
    });

    it('reports missing files as validation errors', async () => {
      await expect(loadDocument({ path: join(dir, 'missing.txt') })).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
