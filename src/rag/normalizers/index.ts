export { TextNormalizer, normalizeWhitespace } from './text.js';
export { ImageNormalizer, captionPlaceholder } from './image.js';
export { PdfNormalizer, classifyPage, classifyPdf, type PageKind, type PdfNormalization } from './pdf.js';
export { UnpdfReader, type PdfReader, type OpenedPdf } from './pdf-reader.js';
