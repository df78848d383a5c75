// Page sources backed by pdfjs-dist
export { PdfPage, openPdfDocument, toDocumentSource } from './pdf-extractor.js';
export type { PdfDocumentSource } from './pdf-extractor.js';

// Layout-aware extraction using pdfjs-dist
export { extractTextItems } from './layout-pdfjs.js';
export type { TextItem, PageGeometry, LayoutExtractedPDF } from './layout-pdfjs.js';

// Layout utilities (rows + fixed-width rendering)
export * from './layout/index.js';
