/**
 * Layout-aware PDF extraction using pdfjs-dist.
 * Extracts text items with positional coordinates so pages can be rendered
 * as fixed-width text that keeps each item's horizontal position.
 */
import { readFile } from 'fs/promises';

/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  /** The text content */
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  /** Width of the text item */
  width: number;
  /** Height of the text item (approximated from font size) */
  height: number;
  /** Page number (1-indexed) */
  page: number;
}

/**
 * Page box in PDF units, used for cropping and column origin.
 */
export interface PageGeometry {
  page: number;
  left: number;
  bottom: number;
  width: number;
  height: number;
}

/**
 * Result of layout-aware PDF extraction.
 */
export interface LayoutExtractedPDF {
  /** All text items with positions */
  items: TextItem[];
  /** Page boxes, in page order */
  pages: PageGeometry[];
  /** Total number of pages */
  totalPages: number;
  /** Metadata from the PDF */
  metadata: {
    title?: string | undefined;
    author?: string | undefined;
    creationDate?: string | undefined;
  };
}

interface PdfjsTextItemLike {
  str: string;
  transform: unknown[];
  width?: number;
  height?: number;
}

/**
 * Extract text items with positional coordinates from a PDF file.
 */
export async function extractTextItems(filePath: string): Promise<LayoutExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractTextItemsFromBuffer(new Uint8Array(dataBuffer));
}

/**
 * Extract text items from a buffer.
 */
async function extractTextItemsFromBuffer(buffer: Buffer | Uint8Array): Promise<LayoutExtractedPDF> {
  // Dynamic import for pdfjs-dist (ESM only)
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const data = buffer instanceof Buffer ? new Uint8Array(buffer) : buffer;

  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
    isEvalSupported: false,
  });

  const pdfDocument = await loadingTask.promise;
  const items: TextItem[] = [];
  const pages: PageGeometry[] = [];
  const numPages = pdfDocument.numPages;

  try {
    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const [x0 = 0, y0 = 0, x1 = 612, y1 = 792] = page.view;
      pages.push({ page: pageNum, left: x0, bottom: y0, width: x1 - x0, height: y1 - y0 });

      const textContent = await page.getTextContent();
      const contentItems: unknown[] = textContent.items;

      for (const item of contentItems) {
        // Type guard: only process actual text items (not marked content)
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // Transform matrix [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;

        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({ str, x, y, width, height, page: pageNum });
      }
      page.cleanup();
    }

    let title: string | undefined;
    let author: string | undefined;
    let creationDate: string | undefined;

    const metadata = await pdfDocument.getMetadata();
    const info: unknown = metadata.info;
    if (typeof info === 'object' && info !== null) {
      if ('Title' in info && typeof info.Title === 'string') title = info.Title;
      if ('Author' in info && typeof info.Author === 'string') author = info.Author;
      if ('CreationDate' in info && typeof info.CreationDate === 'string') creationDate = info.CreationDate;
    }

    return {
      items,
      pages,
      totalPages: numPages,
      metadata: { title, author, creationDate },
    };
  } finally {
    await pdfDocument.destroy();
  }
}

/**
 * Type guard to check if an item is a text item (has str and transform).
 */
function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}
