import type { LayoutOptions, PageSource } from '@ledgerscan/types';
import { extractTextItems, type LayoutExtractedPDF, type PageGeometry, type TextItem } from './layout-pdfjs.js';
import { renderLayoutText } from './layout/text-layout.js';

/**
 * A PDF page that renders itself as fixed-width text on demand, so each
 * statement layout can ask for its own density, tolerance and crop.
 */
export class PdfPage implements PageSource {
  readonly pageNumber: number;
  private readonly items: readonly TextItem[];
  private readonly geometry: PageGeometry;

  constructor(geometry: PageGeometry, items: readonly TextItem[]) {
    this.pageNumber = geometry.page;
    this.geometry = geometry;
    this.items = items;
  }

  extractText(options: LayoutOptions): string {
    return renderLayoutText(this.items, this.geometry, options);
  }
}

export interface PdfDocumentSource {
  pages: PdfPage[];
  totalPages: number;
  metadata: LayoutExtractedPDF['metadata'];
}

export function toDocumentSource(extracted: LayoutExtractedPDF): PdfDocumentSource {
  const pages = extracted.pages.map(
    (geometry) => new PdfPage(geometry, extracted.items.filter((item) => item.page === geometry.page))
  );
  return {
    pages,
    totalPages: extracted.totalPages,
    metadata: extracted.metadata,
  };
}

/**
 * Load a PDF file and expose its pages as page sources.
 */
export async function openPdfDocument(filePath: string): Promise<PdfDocumentSource> {
  return toDocumentSource(await extractTextItems(filePath));
}
