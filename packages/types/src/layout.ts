/**
 * Page text contract between the PDF layer and the statement engine.
 */

export interface CropRegion {
  /** Left edge as a fraction of page width (0..1) */
  left: number;
  /** Right edge as a fraction of page width (0..1) */
  right: number;
}

export interface LayoutOptions {
  /** PDF units per rendered character column */
  xDensity?: number;
  /** Gap in PDF units below which adjacent text items are joined without a space */
  xTolerance: number;
  crop?: CropRegion;
}

/**
 * A page that can render itself as fixed-width text on request.
 */
export interface PageSource {
  readonly pageNumber: number;
  extractText(options: LayoutOptions): string;
}

/**
 * Wrap already-rendered page texts as page sources. Layout options are
 * ignored since the text is fixed.
 */
export function textPages(texts: readonly string[]): PageSource[] {
  return texts.map((text, index) => ({
    pageNumber: index + 1,
    extractText: () => text,
  }));
}
