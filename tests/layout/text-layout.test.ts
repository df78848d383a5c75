import { describe, it, expect } from 'vitest';
import { PdfPage, cropWindow, renderLayoutText, toDocumentSource } from '@ledgerscan/pdf-extract';
import type { PageGeometry, TextItem } from '@ledgerscan/pdf-extract';

const geometry: PageGeometry = { page: 1, left: 0, bottom: 0, width: 100, height: 100 };

function item(str: string, x: number, y: number, width: number, page = 1): TextItem {
  return { str, x, y, width, height: 10, page };
}

const items = [
  item('Date', 0, 90, 20),
  item('Amount', 50, 90, 30),
  item('Jan', 0, 80, 15),
  item('5', 16, 81, 5),
  item('Other page', 0, 90, 40, 2),
];

describe('renderLayoutText', () => {
  it('should place items at the column their x position maps to', () => {
    expect(renderLayoutText(items, geometry, { xDensity: 5, xTolerance: 1 })).toBe('Date      Amount\nJan5');
  });

  it('should keep a space between items further apart than the tolerance', () => {
    expect(renderLayoutText(items, geometry, { xDensity: 5, xTolerance: 0.5 })).toBe('Date      Amount\nJan 5');
  });

  it('should never let an item overwrite the one before it', () => {
    const overlapping = [item('ABCDEF', 0, 50, 30), item('G', 10, 50, 5)];
    expect(renderLayoutText(overlapping, geometry, { xDensity: 5, xTolerance: 1 })).toBe('ABCDEFG');
  });

  it('should drop items outside the crop window', () => {
    expect(renderLayoutText(items, geometry, { xDensity: 5, xTolerance: 1, crop: { left: 0, right: 0.5 } })).toBe(
      'Date\nJan5',
    );
  });

  it('should reject a non-positive density', () => {
    expect(() => renderLayoutText(items, geometry, { xDensity: 0, xTolerance: 1 })).toThrow(
      'xDensity must be positive, got 0',
    );
  });
});

describe('cropWindow', () => {
  it('should default to the full page width', () => {
    expect(cropWindow({ ...geometry, left: 10, width: 200 }, { xTolerance: 1 })).toEqual({ left: 10, right: 210 });
  });

  it('should reject an inverted region', () => {
    expect(() => cropWindow(geometry, { xTolerance: 1, crop: { left: 0.6, right: 0.4 } })).toThrow(
      'Invalid crop region: 0.6..0.4',
    );
  });
});

describe('PdfPage', () => {
  it('should render with the options each caller passes', () => {
    const page = new PdfPage(geometry, items);

    expect(page.pageNumber).toBe(1);
    expect(page.extractText({ xDensity: 5, xTolerance: 1 })).toBe('Date      Amount\nJan5');
    expect(page.extractText({ xDensity: 10, xTolerance: 1 })).toBe('Date Amount\nJan5');
  });

  it('should split extracted items by page', () => {
    const document = toDocumentSource({
      items,
      pages: [geometry, { ...geometry, page: 2 }],
      totalPages: 2,
      metadata: { title: undefined, author: undefined, creationDate: undefined },
    });

    expect(document.totalPages).toBe(2);
    expect(document.pages.map((p) => p.extractText({ xDensity: 5, xTolerance: 1 }))).toEqual([
      'Date      Amount\nJan5',
      'Other page',
    ]);
  });
});
