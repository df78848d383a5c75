/**
 * Collapse runs of whitespace to a single space and trim both ends.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Slice a fixed-width line the way column ranges are declared: half-open,
 * with an omitted end meaning "to end of line". Short lines yield ''.
 */
export function sliceColumn(line: string, range: { start: number; end?: number | undefined }): string {
  return range.end === undefined ? line.slice(range.start) : line.slice(range.start, range.end);
}

export function isBlank(text: string | undefined): boolean {
  return text === undefined || text.trim() === '';
}
