import { isBlank, sliceColumn } from '@ledgerscan/types';
import type { ColumnRange, LinePredicate, Marker } from './types.js';

export function hasMarker(text: string, marker: Marker): boolean {
  return typeof marker === 'string' ? text.includes(marker) : marker.test(text);
}

export function hasAllMarkers(text: string, markers: readonly Marker[]): boolean {
  return markers.length > 0 && markers.every((marker) => hasMarker(text, marker));
}

export function isBoilerplate(description: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => description.includes(phrase));
}

/** Line is exactly `text` once surrounding whitespace is removed. */
export function lineEquals(text: string): LinePredicate {
  return (line) => line.trim() === text;
}

export function lineContains(text: string): LinePredicate {
  return (line) => line.includes(text);
}

export function lineMatches(pattern: RegExp): LinePredicate {
  return (line) => pattern.test(line);
}

/**
 * A wrapped description line: text in the description column, every amount
 * column blank, and not itself the start of a new row.
 */
export function isWrappedDescription(
  line: string,
  description: ColumnRange,
  amountColumns: readonly ColumnRange[],
  rowPattern: RegExp,
): boolean {
  const text = sliceColumn(line, description);
  if (isBlank(text) || rowPattern.test(text)) {
    return false;
  }
  return amountColumns.every((range) => isBlank(sliceColumn(line, range)));
}
