import { describe, it, expect } from 'vitest';
import { collapseWhitespace, isBlank, sliceColumn } from '@ledgerscan/types';

describe('collapseWhitespace', () => {
  it('should leave no run of two or more spaces', () => {
    const collapsed = collapseWhitespace('  GROCERY   STORE \t  PURCHASE  ');
    expect(collapsed).toBe('GROCERY STORE PURCHASE');
    expect(collapsed).not.toMatch(/\s{2,}/);
  });
});

describe('sliceColumn', () => {
  it('should slice half-open ranges', () => {
    expect(sliceColumn('abcdef', { start: 2, end: 4 })).toBe('cd');
    expect(sliceColumn('abcdef', { start: 2 })).toBe('cdef');
  });

  it('should return an empty string past the end of a short line', () => {
    expect(sliceColumn('abc', { start: 10, end: 20 })).toBe('');
  });
});

describe('isBlank', () => {
  it('should treat whitespace and undefined as blank', () => {
    expect(isBlank('   ')).toBe(true);
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(' x ')).toBe(false);
  });
});
