import { describe, it, expect } from 'vitest';
import { IntervalError } from '@ctxgrep/shared';
import { buildContextWindows, saturatingAdd, saturatingSub, MAX_INDEX } from './windows';

const bounds = (positions: number[], before: number, after: number, maxIndex?: number) =>
  buildContextWindows(positions, before, after, maxIndex).map((w) => [w.start, w.end]);

describe('saturating arithmetic', () => {
  it('clamps subtraction at zero', () => {
    expect(saturatingSub(5, 2)).toBe(3);
    expect(saturatingSub(1, 5)).toBe(0);
  });

  it('clamps addition at the maximum', () => {
    expect(saturatingAdd(5, 2)).toBe(7);
    expect(saturatingAdd(5, 10, 9)).toBe(9);
    expect(saturatingAdd(MAX_INDEX - 1, 5)).toBe(MAX_INDEX);
  });
});

describe('buildContextWindows', () => {
  it('produces one window per match, in order', () => {
    expect(bounds([1, 3], 0, 1)).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('applies both margins', () => {
    expect(bounds([5], 2, 3)).toEqual([[3, 8]]);
  });

  it('clamps the start at line zero', () => {
    expect(bounds([0, 1], 3, 0)).toEqual([
      [0, 0],
      [0, 1],
    ]);
  });

  it('clamps the end at the last line when given', () => {
    expect(bounds([3, 4], 0, 5, 4)).toEqual([
      [3, 4],
      [4, 4],
    ]);
  });

  it('returns nothing for no matches', () => {
    expect(buildContextWindows([], 2, 2)).toEqual([]);
  });

  it('surfaces a window that ends before it starts', () => {
    expect(() => buildContextWindows([4], -3, 0)).toThrow(IntervalError);
  });
});
