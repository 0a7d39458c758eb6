import { IntervalError } from '@ctxgrep/shared';
import { Interval } from './interval';

/**
 * Merges intervals sorted by start into the minimal ascending sequence of
 * non-overlapping intervals covering the same points. Single pass, no sorting.
 *
 * @throws IntervalError with reason `UnorderedInput` if a start is smaller
 * than the one before it.
 */
export function coalesceIntervals(intervals: readonly Interval[]): Interval[] {
  const merged: Interval[] = [];
  if (intervals.length === 0) {
    return merged;
  }

  let current = intervals[0];
  let previousStart = current.start;

  for (let i = 1; i < intervals.length; i++) {
    const next = intervals[i];
    if (next.start < previousStart) {
      throw new IntervalError('UnorderedInput', {
        details: { index: i, previous: previousStart, start: next.start },
      });
    }
    previousStart = next.start;

    if (current.overlaps(next)) {
      current = current.merge(next);
    } else {
      merged.push(current);
      current = next;
    }
  }
  merged.push(current);

  return merged;
}
