import { IntervalError } from '@ctxgrep/shared';

/**
 * Result of comparing two intervals. `undefined` means the intervals overlap
 * and have no defined order.
 */
export type IntervalOrdering = -1 | 0 | 1 | undefined;

/**
 * A closed interval [start, end] over line indices, inclusive at both ends.
 * Instances are immutable; merging returns a new Interval.
 *
 * @example
 * ```typescript
 * const a = Interval.create(1, 3);
 * const b = Interval.create(3, 5);
 * a.overlaps(b); // true
 * a.merge(b).toString(); // '[1, 5]'
 * ```
 */
export class Interval {
  private constructor(
    public readonly start: number,
    public readonly end: number,
  ) {}

  /**
   * @throws IntervalError with reason `StartEndRangeInvalid` when start > end
   * or either bound is not a finite number.
   */
  static create(start: number, end: number): Interval {
    if (!Number.isFinite(start) || !Number.isFinite(end) || start > end) {
      throw new IntervalError('StartEndRangeInvalid', { details: { start, end } });
    }
    return new Interval(start, end);
  }

  /** Number of integer points covered. */
  get length(): number {
    return this.end - this.start + 1;
  }

  contains(point: number): boolean {
    return this.start <= point && point <= this.end;
  }

  /**
   * True when the two ranges share at least one point. Symmetric in its
   * operands.
   */
  overlaps(other: Interval): boolean {
    return this.end >= other.start && other.end >= this.start;
  }

  /**
   * Returns the smallest interval covering both. For `this.start <= other.start`
   * and `other.end >= this.end` that is `[this.start, other.end]`.
   *
   * @throws IntervalError with reason `NonOverlappingInterval` when the ranges
   * share no point.
   */
  merge(other: Interval): Interval {
    if (!this.overlaps(other)) {
      throw new IntervalError('NonOverlappingInterval', {
        details: { left: this.toString(), right: other.toString() },
      });
    }
    return new Interval(Math.min(this.start, other.start), Math.max(this.end, other.end));
  }

  compare(other: Interval): IntervalOrdering {
    if (this.equals(other)) return 0;
    if (this.end < other.start) return -1;
    if (this.start > other.end) return 1;
    return undefined;
  }

  equals(other: Interval): boolean {
    return this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `[${this.start}, ${this.end}]`;
  }

  toJSON(): { start: number; end: number } {
    return { start: this.start, end: this.end };
  }
}
