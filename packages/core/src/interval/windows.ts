import { Interval } from './interval';

/** Largest index a window bound can reach when no line limit is given. */
export const MAX_INDEX = Number.MAX_SAFE_INTEGER;

export function saturatingSub(value: number, amount: number, min = 0): number {
  const result = value - amount;
  return result < min ? min : result;
}

export function saturatingAdd(value: number, amount: number, max = MAX_INDEX): number {
  const result = value + amount;
  return result > max ? max : result;
}

/**
 * Turns ascending match positions into one context window per match, in the
 * same order. Bounds are clamped to [0, maxIndex].
 *
 * Margins are expected to be non-negative. A negative margin can produce a
 * window whose start lies past its end, which surfaces as the IntervalError
 * thrown by {@link Interval.create}.
 */
export function buildContextWindows(
  positions: readonly number[],
  before: number,
  after: number,
  maxIndex: number = MAX_INDEX,
): Interval[] {
  return positions.map((position) =>
    Interval.create(saturatingSub(position, before), saturatingAdd(position, after, maxIndex)),
  );
}
