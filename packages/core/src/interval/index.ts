export { Interval } from './interval';
export type { IntervalOrdering } from './interval';
export { buildContextWindows, saturatingAdd, saturatingSub, MAX_INDEX } from './windows';
export { coalesceIntervals } from './coalesce';
