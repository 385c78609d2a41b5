import { systemClock, type Clock } from "../../types/metrics.js";
import { dateToEnd, dateToStart, type DateInput } from "./quarter-key.js";

/** Inclusive `[start, end]` pair in epoch seconds */
export type QuarterInterval = [start: number, end: number];

export interface BuildIntervalsOptions {
  /** Defaults to one year before `now` */
  from?: DateInput;
  /** Defaults to `now` */
  to?: DateInput;
  now?: Clock;
}

/** Same calendar day a year earlier; Feb 29 clamps to Feb 28 */
export function oneYearBefore(date: Date): Date {
  const shifted = new Date(date.getTime());
  const month = date.getUTCMonth();
  shifted.setUTCFullYear(date.getUTCFullYear() - 1, month, date.getUTCDate());
  if (shifted.getUTCMonth() !== month) {
    shifted.setUTCDate(0);
  }
  return shifted;
}

/**
 * Quarter windows covering the quarter of `from` through the quarter of `to`.
 * Boundaries that fall inside a quarter are widened to the whole quarter; an
 * inverted range yields no windows.
 */
export function buildQuartersIntervals(options: BuildIntervalsOptions = {}): QuarterInterval[] {
  const now = (options.now ?? systemClock)();
  let intervalStart = dateToStart(options.from ?? oneYearBefore(now));
  const finish = dateToEnd(options.to ?? now);
  const intervals: QuarterInterval[] = [];

  while (intervalStart <= finish) {
    const intervalEnd = dateToEnd(intervalStart);
    intervals.push([intervalStart, intervalEnd]);
    intervalStart = intervalEnd + 1;
  }

  return intervals;
}
