/**
 * Shared fixtures for tests
 */

import { QuarterMetrics } from "../src/core/metrics/quarter-metrics.js";
import type { Clock } from "../src/types/metrics.js";

/** Two-metric container: `count` is summed, `rate` averaged */
export class SampleQuarter extends QuarterMetrics<"count" | "rate"> {
  static readonly metrics = ["count", "rate"] as const;
  static readonly aggregatedMetrics = ["rate"] as const;

  constructor() {
    super(SampleQuarter.metrics);
  }
}

export function fixedClock(iso: string): Clock {
  return () => new Date(iso);
}

/** 2016-10-18T15:00:00Z, inside 2016-Q4 */
export const NOW = "2016-10-18T15:00:00Z";

/** Run `fn` and return what it threw, or undefined */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
