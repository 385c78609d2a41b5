import { QuarterMetrics } from "./quarter-metrics.js";

export const AGILITY_QUARTER_METRICS = [
  "issues_opened_count",
  "issues_closed_count",
  "pr_opened_count",
  "pr_merged_count",
  "commits_count",
  "releases_count",
  "issues_processed_in_avg",
  "pr_processed_in_avg",
] as const;

export type AgilityQuarterMetric = (typeof AGILITY_QUARTER_METRICS)[number];

/**
 * Maintenance activity within one quarter. The `*_processed_in_avg` metrics
 * are mean days to close and are averaged over a trailing year.
 */
export class AgilityQuarter extends QuarterMetrics<AgilityQuarterMetric> {
  static readonly metrics: readonly AgilityQuarterMetric[] = AGILITY_QUARTER_METRICS;
  static readonly aggregatedMetrics: readonly AgilityQuarterMetric[] = [
    "issues_processed_in_avg",
    "pr_processed_in_avg",
  ];

  constructor() {
    super(AGILITY_QUARTER_METRICS);
  }
}
