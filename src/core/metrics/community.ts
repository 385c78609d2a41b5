import { QuarterMetrics } from "./quarter-metrics.js";

export const COMMUNITY_QUARTER_METRICS = [
  "users_creating_issues_count",
  "users_commenting_issues_count",
  "users_creating_pr_count",
  "users_commenting_pr_count",
  "stargazers_count",
  "forks_count",
  "stack_overflow_questions_count",
  "stack_overflow_answered_questions_percent",
] as const;

export type CommunityQuarterMetric = (typeof COMMUNITY_QUARTER_METRICS)[number];

/** Community activity observed within one quarter */
export class CommunityQuarter extends QuarterMetrics<CommunityQuarterMetric> {
  static readonly metrics: readonly CommunityQuarterMetric[] = COMMUNITY_QUARTER_METRICS;
  static readonly aggregatedMetrics: readonly CommunityQuarterMetric[] = [
    "stack_overflow_answered_questions_percent",
  ];

  constructor() {
    super(COMMUNITY_QUARTER_METRICS);
  }
}

export const COMMUNITY_TOTAL_METRICS = [
  "stack_overflow_questions_count",
  "stack_overflow_answered_questions_percent",
] as const;

export type CommunityTotalMetric = (typeof COMMUNITY_TOTAL_METRICS)[number];

/** All-time community figures, kept beside the quarterly series */
export class CommunityTotal extends QuarterMetrics<CommunityTotalMetric> {
  static readonly metrics: readonly CommunityTotalMetric[] = COMMUNITY_TOTAL_METRICS;
  static readonly aggregatedMetrics: readonly CommunityTotalMetric[] = [];

  constructor() {
    super(COMMUNITY_TOTAL_METRICS);
  }
}
