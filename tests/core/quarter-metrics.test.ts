import { describe, it, expect } from "vitest";
import {
  COMMUNITY_QUARTER_METRICS,
  CommunityQuarter,
  CommunityTotal,
} from "../../src/core/metrics/community.js";
import { AgilityQuarter } from "../../src/core/metrics/agility.js";
import { QuartersStore } from "../../src/core/quarters/quarters-store.js";
import { InvalidArgumentError } from "../../src/infra/errors.js";

describe("QuarterMetrics", () => {
  it("should start every metric at zero", () => {
    const quarter = new CommunityQuarter();

    expect(quarter.metricValues()).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("should align values with the class-level metric names", () => {
    const quarter = new CommunityQuarter();
    quarter.set("forks_count", 4);
    quarter.set("stack_overflow_answered_questions_percent", 66.67);

    expect(CommunityQuarter.metrics).toEqual(COMMUNITY_QUARTER_METRICS);
    expect(quarter.metricValues()).toEqual([0, 0, 0, 0, 0, 4, 0, 66.67]);
    expect(Object.keys(quarter.toRecord())).toEqual([...COMMUNITY_QUARTER_METRICS]);
  });

  it("should increment counters", () => {
    const quarter = new AgilityQuarter();
    quarter.increment("commits_count");
    quarter.increment("commits_count", 4);

    expect(quarter.get("commits_count")).toBe(5);
  });

  it("should reject non-finite values", () => {
    const quarter = new AgilityQuarter();

    expect(() => quarter.set("releases_count", Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => quarter.set("releases_count", Number.POSITIVE_INFINITY)).toThrow(
      InvalidArgumentError
    );
  });

  it("should restore known metrics from a snapshot", () => {
    const total = new CommunityTotal();
    total.restore({ stack_overflow_questions_count: 12, unknown_metric: 3 });

    expect(total.toRecord()).toEqual({
      stack_overflow_questions_count: 12,
      stack_overflow_answered_questions_percent: 0,
    });
  });

  it("should average only the aggregated agility metrics over a year", () => {
    const store = new QuartersStore(AgilityQuarter);
    for (const [date, commits, days] of [
      ["2015-01-01", 10, 2],
      ["2015-04-01", 20, 4],
      ["2015-07-01", 30, 6],
      ["2015-10-01", 40, 8],
    ] as const) {
      const quarter = store.findOrCreate(date);
      quarter.set("commits_count", commits);
      quarter.set("issues_processed_in_avg", days);
    }

    const record = store.lastYearAsRecord(0);

    expect(record["commits_count"]).toBe(100);
    expect(record["issues_processed_in_avg"]).toBe(5);
    expect(record["pr_processed_in_avg"]).toBe(0);
  });
});
