import { logger } from "../../infra/logger.js";
import { systemClock, type Clock } from "../../types/metrics.js";
import type { Project } from "../project/project.js";
import { formatQuarter } from "../quarters/quarter-key.js";
import type { StackExchangeClient } from "./stack-exchange-client.js";

const log = logger.child("stackoverflow");

export interface StackOverflowFetcherOptions {
  site?: string;
  now?: Clock;
}

/** Share of questions with at least one answer, in percent to two decimals */
export function answeredQuestionsPercent(total: number, unanswered: number): number | undefined {
  if (total === 0) return undefined;
  return Math.round((((total - unanswered) * 100) / total) * 100) / 100;
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Fills a project's community series with Stack Overflow question counts
 * for questions tagged with the project name.
 */
export class StackOverflowFetcher {
  private readonly site: string;
  private readonly now: Clock;

  constructor(
    private readonly project: Project,
    private readonly client: StackExchangeClient,
    options: StackOverflowFetcherOptions = {}
  ) {
    this.site = options.site ?? "stackoverflow";
    this.now = options.now ?? systemClock;
  }

  questionsCount(from: number, to: number): Promise<number> {
    return this.questionsCountRequest("questions", from, to);
  }

  noAnswersQuestionsCount(from: number, to: number): Promise<number> {
    return this.questionsCountRequest("questions/no-answers", from, to);
  }

  async process(): Promise<void> {
    await this.processQuartersStats();
    await this.processTotalStats();
  }

  /** All-time window: ten years back up to the start of today (UTC) */
  totalCountTimeBoundaries(): [from: number, to: number] {
    const now = this.now();
    const from = new Date(now.getTime());
    from.setUTCFullYear(from.getUTCFullYear() - 10);
    const startOfToday = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
    return [toEpochSeconds(from), startOfToday / 1000];
  }

  private questionsCountRequest(path: string, from: number, to: number): Promise<number> {
    return this.client.countTotal(path, {
      fromdate: from,
      todate: to,
      tagged: this.project.name,
      filter: "total",
      site: this.site,
    });
  }

  private async processQuartersStats(): Promise<void> {
    const quarters = this.project.community.quarters;
    const intervals = quarters.quartersIntervals();

    for (const [index, [from, to]] of intervals.entries()) {
      log.step(index + 1, intervals.length, `Stack Overflow questions for ${formatQuarter(from)}`);

      const total = await this.questionsCount(from, to);
      const quarter = quarters.at(from);
      quarter.set("stack_overflow_questions_count", total);

      if (total > 0) {
        const percent = answeredQuestionsPercent(total, await this.noAnswersQuestionsCount(from, to));
        if (percent !== undefined) {
          quarter.set("stack_overflow_answered_questions_percent", percent);
        }
      }
    }
  }

  private async processTotalStats(): Promise<void> {
    const [from, to] = this.totalCountTimeBoundaries();
    const total = await this.questionsCount(from, to);
    const totals = this.project.community.total;
    totals.set("stack_overflow_questions_count", total);

    if (total > 0) {
      const percent = answeredQuestionsPercent(total, await this.noAnswersQuestionsCount(from, to));
      if (percent !== undefined) {
        totals.set("stack_overflow_answered_questions_percent", percent);
      }
    }

    log.debug(`Stack Overflow totals for ${this.project.name}`, totals.toRecord());
  }
}
