import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { buildQuartersIntervals, type QuarterInterval } from "../../core/quarters/intervals.js";
import { formatQuarter } from "../../core/quarters/quarter-key.js";
import { formatEpoch, parseDateArgument } from "./shared.js";

interface IntervalsOptions {
  from?: string;
  to?: string;
  json: boolean;
}

export function createIntervalsCommand(): Command {
  return new Command("intervals")
    .description("List the calendar quarters covering a date range")
    .option("--from <date>", "Range start (YYYY-MM-DD or epoch seconds, default: one year ago)")
    .option("--to <date>", "Range end (YYYY-MM-DD or epoch seconds, default: now)")
    .option("--json", "Output as JSON", false)
    .action((options: IntervalsOptions) => {
      try {
        const intervals = buildQuartersIntervals({
          from: options.from === undefined ? undefined : parseDateArgument(options.from),
          to: options.to === undefined ? undefined : parseDateArgument(options.to),
        });
        console.log(renderIntervals(intervals, options.json));
      } catch (error) {
        logger.error("Intervals failed", error);
        process.exit(1);
      }
    });
}

export function renderIntervals(intervals: QuarterInterval[], json: boolean): string {
  if (json) {
    return JSON.stringify(intervals);
  }
  return intervals
    .map(([start, end]) => `${formatQuarter(start)}  ${formatEpoch(start)}  ${formatEpoch(end)}`)
    .join("\n");
}
