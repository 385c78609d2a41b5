import { MalformedDateError } from "../../infra/errors.js";

/** Anything a caller may use to point at a day: `YYYY-MM-DD`, epoch seconds or a Date */
export type DateInput = string | number | Date;

/** Calendar quarter in UTC; `index` is 0 for Jan-Mar through 3 for Oct-Dec */
export interface Quarter {
  year: number;
  index: number;
}

export const SECONDS_PER_DAY = 24 * 60 * 60;

const DATE_PATTERN = /^(\d{4})(?:-(\d{1,2})(?:-(\d{1,2}))?)?$/;

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes the year as given
function utcMillis(year: number, month: number, day: number): number {
  const instant = new Date(0);
  instant.setUTCFullYear(year, month, day);
  return instant.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcMillis(year, month + 1, 0)).getUTCDate();
}

function parseCalendarDate(value: string): { year: number; month: number } {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new MalformedDateError(value);
  }

  const year = Number(match[1]);
  const month = match[2] === undefined ? 0 : Number(match[2]) - 1;
  const day = match[3] === undefined ? 1 : Number(match[3]);

  if (month < 0 || month > 11 || day < 1 || day > daysInMonth(year, month)) {
    throw new MalformedDateError(value);
  }

  return { year, month };
}

/**
 * Resolve the UTC calendar quarter containing `date`.
 *
 * Strings are read as plain calendar dates with no time zone; numbers are
 * epoch seconds truncated to their UTC day.
 */
export function quarterOf(date: DateInput): Quarter {
  if (typeof date === "string") {
    const { year, month } = parseCalendarDate(date);
    return { year, index: Math.floor(month / 3) };
  }

  const ms = typeof date === "number" ? date * 1000 : date.getTime();
  if (!Number.isFinite(ms)) {
    throw new MalformedDateError(date);
  }

  const day = new Date(ms);
  const quarter = { year: day.getUTCFullYear(), index: Math.floor(day.getUTCMonth() / 3) };
  // Both bounds must be representable, not just the instant itself
  if (Number.isNaN(quarterStart(quarter)) || Number.isNaN(quarterEnd(quarter))) {
    throw new MalformedDateError(date);
  }
  return quarter;
}

export function quarterStart(quarter: Quarter): number {
  return utcMillis(quarter.year, quarter.index * 3, 1) / 1000;
}

/** Last second of the quarter (23:59:59 of its last day) */
export function quarterEnd(quarter: Quarter): number {
  return utcMillis(quarter.year, quarter.index * 3 + 3, 1) / 1000 - 1;
}

/** Canonical bucket key: epoch seconds of the start of the quarter containing `date` */
export function dateToStart(date: DateInput): number {
  return quarterStart(quarterOf(date));
}

export function dateToEnd(date: DateInput): number {
  return quarterEnd(quarterOf(date));
}

export function formatQuarter(date: DateInput): string {
  const { year, index } = quarterOf(date);
  return `${year}-Q${index + 1}`;
}
