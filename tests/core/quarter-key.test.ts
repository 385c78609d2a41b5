import { describe, it, expect } from "vitest";
import {
  dateToStart,
  dateToEnd,
  formatQuarter,
  quarterEnd,
  quarterOf,
  quarterStart,
} from "../../src/core/quarters/quarter-key.js";
import { MalformedDateError } from "../../src/infra/errors.js";

describe("quarterOf", () => {
  it("should group months into calendar quarters", () => {
    expect(quarterOf("2015-01-31")).toEqual({ year: 2015, index: 0 });
    expect(quarterOf("2015-04-01")).toEqual({ year: 2015, index: 1 });
    expect(quarterOf("2015-09-30")).toEqual({ year: 2015, index: 2 });
    expect(quarterOf("2015-12-31")).toEqual({ year: 2015, index: 3 });
  });

  it("should read epoch seconds in UTC", () => {
    // 2015-12-31T23:59:59Z
    expect(quarterOf(1451606399)).toEqual({ year: 2015, index: 3 });
    expect(quarterOf(1451606400)).toEqual({ year: 2016, index: 0 });
  });
});

describe("dateToStart", () => {
  it("should resolve calendar date strings", () => {
    expect(dateToStart("2015-08-17")).toBe(1435708800);
    expect(dateToStart("2015-07-01")).toBe(1435708800);
    expect(dateToStart("2015-09-30")).toBe(1435708800);
  });

  it("should accept partial dates", () => {
    expect(dateToStart("2015-10")).toBe(1443657600);
    expect(dateToStart("2015")).toBe(1420070400);
  });

  it("should resolve epoch seconds and Date objects to the same key", () => {
    expect(dateToStart(1439814600)).toBe(1435708800);
    expect(dateToStart(new Date("2015-09-30T23:59:59Z"))).toBe(1435708800);
    expect(dateToStart(1443657599)).toBe(1435708800);
    expect(dateToStart(1443657600)).toBe(1443657600);
  });

  it("should return a key that is its own quarter start", () => {
    const key = dateToStart("2016-05-20");
    expect(dateToStart(key)).toBe(key);
  });

  it("should handle dates before the epoch", () => {
    // 1969-12-31T23:59:59Z belongs to the quarter starting 1969-10-01
    expect(dateToStart(-1)).toBe(-7948800);
  });

  it("should keep years below 100 as written", () => {
    // 0050-04-01T00:00:00Z
    expect(dateToStart("0050-06-01")).toBe(-60581520000);
    expect(dateToEnd("0050-06-01")).toBe(-60573657601);
    expect(dateToStart(-60577243200)).toBe(-60581520000);
    expect(formatQuarter(-60577243200)).toBe("50-Q2");
  });

  it("should apply leap rules to the year as written", () => {
    // year 0 is a leap year, 1900 is not
    expect(dateToStart("0000-02-29")).toBe(-62167219200);
  });

  it("should accept leap days only in leap years", () => {
    expect(dateToStart("2016-02-29")).toBe(1451606400);
    expect(() => dateToStart("2015-02-29")).toThrow(MalformedDateError);
  });

  it.each(["2015-13-01", "2015-00-10", "2015-04-31", "next tuesday", "", "15-01-01"])(
    "should reject malformed date %j",
    (value) => {
      expect(() => dateToStart(value)).toThrow(MalformedDateError);
    }
  );

  it("should reject non-finite timestamps and invalid dates", () => {
    expect(() => dateToStart(Number.NaN)).toThrow(MalformedDateError);
    expect(() => dateToStart(Number.POSITIVE_INFINITY)).toThrow(MalformedDateError);
    expect(() => dateToStart(new Date("not a date"))).toThrow(MalformedDateError);
  });

  it("should reject timestamps outside the range of Date", () => {
    expect(() => dateToStart(1e13)).toThrow(MalformedDateError);
    expect(() => dateToStart(-1e13)).toThrow(MalformedDateError);
    // 275760-09-13 is the last representable day, but its quarter ends past it
    expect(() => dateToEnd(8.64e12)).toThrow(MalformedDateError);
  });
});

describe("quarter boundaries", () => {
  it("should end on the last second of the quarter", () => {
    expect(quarterEnd({ year: 2015, index: 2 })).toBe(1443657599);
    expect(dateToEnd("2015-08-17")).toBe(1443657599);
    expect(quarterEnd({ year: 2015, index: 2 }) + 1).toBe(quarterStart({ year: 2015, index: 3 }));
  });

  it("should roll over the year after the fourth quarter", () => {
    expect(quarterEnd({ year: 2015, index: 3 }) + 1).toBe(1451606400);
  });

  it("should format quarters for display", () => {
    expect(formatQuarter("2015-08-17")).toBe("2015-Q3");
    expect(formatQuarter(1451606400)).toBe("2016-Q1");
  });
});
