import { z } from "zod";
import {
  DegenerateAggregationError,
  InvalidArgumentError,
  QuarterNotFoundError,
  SnapshotError,
} from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import {
  systemClock,
  type Clock,
  type MetricsContainer,
  type MetricsContainerType,
  type MetricsSnapshot,
} from "../../types/metrics.js";
import { buildQuartersIntervals, type QuarterInterval } from "./intervals.js";
import { SECONDS_PER_DAY, dateToEnd, dateToStart, type DateInput } from "./quarter-key.js";

const log = logger.child("store");

/** Longer than any quarter, shorter than any two */
const QUARTER_STEP_SECONDS = 93 * SECONDS_PER_DAY;

const QUARTERS_IN_YEAR = 4;

export const StoreSnapshotSchema = z.record(
  z.string().regex(/^-?\d+$/, "keys must be integer epoch seconds"),
  z.record(z.string(), z.number())
);

export type StoreSnapshot = z.infer<typeof StoreSnapshotSchema>;

export interface QuartersStoreOptions {
  now?: Clock;
}

export interface LastYearOptions {
  /** Throw DegenerateAggregationError instead of aggregating a partial year */
  strict?: boolean;
}

/**
 * Metrics of one type bucketed by calendar quarter.
 *
 * Buckets are keyed by the epoch seconds of their quarter start and created
 * lazily. `startDate`/`endDate` only describe the stored range after
 * {@link QuartersStore.fillGaps}; before that they hold the creation time.
 * Not safe for concurrent writers.
 */
export class QuartersStore<T extends MetricsContainer> {
  private readonly quarters = new Map<number, T>();
  private sortedKeys: number[] | undefined;
  private readonly now: Clock;
  private _startDate: Date;
  private _endDate: Date;

  constructor(
    readonly dataType: MetricsContainerType<T>,
    options: QuartersStoreOptions = {}
  ) {
    this.now = options.now ?? systemClock;
    this._startDate = this.now();
    this._endDate = this.now();
  }

  static fromJSON<T extends MetricsContainer>(
    dataType: MetricsContainerType<T>,
    input: unknown,
    options: QuartersStoreOptions = {}
  ): QuartersStore<T> {
    let raw = input;
    if (typeof input === "string") {
      try {
        raw = JSON.parse(input) as unknown;
      } catch (error) {
        throw new SnapshotError(
          "Quarters snapshot is not valid JSON",
          error instanceof Error ? error : undefined
        );
      }
    }

    const result = StoreSnapshotSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new SnapshotError(`Invalid quarters snapshot: ${errors}`);
    }

    const store = new QuartersStore(dataType, options);
    for (const [key, snapshot] of Object.entries(result.data)) {
      const start = Number(key);
      if (dateToStart(start) !== start) {
        throw new SnapshotError(`Snapshot key ${key} is not the start of a quarter`);
      }
      store.findOrCreate(start).restore(snapshot);
    }
    return store;
  }

  get size(): number {
    return this.quarters.size;
  }

  get startDate(): Date {
    return this._startDate;
  }

  get endDate(): Date {
    return this._endDate;
  }

  /** Quarter-start keys in ascending order */
  keys(): number[] {
    return [...this.sortedIndex()];
  }

  has(date: DateInput): boolean {
    return this.quarters.has(dateToStart(date));
  }

  /**
   * Strict lookup of the bucket for the quarter containing `date`.
   *
   * @throws QuarterNotFoundError when that quarter has no bucket
   */
  fetch(date: DateInput): T {
    const key = dateToStart(date);
    const quarter = this.quarters.get(key);
    if (quarter === undefined) {
      throw new QuarterNotFoundError(key);
    }
    return quarter;
  }

  findOrCreate(date: DateInput): T {
    const key = dateToStart(date);
    let quarter = this.quarters.get(key);
    if (quarter === undefined) {
      quarter = new this.dataType();
      this.quarters.set(key, quarter);
      this.sortedKeys = undefined;
    }
    return quarter;
  }

  /** Alias of {@link QuartersStore.findOrCreate} */
  at(date: DateInput): T {
    return this.findOrCreate(date);
  }

  /**
   * Create empty buckets for every quarter missing between the earliest and
   * latest stored ones, then pin `startDate`/`endDate` to those quarters.
   * Call once all data is gathered. Idempotent; no-op on an empty store.
   */
  fillGaps(): void {
    const keys = this.sortedIndex();
    const first = keys[0];
    const last = keys[keys.length - 1];
    if (first === undefined || last === undefined) return;

    let created = 0;
    // Re-anchoring on each quarter start keeps the 93-day step from drifting
    for (let period = first; period <= last; period = dateToStart(period + QUARTER_STEP_SECONDS)) {
      if (!this.quarters.has(period)) {
        this.findOrCreate(period);
        created++;
      }
    }

    if (created > 0) {
      log.debug(`Filled ${created} missing quarters`, { first, last });
    }

    this._startDate = new Date(first * 1000);
    this._endDate = new Date(last * 1000);
  }

  /**
   * Metric values over the trailing year: the four quarters ending `offset`
   * quarters before the most recent one. Aggregated metrics are averaged,
   * all others summed.
   *
   * With fewer than `4 + offset` quarters stored the window is whatever is
   * available, so sums under-count unless `strict` is set.
   */
  lastYearAsRecord(offset = 1, options: LastYearOptions = {}): MetricsSnapshot {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidArgumentError(`Offset must be a non-negative integer, got ${offset}`);
    }

    const keys = this.sortedIndex();
    const required = QUARTERS_IN_YEAR + offset;
    if (keys.length < required) {
      if (options.strict) {
        throw new DegenerateAggregationError(keys.length, required);
      }
      log.debug(`Aggregating a partial year: ${keys.length} of ${required} quarters stored`);
    }

    const rows = keys
      .slice(-required)
      .slice(0, QUARTERS_IN_YEAR)
      .map((key) => this.fetch(key).metricValues());

    const result: MetricsSnapshot = {};
    this.dataType.metrics.forEach((name, position) => {
      result[name] = rows.reduce((sum, values) => sum + (values[position] ?? 0), 0);
    });

    for (const name of this.dataType.aggregatedMetrics) {
      const sum = result[name];
      if (sum !== undefined) {
        result[name] = sum / QUARTERS_IN_YEAR;
      }
    }

    return result;
  }

  lastYearData(offset = 1, options: LastYearOptions = {}): number[] {
    const record = this.lastYearAsRecord(offset, options);
    return this.dataType.metrics.map((name) => record[name] ?? 0);
  }

  preview(): Array<[Date, T]> {
    return this.eachSorted((time, quarter): [Date, T] => [new Date(time * 1000), quarter]);
  }

  eachSorted<R>(fn: (time: number, quarter: T) => R): R[] {
    return this.sortedIndex().map((key) => fn(key, this.fetch(key)));
  }

  reverseEachSorted<R>(fn: (time: number, quarter: T) => R): R[] {
    return [...this.sortedIndex()].reverse().map((key) => fn(key, this.fetch(key)));
  }

  /**
   * Windows a fetcher still has to query: each stored quarter up to the next
   * stored one, the last one running to the end of the current quarter.
   * An empty store falls back to the quarters of the trailing year.
   */
  quartersIntervals(): QuarterInterval[] {
    if (this.quarters.size === 0) {
      return buildQuartersIntervals({ now: this.now });
    }

    const bounds = [...this.sortedIndex(), dateToEnd(this.now())];
    const intervals: QuarterInterval[] = [];
    for (let i = 0; i + 1 < bounds.length; i++) {
      const start = bounds[i];
      const finish = bounds[i + 1];
      if (start !== undefined && finish !== undefined) {
        intervals.push([start, finish]);
      }
    }
    return intervals;
  }

  withQuartersIntervals(fn: (start: number, finish: number) => void): void {
    for (const [start, finish] of this.quartersIntervals()) {
      fn(start, finish);
    }
  }

  toJSON(): StoreSnapshot {
    const snapshot: StoreSnapshot = {};
    for (const [time, quarter] of this.quarters) {
      snapshot[String(time)] = quarter.toRecord();
    }
    return snapshot;
  }

  serialize(): string {
    return JSON.stringify(this.toJSON());
  }

  private sortedIndex(): number[] {
    if (this.sortedKeys === undefined) {
      this.sortedKeys = [...this.quarters.keys()].sort((a, b) => a - b);
    }
    return this.sortedKeys;
  }
}
