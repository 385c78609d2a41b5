/** Name→value snapshot of one container, in canonical metric order */
export type MetricsSnapshot = Record<string, number>;

/**
 * Instance side of a bucket stored under one quarter.
 * `metricValues()` is aligned positionally with the type's `metrics` list.
 */
export interface MetricsContainer {
  metricValues(): number[];
  toRecord(): MetricsSnapshot;
  restore(snapshot: Readonly<Partial<MetricsSnapshot>>): void;
}

/**
 * Class side: the constructor plus the metric names shared by every instance.
 * Names listed in `aggregatedMetrics` are averaged over a trailing year, all
 * others are summed.
 */
export interface MetricsContainerType<T extends MetricsContainer> {
  new (): T;
  readonly metrics: readonly string[];
  readonly aggregatedMetrics: readonly string[];
}

/** Source of "now"; injected wherever a default depends on the current time */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
