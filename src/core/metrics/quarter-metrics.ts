import { InvalidArgumentError } from "../../infra/errors.js";
import type { MetricsContainer, MetricsSnapshot } from "../../types/metrics.js";

/**
 * Zero-initialised numeric metrics over a fixed, ordered list of names.
 * Subclasses pass their name list and expose it as the static `metrics`.
 */
export abstract class QuarterMetrics<M extends string> implements MetricsContainer {
  private readonly values = new Map<M, number>();

  protected constructor(private readonly names: readonly M[]) {
    for (const name of names) {
      this.values.set(name, 0);
    }
  }

  get(name: M): number {
    return this.values.get(name) ?? 0;
  }

  set(name: M, value: number): void {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`Metric ${name} must be a finite number, got ${value}`);
    }
    this.values.set(name, value);
  }

  increment(name: M, by = 1): void {
    this.set(name, this.get(name) + by);
  }

  metricValues(): number[] {
    return this.names.map((name) => this.get(name));
  }

  toRecord(): MetricsSnapshot {
    return Object.fromEntries(this.names.map((name) => [name, this.get(name)]));
  }

  // Unknown names are dropped so older snapshots load after a metric is removed
  restore(snapshot: Readonly<Partial<MetricsSnapshot>>): void {
    for (const name of this.names) {
      const value = snapshot[name];
      if (value !== undefined) {
        this.set(name, value);
      }
    }
  }
}
