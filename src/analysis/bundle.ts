import type { NotApplicable } from "../common/math.js";
import { sortLabels } from "../dataset/accessor.js";
import type {
  CrossTab,
  MatchRecord,
  MetricBundle,
  MetricUnit,
  ScatterPoint,
  SeriesPoint,
} from "../types.js";

export type Side = "primary" | "secondary";

export function emptyBundle(): MetricBundle {
  return { metrics: {}, series: {}, distributions: {}, crossTabs: {}, points: {} };
}

/**
 * Collects named metrics into one bundle. `forSide` returns a view over the
 * same bundle that prefixes every name with `primary.` or `secondary.`.
 */
export class BundleBuilder {
  private readonly bundle: MetricBundle;
  private readonly prefix: string;

  constructor(bundle: MetricBundle = emptyBundle(), prefix = "") {
    this.bundle = bundle;
    this.prefix = prefix;
  }

  forSide(side: Side): BundleBuilder {
    return new BundleBuilder(this.bundle, `${side}.`);
  }

  count(name: string, value: number): this {
    return this.metric(name, "count", value);
  }

  percent(name: string, value: number | NotApplicable): this {
    return this.metric(name, "percent", value);
  }

  mean(name: string, value: number | NotApplicable): this {
    return this.metric(name, "mean", value);
  }

  date(name: string, value: string): this {
    return this.metric(name, "date", value);
  }

  text(name: string, value: string): this {
    return this.metric(name, "text", value);
  }

  series(name: string, points: SeriesPoint[]): this {
    this.bundle.series[this.key(name)] = points;
    return this;
  }

  distribution(name: string, values: number[]): this {
    this.bundle.distributions[this.key(name)] = values;
    return this;
  }

  crossTab(name: string, table: CrossTab): this {
    this.bundle.crossTabs[this.key(name)] = table;
    return this;
  }

  points(name: string, points: ScatterPoint[]): this {
    this.bundle.points[this.key(name)] = points;
    return this;
  }

  rows(rows: MatchRecord[]): this {
    this.bundle.rows = rows;
    return this;
  }

  build(): MetricBundle {
    return this.bundle;
  }

  private metric(name: string, unit: MetricUnit, value: number | string): this {
    this.bundle.metrics[this.key(name)] = { unit, value };
    return this;
  }

  private key(name: string): string {
    return `${this.prefix}${name}`;
  }
}

/** Puts two season-indexed series on the same label axis, filling gaps with 0. */
export function alignSeries(a: SeriesPoint[], b: SeriesPoint[]): [SeriesPoint[], SeriesPoint[]] {
  const labels = sortLabels(new Set([...a, ...b].map((point) => point.label)));
  const fill = (points: SeriesPoint[]): SeriesPoint[] => {
    const byLabel = new Map(points.map((point): [string, number] => [point.label, point.value]));
    return labels.map((label) => ({ label, value: byLabel.get(label) ?? 0 }));
  };
  return [fill(a), fill(b)];
}
