import { extent, mean, median, percentile, stdDev } from "./rng";
import {
  type AnalysisSummary,
  type DistributionSpec,
  type EnsembleRow,
  type FieldCorrelation,
  type ParameterField,
  type ThresholdRate,
} from "./types";

export interface HistogramBin {
  x0: number;
  x1: number;
  count: number;
}

export interface LinearFit {
  slope: number;
  intercept: number;
}

export function summarize(
  ensemble: EnsembleRow[],
  distributions: DistributionSpec[],
  thresholdsKm: number[],
): AnalysisSummary {
  const ranges = ensemble.map((r) => r.rangeKm);
  const [minKm, maxKm] = extent(ranges);

  return {
    runs: ranges.length,
    meanKm: mean(ranges),
    stdKm: stdDev(ranges),
    medianKm: median(ranges),
    p5Km: percentile(ranges, 0.05),
    p95Km: percentile(ranges, 0.95),
    minKm,
    maxKm,
    thresholdRates: thresholdRates(ranges, thresholdsKm),
    correlations: fieldCorrelations(ensemble, distributions),
  };
}

export function thresholdRates(
  ranges: number[],
  thresholdsKm: number[],
): ThresholdRate[] {
  return thresholdsKm.map((thresholdKm) => {
    if (ranges.length === 0) return { thresholdKm, percent: 0 };
    let hits = 0;
    for (const r of ranges) if (r >= thresholdKm) hits++;
    return { thresholdKm, percent: (hits / ranges.length) * 100 };
  });
}

export function fieldCorrelations(
  ensemble: EnsembleRow[],
  distributions: DistributionSpec[],
): FieldCorrelation[] {
  const ranges = ensemble.map((r) => r.rangeKm);
  const seen = new Set<string>();
  const out: FieldCorrelation[] = [];
  for (const { field } of distributions) {
    if (seen.has(field)) continue;
    seen.add(field);
    const xs = ensemble.map((r) => r.params[field]);
    out.push({ field, r: pearson(xs, ranges) });
  }
  return out;
}

// 0 when either side is constant
export function pearson(xs: number[], ys: number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0,
    sxx = 0,
    syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return 0;
  return sxy / Math.sqrt(sxx * syy);
}

export function histogram(values: number[], bins = 50): HistogramBin[] {
  if (values.length === 0 || bins <= 0) return [];
  let [lo, hi] = extent(values);
  if (lo === hi) {
    // single spike: one unit-wide bin around it
    lo -= 0.5;
    hi += 0.5;
  }
  const width = (hi - lo) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    x0: lo + i * width,
    x1: i === bins - 1 ? hi : lo + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const idx = Math.min(bins - 1, Math.floor((v - lo) / width));
    out[idx].count++;
  }
  return out;
}

/** Empirical CDF as [range, cumulative %] points, sorted by range. */
export function empiricalCdf(values: number[]): [number, number][] {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted.map((x, i) => [x, ((i + 1) / sorted.length) * 100]);
}

export function linearFit(xs: number[], ys: number[]): LinearFit {
  const n = Math.min(xs.length, ys.length);
  if (n === 0) return { slope: 0, intercept: 0 };
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0,
    sxx = 0;
  for (let i = 0; i < n; i++) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) * (xs[i] - mx);
  }
  if (sxx === 0) return { slope: 0, intercept: my };
  const slope = sxy / sxx;
  return { slope, intercept: my - slope * mx };
}

export interface QuartileGroup {
  label: string;
  ranges: number[];
}

/**
 * Splits the ranges into four groups by quartile of `field`. Bins are closed
 * on the right: a value equal to a quartile boundary lands in the lower group.
 */
export function quartileGroups(
  ensemble: EnsembleRow[],
  field: ParameterField,
): QuartileGroup[] {
  const xs = ensemble.map((r) => r.params[field]);
  const edges = [0.25, 0.5, 0.75].map((p) => percentile(xs, p));
  const groups: QuartileGroup[] = ["Q1", "Q2", "Q3", "Q4"].map((label) => ({
    label,
    ranges: [],
  }));
  ensemble.forEach((row, i) => {
    let k = 0;
    while (k < edges.length && xs[i] > edges[k]) k++;
    groups[k].ranges.push(row.rangeKm);
  });
  return groups;
}

/**
 * Box plot statistics `[low whisker, Q1, median, Q3, high whisker]`. Whiskers
 * reach the most extreme values within 1.5 IQR of the box.
 */
export function boxStats(values: number[]): [number, number, number, number, number] {
  if (values.length === 0) return [0, 0, 0, 0, 0];
  const q1 = percentile(values, 0.25);
  const q2 = percentile(values, 0.5);
  const q3 = percentile(values, 0.75);
  const iqr = q3 - q1;
  const inside = values.filter((v) => v >= q1 - 1.5 * iqr && v <= q3 + 1.5 * iqr);
  const [lo, hi] = extent(inside);
  return [lo, q1, q2, q3, hi];
}
