/**
 * Aggregate measures over a numeric dataset.
 *
 * Percentiles use nearest-rank selection on a sorted copy,
 * `sorted[floor(p * n / 100)]`, with no interpolation.
 */

export interface StatisticsSummary {
  count: number;
  sum: number;
  mean: number;
  std_dev: number;
  /** Population variance (divisor n) */
  variance: number;
  min: number;
  max: number;
  median: number;
  p25: number;
  p75: number;
  p95: number;
  p99: number;
  range: number;
}

export interface EmptyDatasetMarker {
  error: "empty dataset";
}

export type StatisticsResult = StatisticsSummary | EmptyDatasetMarker;

export function isEmptyDataset(result: StatisticsResult): result is EmptyDatasetMarker {
  return "error" in result;
}

function percentile(sorted: Float64Array, p: number): number {
  return sorted[Math.floor((p * sorted.length) / 100)];
}

export function computeStatistics(data: ArrayLike<number>): StatisticsResult {
  const n = data.length;
  if (n === 0) {
    return { error: "empty dataset" };
  }

  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += data[i];
  }
  const mean = sum / n;

  let squaredDiffs = 0;
  for (let i = 0; i < n; i++) {
    const diff = data[i] - mean;
    squaredDiffs += diff * diff;
  }
  const variance = squaredDiffs / n;

  let min = data[0];
  let max = data[0];
  for (let i = 1; i < n; i++) {
    if (data[i] < min) min = data[i];
    if (data[i] > max) max = data[i];
  }

  // Typed array sort is numeric and leaves the caller's data untouched
  const sorted = Float64Array.from(data).sort();
  const mid = Math.floor(n / 2);
  const median = n % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];

  return {
    count: n,
    sum,
    mean,
    std_dev: Math.sqrt(variance),
    variance,
    min,
    max,
    median,
    p25: percentile(sorted, 25),
    p75: percentile(sorted, 75),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    range: max - min,
  };
}
