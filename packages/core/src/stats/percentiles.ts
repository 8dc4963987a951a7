import type { PercentileStats } from '../types/run.js';

export const EMPTY_PERCENTILES: Readonly<PercentileStats> = Object.freeze({
  count: 0,
  min: 0,
  max: 0,
  mean: 0,
  median: 0,
  p50: 0,
  p95: 0,
  p99: 0,
  'p99.9': 0,
  'p99.99': 0,
});

function valueAt(sorted: readonly number[], index: number): number {
  const value = sorted[index];
  if (value === undefined) {
    throw new RangeError(`index ${index} outside ${sorted.length} samples`);
  }
  return value;
}

/**
 * Percentile of ascending `sorted` values using linear interpolation
 * between the two closest ranks (rank in [0, 100]).
 */
export function percentile(sorted: readonly number[], rank: number): number {
  if (!Number.isFinite(rank) || rank < 0 || rank > 100) {
    throw new RangeError('percentile rank must be between 0 and 100');
  }
  if (sorted.length === 0) {
    return 0;
  }
  const index = (rank / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const lowerValue = valueAt(sorted, lower);
  if (lower === upper) {
    return lowerValue;
  }
  const weight = index - lower;
  return lowerValue + (valueAt(sorted, upper) - lowerValue) * weight;
}

export function median(sorted: readonly number[]): number {
  if (sorted.length === 0) {
    return 0;
  }
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return valueAt(sorted, middle);
  }
  return (valueAt(sorted, middle - 1) + valueAt(sorted, middle)) / 2;
}

export function computePercentiles(
  samples: readonly number[]
): PercentileStats {
  if (samples.length === 0) {
    return { ...EMPTY_PERCENTILES };
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, value) => acc + value, 0);

  return {
    count: sorted.length,
    min: valueAt(sorted, 0),
    max: valueAt(sorted, sorted.length - 1),
    mean: sum / sorted.length,
    median: median(sorted),
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    'p99.9': percentile(sorted, 99.9),
    'p99.99': percentile(sorted, 99.99),
  };
}
