import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  EMPTY_PERCENTILES,
  computePercentiles,
  median,
  percentile,
} from '../percentiles.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? 100);

describe('percentile', () => {
  it('interpolates linearly between the closest ranks', () => {
    const sorted = [1, 2, 3, 4];
    expect(percentile(sorted, 0)).toBe(1);
    expect(percentile(sorted, 50)).toBe(2.5);
    expect(percentile(sorted, 95)).toBeCloseTo(3.85, 10);
    expect(percentile(sorted, 100)).toBe(4);
  });

  it('rejects ranks outside [0, 100]', () => {
    expect(() => percentile([1, 2], 101)).toThrow(RangeError);
    expect(() => percentile([1, 2], -1)).toThrow(RangeError);
    expect(() => percentile([1, 2], Number.NaN)).toThrow(RangeError);
  });
});

describe('median', () => {
  it('takes the middle value or the mean of the two middle values', () => {
    expect(median([1, 5, 9])).toBe(5);
    expect(median([1, 5, 9, 11])).toBe(7);
    expect(median([])).toBe(0);
  });
});

describe('computePercentiles', () => {
  it('returns the all-zero sentinel for an empty sample set', () => {
    expect(computePercentiles([])).toEqual({
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
    expect(computePercentiles([])).toEqual(EMPTY_PERCENTILES);
  });

  it('summarizes a single sample', () => {
    const stats = computePercentiles([42]);
    expect(stats).toEqual({
      count: 1,
      min: 42,
      max: 42,
      mean: 42,
      median: 42,
      p50: 42,
      p95: 42,
      p99: 42,
      'p99.9': 42,
      'p99.99': 42,
    });
  });

  it('computes tail percentiles for 10..1000 us', () => {
    const samples = Array.from({ length: 100 }, (_, i) => (i + 1) * 10);
    const stats = computePercentiles(samples);

    expect(stats.count).toBe(100);
    expect(stats.min).toBe(10);
    expect(stats.max).toBe(1000);
    expect(stats.mean).toBeCloseTo(505, 10);
    expect(stats.median).toBe(505);
    expect(stats.p50).toBeCloseTo(505, 10);
    expect(stats.p95).toBeCloseTo(950.5, 8);
    expect(stats.p99).toBeCloseTo(990.1, 8);
    expect(stats['p99.9']).toBeCloseTo(999.01, 8);
    expect(stats['p99.99']).toBeCloseTo(999.901, 8);
  });

  it('does not reorder the caller samples', () => {
    const samples = [30, 10, 20];
    computePercentiles(samples);
    expect(samples).toEqual([30, 10, 20]);
  });

  it('keeps p50 and median equal for any non-empty sample set', () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1e6, noNaN: true }), {
          minLength: 1,
          maxLength: 200,
        }),
        (samples) => {
          const stats = computePercentiles(samples);
          const tolerance = 1e-9 * Math.max(1, Math.abs(stats.median));
          expect(Math.abs(stats.p50 - stats.median)).toBeLessThanOrEqual(
            tolerance
          );
          expect(stats.count).toBe(samples.length);
        }
      ),
      { numRuns }
    );
  });
});
