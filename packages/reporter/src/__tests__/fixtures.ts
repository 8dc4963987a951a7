import {
  EMPTY_PERCENTILES,
  parseMetadata,
  summarizeRunData,
  type PercentileStats,
  type Phase,
  type RunSummary,
} from '@qoslens/core';

export const BASELINE_METADATA = [
  'test_name=no_fdp',
  'test_duration=60',
  'overwrites=1000',
  'overwrite_duration=10',
  'warmup_ops=0',
  'warmup_duration=0',
].join('\n');

export const TREATMENT_METADATA = [
  'test_name=fdp',
  'test_duration=60.0',
  'overwrites=1000',
  'overwrite_duration=20',
  'warmup_ops=1500',
].join('\n');

export function makeSummary(
  directory: string,
  metadata: string,
  samples: Partial<Record<Phase, number[]>> = {}
): RunSummary {
  return summarizeRunData(directory, {
    metadata: parseMetadata(metadata),
    samples: {
      warmup: samples.warmup ?? [],
      victim_write: samples.victim_write ?? [],
      noisy_write: samples.noisy_write ?? [],
      overwrite: samples.overwrite ?? [],
      victim_read: samples.victim_read ?? [],
    },
  });
}

export function makeStats(overrides: Partial<PercentileStats>): PercentileStats {
  return { ...EMPTY_PERCENTILES, count: 100, ...overrides };
}

export const BASELINE_READS = makeStats({
  min: 50,
  max: 300,
  mean: 150,
  median: 120,
  p50: 120,
  p95: 180,
  p99: 200,
  'p99.9': 240,
});

export const TREATMENT_READS = makeStats({
  min: 25,
  max: 150,
  mean: 75,
  median: 60,
  p50: 60,
  p95: 90,
  p99: 100,
  'p99.9': 120,
});

export function withVictimReads(
  summary: RunSummary,
  stats: PercentileStats
): RunSummary {
  return { ...summary, latencies: { ...summary.latencies, victim_read: stats } };
}

/** Baseline and treatment pair with every section populated. */
export function comparisonPair(): { baseline: RunSummary; treatment: RunSummary } {
  return {
    baseline: withVictimReads(
      makeSummary('runs/no_fdp', BASELINE_METADATA),
      BASELINE_READS
    ),
    treatment: withVictimReads(
      makeSummary('runs/fdp', TREATMENT_METADATA),
      TREATMENT_READS
    ),
  };
}

export const GENERATED_AT = '2025-01-15T12:00:00.000Z';
