/**
 * Data model for a single test run: raw inputs (metadata, latency samples)
 * and the statistics derived from them. Every value is built once and never
 * mutated afterwards.
 */

/** Phases of a run, in the order they execute. */
export const PHASES = [
  'warmup',
  'victim_write',
  'noisy_write',
  'overwrite',
  'victim_read',
] as const;

export type Phase = (typeof PHASES)[number];

/**
 * Metadata value after coercion. The tag records which parse succeeded so
 * that `5` and `5.0` stay distinguishable when echoed back in reports.
 */
export type MetadataValue =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string };

export type RunMetadata = ReadonlyMap<string, MetadataValue>;

/** Latency samples per phase, in microseconds. Absent phases are empty. */
export type SampleSet = Readonly<Record<Phase, readonly number[]>>;

export interface RunData {
  metadata: RunMetadata;
  samples: SampleSet;
}

/**
 * Distribution of one phase. When `count` is 0 every other field is 0;
 * check `count` before treating the values as measurements.
 */
export interface PercentileStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p50: number;
  p95: number;
  p99: number;
  'p99.9': number;
  'p99.99': number;
}

export type PercentileMetric = Exclude<keyof PercentileStats, 'count'>;

/** Keys are present only when the matching duration is positive. */
export interface ThroughputStats {
  warmup_iops?: number;
  overwrite_iops?: number;
}

export interface RunSummary {
  directory: string;
  testName: string;
  duration: MetadataValue;
  throughput: ThroughputStats;
  /** Heuristic estimate in [1.0, 5.0]; see estimateWriteAmplification. */
  waf: number;
  /** Only phases with at least one sample. */
  latencies: Partial<Record<Phase, PercentileStats>>;
  samples: SampleSet;
  metadata: RunMetadata;
}
