/**
 * Data model for a baseline vs. treatment comparison. Built once from two
 * run summaries by `buildComparison`; every renderer (text, Markdown, JSON)
 * reads from this structure only.
 */
import type { Phase } from '@qoslens/core';

export const COMPARISON_SCHEMA_VERSION = 'comparison-report/v1';

/** Victim-read metrics shown in the latency table, in display order. */
export const LATENCY_TABLE_METRICS = [
  'mean',
  'median',
  'p50',
  'p95',
  'p99',
  'p99.9',
  'p99.99',
] as const;

export type LatencyTableMetric = (typeof LATENCY_TABLE_METRICS)[number];

export interface RunLabels {
  baseline: string;
  treatment: string;
}

export interface RunConfiguration {
  label: string;
  testName: string;
  directory: string;
  /** `test_duration` as written in metadata.txt (`0` when absent). */
  duration: string;
  /** Heuristic write-amplification estimate. */
  waf: number;
  /** Every metadata entry, coerced. */
  metadata: Record<string, number | string>;
}

export interface LatencyComparisonRow {
  metric: LatencyTableMetric;
  baseline: number;
  treatment: number;
  /** (baseline - treatment) / baseline * 100; rows with baseline 0 are dropped. */
  improvementPct: number;
}

export interface ThroughputComparison {
  metric: 'overwrite_iops';
  baseline: number;
  treatment: number;
  /** (treatment - baseline) / baseline * 100, absent when baseline is 0. */
  changePct?: number;
}

export interface WafComparison {
  baseline: number;
  treatment: number;
  reductionPct: number;
  estimated: true;
}

export interface KeyFindings {
  /** Absent when the baseline P99 is 0. */
  p99ImprovementPct?: number;
  narrative: string[];
}

export interface PhaseDigest {
  count: number;
  p50: number;
  p99: number;
}

export interface PhaseOverviewRow {
  phase: Phase;
  baseline: PhaseDigest;
  treatment: PhaseDigest;
}

export interface ComparisonReport {
  schemaVersion: typeof COMPARISON_SCHEMA_VERSION;
  generatedAt: string;
  title: string;
  labels: RunLabels;
  runs: {
    baseline: RunConfiguration;
    treatment: RunConfiguration;
  };
  /** Present only when both runs recorded victim reads. */
  victimRead?: {
    baselineCount: number;
    treatmentCount: number;
    rows: LatencyComparisonRow[];
  };
  /** Present only when both runs report overwrite IOPS. */
  throughput?: ThroughputComparison;
  waf: WafComparison;
  /** Present only when both runs recorded victim reads. */
  findings?: KeyFindings;
  phases: PhaseOverviewRow[];
}
