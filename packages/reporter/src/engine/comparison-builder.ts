import {
  EMPTY_PERCENTILES,
  PHASES,
  formatMetadataValue,
  metadataToRecord,
  type PercentileStats,
  type RunSummary,
} from '@qoslens/core';

import {
  COMPARISON_SCHEMA_VERSION,
  LATENCY_TABLE_METRICS,
  type ComparisonReport,
  type KeyFindings,
  type LatencyComparisonRow,
  type PhaseDigest,
  type PhaseOverviewRow,
  type RunConfiguration,
  type RunLabels,
  type ThroughputComparison,
  type WafComparison,
} from '../model/comparison.js';

export const DEFAULT_LABELS: Readonly<RunLabels> = Object.freeze({
  baseline: 'NO FDP',
  treatment: 'WITH FDP',
});

export const DEFAULT_REPORT_TITLE = 'FDP QoS ANALYSIS REPORT';

export const KEY_FINDING_NARRATIVE: readonly string[] = [
  'FDP isolation reduces tail latency significantly',
  'Victim workload protected from noisy neighbor GC',
];

export interface BuildComparisonOptions {
  labels?: Partial<RunLabels>;
  title?: string;
  /** ISO timestamp; defaults to the current time. */
  generatedAt?: string;
}

/**
 * Relative reduction from baseline to treatment in percent. Positive means
 * the treatment is lower (better for latency and WAF). Undefined when the
 * baseline is not positive.
 */
export function improvementPct(
  baseline: number,
  treatment: number
): number | undefined {
  if (!(baseline > 0)) {
    return undefined;
  }
  return ((baseline - treatment) / baseline) * 100;
}

function describeRun(summary: RunSummary, label: string): RunConfiguration {
  return {
    label,
    testName: summary.testName,
    directory: summary.directory,
    duration: formatMetadataValue(summary.duration),
    waf: summary.waf,
    metadata: metadataToRecord(summary.metadata),
  };
}

function compareLatencies(
  baseline: PercentileStats,
  treatment: PercentileStats
): LatencyComparisonRow[] {
  const rows: LatencyComparisonRow[] = [];
  for (const metric of LATENCY_TABLE_METRICS) {
    const pct = improvementPct(baseline[metric], treatment[metric]);
    if (pct === undefined) {
      continue;
    }
    rows.push({
      metric,
      baseline: baseline[metric],
      treatment: treatment[metric],
      improvementPct: pct,
    });
  }
  return rows;
}

function compareThroughput(
  baseline: RunSummary,
  treatment: RunSummary
): ThroughputComparison | undefined {
  const before = baseline.throughput.overwrite_iops;
  const after = treatment.throughput.overwrite_iops;
  if (before === undefined || after === undefined) {
    return undefined;
  }
  const comparison: ThroughputComparison = {
    metric: 'overwrite_iops',
    baseline: before,
    treatment: after,
  };
  if (before > 0) {
    comparison.changePct = ((after - before) / before) * 100;
  }
  return comparison;
}

function compareWaf(baseline: RunSummary, treatment: RunSummary): WafComparison {
  return {
    baseline: baseline.waf,
    treatment: treatment.waf,
    reductionPct: improvementPct(baseline.waf, treatment.waf) ?? 0,
    estimated: true,
  };
}

function digest(stats: PercentileStats | undefined): PhaseDigest {
  const source = stats ?? EMPTY_PERCENTILES;
  return { count: source.count, p50: source.p50, p99: source.p99 };
}

function overviewPhases(
  baseline: RunSummary,
  treatment: RunSummary
): PhaseOverviewRow[] {
  return PHASES.map((phase) => ({
    phase,
    baseline: digest(baseline.latencies[phase]),
    treatment: digest(treatment.latencies[phase]),
  }));
}

/**
 * Pairs two run summaries into a single comparison document. Sections whose
 * data is missing from either run are left out rather than zero-filled.
 */
export function buildComparison(
  baseline: RunSummary,
  treatment: RunSummary,
  options: BuildComparisonOptions = {}
): ComparisonReport {
  const labels: RunLabels = {
    baseline: options.labels?.baseline ?? DEFAULT_LABELS.baseline,
    treatment: options.labels?.treatment ?? DEFAULT_LABELS.treatment,
  };

  const report: ComparisonReport = {
    schemaVersion: COMPARISON_SCHEMA_VERSION,
    generatedAt: options.generatedAt ?? new Date().toISOString(),
    title: options.title ?? DEFAULT_REPORT_TITLE,
    labels,
    runs: {
      baseline: describeRun(baseline, labels.baseline),
      treatment: describeRun(treatment, labels.treatment),
    },
    waf: compareWaf(baseline, treatment),
    phases: overviewPhases(baseline, treatment),
  };

  const baselineReads = baseline.latencies.victim_read;
  const treatmentReads = treatment.latencies.victim_read;
  if (baselineReads && treatmentReads) {
    report.victimRead = {
      baselineCount: baselineReads.count,
      treatmentCount: treatmentReads.count,
      rows: compareLatencies(baselineReads, treatmentReads),
    };
    const findings: KeyFindings = { narrative: [...KEY_FINDING_NARRATIVE] };
    const p99 = improvementPct(baselineReads.p99, treatmentReads.p99);
    if (p99 !== undefined) {
      findings.p99ImprovementPct = p99;
    }
    report.findings = findings;
  }

  const throughput = compareThroughput(baseline, treatment);
  if (throughput) {
    report.throughput = throughput;
  }

  return report;
}
