import { describe, expect, it } from 'vitest';

import {
  BASELINE_METADATA,
  GENERATED_AT,
  TREATMENT_METADATA,
  comparisonPair,
  makeStats,
  makeSummary,
  withVictimReads,
} from '../../__tests__/fixtures.js';
import {
  DEFAULT_LABELS,
  KEY_FINDING_NARRATIVE,
  buildComparison,
  improvementPct,
} from '../comparison-builder.js';

describe('improvementPct', () => {
  it('is the relative reduction from baseline', () => {
    expect(improvementPct(200, 100)).toBe(50);
    expect(improvementPct(100, 150)).toBe(-50);
    expect(improvementPct(100, 100)).toBe(0);
  });

  it('is undefined when the baseline is not positive', () => {
    expect(improvementPct(0, 5)).toBeUndefined();
    expect(improvementPct(-1, 5)).toBeUndefined();
    expect(improvementPct(Number.NaN, 5)).toBeUndefined();
  });
});

describe('buildComparison', () => {
  it('fills every section when both runs are complete', () => {
    const { baseline, treatment } = comparisonPair();
    const report = buildComparison(baseline, treatment, {
      generatedAt: GENERATED_AT,
    });

    expect(report.schemaVersion).toBe('comparison-report/v1');
    expect(report.generatedAt).toBe(GENERATED_AT);
    expect(report.labels).toEqual(DEFAULT_LABELS);
    expect(report.runs.baseline).toMatchObject({
      label: 'NO FDP',
      testName: 'no_fdp',
      directory: 'runs/no_fdp',
      duration: '60',
      waf: 3.5,
    });
    expect(report.runs.treatment).toMatchObject({
      label: 'WITH FDP',
      testName: 'fdp',
      duration: '60.0',
      waf: 2,
    });
    expect(report.runs.treatment.metadata).toEqual({
      test_name: 'fdp',
      test_duration: 60,
      overwrites: 1000,
      overwrite_duration: 20,
      warmup_ops: 1500,
    });

    expect(report.victimRead?.rows.map((row) => row.metric)).toEqual([
      'mean',
      'median',
      'p50',
      'p95',
      'p99',
      'p99.9',
    ]);
    expect(report.victimRead?.rows.find((row) => row.metric === 'p99')).toEqual({
      metric: 'p99',
      baseline: 200,
      treatment: 100,
      improvementPct: 50,
    });
    expect(report.findings).toEqual({
      p99ImprovementPct: 50,
      narrative: [...KEY_FINDING_NARRATIVE],
    });
    expect(report.throughput).toEqual({
      metric: 'overwrite_iops',
      baseline: 100,
      treatment: 50,
      changePct: -50,
    });
    expect(report.waf.estimated).toBe(true);
    expect(report.waf.reductionPct).toBeCloseTo(42.857, 3);
  });

  it('drops the P99 row and finding when the baseline P99 is 0', () => {
    const { baseline, treatment } = comparisonPair();
    const report = buildComparison(
      withVictimReads(baseline, makeStats({ mean: 10, p99: 0 })),
      treatment
    );

    expect(report.victimRead?.rows.map((row) => row.metric)).toEqual(['mean']);
    expect(report.findings).toEqual({ narrative: [...KEY_FINDING_NARRATIVE] });
  });

  it('omits victim read sections when either run lacks victim reads', () => {
    const { baseline } = comparisonPair();
    const report = buildComparison(
      baseline,
      makeSummary('runs/fdp', TREATMENT_METADATA)
    );

    expect(report.victimRead).toBeUndefined();
    expect(report.findings).toBeUndefined();
  });

  it('omits throughput unless both runs report overwrite IOPS', () => {
    const report = buildComparison(
      makeSummary('a', BASELINE_METADATA),
      makeSummary('b', 'overwrites=1000')
    );

    expect(report.throughput).toBeUndefined();
  });

  it('leaves changePct out when baseline throughput is 0', () => {
    const report = buildComparison(
      makeSummary('a', 'overwrite_duration=10'),
      makeSummary('b', 'overwrites=50\noverwrite_duration=10')
    );

    expect(report.throughput).toEqual({
      metric: 'overwrite_iops',
      baseline: 0,
      treatment: 5,
    });
  });

  it('merges partial labels with the defaults', () => {
    const { baseline, treatment } = comparisonPair();
    const report = buildComparison(baseline, treatment, {
      labels: { treatment: 'FDP on' },
      title: 'Custom title',
    });

    expect(report.labels).toEqual({ baseline: 'NO FDP', treatment: 'FDP on' });
    expect(report.runs.treatment.label).toBe('FDP on');
    expect(report.title).toBe('Custom title');
  });

  it('summarizes every phase, zero-filled when a run has no samples', () => {
    const report = buildComparison(
      makeSummary('a', '', { warmup: [10, 20, 30] }),
      makeSummary('b', '')
    );

    expect(report.phases.map((row) => row.phase)).toEqual([
      'warmup',
      'victim_write',
      'noisy_write',
      'overwrite',
      'victim_read',
    ]);
    const warmup = report.phases[0];
    expect(warmup?.baseline.count).toBe(3);
    expect(warmup?.baseline.p50).toBe(20);
    expect(warmup?.baseline.p99).toBeCloseTo(29.8, 10);
    expect(warmup?.treatment).toEqual({ count: 0, p50: 0, p99: 0 });
  });
});
