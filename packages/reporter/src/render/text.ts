import type { ComparisonReport } from '../model/comparison.js';
import { formatFixed, formatImprovement, rule } from './format.js';

const COLUMN_WIDTH = 15;

export const WAF_ESTIMATE_NOTE =
  'Note: WAF is a heuristic estimate from the overwrite ratio, not a measured value.';

function column(value: string): string {
  return value.padEnd(COLUMN_WIDTH);
}

function heading(lines: string[], title: string): void {
  lines.push(title, rule('-'));
}

/**
 * Fixed-width plain text report (analysis_report.txt). Layout and number
 * formatting are stable so that reports from different runs diff cleanly.
 */
export function renderTextReport(report: ComparisonReport): string {
  const { labels, runs } = report;
  const lines: string[] = [];

  lines.push(rule('='), report.title, rule('='), '');

  heading(lines, 'TEST CONFIGURATIONS');
  lines.push(
    `Test 1 (${labels.baseline}):  Duration=${runs.baseline.duration}s, WAF=${formatFixed(runs.baseline.waf, 2)}x`,
    `Test 2 (${labels.treatment}): Duration=${runs.treatment.duration}s, WAF=${formatFixed(runs.treatment.waf, 2)}x`,
    ''
  );

  heading(lines, 'VICTIM READ LATENCIES (Primary QoS Metric)');
  if (report.victimRead) {
    lines.push(
      [
        column('Metric'),
        column(`${labels.baseline} (μs)`),
        column(`${labels.treatment} (μs)`),
        column('Improvement'),
      ].join(' ')
    );
    lines.push(rule('-'));
    for (const row of report.victimRead.rows) {
      lines.push(
        [
          column(row.metric.toUpperCase()),
          column(formatFixed(row.baseline)),
          column(formatFixed(row.treatment)),
          formatImprovement(row.improvementPct),
        ].join(' ')
      );
    }
    lines.push('');
  }

  heading(lines, 'THROUGHPUT');
  if (report.throughput) {
    lines.push(
      `Overwrite Phase IOPS (${labels.baseline}):  ${formatFixed(report.throughput.baseline)}`,
      `Overwrite Phase IOPS (${labels.treatment}): ${formatFixed(report.throughput.treatment)}`,
      ''
    );
  }

  heading(lines, 'WRITE AMPLIFICATION FACTOR (WAF)');
  lines.push(
    `WAF (${labels.baseline}):  ${formatFixed(report.waf.baseline, 2)}x`,
    `WAF (${labels.treatment}): ${formatFixed(report.waf.treatment, 2)}x`,
    `Reduction: ${formatFixed(report.waf.reductionPct)}%`,
    WAF_ESTIMATE_NOTE,
    ''
  );

  heading(lines, 'KEY FINDINGS');
  if (report.findings) {
    if (report.findings.p99ImprovementPct !== undefined) {
      lines.push(
        `✓ P99 latency improved by ${formatFixed(report.findings.p99ImprovementPct)}%`
      );
    }
    for (const finding of report.findings.narrative) {
      lines.push(`✓ ${finding}`);
    }
  }

  lines.push('', rule('='));
  return `${lines.join('\n')}\n`;
}
