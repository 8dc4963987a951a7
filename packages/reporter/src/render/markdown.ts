import type {
  ComparisonReport,
  PhaseDigest,
  RunConfiguration,
} from '../model/comparison.js';
import { formatFixed, formatImprovement } from './format.js';

function cell(value: string | number): string {
  return String(value).replace(/\|/g, '\\|');
}

function renderDigest(digest: PhaseDigest): string {
  if (digest.count === 0) {
    return '—';
  }
  return `${digest.count} / ${formatFixed(digest.p50)} / ${formatFixed(digest.p99)}`;
}

function renderMetadata(run: RunConfiguration): string[] {
  const entries = Object.entries(run.metadata);
  const lines = [`### ${run.label}`, ''];
  if (entries.length === 0) {
    lines.push('No metadata recorded.');
    return lines;
  }
  lines.push('| Key | Value |', '|---|---|');
  entries.forEach(([key, value]) => {
    lines.push(`| ${cell(key)} | ${cell(value)} |`);
  });
  return lines;
}

export function renderMarkdownReport(report: ComparisonReport): string {
  const { labels, runs } = report;
  const lines: string[] = [];

  lines.push(`# ${report.title}`, '');
  lines.push(`- Generated: ${report.generatedAt}`);
  lines.push(`- Baseline: ${labels.baseline} (\`${runs.baseline.directory}\`)`);
  lines.push(
    `- Treatment: ${labels.treatment} (\`${runs.treatment.directory}\`)`
  );

  lines.push(
    '',
    '## Test configurations',
    '',
    '| Run | Test name | Duration (s) | WAF (est.) |',
    '|---|---|---|---|'
  );
  [runs.baseline, runs.treatment].forEach((run) => {
    lines.push(
      `| ${cell(run.label)} | ${cell(run.testName)} | ${cell(run.duration)} | ${formatFixed(run.waf, 2)}x |`
    );
  });

  lines.push('', '## Victim read latencies', '');
  if (report.victimRead) {
    lines.push(
      `| Metric | ${cell(labels.baseline)} (μs) | ${cell(labels.treatment)} (μs) | Improvement |`,
      '|---|---:|---:|---:|'
    );
    report.victimRead.rows.forEach((row) => {
      lines.push(
        `| ${row.metric.toUpperCase()} | ${formatFixed(row.baseline)} | ${formatFixed(row.treatment)} | ${formatImprovement(row.improvementPct)} |`
      );
    });
    lines.push(
      '',
      `Samples: ${report.victimRead.baselineCount} (${labels.baseline}), ${report.victimRead.treatmentCount} (${labels.treatment})`
    );
  } else {
    lines.push('Victim read samples missing from at least one run.');
  }

  lines.push('', '## Throughput', '');
  if (report.throughput) {
    const change = formatImprovement(report.throughput.changePct);
    lines.push(
      `- Overwrite phase IOPS (${labels.baseline}): ${formatFixed(report.throughput.baseline)}`,
      `- Overwrite phase IOPS (${labels.treatment}): ${formatFixed(report.throughput.treatment)}`,
      `- Change: ${change}`
    );
  } else {
    lines.push('Overwrite IOPS unavailable for at least one run.');
  }

  lines.push('', '## Write amplification factor (estimated)', '');
  lines.push(
    `- WAF (${labels.baseline}): ${formatFixed(report.waf.baseline, 2)}x`,
    `- WAF (${labels.treatment}): ${formatFixed(report.waf.treatment, 2)}x`,
    `- Reduction: ${formatFixed(report.waf.reductionPct)}%`,
    '',
    '> WAF is a heuristic estimate derived from the overwrite count per host write, not a measured value.'
  );

  lines.push(
    '',
    '## Phase overview',
    '',
    `Each cell shows samples / P50 / P99 in μs.`,
    '',
    `| Phase | ${cell(labels.baseline)} | ${cell(labels.treatment)} |`,
    '|---|---|---|'
  );
  report.phases.forEach((row) => {
    lines.push(
      `| ${row.phase} | ${renderDigest(row.baseline)} | ${renderDigest(row.treatment)} |`
    );
  });

  lines.push('', '## Key findings', '');
  if (report.findings) {
    if (report.findings.p99ImprovementPct !== undefined) {
      lines.push(
        `- P99 latency improved by ${formatFixed(report.findings.p99ImprovementPct)}%`
      );
    }
    report.findings.narrative.forEach((finding) => {
      lines.push(`- ${finding}`);
    });
  } else {
    lines.push('No findings: victim read samples missing.');
  }

  lines.push('', '## Metadata', '');
  lines.push(...renderMetadata(runs.baseline), '');
  lines.push(...renderMetadata(runs.treatment));

  return `${lines.join('\n')}\n`;
}
