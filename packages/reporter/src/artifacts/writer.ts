import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { silentLogger, type Logger, type RunSummary } from '@qoslens/core';

import {
  CHART_FILES,
  createChartRenderer,
  type ChartRenderer,
} from '../charts/renderer.js';
import type { ChartTheme } from '../charts/theme.js';
import { buildComparison } from '../engine/comparison-builder.js';
import type { ComparisonReport, RunLabels } from '../model/comparison.js';
import { renderJsonReport } from '../render/json.js';
import { renderMarkdownReport } from '../render/markdown.js';
import { renderTextReport } from '../render/text.js';

export const REPORT_FORMATS = ['text', 'markdown', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const REPORT_FILES: Readonly<Record<ReportFormat, string>> = {
  text: 'analysis_report.txt',
  markdown: 'analysis_report.md',
  json: 'analysis_report.json',
};

export interface WriteArtifactsOptions {
  baseline: RunSummary;
  treatment: RunSummary;
  outDir: string;
  /** `text` is written whether or not it is listed. */
  formats?: readonly ReportFormat[];
  charts?: boolean;
  chartTheme?: Partial<ChartTheme>;
  labels?: Partial<RunLabels>;
  generatedAt?: string;
  logger?: Logger;
}

export interface WrittenArtifact {
  kind: ReportFormat | 'chart';
  path: string;
}

export interface ArtifactResult {
  report: ComparisonReport;
  written: WrittenArtifact[];
}

function writeCharts(
  renderer: ChartRenderer,
  baseline: RunSummary,
  treatment: RunSummary,
  report: ComparisonReport,
  outDir: string,
  logger: Logger
): string[] {
  const labels = report.labels;
  const written: string[] = [];
  const baselineReads = baseline.latencies.victim_read;
  const treatmentReads = treatment.latencies.victim_read;

  if (baselineReads && treatmentReads) {
    written.push(
      renderer.write(
        path.join(outDir, CHART_FILES.cdf),
        renderer.renderCdf(baseline.samples.victim_read, treatment.samples.victim_read, labels)
      ),
      renderer.write(
        path.join(outDir, CHART_FILES.tailLatency),
        renderer.renderTailLatency(baselineReads, treatmentReads, labels)
      )
    );
  } else {
    logger.warn('victim read samples missing; skipping CDF and tail latency charts');
  }

  written.push(
    renderer.write(
      path.join(outDir, CHART_FILES.waf),
      renderer.renderWaf(report.waf.baseline, report.waf.treatment, labels)
    )
  );

  if (report.throughput) {
    written.push(
      renderer.write(
        path.join(outDir, CHART_FILES.throughput),
        renderer.renderThroughput(report.throughput.baseline, report.throughput.treatment, labels)
      )
    );
  } else {
    logger.warn('No throughput data available; skipping throughput chart');
  }

  return written;
}

/**
 * Builds the comparison and writes every requested artifact into `outDir`.
 * Reports are rendered before anything is written, so a JSON validation
 * failure leaves the directory untouched.
 */
export function writeAnalysisArtifacts(options: WriteArtifactsOptions): ArtifactResult {
  const logger = options.logger ?? silentLogger;
  const formats = new Set<ReportFormat>(['text', ...(options.formats ?? [])]);
  const report = buildComparison(options.baseline, options.treatment, {
    labels: options.labels,
    generatedAt: options.generatedAt,
  });

  const rendered: Array<[ReportFormat, string]> = [];
  for (const format of REPORT_FORMATS) {
    if (!formats.has(format)) continue;
    switch (format) {
      case 'text':
        rendered.push([format, renderTextReport(report)]);
        break;
      case 'markdown':
        rendered.push([format, renderMarkdownReport(report)]);
        break;
      case 'json':
        rendered.push([format, renderJsonReport(report)]);
        break;
    }
  }

  mkdirSync(options.outDir, { recursive: true });
  const written: WrittenArtifact[] = [];

  if (options.charts ?? true) {
    const renderer = createChartRenderer(options.chartTheme);
    for (const chartPath of writeCharts(
      renderer,
      options.baseline,
      options.treatment,
      report,
      options.outDir,
      logger
    )) {
      logger.debug(`wrote ${chartPath}`);
      written.push({ kind: 'chart', path: chartPath });
    }
  }

  for (const [format, content] of rendered) {
    const filePath = path.join(options.outDir, REPORT_FILES[format]);
    writeFileSync(filePath, content, 'utf8');
    logger.debug(`wrote ${filePath}`);
    written.push({ kind: format, path: filePath });
  }

  return { report, written };
}
