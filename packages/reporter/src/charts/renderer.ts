import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import type { PercentileStats } from '@qoslens/core';

import type { RunLabels } from '../model/comparison.js';
import { formatImprovement } from '../render/format.js';
import { formatTick, linearScale, niceTicks, type Scale } from './scale.js';
import { line, polyline, rect, svgDocument, text } from './svg.js';
import { resolveChartTheme, type ChartTheme } from './theme.js';

export const CHART_FILES = {
  cdf: 'cdf_victim_read.svg',
  tailLatency: 'tail_latency_comparison.svg',
  waf: 'waf_comparison.svg',
  throughput: 'throughput_comparison.svg',
} as const;

export type ChartKind = keyof typeof CHART_FILES;

export const TAIL_METRICS = ['p50', 'p95', 'p99', 'p99.9'] as const;

const CDF_GUIDES = [
  { level: 0.95, label: 'P95' },
  { level: 0.99, label: 'P99' },
  { level: 0.999, label: 'P99.9' },
] as const;

/** Upper bound on plotted points per CDF series. */
export const MAX_CDF_POINTS = 2000;

const MARGIN = { top: 50, right: 30, bottom: 60, left: 80 } as const;

export interface ChartRenderer {
  readonly theme: Readonly<ChartTheme>;
  renderCdf(
    baseline: readonly number[],
    treatment: readonly number[],
    labels: RunLabels
  ): string;
  renderTailLatency(
    baseline: PercentileStats,
    treatment: PercentileStats,
    labels: RunLabels
  ): string;
  renderWaf(baseline: number, treatment: number, labels: RunLabels): string;
  renderThroughput(baseline: number, treatment: number, labels: RunLabels): string;
  /** Writes `svg` to `filePath`, creating parent directories. */
  write(filePath: string, svg: string): string;
}

interface Frame {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

function frameOf(theme: ChartTheme): Frame {
  return {
    left: MARGIN.left,
    right: theme.width - MARGIN.right,
    top: MARGIN.top,
    bottom: theme.height - MARGIN.bottom,
  };
}

/**
 * Empirical CDF points (value, (i + 1) / n) of ascending `sorted`, thinned
 * to at most MAX_CDF_POINTS while always keeping the last sample.
 */
export function cdfPoints(sorted: readonly number[]): Array<[number, number]> {
  const n = sorted.length;
  const take = Math.min(n, MAX_CDF_POINTS);
  const points: Array<[number, number]> = [];
  for (let i = 0; i < take; i += 1) {
    const index = take === 1 ? n - 1 : Math.round((i * (n - 1)) / (take - 1));
    const value = sorted[index];
    if (value !== undefined) {
      points.push([value, (index + 1) / n]);
    }
  }
  return points;
}

function chartTitle(theme: ChartTheme, title: string): string {
  return text(theme.width / 2, MARGIN.top / 2 + 6, title, {
    'text-anchor': 'middle',
    'font-size': theme.fontSize + 4,
    'font-weight': 'bold',
  });
}

function axisLabels(theme: ChartTheme, frame: Frame, xLabel: string, yLabel: string): string[] {
  const labelAttrs = { 'font-size': theme.fontSize + 2, 'font-weight': 'bold', 'text-anchor': 'middle' };
  const midY = (frame.top + frame.bottom) / 2;
  return [
    text((frame.left + frame.right) / 2, theme.height - 15, xLabel, labelAttrs),
    text(20, midY, yLabel, { ...labelAttrs, transform: `rotate(-90 20 ${midY})` }),
  ];
}

function yGrid(theme: ChartTheme, frame: Frame, ticks: readonly number[], y: Scale): string[] {
  return ticks.flatMap((tick) => [
    line(frame.left, y(tick), frame.right, y(tick), {
      stroke: theme.gridColor,
      'stroke-opacity': 0.3,
      'stroke-dasharray': '4 3',
    }),
    text(frame.left - 8, y(tick) + 4, formatTick(tick), { 'text-anchor': 'end' }),
  ]);
}

function axes(frame: Frame): string[] {
  return [
    line(frame.left, frame.bottom, frame.right, frame.bottom, { stroke: 'black' }),
    line(frame.left, frame.top, frame.left, frame.bottom, { stroke: 'black' }),
  ];
}

function legend(
  theme: ChartTheme,
  frame: Frame,
  entries: ReadonlyArray<{ label: string; color: string }>,
  corner: 'top-right' | 'bottom-right'
): string[] {
  const width = 170;
  const rowHeight = 18;
  const x = frame.right - width - 10;
  const y =
    corner === 'top-right'
      ? frame.top + 10
      : frame.bottom - entries.length * rowHeight - 20;
  const body = [
    rect(x, y, width, entries.length * rowHeight + 10, {
      fill: 'white',
      'fill-opacity': 0.8,
      stroke: theme.gridColor,
    }),
  ];
  entries.forEach((entry, i) => {
    const rowY = y + 14 + i * rowHeight;
    body.push(
      rect(x + 8, rowY - 9, 18, 10, { fill: entry.color, 'fill-opacity': theme.seriesOpacity }),
      text(x + 32, rowY, entry.label, { 'font-size': theme.fontSize + 1 })
    );
  });
  return body;
}

interface BarGroup {
  label: string;
  baseline: number;
  treatment: number;
  annotation?: { text: string; improved: boolean };
}

function groupedBars(
  theme: ChartTheme,
  title: string,
  yLabel: string,
  groups: readonly BarGroup[],
  labels: RunLabels,
  formatValue: (value: number) => string
): string {
  const frame = frameOf(theme);
  const peak = Math.max(0, ...groups.flatMap((g) => [g.baseline, g.treatment]));
  const ticks = niceTicks(peak * 1.2);
  const top = ticks[ticks.length - 1] ?? 1;
  const y = linearScale([0, top], [frame.bottom, frame.top]);
  const slot = (frame.right - frame.left) / Math.max(groups.length, 1);
  const barWidth = slot * 0.35;

  const body: string[] = [chartTitle(theme, title), ...yGrid(theme, frame, ticks, y)];
  groups.forEach((group, i) => {
    const center = frame.left + slot * (i + 0.5);
    const series = [
      { value: group.baseline, x: center - barWidth, color: theme.baselineColor },
      { value: group.treatment, x: center, color: theme.treatmentColor },
    ];
    for (const bar of series) {
      body.push(
        rect(bar.x, y(bar.value), barWidth, frame.bottom - y(bar.value), {
          fill: bar.color,
          'fill-opacity': theme.seriesOpacity,
        })
      );
      if (bar.value > 0) {
        body.push(
          text(bar.x + barWidth / 2, y(bar.value) - 4, formatValue(bar.value), {
            'text-anchor': 'middle',
            'font-size': theme.fontSize - 1,
          })
        );
      }
    }
    body.push(
      text(center, frame.bottom + 18, group.label, { 'text-anchor': 'middle' })
    );
    if (group.annotation) {
      body.push(
        text(center, y(Math.max(group.baseline, group.treatment) * 1.1) - 4, group.annotation.text, {
          'text-anchor': 'middle',
          'font-weight': 'bold',
          fill: group.annotation.improved ? theme.improvedColor : theme.regressedColor,
        })
      );
    }
  });
  body.push(
    ...axes(frame),
    ...axisLabels(theme, frame, '', yLabel),
    ...legend(
      theme,
      frame,
      [
        { label: labels.baseline, color: theme.baselineColor },
        { label: labels.treatment, color: theme.treatmentColor },
      ],
      'top-right'
    )
  );
  return svgDocument(theme.width, theme.height, title, body, {
    'font-family': theme.fontFamily,
    'font-size': theme.fontSize,
  });
}

function tailLabel(metric: string): string {
  return `P${metric.slice(1)}`;
}

function improvementAnnotation(
  baseline: number,
  treatment: number
): BarGroup['annotation'] {
  if (!(baseline > 0 && treatment > 0)) {
    return undefined;
  }
  const pct = ((baseline - treatment) / baseline) * 100;
  return { text: formatImprovement(pct), improved: pct > 0 };
}

/**
 * Binds a theme once and returns the chart functions that use it. Every
 * render function is pure; only `write` touches the file system.
 */
export function createChartRenderer(overrides: Partial<ChartTheme> = {}): ChartRenderer {
  const theme = Object.freeze(resolveChartTheme(overrides));

  return {
    theme,

    renderCdf(baseline, treatment, labels) {
      const title = 'Victim Read Latency CDF';
      const frame = frameOf(theme);
      const series = [
        { sorted: [...baseline].sort((a, b) => a - b), color: theme.baselineColor, label: labels.baseline },
        { sorted: [...treatment].sort((a, b) => a - b), color: theme.treatmentColor, label: labels.treatment },
      ];
      const peak = Math.max(0, ...series.map((s) => s.sorted[s.sorted.length - 1] ?? 0));
      const xTicks = niceTicks(peak);
      const x = linearScale([0, xTicks[xTicks.length - 1] ?? 1], [frame.left, frame.right]);
      const y = linearScale([0, 1], [frame.bottom, frame.top]);

      const body: string[] = [chartTitle(theme, title), ...yGrid(theme, frame, [0, 0.2, 0.4, 0.6, 0.8, 1], y)];
      for (const tick of xTicks) {
        body.push(
          line(x(tick), frame.top, x(tick), frame.bottom, {
            stroke: theme.gridColor,
            'stroke-opacity': 0.3,
            'stroke-dasharray': '4 3',
          }),
          text(x(tick), frame.bottom + 18, formatTick(tick), { 'text-anchor': 'middle' })
        );
      }
      for (const guide of CDF_GUIDES) {
        body.push(
          line(frame.left, y(guide.level), frame.right, y(guide.level), {
            stroke: theme.guideColor,
            'stroke-opacity': 0.5,
            'stroke-dasharray': '1 3',
          }),
          text(frame.left + 6, y(guide.level) - 4, guide.label, {
            fill: theme.guideColor,
            'font-size': theme.fontSize - 1,
          })
        );
      }
      for (const s of series) {
        if (s.sorted.length === 0) continue;
        body.push(
          polyline(
            cdfPoints(s.sorted).map(([value, level]) => [x(value), y(level)] as const),
            { stroke: s.color, 'stroke-width': 2, 'stroke-opacity': theme.seriesOpacity }
          )
        );
      }
      body.push(
        ...axes(frame),
        ...axisLabels(theme, frame, 'Latency (μs)', 'CDF'),
        ...legend(theme, frame, series, 'bottom-right')
      );
      return svgDocument(theme.width, theme.height, title, body, {
        'font-family': theme.fontFamily,
        'font-size': theme.fontSize,
      });
    },

    renderTailLatency(baseline, treatment, labels) {
      const groups: BarGroup[] = TAIL_METRICS.map((metric) => ({
        label: tailLabel(metric),
        baseline: baseline[metric],
        treatment: treatment[metric],
        annotation: improvementAnnotation(baseline[metric], treatment[metric]),
      }));
      return groupedBars(
        theme,
        'Tail Latency Comparison (Victim Reads)',
        'Latency (μs)',
        groups,
        labels,
        (value) => String(Math.trunc(value))
      );
    },

    renderWaf(baseline, treatment, labels) {
      const reduction = baseline > 0 ? ((baseline - treatment) / baseline) * 100 : undefined;
      const groups: BarGroup[] = [
        {
          label: 'Write Amplification (estimated)',
          baseline,
          treatment,
          annotation:
            reduction === undefined
              ? undefined
              : { text: `Reduction: ${reduction.toFixed(1)}%`, improved: reduction > 0 },
        },
      ];
      return groupedBars(
        theme,
        'Write Amplification Comparison',
        'Write Amplification Factor (WAF, estimated)',
        groups,
        labels,
        (value) => `${value.toFixed(2)}x`
      );
    },

    renderThroughput(baseline, treatment, labels) {
      return groupedBars(
        theme,
        'Throughput Comparison',
        'Throughput (IOPS)',
        [{ label: 'Overwrite Phase', baseline, treatment }],
        labels,
        (value) => String(Math.trunc(value))
      );
    },

    write(filePath, svg) {
      mkdirSync(path.dirname(filePath), { recursive: true });
      writeFileSync(filePath, svg, 'utf8');
      return filePath;
    },
  };
}
