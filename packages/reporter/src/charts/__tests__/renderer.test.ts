import { describe, expect, it } from 'vitest';

import { BASELINE_READS, TREATMENT_READS } from '../../__tests__/fixtures.js';
import { MAX_CDF_POINTS, cdfPoints, createChartRenderer } from '../renderer.js';
import { formatTick, linearScale, niceTicks } from '../scale.js';
import { escapeXml } from '../svg.js';

const LABELS = { baseline: 'NO FDP', treatment: 'WITH FDP' };

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('chart helpers', () => {
  it('escapes XML special characters', () => {
    expect(escapeXml(`<a & "b">`)).toBe('&lt;a &amp; &quot;b&quot;&gt;');
  });

  it('maps values linearly', () => {
    const scale = linearScale([0, 10], [100, 0]);
    expect(scale(0)).toBe(100);
    expect(scale(5)).toBe(50);
    expect(linearScale([3, 3], [7, 9])(42)).toBe(7);
  });

  it('picks round tick steps', () => {
    expect(niceTicks(1000)).toEqual([0, 200, 400, 600, 800, 1000]);
    expect(niceTicks(0)).toEqual([0, 0.2, 0.4, 0.6, 0.8, 1]);
    expect(formatTick(0.6)).toBe('0.6');
    expect(formatTick(400)).toBe('400');
  });

  it('builds empirical CDF points', () => {
    expect(cdfPoints([1, 2, 3, 4])).toEqual([
      [1, 0.25],
      [2, 0.5],
      [3, 0.75],
      [4, 1],
    ]);
  });

  it('thins large sample sets but keeps both ends', () => {
    const sorted = Array.from({ length: 5000 }, (_, i) => i + 1);
    const points = cdfPoints(sorted);

    expect(points).toHaveLength(MAX_CDF_POINTS);
    expect(points[0]).toEqual([1, 1 / 5000]);
    expect(points[points.length - 1]).toEqual([5000, 1]);
  });
});

describe('createChartRenderer', () => {
  it('binds the theme once', () => {
    const renderer = createChartRenderer({ width: 640 });

    expect(renderer.theme.width).toBe(640);
    expect(renderer.theme.fontFamily).toBe('serif');
    expect(renderer.renderWaf(2, 1.5, LABELS)).toContain(
      'width="640" height="600" viewBox="0 0 640 600"'
    );
  });

  it('draws one CDF line per non-empty run', () => {
    const renderer = createChartRenderer();
    const both = renderer.renderCdf([30, 10, 20], [5, 15], LABELS);
    const single = renderer.renderCdf([30, 10, 20], [], LABELS);

    expect(both.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg')).toBe(true);
    expect(count(both, '<polyline')).toBe(2);
    expect(count(single, '<polyline')).toBe(1);
    expect(both).toContain('>P99.9</text>');
    expect(both).toContain('>Latency (μs)</text>');
  });

  it('escapes run labels', () => {
    const svg = createChartRenderer().renderCdf([1], [2], {
      baseline: 'A & B',
      treatment: '<fdp>',
    });

    expect(svg).toContain('>A &amp; B</text>');
    expect(svg).toContain('>&lt;fdp&gt;</text>');
  });

  it('labels tail latency bars with values and improvements', () => {
    const svg = createChartRenderer().renderTailLatency(
      BASELINE_READS,
      TREATMENT_READS,
      LABELS
    );

    expect(svg).toContain('<title>Tail Latency Comparison (Victim Reads)</title>');
    expect(count(svg, '>+50.0%</text>')).toBe(4);
    expect(svg).toContain('>240</text>');
    expect(svg).toContain('>P99.9</text>');
  });

  it('skips improvement labels where a value is 0', () => {
    const svg = createChartRenderer().renderTailLatency(
      BASELINE_READS,
      { ...TREATMENT_READS, p95: 0 },
      LABELS
    );

    expect(count(svg, '>+50.0%</text>')).toBe(3);
  });

  it('shows WAF values and the reduction', () => {
    const svg = createChartRenderer().renderWaf(3.5, 2, LABELS);

    expect(svg).toContain('>3.50x</text>');
    expect(svg).toContain('>2.00x</text>');
    expect(svg).toContain('>Reduction: 42.9%</text>');
    expect(svg).toContain('fill="green"');
  });

  it('shows overwrite throughput bars', () => {
    const svg = createChartRenderer().renderThroughput(100, 50.7, LABELS);

    expect(svg).toContain('>100</text>');
    expect(svg).toContain('>50</text>');
    expect(svg).toContain('>Overwrite Phase</text>');
  });
});
