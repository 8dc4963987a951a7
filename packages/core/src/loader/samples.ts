import { existsSync } from 'node:fs';
import path from 'node:path';

import { SampleParseError } from '../types/errors.js';
import { PHASES, type Phase, type SampleSet } from '../types/run.js';
import { readRunFile } from './read.js';

export const SAMPLE_FILES: Readonly<Record<Phase, string>> = {
  warmup: 'warmup_latencies.txt',
  victim_write: 'victim_write_latencies.txt',
  noisy_write: 'noisy_write_latencies.txt',
  overwrite: 'overwrite_latencies.txt',
  victim_read: 'victim_read_latencies.txt',
};

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses whitespace separated latency values. Anything after `#` on a line
 * is a comment. The first token that is not a number aborts the parse.
 */
export function parseSamples(text: string, source: string): number[] {
  const values: number[] = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const commentStart = rawLine.indexOf('#');
    const line = commentStart >= 0 ? rawLine.slice(0, commentStart) : rawLine;
    for (const token of line.split(/\s+/)) {
      if (!token) continue;
      if (!NUMBER_RE.test(token)) {
        throw new SampleParseError({
          message: `Non-numeric latency value "${token}" in ${source} at line ${index + 1}`,
          context: { path: source, line: index + 1, token },
        });
      }
      values.push(Number.parseFloat(token));
    }
  });
  return values;
}

export function loadPhaseSamples(directory: string, phase: Phase): number[] {
  const filePath = path.join(directory, SAMPLE_FILES[phase]);
  if (!existsSync(filePath)) {
    return [];
  }
  return parseSamples(readRunFile(filePath), filePath);
}

export function loadSamples(directory: string): SampleSet {
  return {
    warmup: loadPhaseSamples(directory, 'warmup'),
    victim_write: loadPhaseSamples(directory, 'victim_write'),
    noisy_write: loadPhaseSamples(directory, 'noisy_write'),
    overwrite: loadPhaseSamples(directory, 'overwrite'),
    victim_read: loadPhaseSamples(directory, 'victim_read'),
  };
}

export function countSamples(samples: SampleSet): number {
  return PHASES.reduce((total, phase) => total + samples[phase].length, 0);
}
