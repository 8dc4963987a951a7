import { existsSync } from 'node:fs';
import path from 'node:path';

import type { MetadataValue, RunMetadata } from '../types/run.js';
import { readRunFile } from './read.js';

export const METADATA_FILE = 'metadata.txt';

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Float when the raw value has a decimal point, integer otherwise, and the
 * untouched string when neither parse succeeds. Never throws.
 */
export function coerceMetadataValue(raw: string): MetadataValue {
  const candidate = raw.trim();
  if (candidate.includes('.')) {
    if (FLOAT_RE.test(candidate)) {
      return { kind: 'float', value: Number.parseFloat(candidate) };
    }
    return { kind: 'string', value: raw };
  }
  if (INT_RE.test(candidate)) {
    return { kind: 'int', value: Number.parseInt(candidate, 10) };
  }
  return { kind: 'string', value: raw };
}

export function parseMetadata(text: string): RunMetadata {
  const metadata = new Map<string, MetadataValue>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const separator = line.indexOf('=');
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator);
    const value = line.slice(separator + 1);
    metadata.set(key, coerceMetadataValue(value));
  }
  return metadata;
}

export function loadMetadata(directory: string): RunMetadata {
  const filePath = path.join(directory, METADATA_FILE);
  if (!existsSync(filePath)) {
    return new Map();
  }
  return parseMetadata(readRunFile(filePath));
}

/**
 * Numeric view of a metadata entry. Absent keys and string values both
 * fall back to `fallback`.
 */
export function metadataNumber(
  metadata: RunMetadata,
  key: string,
  fallback = 0
): number {
  const entry = metadata.get(key);
  if (!entry || entry.kind === 'string') {
    return fallback;
  }
  return entry.value;
}

export function metadataText(
  metadata: RunMetadata,
  key: string,
  fallback = 'Unknown'
): string {
  const entry = metadata.get(key);
  return entry ? formatMetadataValue(entry) : fallback;
}

/** Floats always keep a decimal point: `5.0` stays `5.0`, not `5`. */
export function formatMetadataValue(entry: MetadataValue): string {
  switch (entry.kind) {
    case 'string':
      return entry.value;
    case 'int':
      return String(entry.value);
    case 'float':
      return Number.isInteger(entry.value)
        ? entry.value.toFixed(1)
        : String(entry.value);
  }
}

export function metadataToRecord(
  metadata: RunMetadata
): Record<string, number | string> {
  const record: Record<string, number | string> = {};
  for (const [key, entry] of metadata) {
    record[key] = entry.value;
  }
  return record;
}
