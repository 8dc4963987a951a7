import { metadataNumber } from '../loader/metadata.js';
import type { RunMetadata } from '../types/run.js';

export const WAF_MIN = 1.0;
export const WAF_MAX = 5.0;
export const OVERWRITE_WAF_WEIGHT = 2.5;

/**
 * Estimated Write Amplification Factor.
 *
 * This is a heuristic proxy, not a measurement: real WAF needs flash-level
 * write accounting (host writes vs. media writes including GC), which the
 * run metadata does not carry. The overwrite share of host writes stands in
 * for GC pressure:
 *
 *   host_writes = warmup_ops + victim_writes + noisy_writes + overwrites
 *   waf         = min(1.0 + overwrites / host_writes * 2.5, 5.0)
 *
 * No host writes, or no overwrites, yields 1.0. Every report labels the
 * value as an estimate.
 */
export function estimateWriteAmplification(metadata: RunMetadata): number {
  const overwrites = metadataNumber(metadata, 'overwrites');
  const hostWrites =
    metadataNumber(metadata, 'warmup_ops') +
    metadataNumber(metadata, 'victim_writes') +
    metadataNumber(metadata, 'noisy_writes') +
    overwrites;

  if (hostWrites === 0) {
    return WAF_MIN;
  }
  if (overwrites > 0) {
    const overwriteRatio = overwrites / hostWrites;
    const estimate = WAF_MIN + overwriteRatio * OVERWRITE_WAF_WEIGHT;
    return Math.max(WAF_MIN, Math.min(estimate, WAF_MAX));
  }
  return WAF_MIN;
}
