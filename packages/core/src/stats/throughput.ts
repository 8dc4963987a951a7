import { metadataNumber } from '../loader/metadata.js';
import type { RunMetadata, ThroughputStats } from '../types/run.js';

/**
 * Operations per second for the warmup and overwrite phases. A phase
 * without a positive duration contributes no key at all.
 */
export function computeThroughput(metadata: RunMetadata): ThroughputStats {
  const throughput: ThroughputStats = {};

  const warmupDuration = metadataNumber(metadata, 'warmup_duration');
  if (warmupDuration > 0) {
    throughput.warmup_iops =
      metadataNumber(metadata, 'warmup_ops') / warmupDuration;
  }

  const overwriteDuration = metadataNumber(metadata, 'overwrite_duration');
  if (overwriteDuration > 0) {
    const totalOps =
      metadataNumber(metadata, 'overwrites') +
      metadataNumber(metadata, 'victim_reads');
    throughput.overwrite_iops = totalOps / overwriteDuration;
  }

  return throughput;
}
