import { countSamples, loadRunData } from '../loader/index.js';
import { metadataText } from '../loader/metadata.js';
import { computePercentiles } from '../stats/percentiles.js';
import { computeThroughput } from '../stats/throughput.js';
import { estimateWriteAmplification } from '../stats/waf.js';
import {
  PHASES,
  type MetadataValue,
  type PercentileStats,
  type Phase,
  type RunData,
  type RunSummary,
} from '../types/run.js';
import { silentLogger, type Logger } from '../util/logger.js';

export interface SummarizeOptions {
  logger?: Logger;
}

const ZERO_DURATION: MetadataValue = { kind: 'int', value: 0 };

export function summarizeRunData(
  directory: string,
  data: RunData,
  options: SummarizeOptions = {}
): RunSummary {
  const logger = options.logger ?? silentLogger;
  const latencies: Partial<Record<Phase, PercentileStats>> = {};

  for (const phase of PHASES) {
    const samples = data.samples[phase];
    logger.debug(`${directory}: ${phase} samples=${samples.length}`);
    if (samples.length > 0) {
      latencies[phase] = computePercentiles(samples);
    }
  }

  return {
    directory,
    testName: metadataText(data.metadata, 'test_name'),
    duration: data.metadata.get('test_duration') ?? ZERO_DURATION,
    throughput: computeThroughput(data.metadata),
    waf: estimateWriteAmplification(data.metadata),
    latencies,
    samples: data.samples,
    metadata: data.metadata,
  };
}

/**
 * Loads a run directory and derives its statistics.
 */
export function summarizeRun(
  directory: string,
  options: SummarizeOptions = {}
): RunSummary {
  const logger = options.logger ?? silentLogger;
  logger.debug(`loading run data from ${directory}`);
  const data = loadRunData(directory);
  logger.debug(`${directory}: ${countSamples(data.samples)} samples across ${PHASES.length} phases`);
  return summarizeRunData(directory, data, options);
}
