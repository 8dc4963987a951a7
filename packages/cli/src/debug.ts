import { metadataToRecord, type RunSummary } from '@qoslens/core';

/**
 * JSON-friendly view of a summary. Raw samples are reduced to counts.
 */
export function summaryForDebug(summary: RunSummary): Record<string, unknown> {
  return {
    directory: summary.directory,
    testName: summary.testName,
    duration: summary.duration.value,
    throughput: summary.throughput,
    waf: summary.waf,
    latencies: summary.latencies,
    metadata: metadataToRecord(summary.metadata),
  };
}

/**
 * Print a run summary to stderr. Used behind the --debug flag.
 */
export function printSummaryDebug(
  label: string,
  summary: RunSummary,
  write: (chunk: string) => void = (chunk) => void process.stderr.write(chunk)
): void {
  write(
    `[qoslens] summary(${label}): ${JSON.stringify(summaryForDebug(summary), null, 2)}\n`
  );
}
