import { ConfigurationError } from '@qoslens/core';
import { REPORT_FORMATS, type ReportFormat } from '@qoslens/reporter';

/**
 * CLI options as commander hands them over. `charts` and `color` come from
 * the negatable `--no-charts` / `--no-color` flags.
 */
export type CliOptions = {
  outDir?: string;
  format?: string;
  charts?: boolean;
  baselineLabel?: string;
  treatmentLabel?: string;
  debug?: boolean;
  color?: boolean;
};

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * Comma separated format list. `text` is always produced and comes first;
 * duplicates collapse.
 */
export function parseFormats(flagValue: string | undefined): ReportFormat[] {
  const requested = (flagValue ?? '')
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
  const invalid = requested.filter((format) => !isReportFormat(format));
  if (invalid.length) {
    throw new ConfigurationError({
      message: `Unsupported format(s): ${invalid.join(', ')}. Expected one of ${REPORT_FORMATS.join(', ')}.`,
      context: { token: invalid.join(',') },
    });
  }
  const formats = new Set<ReportFormat>(['text']);
  requested.filter(isReportFormat).forEach((format) => formats.add(format));
  return Array.from(formats);
}

export function parseLabel(
  value: string | undefined,
  fallback: string,
  flag: string
): string {
  if (value === undefined) {
    return fallback;
  }
  const label = value.trim();
  if (!label) {
    throw new ConfigurationError({
      message: `${flag} must not be empty`,
    });
  }
  return label;
}
