import { DEFAULT_LABELS, type ReportFormat, type RunLabels } from '@qoslens/reporter';

import { parseFormats, parseLabel, type CliOptions } from '../flags.js';

export const DEFAULT_OUT_DIR = 'analysis_results';
export const OUT_DIR_ENV = 'QOSLENS_OUT_DIR';

export type ErrorEnv = 'dev' | 'prod';

export interface AnalysisOptions {
  outDir: string;
  formats: ReportFormat[];
  charts: boolean;
  labels: RunLabels;
  debug: boolean;
  colors: boolean;
  errorEnv: ErrorEnv;
}

function isSet(value: string | undefined): boolean {
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

export function resolveErrorEnv(env: NodeJS.ProcessEnv): ErrorEnv {
  return env.NODE_ENV === 'production' ? 'prod' : 'dev';
}

/** Colours need a TTY, no `--no-color` and no `NO_COLOR` in the environment. */
export function resolveColors(
  cli: Pick<CliOptions, 'color'>,
  env: NodeJS.ProcessEnv,
  isTTY: boolean
): boolean {
  if (cli.color === false || isSet(env.NO_COLOR)) {
    return false;
  }
  return isTTY;
}

/**
 * Merges commander options with the environment. Command-line values win
 * over environment values, which win over defaults.
 */
export function resolveAnalysisOptions(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  isTTY = false
): AnalysisOptions {
  const envOutDir = env[OUT_DIR_ENV]?.trim();
  return {
    outDir: cli.outDir ?? (envOutDir || DEFAULT_OUT_DIR),
    formats: parseFormats(cli.format),
    charts: cli.charts ?? true,
    labels: {
      baseline: parseLabel(cli.baselineLabel, DEFAULT_LABELS.baseline, '--baseline-label'),
      treatment: parseLabel(cli.treatmentLabel, DEFAULT_LABELS.treatment, '--treatment-label'),
    },
    debug: cli.debug ?? false,
    colors: resolveColors(cli, env, isTTY),
    errorEnv: resolveErrorEnv(env),
  };
}
