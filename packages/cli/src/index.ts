#!/usr/bin/env node
// CLI entry point
// - Command name: `qoslens <baseline_dir> <treatment_dir>`.
// - Loads both run directories, prints progress on stdout and writes the
//   comparison report, optional Markdown/JSON renderings and SVG charts
//   into the output directory.

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command, CommanderError } from 'commander';
import {
  ConfigurationError,
  ErrorCode,
  ErrorPresenter,
  createStderrLogger,
  summarizeRun,
  toAnalysisError,
  type Logger,
} from '@qoslens/core';
import { DEFAULT_LABELS, writeAnalysisArtifacts } from '@qoslens/reporter';

import {
  resolveAnalysisOptions,
  resolveColors,
  resolveErrorEnv,
  type AnalysisOptions,
} from './config/analysis-options.js';
import { printSummaryDebug } from './debug.js';
import type { CliOptions } from './flags.js';
import { renderCLIView } from './render.js';

export const VERSION = '0.1.0';
export const USAGE = 'qoslens <baseline_dir> <treatment_dir> [options]';

export interface CliIO {
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
  env: NodeJS.ProcessEnv;
  stderrIsTTY: boolean;
  /** Width error views wrap at; unset falls back to 80 columns. */
  terminalWidth?: number;
}

type ErrorViewSettings = Pick<AnalysisOptions, 'colors' | 'errorEnv' | 'debug'>;

const RULE = '='.repeat(80);

function defaultIO(): CliIO {
  return {
    stdout: (chunk) => void process.stdout.write(chunk),
    stderr: (chunk) => void process.stderr.write(chunk),
    env: process.env,
    stderrIsTTY: process.stderr.isTTY === true,
    terminalWidth: process.stderr.columns,
  };
}

function assertRunDirectory(directory: string, label: string): void {
  const stat = fs.statSync(directory, { throwIfNoEntry: false });
  if (!stat) {
    throw new ConfigurationError({
      message: `${label} directory not found: ${directory}`,
      errorCode: ErrorCode.RUN_DIRECTORY_NOT_FOUND,
      context: { path: directory },
    });
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError({
      message: `${label} path is not a directory: ${directory}`,
      errorCode: ErrorCode.RUN_DIRECTORY_NOT_FOUND,
      context: { path: directory },
    });
  }
}

function runAnalysis(
  runDirs: readonly string[],
  options: AnalysisOptions,
  io: CliIO,
  logger: Logger
): void {
  const [baselineDir, treatmentDir] = runDirs;
  if (runDirs.length !== 2 || !baselineDir || !treatmentDir) {
    throw new ConfigurationError({
      message: `Expected exactly 2 run directories, got ${runDirs.length}`,
      context: { usage: USAGE },
    });
  }
  const { labels } = options;
  assertRunDirectory(baselineDir, labels.baseline);
  assertRunDirectory(treatmentDir, labels.treatment);

  const out = (line = ''): void => io.stdout(`${line}\n`);
  out();
  out(RULE);
  out('FDP QoS ANALYSIS PIPELINE');
  out(RULE);
  out();
  out('Loading test results...');

  const baseline = summarizeRun(baselineDir, { logger });
  const treatment = summarizeRun(treatmentDir, { logger });
  if (options.debug) {
    printSummaryDebug(labels.baseline, baseline, io.stderr);
    printSummaryDebug(labels.treatment, treatment, io.stderr);
  }

  out(
    `✓ Test 1 (${labels.baseline}):  ${baseline.latencies.victim_read?.count ?? 0} victim reads`
  );
  out(
    `✓ Test 2 (${labels.treatment}): ${treatment.latencies.victim_read?.count ?? 0} victim reads`
  );
  out();
  out('Generating artifacts...');

  const { written } = writeAnalysisArtifacts({
    baseline,
    treatment,
    outDir: options.outDir,
    formats: options.formats,
    charts: options.charts,
    labels,
    logger,
  });
  written.forEach((artifact) => out(`✓ Saved ${artifact.path}`));

  out();
  out(RULE);
  out('ANALYSIS COMPLETE');
  out(RULE);
  out(`Results saved in: ${options.outDir}${path.sep}`);
}

// Used when option resolution itself failed
function fallbackViewSettings(cli: CliOptions, io: CliIO): ErrorViewSettings {
  return {
    colors: resolveColors(cli, io.env, io.stderrIsTTY),
    errorEnv: resolveErrorEnv(io.env),
    debug: cli.debug ?? false,
  };
}

function handleCliError(err: unknown, io: CliIO, settings: ErrorViewSettings): number {
  const presenter = new ErrorPresenter(settings.errorEnv, {
    colors: settings.colors,
    terminalWidth: io.terminalWidth ?? 80,
  });
  const error = toAnalysisError(err);

  io.stderr(`${renderCLIView(presenter.formatForCLI(error))}\n`);
  if (settings.debug) {
    io.stderr(`[qoslens] error: ${JSON.stringify(presenter.formatForLog(error))}\n`);
  }
  return error.getExitCode();
}

/** Holds the options the action resolved, for error rendering after a failure. */
export interface ProgramState {
  options?: AnalysisOptions;
}

export function createProgram(
  io: CliIO = defaultIO(),
  state: ProgramState = {}
): Command {
  const program = new Command();

  program
    .name('qoslens')
    .description(
      'Compare per-phase latency QoS of a baseline run against a treatment run'
    )
    .version(VERSION)
    .argument('[run_dirs...]', 'baseline and treatment run directories')
    .option(
      '-o, --out-dir <dir>',
      'Output directory (default: analysis_results, env QOSLENS_OUT_DIR)'
    )
    .option(
      '-f, --format <list>',
      'Comma separated report formats: text,markdown,json',
      'text'
    )
    .option('--no-charts', 'Skip SVG charts')
    .option(
      '--baseline-label <label>',
      'Label of the baseline run',
      DEFAULT_LABELS.baseline
    )
    .option(
      '--treatment-label <label>',
      'Label of the treatment run',
      DEFAULT_LABELS.treatment
    )
    .option('--debug', 'Print both run summaries as JSON to stderr', false)
    .option('--no-color', 'Disable ANSI colours in error output')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action((runDirs: string[]) => {
      const cli = program.opts<CliOptions>();
      const options = resolveAnalysisOptions(cli, io.env, io.stderrIsTTY);
      state.options = options;
      const logger = createStderrLogger({ verbose: options.debug, write: io.stderr });
      runAnalysis(runDirs, options, io, logger);
    });

  return program;
}

/**
 * Runs the CLI and resolves to the process exit code. Never calls
 * `process.exit` itself.
 */
export async function runCli(
  argv: string[] = process.argv,
  io: CliIO = defaultIO()
): Promise<number> {
  const state: ProgramState = {};
  const program = createProgram(io, state);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander already printed help, version or its own error message
      return err.exitCode;
    }
    return handleCliError(
      err,
      io,
      state.options ?? fallbackViewSettings(program.opts<CliOptions>(), io)
    );
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  process.exitCode = await runCli(argv);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
