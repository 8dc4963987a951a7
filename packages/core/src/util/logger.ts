/**
 * Minimal prefixed stderr logger. stdout stays reserved for user-facing
 * progress lines and rendered output.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface StderrLoggerOptions {
  /** Emit debug lines (off by default). */
  verbose?: boolean;
  prefix?: string;
  write?: (chunk: string) => void;
}

export const LOG_PREFIX = '[qoslens]';

export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? LOG_PREFIX;
  const write =
    options.write ?? ((chunk: string) => void process.stderr.write(chunk));
  const emit = (level: string, message: string): void => {
    write(`${prefix} ${level}: ${message}\n`);
  };

  return {
    debug(message) {
      if (options.verbose) emit('debug', message);
    },
    info(message) {
      emit('info', message);
    },
    warn(message) {
      emit('warn', message);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};
