/**
 * Scoped console logger
 *
 * Prefixes every line with `[WaveDrom <scope>]`. Debug output is dropped
 * unless the logger is verbose.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[WaveDrom ${scope}]`;
  const verbose = options.verbose ?? false;

  return {
    debug(message, ...details) {
      if (verbose) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

/**
 * Logger that discards everything, for callers that opt out of logging
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
