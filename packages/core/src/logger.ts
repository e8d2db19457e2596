/**
 * Logger interface shared by every codesitter component.
 *
 * Extraction code never writes to the console directly; it receives a
 * Logger through its options so hosts can route output (stderr, JSON
 * lines for log aggregation, or nothing at all in tests).
 */

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

/**
 * Human-readable logger with coloured level prefixes.
 *
 * WARNING: info and debug go to stdout. Hosts that reserve stdout for a
 * protocol should use {@link createJsonLogger} instead.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`${chalk.blue('[info]')} ${message}`),
  warning: (message: string) => console.warn(`${chalk.yellow('[warning]')} ${message}`),
  error: (message: string) => console.error(`${chalk.red('[error]')} ${message}`),
  debug: (message: string) => console.debug(`${chalk.dim('[debug]')} ${message}`),
};

/**
 * Structured JSON logger. One object per line on stderr.
 */
export function createJsonLogger(
  service: string,
  write: (line: string) => void = line => process.stderr.write(line),
): Logger {
  const log = (level: string, message: string): void => {
    const entry = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      service,
    });
    write(entry + '\n');
  };

  return {
    info: (message: string) => log('info', message),
    warning: (message: string) => log('warn', message),
    error: (message: string) => log('error', message),
    debug: (message: string) => log('debug', message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Wrap a logger so messages below `minLevel` are dropped.
 */
export function withLevel(logger: Logger, minLevel: LogLevel): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    info: message => {
      if (enabled('info')) logger.info(message);
    },
    warning: message => {
      if (enabled('warning')) logger.warning(message);
    },
    error: message => {
      if (enabled('error')) logger.error(message);
    },
    debug: message => {
      if (enabled('debug')) logger.debug(message);
    },
  };
}
