/**
 * Logging capability passed into the client, ledger store and reconciler
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  name?: string;
  level?: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Line-oriented console logger: `timestamp - name - LEVEL - message`
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const name = options.name ?? 'splunkbase-downloader';
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => console.log(line));
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const label = LEVEL_STYLE[level](level.toUpperCase());
    write(`${chalk.dim(now().toISOString())} - ${name} - ${label} - ${message}`);
  };

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
}

/** The part of an ora spinner a log writer needs */
export interface SpinnerHandle {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

/**
 * Wrap a line writer so an active spinner is cleared before each line and
 * redrawn after it
 */
export function spinnerSafeWriter(
  write: (line: string) => void,
  spinner: () => SpinnerHandle | undefined,
): (line: string) => void {
  return line => {
    const active = spinner();
    if (!active?.isSpinning) {
      write(line);
      return;
    }
    active.clear();
    write(line);
    active.render();
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
