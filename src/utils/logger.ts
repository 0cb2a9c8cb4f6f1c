/**
 * Leveled, coloured logger. One instance is created per run and handed to
 * every component that needs it.
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  quiet?: boolean;
  /**
   * Receives one formatted line at a time (without trailing newline).
   * Defaults to standard error so result output on stdout stays clean.
   */
  write?: (line: string) => void;
}

/**
 * Logger class with configurable levels
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly quiet: boolean;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.quiet = options.quiet ?? false;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  /**
   * Check if level should be logged
   */
  isEnabled(level: LogLevel): boolean {
    if (this.quiet) {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]) {
    if (this.isEnabled('debug')) {
      this.emit(chalk.gray(`[DEBUG] ${message}`), args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.isEnabled('info')) {
      this.emit(chalk.blue(`[INFO] ${message}`), args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.isEnabled('warn')) {
      this.emit(chalk.yellow(`[WARN] ${message}`), args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.isEnabled('error')) {
      this.emit(chalk.red(`[ERROR] ${message}`), args);
    }
  }

  /**
   * Success log (info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.isEnabled('info')) {
      this.emit(chalk.green(`[✓] ${message}`), args);
    }
  }

  /**
   * Progress log (info level)
   */
  progress(message: string, current: number, total: number) {
    if (this.isEnabled('info')) {
      const percentage = total > 0 ? Math.round((current / total) * 100) : 100;
      this.emit(chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`), []);
    }
  }

  private emit(line: string, args: unknown[]) {
    const extra = args.map(formatArg).filter((s) => s.length > 0);
    this.write(extra.length > 0 ? `${line} ${extra.join(' ')}` : line);
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg === undefined) {
    return '';
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Logger that discards everything; the default for library callers that
 * do not pass one.
 */
export function silentLogger(): Logger {
  return new Logger({ quiet: true });
}
