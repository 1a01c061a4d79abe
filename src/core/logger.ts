import chalk from 'chalk';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogOptions {
  level?: LogLevel;
  /** Minimum verbosity at which the line is printed. */
  v?: number;
}

const COLORS: Record<LogLevel, (text: string) => string> = {
  INFO:  text => text,
  WARN:  chalk.yellow,
  ERROR: chalk.red,
};

/**
 * Leveled console logger gated by a `-v` count.
 *
 * Lines are printed as `[LEVEL] message`. A line logged with a `v` threshold
 * only shows up once the verbosity reaches it; warnings and errors logged
 * without one are always shown.
 */
export class Logger {
  /** Lines printed so far, per level. */
  readonly counts: Record<LogLevel, number> = { INFO: 0, WARN: 0, ERROR: 0 };

  constructor(public readonly verbosity: number = 0) {}

  log(message: string, options: LogOptions = {}): void {
    const level = options.level ?? 'INFO';
    if (options.v !== undefined && this.verbosity < options.v) return;

    this.counts[level]++;

    const line = COLORS[level](`[${level}] ${message}`);
    if (level === 'ERROR') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  info(message: string, v = 0): void {
    this.log(message, { level: 'INFO', v });
  }

  warn(message: string): void {
    this.log(message, { level: 'WARN' });
  }

  error(message: string): void {
    this.log(message, { level: 'ERROR' });
  }
}
