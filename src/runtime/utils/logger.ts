/**
 * Leveled stderr logger
 *
 * One instance is created at CLI start-up and handed to every component
 * that logs. Level ordering: ERROR < WARNING < INFO < DEBUG < TRACE.
 */

export type LogLevel = 'ERROR' | 'WARNING' | 'INFO' | 'DEBUG' | 'TRACE';

const LEVEL_RANK: Record<LogLevel, number> = {
  ERROR: 0,
  WARNING: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Where formatted lines go (defaults to stderr) */
  sink?: LogSink;
}

/**
 * Map a repeated `-v` count to a level
 */
export function levelFromVerbosity(verbose: number): LogLevel {
  if (verbose >= 3) return 'TRACE';
  if (verbose === 2) return 'DEBUG';
  if (verbose === 1) return 'INFO';
  return 'ERROR';
}

export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'ERROR';
    this.sink = options.sink ?? (line => process.stderr.write(`${line}\n`));
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  error(message: string): void {
    this.log('ERROR', message);
  }

  warning(message: string): void {
    this.log('WARNING', message);
  }

  info(message: string): void {
    this.log('INFO', message);
  }

  debug(message: string): void {
    this.log('DEBUG', message);
  }

  trace(message: string): void {
    this.log('TRACE', message);
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    this.sink(`[${level}] ${message}`);
  }
}
