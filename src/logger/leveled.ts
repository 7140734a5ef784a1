/**
 * Leveled Logger
 *
 * Writes each accepted message as one canonical log line:
 *
 *     error {"msg":"Request failed.","status":"503"}
 */

import { fromKeyvals, formatLine, logFailureLine } from '../encoding';
import { Level, LevelFilter, FILTER_DEFAULT, isEnabled } from '../level';
import { Logger, LogDestination } from './types';

export interface LeveledLoggerConfig {
  /**
   * Where lines are written (default: process.stderr)
   */
  output?: LogDestination;

  /**
   * Levels to write (default: Error and Info)
   */
  filterLevel?: LevelFilter;

  /**
   * Whether to start each line with the local date and time,
   * `YYYY/MM/DD hh:mm:ss` (default: false)
   */
  timestamps?: boolean;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}/${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export class LeveledLogger implements Logger {
  private readonly output: LogDestination;
  private readonly timestamps: boolean;
  private filterLevel: LevelFilter;

  constructor(config: LeveledLoggerConfig = {}) {
    this.output = config.output ?? process.stderr;
    this.filterLevel = config.filterLevel ?? FILTER_DEFAULT;
    this.timestamps = config.timestamps ?? false;
  }

  /**
   * Changes which levels are written, while the logger is in use. There is no
   * lock around the filter: a message logged while the filter changes may be
   * filtered by either the old or the new value.
   */
  setFilterLevel(filter: LevelFilter): void {
    this.filterLevel = filter;
  }

  getFilterLevel(): LevelFilter {
    return this.filterLevel;
  }

  error(...keyvals: unknown[]): void {
    this.log(Level.Error, keyvals);
  }

  info(...keyvals: unknown[]): void {
    this.log(Level.Info, keyvals);
  }

  debug(...keyvals: unknown[]): void {
    this.log(Level.Debug, keyvals);
  }

  trace(...keyvals: unknown[]): void {
    this.log(Level.Trace, keyvals);
  }

  private log(level: Level, keyvals: unknown[]): void {
    if (!isEnabled(this.filterLevel, level)) {
      return;
    }

    let line: string;
    try {
      line = formatLine(level, fromKeyvals(...keyvals));
    } catch (error) {
      line = logFailureLine(error);
    }

    this.output.write(this.timestamps ? `${formatTimestamp(new Date())} ${line}` : line);
  }
}
