/**
 * Log Levels
 *
 * The four supported severities, ordered Trace < Debug < Info < Error.
 * Each level is a single bit so that a filter is any combination of them.
 */

import { ConfigurationError, ErrorCode } from '../errors';

export enum Level {
  Trace = 1 << 0,
  Debug = 1 << 1,
  Info = 1 << 2,
  Error = 1 << 3,
}

/** A bitmask of levels */
export type LevelFilter = number;

export const FILTER_NONE: LevelFilter = 0;
export const FILTER_ALL: LevelFilter = Level.Trace | Level.Debug | Level.Info | Level.Error;
/** Error and Info messages only */
export const FILTER_DEFAULT: LevelFilter = Level.Error | Level.Info;

const LEVEL_NAMES: Record<Level, string> = {
  [Level.Trace]: 'trace',
  [Level.Debug]: 'debug',
  [Level.Info]: 'info',
  [Level.Error]: 'error',
};

const LEVELS_BY_NAME: Record<string, Level> = {
  trace: Level.Trace,
  debug: Level.Debug,
  info: Level.Info,
  error: Level.Error,
};

export function levelName(level: Level): string {
  return LEVEL_NAMES[level];
}

/**
 * Level name left-aligned in a five character column, as it appears at the
 * start of every log line.
 */
export function paddedLevel(level: Level): string {
  return levelName(level).padEnd(5);
}

/**
 * Looks up a level by name. Surrounding whitespace and case are ignored, so
 * the padded prefix of a log line parses too.
 */
export function parseLevel(name: string): Level | undefined {
  return LEVELS_BY_NAME[name.trim().toLowerCase()];
}

/**
 * Parses a comma-separated list of level names into a filter, for example
 * `"error,info"`. The words `all` and `none` are accepted on their own.
 */
export function parseFilter(text: string): LevelFilter {
  const trimmed = text.trim().toLowerCase();
  if (trimmed === 'all') {
    return FILTER_ALL;
  }
  if (trimmed === 'none' || trimmed === '') {
    return FILTER_NONE;
  }

  let filter = FILTER_NONE;
  for (const part of trimmed.split(',')) {
    const level = parseLevel(part);
    if (level === undefined) {
      throw new ConfigurationError(`Unknown log level: "${part.trim()}"`, ErrorCode.CONFIG_INVALID, {
        operation: 'parseFilter',
        metadata: { filter: text },
      });
    }
    filter |= level;
  }
  return filter;
}

export function isEnabled(filter: LevelFilter, level: Level): boolean {
  return (filter & level) !== 0;
}
