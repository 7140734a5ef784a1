/**
 * truthlog
 *
 * Structured, leveled logging where every message is a level and an ordered
 * set of key-value pairs rendered as one JSON line, plus a test harness
 * (`truthlog/testing`) that checks logged lines against a truth transcript.
 *
 * @packageDocumentation
 */

// Levels
export {
  Level,
  LevelFilter,
  FILTER_NONE,
  FILTER_ALL,
  FILTER_DEFAULT,
  levelName,
  paddedLevel,
  parseLevel,
  parseFilter,
  isEnabled,
} from './level';

// Loggers
export { Logger, LogDestination, LeveledLogger, LeveledLoggerConfig, DiscardLogger, withContext } from './logger';

// Encoding
export {
  JSONSerializable,
  TextSerializable,
  OrderedEntry,
  OrderedEntries,
  MISSING_VALUE,
  fromKeyvals,
  formatValue,
  stringFromValue,
  toStringMap,
  renderJSON,
  parseJSONObject,
  formatLine,
  parseLine,
  ParsedLine,
} from './encoding';

// Storage
export { DeferredFileWriter, DeferredFileWriterConfig } from './storage';

// Errors
export * from './errors';
