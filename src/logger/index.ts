/**
 * Logger Module
 *
 * The Logger interface and its implementations for application code.
 */

export { Logger, LogDestination } from './types';
export { LeveledLogger, LeveledLoggerConfig, formatTimestamp } from './leveled';
export { DiscardLogger } from './discard';
export { withContext } from './contextual';
