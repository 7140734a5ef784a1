/**
 * Ordered Key-Value Encoding Module
 */

export * from './types';
export { formatValue, fromKeyvals, stringFromValue, toStringMap } from './keyvals';
export { encodeValue, renderJSON, parseJSONObject } from './json';
export { ParsedLine, formatLine, logFailureLine, parseLine } from './line';
