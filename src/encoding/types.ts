/**
 * Ordered Key-Value Types
 */

/**
 * A value that renders itself as structured JSON. Anything with a `toJSON`
 * method qualifies, including `Date` and `Buffer`.
 */
export interface JSONSerializable {
  toJSON(): unknown;
}

/**
 * A value that renders itself as a single string.
 */
export interface TextSerializable {
  toText(): string;
}

/** One key-value pair of a log message */
export interface OrderedEntry {
  key: string;
  value: unknown;
}

/**
 * The pairs of a log message in call order. Keys may repeat; a repeated key
 * is rendered twice rather than merged.
 */
export type OrderedEntries = OrderedEntry[];

/** Value given to a trailing key that has no value */
export const MISSING_VALUE = 'missing';

export function isJSONSerializable(value: unknown): value is JSONSerializable {
  return typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function';
}

export function isTextSerializable(value: unknown): value is TextSerializable {
  return typeof value === 'object' && value !== null && 'toText' in value && typeof value.toText === 'function';
}
