/**
 * Key-Value Encoder
 *
 * Turns the interleaved arguments of a log call into ordered entries, and
 * gives every value a canonical string form for field-level comparison.
 */

import { inspect } from 'util';
import { encodeValue } from './json';
import { OrderedEntries, MISSING_VALUE, isJSONSerializable, isTextSerializable } from './types';

/**
 * Default text of a value: strings unchanged, other primitives through
 * `String`, errors by their message, objects with their own `toString` by
 * its result, and anything else as Node's one-line inspection.
 */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
    case 'undefined':
      return String(value);
    case 'symbol':
      return value.toString();
    default:
      break;
  }

  if (value === null) {
    return 'null';
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && hasOwnText(value)) {
    return String(value);
  }
  return inspect(value, { compact: true, breakLength: Infinity });
}

/** Whether an object defines a `toString` other than the default one */
function hasOwnText(value: object): boolean {
  const { toString } = value;
  return typeof toString === 'function' && toString !== Object.prototype.toString;
}

/**
 * Creates ordered entries from alternating keys and values.
 *
 * Values with a `toJSON` or `toText` method are kept so that rendering can
 * use them; every other value is converted with {@link formatValue}. A final
 * key without a value gets the value `"missing"`.
 */
export function fromKeyvals(...keyvals: unknown[]): OrderedEntries {
  const entries: OrderedEntries = [];

  for (let i = 0; i < keyvals.length; i += 2) {
    const value = i + 1 < keyvals.length ? keyvals[i + 1] : MISSING_VALUE;

    entries.push({
      key: formatValue(keyvals[i]),
      value: isJSONSerializable(value) || isTextSerializable(value) ? value : formatValue(value),
    });
  }

  return entries;
}

/**
 * Canonical string form of a value.
 *
 * Strings are returned unquoted. Serializable values are rendered and decoded
 * again first, so a value compares the same whether it came from a log call
 * or was read back from a log line. Other JSON values become compact JSON.
 */
export function stringFromValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (isJSONSerializable(value) || isTextSerializable(value)) {
    const decoded: unknown = JSON.parse(encodeValue(value));
    return stringFromValue(decoded);
  }

  if (value === null || typeof value === 'number' || typeof value === 'boolean' || typeof value === 'object') {
    return encodeValue(value);
  }

  return formatValue(value);
}

/**
 * Field map handed to field-ignore functions. A repeated key keeps its last
 * value.
 */
export function toStringMap(entries: OrderedEntries): Record<string, string> {
  return Object.fromEntries(entries.map((entry) => [entry.key, stringFromValue(entry.value)]));
}
