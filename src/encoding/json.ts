/**
 * Ordered JSON
 *
 * Renders ordered entries as a single JSON object and reads such objects
 * back without losing member order or repeated keys. `JSON.parse` alone
 * cannot do the latter: it merges repeated keys and moves integer-like keys
 * to the front.
 */

import { RenderError, ErrorCode, errorMessage } from '../errors';
import { OrderedEntries, isJSONSerializable, isTextSerializable } from './types';

/**
 * JSON text of one value. `toJSON` takes precedence over `toText`.
 */
export function encodeValue(value: unknown, key?: string): string {
  const field = key === undefined ? 'value' : `field "${key}"`;

  let encoded: string | undefined;
  try {
    if (isTextSerializable(value) && !isJSONSerializable(value)) {
      encoded = JSON.stringify(value.toText());
    } else {
      encoded = JSON.stringify(value);
    }
  } catch (error) {
    throw new RenderError(
      `cannot serialize ${field}: ${errorMessage(error)}`,
      ErrorCode.RENDER_FAILED,
      { operation: 'encodeValue', metadata: { key } },
      { cause: error }
    );
  }

  // JSON.stringify yields undefined for functions, symbols, and toJSON() results of undefined
  if (encoded === undefined) {
    throw new RenderError(`cannot serialize ${field}: no JSON representation`, ErrorCode.RENDER_FAILED, {
      operation: 'encodeValue',
      metadata: { key },
    });
  }

  return encoded;
}

/**
 * Renders entries as one JSON object followed by a newline. Member order and
 * repeated keys are kept, and `<`, `>` and `&` are not escaped.
 *
 * @throws RenderError if any value fails to serialize; nothing is returned in
 * that case.
 */
export function renderJSON(entries: OrderedEntries): string {
  const members = entries.map((entry) => `${JSON.stringify(entry.key)}:${encodeValue(entry.value, entry.key)}`);
  return `{${members.join(',')}}\n`;
}

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

class Scanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipWhitespace(): void {
    while (!this.atEnd() && WHITESPACE.has(this.peek())) {
      this.pos++;
    }
  }

  expect(char: string): void {
    if (this.peek() !== char) {
      throw this.error(`expected "${char}"`);
    }
    this.pos++;
  }

  /** Returns the source text of the string token at the current position. */
  readString(): string {
    const start = this.pos;
    this.expect('"');
    while (!this.atEnd()) {
      const char = this.text.charAt(this.pos++);
      if (char === '\\') {
        this.pos++;
      } else if (char === '"') {
        return this.text.slice(start, this.pos);
      }
    }
    throw this.error('unterminated string');
  }

  /** Returns the source text of the value at the current position. */
  readValue(): string {
    const first = this.peek();
    if (first === '"') {
      return this.readString();
    }

    const start = this.pos;
    if (first === '{' || first === '[') {
      let depth = 0;
      while (!this.atEnd()) {
        const char = this.peek();
        if (char === '"') {
          this.readString();
          continue;
        }
        this.pos++;
        if (char === '{' || char === '[') {
          depth++;
        } else if (char === '}' || char === ']') {
          depth--;
          if (depth === 0) {
            return this.text.slice(start, this.pos);
          }
        }
      }
      throw this.error('unterminated value');
    }

    while (!this.atEnd() && !WHITESPACE.has(this.peek()) && !',}]'.includes(this.peek())) {
      this.pos++;
    }
    if (this.pos === start) {
      throw this.error('expected a value');
    }
    return this.text.slice(start, this.pos);
  }

  next(): string {
    return this.text.charAt(this.pos++);
  }

  error(message: string): RenderError {
    return new RenderError(`invalid JSON object at offset ${this.pos}: ${message}`, ErrorCode.RENDER_PARSE_FAILED, {
      operation: 'parseJSONObject',
    });
  }
}

function decode(source: string): unknown {
  try {
    const value: unknown = JSON.parse(source);
    return value;
  } catch (error) {
    throw new RenderError(
      `invalid JSON value ${source}: ${errorMessage(error)}`,
      ErrorCode.RENDER_PARSE_FAILED,
      { operation: 'parseJSONObject' },
      { cause: error }
    );
  }
}

/**
 * Reads a JSON object into entries in document order. Values are decoded
 * JSON values.
 *
 * @throws RenderError if the text is not a single JSON object.
 */
export function parseJSONObject(text: string): OrderedEntries {
  const scanner = new Scanner(text);
  const entries: OrderedEntries = [];

  scanner.skipWhitespace();
  scanner.expect('{');
  scanner.skipWhitespace();

  if (scanner.peek() === '}') {
    scanner.next();
  } else {
    for (;;) {
      scanner.skipWhitespace();
      const key = decode(scanner.readString());
      scanner.skipWhitespace();
      scanner.expect(':');
      scanner.skipWhitespace();
      const value = decode(scanner.readValue());

      entries.push({ key: String(key), value });

      scanner.skipWhitespace();
      const separator = scanner.next();
      if (separator === '}') {
        break;
      }
      if (separator !== ',') {
        throw scanner.error('expected "," or "}"');
      }
    }
  }

  scanner.skipWhitespace();
  if (!scanner.atEnd()) {
    throw scanner.error('unexpected trailing data');
  }

  return entries;
}
