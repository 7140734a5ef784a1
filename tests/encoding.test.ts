/**
 * Encoding Tests
 *
 * Tests for key-value conversion, ordered JSON rendering and parsing, and
 * canonical log lines.
 */

import {
  fromKeyvals,
  formatValue,
  stringFromValue,
  toStringMap,
  renderJSON,
  parseJSONObject,
  formatLine,
  parseLine,
  Level,
  MISSING_VALUE,
  RenderError,
  ErrorCode,
} from '../src';

describe('Encoding', () => {
  describe('formatValue', () => {
    test('should leave strings unchanged', () => {
      expect(formatValue('plain text')).toBe('plain text');
    });

    test('should convert primitives', () => {
      expect(formatValue(3.14)).toBe('3.14');
      expect(formatValue(true)).toBe('true');
      expect(formatValue(10n)).toBe('10');
      expect(formatValue(undefined)).toBe('undefined');
      expect(formatValue(null)).toBe('null');
      expect(formatValue(Symbol('tag'))).toBe('Symbol(tag)');
    });

    test('should use the message of an error', () => {
      expect(formatValue(new Error('disk full'))).toBe('disk full');
    });

    test('should use the text of an object with its own toString', () => {
      class Endpoint {
        constructor(
          readonly host: string,
          readonly port: number
        ) {}

        toString(): string {
          return `${this.host}:${this.port}`;
        }
      }

      expect(formatValue(new Endpoint('db', 5432))).toBe('db:5432');
      expect(renderJSON(fromKeyvals('addr', new Endpoint('db', 5432)))).toBe('{"addr":"db:5432"}\n');
      expect(formatValue(/ab+c/i)).toBe('/ab+c/i');
    });

    test('should inspect other values on one line', () => {
      expect(formatValue([1, 2, 3])).toBe('[ 1, 2, 3 ]');
      expect(formatValue({})).toBe('{}');
      expect(formatValue({ a: 1 })).toBe('{ a: 1 }');
      expect(formatValue(new Map([['k', 1]]))).toBe("Map(1) { 'k' => 1 }");
    });
  });

  describe('fromKeyvals', () => {
    test('should pair keys with values in order', () => {
      expect(fromKeyvals('msg', 'Connected.', 'port', 8080)).toEqual([
        { key: 'msg', value: 'Connected.' },
        { key: 'port', value: '8080' },
      ]);
    });

    test('should give a trailing key the missing value', () => {
      expect(fromKeyvals('msg', 'Oops.', 'data')).toEqual([
        { key: 'msg', value: 'Oops.' },
        { key: 'data', value: MISSING_VALUE },
      ]);
      expect(MISSING_VALUE).toBe('missing');
    });

    test('should return no entries for no arguments', () => {
      expect(fromKeyvals()).toEqual([]);
    });

    test('should keep repeated keys', () => {
      const entries = fromKeyvals('a', 1, 'a', 2);

      expect(entries.map((entry) => entry.key)).toEqual(['a', 'a']);
      expect(entries.map((entry) => entry.value)).toEqual(['1', '2']);
    });

    test('should convert keys to text', () => {
      expect(fromKeyvals(42, 'answer')[0].key).toBe('42');
    });

    test('should keep serializable values as they are', () => {
      const when = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
      const label = { toText: () => 'primary' };

      const entries = fromKeyvals('when', when, 'label', label);

      expect(entries[0].value).toBe(when);
      expect(entries[1].value).toBe(label);
    });
  });

  describe('renderJSON', () => {
    test('should render entries as one JSON object', () => {
      expect(renderJSON(fromKeyvals('msg', 'hi', 'n', 1))).toBe('{"msg":"hi","n":"1"}\n');
    });

    test('should render an empty object', () => {
      expect(renderJSON([])).toBe('{}\n');
    });

    test('should keep repeated keys and their order', () => {
      expect(renderJSON(fromKeyvals('b', 1, '10', 2, 'b', 3))).toBe('{"b":"1","10":"2","b":"3"}\n');
    });

    test('should not escape HTML characters', () => {
      expect(renderJSON(fromKeyvals('html', '<a&b>'))).toBe('{"html":"<a&b>"}\n');
    });

    test('should use toJSON for structured values', () => {
      const when = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
      const stats = { toJSON: () => ({ b: 1, a: [true, null] }) };

      expect(renderJSON(fromKeyvals('when', when, 'stats', stats))).toBe(
        '{"when":"2026-01-02T03:04:05.000Z","stats":{"b":1,"a":[true,null]}}\n'
      );
    });

    test('should quote text values', () => {
      expect(renderJSON(fromKeyvals('label', { toText: () => 'say "hi"' }))).toBe('{"label":"say \\"hi\\""}\n');
    });

    test('should prefer toJSON over toText', () => {
      const both = { toJSON: () => 7, toText: () => 'seven' };

      expect(renderJSON(fromKeyvals('n', both))).toBe('{"n":7}\n');
    });

    test('should throw RenderError when a value fails to serialize', () => {
      const failing = {
        toJSON(): unknown {
          throw new Error('boom');
        },
      };

      expect(() => renderJSON(fromKeyvals('bad', failing))).toThrow(RenderError);
      expect(() => renderJSON(fromKeyvals('bad', failing))).toThrow('cannot serialize field "bad": boom');
    });

    test('should throw RenderError when a value has no JSON form', () => {
      const nothing = { toJSON: () => undefined };

      expect(() => renderJSON(fromKeyvals('gone', nothing))).toThrow(
        'cannot serialize field "gone": no JSON representation'
      );
    });
  });

  describe('parseJSONObject', () => {
    test('should keep member order, including integer-like keys', () => {
      const entries = parseJSONObject('{"b":1,"10":"x","a":true}');

      expect(entries).toEqual([
        { key: 'b', value: 1 },
        { key: '10', value: 'x' },
        { key: 'a', value: true },
      ]);
    });

    test('should keep repeated keys', () => {
      expect(parseJSONObject('{"a":1,"a":2}')).toEqual([
        { key: 'a', value: 1 },
        { key: 'a', value: 2 },
      ]);
    });

    test('should decode nested values and escapes', () => {
      const entries = parseJSONObject('{ "s" : "a \\"quoted\\" }" , "o": {"x":[1,{"y":"]"}]}, "n": null }');

      expect(entries).toEqual([
        { key: 's', value: 'a "quoted" }' },
        { key: 'o', value: { x: [1, { y: ']' }] } },
        { key: 'n', value: null },
      ]);
    });

    test('should parse an empty object', () => {
      expect(parseJSONObject('{}')).toEqual([]);
    });

    test('should read back what renderJSON writes', () => {
      const entries = fromKeyvals('msg', 'Saved.', '2', 'two', 'msg', 'again', 'data');

      expect(parseJSONObject(renderJSON(entries))).toEqual(entries);
    });

    test.each([['[1]'], ['{"a":1'], ['{"a":1} extra'], ['{"a" 1}'], ['{"a":tru}'], ['']])(
      'should throw RenderError for %j',
      (text) => {
        expect(() => parseJSONObject(text)).toThrow(RenderError);
      }
    );

    test('should report the parse error code', () => {
      try {
        parseJSONObject('{"a":1} extra');
        throw new Error('expected a RenderError');
      } catch (error) {
        expect(error).toBeInstanceOf(RenderError);
        if (error instanceof RenderError) {
          expect(error.code).toBe(ErrorCode.RENDER_PARSE_FAILED);
          expect(error.message).toBe('invalid JSON object at offset 8: unexpected trailing data');
        }
      }
    });
  });

  describe('stringFromValue', () => {
    test('should return strings unquoted', () => {
      expect(stringFromValue('hello')).toBe('hello');
    });

    test('should render other JSON values compactly', () => {
      expect(stringFromValue(12)).toBe('12');
      expect(stringFromValue(false)).toBe('false');
      expect(stringFromValue(null)).toBe('null');
      expect(stringFromValue({ a: [1, 'b'] })).toBe('{"a":[1,"b"]}');
    });

    test('should give serializable values their decoded form', () => {
      expect(stringFromValue(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)))).toBe('2026-01-02T03:04:05.000Z');
      expect(stringFromValue({ toText: () => 'primary' })).toBe('primary');
      expect(stringFromValue({ toJSON: () => [1, 2] })).toBe('[1,2]');
    });

    test('should format values without a JSON form', () => {
      expect(stringFromValue(undefined)).toBe('undefined');
    });
  });

  describe('toStringMap', () => {
    test('should map keys to string values with the last repeat winning', () => {
      const entries = parseJSONObject('{"msg":"hi","n":3,"msg":"bye"}');

      expect(toStringMap(entries)).toEqual({ msg: 'bye', n: '3' });
    });
  });

  describe('log lines', () => {
    test('should pad the level to five columns', () => {
      expect(formatLine(Level.Info, fromKeyvals('msg', 'hi'))).toBe('info  {"msg":"hi"}\n');
      expect(formatLine(Level.Error, fromKeyvals('msg', 'hi'))).toBe('error {"msg":"hi"}\n');
    });

    test('should parse a line back into its parts', () => {
      const parsed = parseLine('debug {"msg":"hi","n":"2"}');

      expect(parsed.level).toBe(Level.Debug);
      expect(parsed.levelText).toBe('debug');
      expect(parsed.entries).toEqual([
        { key: 'msg', value: 'hi' },
        { key: 'n', value: '2' },
      ]);
    });

    test('should keep an unknown level prefix as text', () => {
      const parsed = parseLine('warn  {}');

      expect(parsed.level).toBeUndefined();
      expect(parsed.levelText).toBe('warn');
      expect(parsed.entries).toEqual([]);
    });

    test('should throw RenderError for text that is not a log line', () => {
      expect(() => parseLine('just some text')).toThrow(RenderError);
      expect(() => parseLine('')).toThrow(RenderError);
    });
  });
});
