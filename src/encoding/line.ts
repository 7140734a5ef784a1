/**
 * Canonical Log Lines
 *
 * A log line is the level name left-aligned in five columns, a space, and a
 * single-line JSON object:
 *
 *     info  {"msg":"Connected.","port":"8080"}
 */

import { RenderError, ErrorCode, errorMessage } from '../errors';
import { Level, paddedLevel, parseLevel } from '../level';
import { fromKeyvals } from './keyvals';
import { renderJSON, parseJSONObject } from './json';
import { OrderedEntries } from './types';

/** A log line split back into its parts */
export interface ParsedLine {
  /** The level, or undefined when the prefix is not a known level name */
  level: Level | undefined;
  /** The level prefix as written */
  levelText: string;
  entries: OrderedEntries;
}

/**
 * Renders a complete log line, including the trailing newline.
 *
 * @throws RenderError if any value fails to serialize.
 */
export function formatLine(level: Level, entries: OrderedEntries): string {
  return `${paddedLevel(level)} ${renderJSON(entries)}`;
}

/**
 * The line written in place of a log message that could not be rendered.
 */
export function logFailureLine(error: unknown): string {
  return formatLine(Level.Error, fromKeyvals('msg', 'logging failure', 'error', errorMessage(error)));
}

const LINE_PATTERN = /^(\S+)[ \t]+(\{.*\})[ \t\r]*$/s;

/**
 * @throws RenderError if the line does not follow the log line grammar.
 */
export function parseLine(line: string): ParsedLine {
  const match = LINE_PATTERN.exec(line);
  if (!match) {
    throw new RenderError(`not a log line: ${JSON.stringify(line)}`, ErrorCode.RENDER_PARSE_FAILED, {
      operation: 'parseLine',
    });
  }

  const [, levelText, body] = match;
  return {
    level: parseLevel(levelText),
    levelText,
    entries: parseJSONObject(body),
  };
}
