import { Logger } from './types';

/**
 * Logger that ignores every message. Useful as a library's default until the
 * application provides a real one.
 */
export class DiscardLogger implements Logger {
  error(..._keyvals: unknown[]): void {}
  info(..._keyvals: unknown[]): void {}
  debug(..._keyvals: unknown[]): void {}
  trace(..._keyvals: unknown[]): void {}
}
