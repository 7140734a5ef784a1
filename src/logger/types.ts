/**
 * Logger Interface
 *
 * Libraries accept a Logger so that the application decides where messages
 * go. Every method takes alternating keys and values:
 *
 *     logger.info('msg', 'Connected.', 'port', 8080);
 */
export interface Logger {
  error(...keyvals: unknown[]): void;
  info(...keyvals: unknown[]): void;
  debug(...keyvals: unknown[]): void;
  trace(...keyvals: unknown[]): void;
}

/** Anything log lines can be written to, such as `process.stderr` */
export interface LogDestination {
  write(chunk: string): unknown;
}
