import { Logger } from './types';

class ContextLogger implements Logger {
  constructor(
    private readonly logger: Logger,
    private readonly context: unknown[]
  ) {}

  error(...keyvals: unknown[]): void {
    this.logger.error(...this.context, ...keyvals);
  }

  info(...keyvals: unknown[]): void {
    this.logger.info(...this.context, ...keyvals);
  }

  debug(...keyvals: unknown[]): void {
    this.logger.debug(...this.context, ...keyvals);
  }

  trace(...keyvals: unknown[]): void {
    this.logger.trace(...this.context, ...keyvals);
  }
}

/**
 * Returns a logger that puts `keyvals` in front of the pairs of every call.
 * The logger itself is returned when there is nothing to add.
 */
export function withContext(logger: Logger, ...keyvals: unknown[]): Logger {
  if (keyvals.length === 0) {
    return logger;
  }

  return new ContextLogger(logger, keyvals);
}
