/**
 * truthlog Error Types
 *
 * Structured error handling with error codes and categories for the
 * encoder, the deferred file writer, and the test verification engine.
 */

import { v4 as uuidv4 } from 'uuid';

/** Error categories for classification */
export enum ErrorCategory {
  /** Invalid or conflicting configuration */
  CONFIG = 'config',
  /** A log call could not be rendered to a line */
  RENDER = 'render',
  /** Actual-output file errors */
  STORAGE = 'storage',
  /** Truth transcript errors */
  TRANSCRIPT = 'transcript',
  /** Log output differed from the truth transcript */
  VERIFICATION = 'verification',
}

/** Error codes for specific error types */
export enum ErrorCode {
  // Config errors (1000-1999)
  CONFIG_CONFLICT = 1001,
  CONFIG_INVALID = 1002,

  // Render errors (2000-2999)
  RENDER_FAILED = 2001,
  RENDER_PARSE_FAILED = 2002,

  // Storage errors (3000-3999)
  STORAGE_WRITE_FAILED = 3001,
  STORAGE_CREATE_FAILED = 3002,
  STORAGE_CLOSE_FAILED = 3003,

  // Transcript errors (4000-4999)
  TRANSCRIPT_READ_FAILED = 4001,

  // Verification errors (5000-5999)
  VERIFICATION_MISMATCH = 5001,
}

/** Context information for errors */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** File path involved, if any */
  path?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
  /** Timestamp */
  timestamp: Date;
}

interface ErrorOptions {
  recoverable?: boolean;
  cause?: unknown;
}

/**
 * Base error class for truthlog
 */
export class TruthlogError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly context: ErrorContext;
  readonly recoverable: boolean;
  readonly event_id: string;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    context: Partial<ErrorContext> = {},
    options: ErrorOptions = {}
  ) {
    super(message);
    this.name = 'TruthlogError';
    if (options.cause !== undefined) {
      Object.defineProperty(this, 'cause', {
        value: options.cause,
        writable: true,
        configurable: true,
      });
    }
    this.code = code;
    this.category = category;
    this.context = {
      timestamp: new Date(),
      ...context,
    };
    this.recoverable = options.recoverable ?? false;
    this.event_id = uuidv4();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Convert to JSON for structured reporting */
  toJSON(): Record<string, unknown> {
    return {
      event_id: this.event_id,
      error_type: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      context: {
        ...this.context,
        timestamp: this.context.timestamp.toISOString(),
      },
      recoverable: this.recoverable,
    };
  }
}

// Specialized error classes

export class ConfigurationError extends TruthlogError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID, context?: Partial<ErrorContext>) {
    super(message, code, ErrorCategory.CONFIG, context, { recoverable: false });
    this.name = 'ConfigurationError';
  }
}

export class RenderError extends TruthlogError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RENDER_FAILED,
    context?: Partial<ErrorContext>,
    options?: { cause?: unknown }
  ) {
    super(message, code, ErrorCategory.RENDER, context, { recoverable: true, ...options });
    this.name = 'RenderError';
  }
}

export class StorageError extends TruthlogError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: Partial<ErrorContext>,
    options?: { recoverable?: boolean; cause?: unknown }
  ) {
    super(message, code, ErrorCategory.STORAGE, context, options);
    this.name = 'StorageError';
  }
}

export class TranscriptError extends TruthlogError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: { cause?: unknown }) {
    super(message, ErrorCode.TRANSCRIPT_READ_FAILED, ErrorCategory.TRANSCRIPT, context, options);
    this.name = 'TranscriptError';
  }
}

export class LogMismatchError extends TruthlogError {
  /** Everything the verification engine reported for the run */
  readonly report: string;

  constructor(message: string, report: string) {
    super(message, ErrorCode.VERIFICATION_MISMATCH, ErrorCategory.VERIFICATION, {
      metadata: { report },
    });
    this.name = 'LogMismatchError';
    this.report = report;
  }
}

/**
 * Renders any thrown value as text
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
