/**
 * Error Handling Module
 *
 * Structured error types shared by the logger and the test harness.
 */

export * from './types';
