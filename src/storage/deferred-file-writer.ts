/**
 * Deferred File Writer
 *
 * Buffers everything written to it in memory and only creates its file when
 * promoted. Promotion creates the parent directories, replays the buffer into
 * the file, and sends every later write straight to the file.
 *
 * All file operations are synchronous, so each call completes before any
 * other caller runs and writes are never interleaved.
 */

import * as fs from 'fs';
import * as path from 'path';
import { StorageError, ErrorCode, errorMessage } from '../errors';

export interface DeferredFileWriterConfig {
  /**
   * Path of the file to create on promotion. Without a path the writer
   * stays in memory and promotion does nothing.
   */
  filePath?: string;
}

export class DeferredFileWriter {
  private readonly filePath?: string;
  private buffer: string[] = [];
  private fd: number | null = null;
  private closed = false;

  constructor(config: DeferredFileWriterConfig = {}) {
    this.filePath = config.filePath ? path.resolve(config.filePath) : undefined;
  }

  /**
   * Writes text to the buffer, or to the file once promoted.
   *
   * @returns the number of bytes written
   */
  write(text: string): number {
    // Text stays queued behind a buffer that has not been flushed yet
    if (this.fd === null || this.buffer.length > 0) {
      this.buffer.push(text);
      return Buffer.byteLength(text);
    }

    return this.writeToFile(this.fd, text);
  }

  private writeToFile(fd: number, text: string): number {
    try {
      return fs.writeSync(fd, text);
    } catch (error) {
      throw new StorageError(
        `Failed to write to ${this.filePath}: ${errorMessage(error)}`,
        ErrorCode.STORAGE_WRITE_FAILED,
        { operation: 'write', path: this.filePath },
        { recoverable: true, cause: error }
      );
    }
  }

  /**
   * Creates the file and flushes the buffer into it. Calling it again only
   * retries a flush that failed.
   */
  promote(): void {
    if (this.filePath === undefined) {
      return;
    }

    const fd = this.fd ?? this.open(this.filePath);
    if (this.buffer.length === 0) {
      return;
    }

    this.writeToFile(fd, this.buffer.join(''));
    this.buffer = [];
  }

  private open(filePath: string): number {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      this.fd = fs.openSync(filePath, 'w');
      return this.fd;
    } catch (error) {
      throw new StorageError(
        `Failed to create ${filePath}: ${errorMessage(error)}`,
        ErrorCode.STORAGE_CREATE_FAILED,
        { operation: 'promote', path: filePath },
        { cause: error }
      );
    }
  }

  /**
   * Closes the file if one was created.
   */
  close(): void {
    if (this.fd === null || this.closed) {
      return;
    }

    this.closed = true;
    try {
      fs.closeSync(this.fd);
    } catch (error) {
      throw new StorageError(
        `Failed to close ${this.filePath}: ${errorMessage(error)}`,
        ErrorCode.STORAGE_CLOSE_FAILED,
        { operation: 'close', path: this.filePath },
        { cause: error }
      );
    }
  }

  /**
   * Text written but not yet flushed to a file
   */
  getBuffered(): string {
    return this.buffer.join('');
  }

  isPromoted(): boolean {
    return this.fd !== null;
  }

  /**
   * Gets the resolved file path, if any
   */
  getFilePath(): string | undefined {
    return this.filePath;
  }
}
