/**
 * Chat log sinks
 * Append-only destinations for timestamped receive events
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { StorageError, createChildLogger } from '@chatscribe/shared';
import { formatLogRecord } from '../log-format/index.js';
import type { ChatLogSink } from './types.js';

export class FileChatLogSink implements ChatLogSink {
  private directoryReady: Promise<string | undefined> | null = null;
  private logger = createChildLogger({ component: 'FileChatLogSink' });

  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  async append(timestamp: Date, text: string): Promise<void> {
    const record = formatLogRecord(timestamp, text);

    try {
      if (!this.directoryReady) {
        this.directoryReady = mkdir(dirname(this.path), { recursive: true });
      }
      await this.directoryReady;
      await appendFile(this.path, record, 'utf8');
    } catch (error) {
      this.directoryReady = null;
      throw new StorageError(
        `Failed to append to ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
        { path: this.path }
      );
    }

    this.logger.debug({ bytes: Buffer.byteLength(record) }, 'Appended record');
  }

  async close(): Promise<void> {
    // appendFile opens and closes per call
  }
}

/**
 * Keeps formatted records in memory
 */
export class MemoryChatLogSink implements ChatLogSink {
  private readonly records: string[] = [];

  async append(timestamp: Date, text: string): Promise<void> {
    this.records.push(formatLogRecord(timestamp, text));
  }

  async close(): Promise<void> {}

  getRecords(): string[] {
    return [...this.records];
  }

  /** The records joined as they would appear in a log file */
  toString(): string {
    return this.records.join('');
  }
}
