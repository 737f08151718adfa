/**
 * Chat Log Parser
 * Turns a persisted chat log back into structured chat messages
 */

import { createReadStream } from 'fs';
import {
  LOG_SEPARATOR,
  LOG_RECORD_DELIMITER,
  StorageError,
  createChildLogger,
  type ParsedMessage,
  type ParseFailureReason,
  type ParseSummary,
  type RecordParseResult,
} from '@chatscribe/shared';
import { parseLogTimestamp, splitLogRecords } from '../log-format/index.js';
import { findPrivmsg } from './privmsg-parser.js';

function emptySummary(): ParseSummary {
  return {
    parsed: 0,
    dropped: 0,
    dropReasons: {
      empty_record: 0,
      invalid_timestamp: 0,
      missing_separator: 0,
      not_privmsg: 0,
    },
  };
}

function tally(summary: ParseSummary, result: RecordParseResult): void {
  if (result.ok) {
    summary.parsed++;
  } else {
    summary.dropped++;
    summary.dropReasons[result.reason]++;
  }
}

function failure(reason: ParseFailureReason, record: string): RecordParseResult {
  return { ok: false, reason, record };
}

export class ChatLogParser {
  private logger = createChildLogger({ component: 'ChatLogParser' });

  /**
   * Parse one record; never throws
   */
  parseRecord(record: string): RecordParseResult {
    const trimmed = record.trim();
    if (!trimmed) {
      return failure('empty_record', record);
    }

    const tokenEnd = trimmed.search(/\s/);
    const token = tokenEnd < 0 ? trimmed : trimmed.slice(0, tokenEnd);
    const remainder = tokenEnd < 0 ? '' : trimmed.slice(tokenEnd);

    const timestamp = parseLogTimestamp(token);
    if (!timestamp) {
      return failure('invalid_timestamp', record);
    }

    const separatorIndex = remainder.indexOf(LOG_SEPARATOR);
    if (separatorIndex < 0) {
      return failure('missing_separator', record);
    }

    // Everything after the first separator is the raw chunk, further separators included
    const body = remainder.slice(separatorIndex + LOG_SEPARATOR.length).trim();
    const fields = findPrivmsg(body);
    if (!fields) {
      return failure('not_privmsg', record);
    }

    return {
      ok: true,
      message: {
        timestamp,
        channel: fields.channel,
        username: fields.username,
        message: fields.message,
      },
    };
  }

  /**
   * Parse log text held in memory
   */
  parseText(text: string): ParsedMessage[] {
    const messages: ParsedMessage[] = [];

    for (const record of splitLogRecords(text)) {
      const result = this.parseRecord(record);
      if (result.ok) {
        messages.push(result.message);
      }
    }

    return messages;
  }

  /**
   * Lazy parse results for a log file. Every iteration re-reads the file.
   */
  parseLogResults(path: string): AsyncIterable<RecordParseResult> {
    return {
      [Symbol.asyncIterator]: () => this.iterateResults(path),
    };
  }

  /**
   * Lazy chat messages for a log file; malformed records are dropped
   */
  parseLog(path: string): AsyncIterable<ParsedMessage> {
    const results = this.parseLogResults(path);

    return {
      [Symbol.asyncIterator]: async function* () {
        for await (const result of results) {
          if (result.ok) {
            yield result.message;
          }
        }
      },
    };
  }

  /**
   * Consume a log file and count parsed and dropped records
   */
  async summarize(path: string): Promise<ParseSummary> {
    const summary = emptySummary();
    for await (const result of this.parseLogResults(path)) {
      tally(summary, result);
    }
    return summary;
  }

  private async *iterateResults(path: string): AsyncGenerator<RecordParseResult> {
    const summary = emptySummary();

    for await (const record of this.readRecords(path)) {
      const result = this.parseRecord(record);
      tally(summary, result);
      yield result;
    }

    this.logger.info({ path, ...summary }, 'Chat log parsing complete');
  }

  /**
   * Stream records out of the file without loading it whole
   */
  private async *readRecords(path: string): AsyncGenerator<string> {
    const stream = createReadStream(path, { encoding: 'utf8' });
    let pending = '';

    try {
      for await (const data of stream) {
        pending += String(data);

        let index = pending.indexOf(LOG_RECORD_DELIMITER);
        while (index >= 0) {
          const record = pending.slice(0, index);
          pending = pending.slice(index + LOG_RECORD_DELIMITER.length);
          if (record.trim()) {
            yield record;
          }
          index = pending.indexOf(LOG_RECORD_DELIMITER);
        }
      }
    } catch (error) {
      throw new StorageError(
        `Unable to read chat log ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { path }
      );
    }

    if (pending.trim()) {
      yield pending;
    }
  }
}

/**
 * Lazy chat messages for a log file
 */
export function parseLog(path: string): AsyncIterable<ParsedMessage> {
  return new ChatLogParser().parseLog(path);
}
