/**
 * Persisted chat log format
 *
 * Each receive event becomes one record:
 *   2018-12-10_11:26:40 — <raw chunk, possibly several IRC lines>\n\n\n
 */

import { format, isValid, parse } from 'date-fns';
import {
  LOG_TIMESTAMP_FORMAT,
  LOG_SEPARATOR,
  LOG_RECORD_DELIMITER,
} from '@chatscribe/shared';

// date-fns accepts single-digit fields and extra year digits; the log never contains those
const TIMESTAMP_SHAPE = /^\d{4}-\d{2}-\d{2}_\d{2}:\d{2}:\d{2}$/;

/**
 * Format a timestamp in local time
 */
export function formatLogTimestamp(timestamp: Date): string {
  return format(timestamp, LOG_TIMESTAMP_FORMAT);
}

/**
 * Parse a record timestamp, or null when it is not a real local date-time
 */
export function parseLogTimestamp(token: string): Date | null {
  if (!TIMESTAMP_SHAPE.test(token)) {
    return null;
  }

  const parsed = parse(token, LOG_TIMESTAMP_FORMAT, new Date(0));
  if (!isValid(parsed)) {
    return null;
  }

  // Reject values that only exist by rollover (e.g. a skipped DST hour)
  return formatLogTimestamp(parsed) === token ? parsed : null;
}

export function formatLogRecord(timestamp: Date, text: string): string {
  return `${formatLogTimestamp(timestamp)} ${LOG_SEPARATOR} ${text}${LOG_RECORD_DELIMITER}`;
}

/**
 * Split log text into candidate records, dropping whitespace-only candidates
 */
export function splitLogRecords(text: string): string[] {
  return text.split(LOG_RECORD_DELIMITER).filter((record) => record.trim().length > 0);
}
