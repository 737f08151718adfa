/**
 * Log format Tests
 */
import { describe, it, expect } from 'vitest';
import {
  formatLogTimestamp,
  parseLogTimestamp,
  formatLogRecord,
  splitLogRecords,
} from './log-format.js';

describe('log format', () => {
  describe('formatLogTimestamp()', () => {
    it('should format in local time with an underscore between date and time', () => {
      expect(formatLogTimestamp(new Date(2018, 11, 10, 11, 26, 40))).toBe('2018-12-10_11:26:40');
    });

    it('should zero-pad single-digit fields', () => {
      expect(formatLogTimestamp(new Date(2021, 0, 5, 3, 4, 9))).toBe('2021-01-05_03:04:09');
    });
  });

  describe('parseLogTimestamp()', () => {
    it('should parse a well-formed timestamp as local time', () => {
      const parsed = parseLogTimestamp('2018-12-10_11:26:40');

      expect(parsed).not.toBeNull();
      expect(parsed!.getTime()).toBe(new Date(2018, 11, 10, 11, 26, 40).getTime());
    });

    it('should reject text that is not a date', () => {
      expect(parseLogTimestamp('not-a-date')).toBeNull();
    });

    it('should reject an ISO timestamp', () => {
      expect(parseLogTimestamp('2018-12-10T11:26:40')).toBeNull();
    });

    it('should reject unpadded fields', () => {
      expect(parseLogTimestamp('2018-12-1_11:26:40')).toBeNull();
    });

    it('should reject impossible calendar dates', () => {
      expect(parseLogTimestamp('2018-02-30_11:26:40')).toBeNull();
      expect(parseLogTimestamp('2018-12-10_24:00:00')).toBeNull();
    });
  });

  describe('formatLogRecord()', () => {
    it('should prefix the text and terminate with the record delimiter', () => {
      const record = formatLogRecord(new Date(2018, 11, 10, 11, 26, 40), 'PING-free text\r\n');

      expect(record).toBe('2018-12-10_11:26:40 — PING-free text\r\n\n\n\n');
    });
  });

  describe('splitLogRecords()', () => {
    it('should split on three consecutive newlines', () => {
      expect(splitLogRecords('a\n\n\nb\n\n\n')).toEqual(['a', 'b']);
    });

    it('should keep single and double newlines inside a record', () => {
      expect(splitLogRecords('a\nb\n\nc\n\n\nd')).toEqual(['a\nb\n\nc', 'd']);
    });

    it('should drop whitespace-only candidates', () => {
      expect(splitLogRecords('\n\n\n  \n\n\n')).toEqual([]);
    });
  });
});
