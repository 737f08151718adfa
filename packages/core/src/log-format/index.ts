export {
  formatLogTimestamp,
  parseLogTimestamp,
  formatLogRecord,
  splitLogRecords,
} from './log-format.js';
